/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 */

import { z } from "zod";
import { isAmount } from "@allotment/types";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Integer amount in the smallest unit, as a string */
export const AmountSchema = z
  .string()
  .refine(isAmount, "Amount must be a non-negative integer string");

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Budget DTOs
// =============================================================================

export const InitializeBudgetSchema = z.object({
  income: AmountSchema,
});

export type InitializeBudgetDto = z.infer<typeof InitializeBudgetSchema>;

export const AddSubDivisionSchema = z.object({
  name: z.string().min(1).max(128),
  amount: AmountSchema,
});

export type AddSubDivisionDto = z.infer<typeof AddSubDivisionSchema>;

export const SpendSchema = z.object({
  amount: AmountSchema,
});

export type SpendDto = z.infer<typeof SpendSchema>;

export const StrictModeSchema = z.object({
  enabled: z.boolean(),
});

export type StrictModeDto = z.infer<typeof StrictModeSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema;

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
