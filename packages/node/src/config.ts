/**
 * Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { LedgerPolicy } from "@allotment/budget";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Identity is asserted by a trusted upstream through this header
  IDENTITY_HEADER: z.string().min(1).default("X-Identity-Id"),

  // Durable spend log; in-memory when unset
  EVENT_LOG_PATH: z.string().min(1).optional(),

  // Idempotency
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),

  // Ledger policy
  REINITIALIZE: z.enum(["overwrite", "reject"]).default("overwrite"),
  DUPLICATE_SUBDIVISION: z.enum(["overwrite", "reject"]).default("overwrite"),
  GENERAL_OVERSPEND: z.enum(["allow", "reject"]).default("allow"),
  LENIENT_DAILY_TRACKING: z.enum(["accumulate", "skip"]).default("accumulate"),
  CATEGORY_CEILING: z.enum(["legacy", "enforced"]).default("legacy"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

export function policyFromConfig(config: AppConfig): LedgerPolicy {
  return {
    reinitialize: config.REINITIALIZE,
    duplicateSubDivision: config.DUPLICATE_SUBDIVISION,
    generalOverspend: config.GENERAL_OVERSPEND,
    lenientDailyTracking: config.LENIENT_DAILY_TRACKING,
    categoryCeiling: config.CATEGORY_CEILING,
  };
}
