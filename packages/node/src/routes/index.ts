/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createBudgetRoutes } from "./budget.js";
export { createEventRoutes } from "./events.js";
