/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createPlanRoutes } from "./plans.js";
export { createGrantRoutes, createDebtRoutes, createBeneficiaryRoutes } from "./grants.js";
export { createPoolRoutes } from "./pools.js";
export { createEventRoutes } from "./events.js";
