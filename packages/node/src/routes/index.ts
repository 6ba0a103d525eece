/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createLendingRoutes } from "./lending.js";
export { createAmmRoutes } from "./amm.js";
export { createEventRoutes } from "./events.js";
export { createCustodyRoutes } from "./custody.js";
export type { CustodyRouteOptions } from "./custody.js";
export { createClockRoutes } from "./clock.js";
export { parseId, parseQuery, found } from "./params.js";
