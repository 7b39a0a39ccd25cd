/**
 * Route barrel.
 */

export { createHealthRoutes } from "./health.js";
export { createHistoryRoutes } from "./history.js";
export type { HistoryRoutesOptions } from "./history.js";
export { createEventRoutes } from "./events.js";
export { createEventTypeRoutes } from "./event-types.js";
