/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createRequestRoutes } from "./requests.js";
export { createPoolRoutes } from "./pools.js";
export { createAttestationRoutes } from "./attestations.js";
export { createEventRoutes } from "./events.js";
