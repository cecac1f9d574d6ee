/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createPoolRoutes } from "./pools.js";
export { createUserRoutes, createAgentRoutes } from "./users.js";
export { createUniversalAgentRoutes } from "./universal-agents.js";
export { createSwapRoutes } from "./swaps.js";
export { createFeeRoutes } from "./fees.js";
export { createTokenRoutes } from "./tokens.js";
export { createEventRoutes } from "./events.js";
