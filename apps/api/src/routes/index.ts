/**
 * Routes Index
 *
 * Barrel export for all API routes.
 */

export { healthRoutes, type HealthRouteOptions } from './health.js';
export { userRoutes } from './users.js';
export { actionRoutes } from './actions.js';
export { adRoutes } from './ads.js';
export type { SyncServices, SyncRouteOptions } from './types.js';
