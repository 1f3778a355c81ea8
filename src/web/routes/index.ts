/**
 * @fileoverview Barrel export for all route modules.
 */

export { registerStatusRoutes } from './status-routes.js';
export { registerActionRoutes } from './action-routes.js';
export { registerLifecycleRoutes } from './lifecycle-routes.js';
