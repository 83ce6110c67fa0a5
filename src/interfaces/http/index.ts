export { default as taskRoutes } from './task-routes.js';
export { default as runRoutes } from './run-routes.js';
export { default as workerRoutes } from './worker-routes.js';
export { default as dashboardRoutes } from './dashboard-routes.js';
export type { DashboardRoutesOptions } from './dashboard-routes.js';
export { default as diagnosticRoutes } from './diagnostic-routes.js';
export { default as healthRoutes } from './health-routes.js';
export { registerErrorHandler } from './error-handler.js';
export type { ErrorHandlerOptions } from './error-handler.js';
