export { default as reportingPlugin } from './reporting-plugin.js';
export type { ReportingPluginOptions } from './reporting-plugin.js';
export { default as errorHandler } from './error-handler.js';
export { default as eventRoutes } from './event-routes.js';
export { default as reportRoutes } from './report-routes.js';
export { default as healthRoutes } from './health-routes.js';
export { registerApi } from './register-api.js';
