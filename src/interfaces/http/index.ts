export { default as errorHandler, statusFor } from './error-handler.js';
export { default as functionRoutes } from './function-routes.js';
export { default as eventRoutes } from './event-routes.js';
export type { EventRoutesOptions } from './event-routes.js';
export { default as taskRoutes } from './task-routes.js';
export { default as executionRoutes } from './execution-routes.js';
export { default as healthRoutes } from './health-routes.js';
export { UUID_RE, safeInt } from './params.js';
