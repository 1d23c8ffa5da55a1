/**
 * HTTP Module
 */

export type { RouteOptions } from './routes.js';
export { createRoutes, errorHandler } from './routes.js';
