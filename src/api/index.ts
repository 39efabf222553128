/**
 * API Module - Public API
 */
export { createApp } from "./app.js";
export { type ApiErrorBody, errorHandler } from "./errorHandler.js";
export { requestIdMiddleware } from "./middleware/requestId.js";
export { APP_VERSION, type RouteDependencies, createRoutes } from "./routes.js";
