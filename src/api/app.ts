/**
 * Hono application: request tracing, error boundary and routes.
 */
import { Hono } from "hono";

import { type ApiErrorBody, errorHandler } from "./errorHandler.js";
import { requestIdMiddleware } from "./middleware/requestId.js";
import { type RouteDependencies, createRoutes } from "./routes.js";

export function createApp(deps: RouteDependencies): Hono {
  const app = new Hono();

  // Global middleware
  app.use("*", requestIdMiddleware);

  // Error handler
  app.onError(errorHandler);

  // Mount routes
  app.route("/", createRoutes(deps));

  app.notFound((c) => {
    const body: ApiErrorBody = { error: "Not found", requestId: c.get("requestId") };
    return c.json(body, 404);
  });

  return app;
}
