/**
 * API error boundary.
 *
 * HTTPExceptions raised by routes keep their status and message. Anything
 * else is a 500, with the message hidden in production.
 */
import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { config } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("api");

export type ApiErrorBody = Readonly<{ error: string; requestId: string }>;

export const errorHandler: ErrorHandler = (err, c) => {
  const requestId = c.get("requestId") ?? "unknown";
  const context = {
    requestId,
    path: c.req.path,
    method: c.req.method,
    error: err.message,
  };

  if (err instanceof HTTPException) {
    log.warn({ ...context, status: err.status }, "Request rejected");
    const body: ApiErrorBody = { error: err.message, requestId };
    return c.json(body, err.status);
  }

  log.error({ ...context, stack: err.stack }, "Unhandled API error");

  const body: ApiErrorBody = {
    error: config.NODE_ENV === "production" ? "Internal server error" : err.message,
    requestId,
  };
  return c.json(body, 500);
};
