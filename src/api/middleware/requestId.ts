/**
 * Request ID middleware: every request carries an ID through its log lines
 * and back out in the x-request-id response header.
 *
 * A caller-supplied ID is kept only when it is a short token; anything else
 * is replaced so it never reaches the logs verbatim.
 */
import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import { z } from "zod";
import { createLogger } from "../../logger.js";

const log = createLogger("middleware");

export const REQUEST_ID_HEADER = "x-request-id";

const RequestIdSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9._:-]+$/);

/**
 * The incoming ID when it is acceptable, otherwise a fresh UUID.
 */
export function resolveRequestId(incoming: string | undefined): string {
  const parsed = RequestIdSchema.safeParse(incoming);
  return parsed.success ? parsed.data : randomUUID();
}

export const requestIdMiddleware: MiddlewareHandler = async (c, next) => {
  const incoming = c.req.header(REQUEST_ID_HEADER);
  const requestId = resolveRequestId(incoming);

  if (incoming !== undefined && incoming !== requestId) {
    log.debug({ requestId, path: c.req.path }, "Replaced malformed request ID");
  }

  c.set("requestId", requestId);
  c.header(REQUEST_ID_HEADER, requestId);

  const start = performance.now();
  await next();

  log.debug(
    {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
    },
    "Request handled",
  );
};

declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}
