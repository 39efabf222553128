/**
 * API Routes
 *
 * Read-only HTTP surface over a running monitor:
 * - /api/health - liveness, delivery counters, SSE client count
 * - /api/session - current session snapshot and thresholds
 * - /api/events - SSE stream of presence changes and alerts
 */
import { Hono } from "hono";

import { type Clock, systemClock } from "../clock.js";
import type { AlertDispatcher } from "../dispatcher/index.js";
import { createLogger } from "../logger.js";
import type { Monitor } from "../monitoring/index.js";
import {
  createSseStream,
  getClientCount,
  removeClient,
  sendToClient,
  toSessionStateEvent,
} from "../sse/index.js";

const log = createLogger("api");

export const APP_VERSION = "1.0.0";

export type RouteDependencies = Readonly<{
  monitor: Pick<
    Monitor,
    "getSession" | "getPhase" | "getThresholds" | "isRunning"
  >;
  dispatcher: Pick<AlertDispatcher, "getStats">;
  sourceName: string;
  notifierName: string;
  clock?: Clock;
}>;

/**
 * Build the route table for one monitor instance.
 */
export function createRoutes(deps: RouteDependencies): Hono {
  const { monitor, dispatcher } = deps;
  const clock = deps.clock ?? systemClock;
  const routes = new Hono();

  // ===========================================================================
  // Health Check
  // ===========================================================================

  /**
   * Health endpoint - 503 while the monitor loop is not running.
   */
  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    const running = monitor.isRunning();

    return c.json(
      {
        status: running ? "ok" : "degraded",
        timestamp: new Date(clock.wallTime()).toISOString(),
        requestId,
        version: APP_VERSION,
        config: {
          source: deps.sourceName,
          notifier: deps.notifierName,
        },
        monitorRunning: running,
        alerts: dispatcher.getStats(),
        sseClients: getClientCount(),
      },
      running ? 200 : 503,
    );
  });

  routes.get("/api/version", (c) => {
    return c.json({ version: APP_VERSION });
  });

  // ===========================================================================
  // Session
  // ===========================================================================

  routes.get("/api/session", (c) => {
    const requestId = c.get("requestId");
    const state = toSessionStateEvent(monitor.getSession(), clock);
    const thresholds = monitor.getThresholds();

    return c.json({
      phase: state.phase,
      elapsedSeconds: state.elapsedSeconds,
      session: state.session,
      thresholds: {
        initialSeconds: thresholds.initialThresholdMs / 1000,
        criticalSeconds: thresholds.criticalThresholdMs / 1000,
        criticalCooldownSeconds: thresholds.criticalCooldownMs / 1000,
      },
      requestId,
    });
  });

  // ===========================================================================
  // Server-Sent Events
  // ===========================================================================

  /**
   * SSE stream; the current session state is sent right after connecting.
   */
  routes.get("/api/events", (c) => {
    const requestId = c.get("requestId");
    const { stream, clientId } = createSseStream();

    log.info({ requestId, clientId }, "SSE client connected");

    // Drop the client as soon as the connection goes away
    c.req.raw.signal.addEventListener(
      "abort",
      () => removeClient(clientId),
      { once: true },
    );

    sendToClient(
      clientId,
      toSessionStateEvent(monitor.getSession(), clock),
    );

    return new Response(stream, {
      headers: {
        "Content-Type": "text/event-stream",
        "Cache-Control": "no-cache",
        Connection: "keep-alive",
      },
    });
  });

  return routes;
}
