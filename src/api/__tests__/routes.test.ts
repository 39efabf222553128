/**
 * API Routes Integration Tests
 *
 * Uses Hono's app.request() against a stub monitor and dispatcher.
 */
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../../config.js", () => ({
  config: {
    LOG_LEVEL: "silent",
    NODE_ENV: "production",
  },
}));

// Mock logger to prevent pino initialization issues
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
}));

// Now import the modules (after mocks are set up)
import type { MonitoringSession } from "../../monitoring/index.js";
import { DEFAULT_THRESHOLDS, derivePhase } from "../../monitoring/index.js";
import { disconnectAllClients, getClientCount } from "../../sse/index.js";
import { createApp } from "../app.js";
import type { RouteDependencies } from "../routes.js";

const T0 = 1_700_000_000_000;

const presentSession: MonitoringSession = {
  presenceDetected: true,
  lastMovementTime: T0,
  lastPresenceTime: T0,
  initialAlarmSent: true,
  criticalAlarmSent: false,
  lastCriticalAlertTime: T0,
};

function createTestApp(overrides: { running?: boolean; session?: MonitoringSession } = {}) {
  const session = overrides.session ?? presentSession;
  const deps: RouteDependencies = {
    monitor: {
      getSession: () => session,
      getPhase: () => derivePhase(session),
      getThresholds: () => DEFAULT_THRESHOLDS,
      isRunning: () => overrides.running ?? true,
    },
    dispatcher: {
      getStats: () => ({ delivered: 2, failed: 1, dropped: 0, pending: 0 }),
    },
    sourceName: "/dev/ttyAMA0",
    notifierName: "whatsapp",
    clock: { now: () => T0 + 61_500, wallTime: () => T0 + 61_500 },
  };
  return createApp(deps);
}

describe("API Routes", () => {
  beforeEach(() => {
    disconnectAllClients();
  });

  afterEach(() => {
    disconnectAllClients();
  });

  // ===========================================================================
  // Health Check
  // ===========================================================================

  describe("GET /api/health", () => {
    test("returns 200 with monitor status", async () => {
      const res = await createTestApp().request("/api/health", {
        headers: { "x-request-id": "test-request-id" },
      });

      expect(res.status).toBe(200);
      expect(res.headers.get("x-request-id")).toBe("test-request-id");
      expect(await res.json()).toEqual({
        status: "ok",
        timestamp: "2023-11-14T22:14:21.500Z",
        requestId: "test-request-id",
        version: "1.0.0",
        config: { source: "/dev/ttyAMA0", notifier: "whatsapp" },
        monitorRunning: true,
        alerts: { delivered: 2, failed: 1, dropped: 0, pending: 0 },
        sseClients: 0,
      });
    });

    test("returns 503 while the monitor is not running", async () => {
      const res = await createTestApp({ running: false }).request("/api/health");

      expect(res.status).toBe(503);
      expect(await res.json()).toMatchObject({
        status: "degraded",
        monitorRunning: false,
      });
    });

    test("generates a request ID when none is supplied", async () => {
      const res = await createTestApp().request("/api/health");

      expect(res.headers.get("x-request-id")).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
      );
    });
  });

  describe("GET /api/version", () => {
    test("returns version string", async () => {
      const res = await createTestApp().request("/api/version");

      expect(await res.json()).toEqual({ version: "1.0.0" });
    });
  });

  // ===========================================================================
  // Session
  // ===========================================================================

  describe("GET /api/session", () => {
    test("returns the session snapshot with phase and thresholds", async () => {
      const res = await createTestApp().request("/api/session", {
        headers: { "x-request-id": "req-1" },
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        phase: "initial_alerted",
        elapsedSeconds: 61,
        session: presentSession,
        thresholds: {
          initialSeconds: 60,
          criticalSeconds: 300,
          criticalCooldownSeconds: 600,
        },
        requestId: "req-1",
      });
    });

    test("reports idle with zero elapsed seconds when nobody is present", async () => {
      const res = await createTestApp({
        session: { ...presentSession, presenceDetected: false, initialAlarmSent: false },
      }).request("/api/session");

      expect(await res.json()).toMatchObject({ phase: "idle", elapsedSeconds: 0 });
    });
  });

  // ===========================================================================
  // Server-Sent Events
  // ===========================================================================

  describe("GET /api/events", () => {
    test("streams the connection frame then the session state", async () => {
      const res = await createTestApp().request("/api/events");

      expect(res.headers.get("content-type")).toBe("text/event-stream");
      expect(getClientCount()).toBe(1);

      const reader = res.body?.getReader();
      expect(reader).toBeDefined();
      if (!reader) return;

      const decoder = new TextDecoder();
      const first = await reader.read();
      expect(decoder.decode(first.value)).toMatch(/^event: connected\ndata: \{"clientId":\d+\}\n\n$/);

      const second = await reader.read();
      const frame = decoder.decode(second.value);
      expect(frame.startsWith('event: session_state\ndata: {"type":"session_state","phase":"initial_alerted"')).toBe(true);
      expect(frame.endsWith('"elapsedSeconds":61}\n\n')).toBe(true);

      await reader.cancel();
      expect(getClientCount()).toBe(0);
    });

    test("removes the client and ends the stream when the request aborts", async () => {
      const connection = new AbortController();
      const res = await createTestApp().request(
        new Request("http://localhost/api/events", { signal: connection.signal }),
      );
      expect(getClientCount()).toBe(1);

      connection.abort();

      expect(getClientCount()).toBe(0);
      const reader = res.body?.getReader();
      if (!reader) throw new Error("expected a response body");
      await reader.read(); // connected
      await reader.read(); // session_state
      expect((await reader.read()).done).toBe(true);
    });
  });

  // ===========================================================================
  // Errors
  // ===========================================================================

  describe("error handling", () => {
    test("hides internal error messages in production", async () => {
      const app = createTestApp();
      app.get("/api/boom", () => {
        throw new Error("kaboom");
      });

      const res = await app.request("/api/boom", {
        headers: { "x-request-id": "req-err" },
      });

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        error: "Internal server error",
        requestId: "req-err",
      });
    });

    test("returns JSON 404 for unknown routes", async () => {
      const res = await createTestApp().request("/api/nope", {
        headers: { "x-request-id": "req-404" },
      });

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Not found", requestId: "req-404" });
    });
  });
});
