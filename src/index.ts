/**
 * Vital Watch - Application Entry Point
 *
 * Wires together:
 * - Radar signal source (device node or MQTT topic)
 * - Monitor loop and escalation state machine
 * - Alert dispatcher with WhatsApp (or log-only) delivery
 * - Hono server with health, session and SSE endpoints
 * - Graceful shutdown on SIGINT/SIGTERM
 */
import { type ServerType, serve } from "@hono/node-server";

import { createApp } from "./api/index.js";
import {
  config,
  getNotificationConfig,
  getSourceConfig,
  getThresholds,
} from "./config.js";
import { createAlertDispatcher } from "./dispatcher/index.js";
import { createLogger } from "./logger.js";
import { createMonitor, formatMonitorError } from "./monitoring/index.js";
import { createLogNotifier, createWahaNotifier } from "./notifications/index.js";
import { broadcastAlert, broadcastSessionEvent, disconnectAllClients } from "./sse/index.js";
import {
  type SignalSource,
  createDeviceSource,
  createMqttSource,
  createStdinSource,
} from "./source/index.js";

const log = createLogger("app");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  VITAL WATCH - NO-MOVEMENT MONITOR");
console.log("========================================");
console.log("");

const thresholds = getThresholds();
const sourceConfig = getSourceConfig();

// Log configuration summary (non-sensitive values only)
log.info(
  {
    env: config.NODE_ENV,
    source: sourceConfig.kind,
    initialThresholdSeconds: config.INITIAL_THRESHOLD_SECONDS,
    criticalThresholdSeconds: config.CRITICAL_THRESHOLD_SECONDS,
    criticalCooldownSeconds: config.CRITICAL_COOLDOWN_SECONDS,
    httpEnabled: config.HTTP_ENABLED,
    port: config.PORT,
  },
  "Configuration loaded",
);

// =============================================================================
// SIGNAL SOURCE
// =============================================================================

function createSource(): SignalSource {
  switch (sourceConfig.kind) {
    case "mqtt":
      return createMqttSource({ brokerUrl: sourceConfig.brokerUrl, topic: sourceConfig.topic });
    case "stdin":
      return createStdinSource();
    case "device":
      return createDeviceSource(sourceConfig.path);
  }
}

const source = createSource();

log.info({ source: source.name }, `Signal source: ${sourceConfig.kind.toUpperCase()}`);

// =============================================================================
// ALERT DELIVERY
// =============================================================================

const notificationConfig = getNotificationConfig();
if (notificationConfig) {
  log.info(
    {
      server: notificationConfig.serverUrl,
      phone: notificationConfig.phoneNumber,
    },
    "WhatsApp notifications: ENABLED",
  );
} else if (config.ENABLE_NOTIFICATIONS) {
  log.warn("WhatsApp notifications: NOT CONFIGURED (WAHA_SERVER or NOTIFICATION_PHONE missing) - alerts are logged only");
} else {
  log.info("WhatsApp notifications: DISABLED - alerts are logged only");
}

const notifier = notificationConfig
  ? createWahaNotifier(notificationConfig)
  : createLogNotifier();

const dispatcher = createAlertDispatcher(notifier, {
  maxPending: config.DISPATCH_QUEUE_LIMIT,
});

// =============================================================================
// MONITOR
// =============================================================================

const monitor = createMonitor({
  source,
  dispatcher,
  thresholds,
  marker: config.PRESENCE_MARKER,
  readTimeoutMs: config.READ_TIMEOUT_MS,
  idleDelayMs: config.IDLE_DELAY_MS,
  observer: {
    onSessionEvent: broadcastSessionEvent,
    onAlert: broadcastAlert,
  },
});

// =============================================================================
// HTTP SERVER
// =============================================================================

let server: ServerType | null = null;

if (config.HTTP_ENABLED) {
  const app = createApp({
    monitor,
    dispatcher,
    sourceName: source.name,
    notifierName: notifier.name,
  });

  server = serve(
    {
      fetch: app.fetch,
      port: config.PORT,
      hostname: "0.0.0.0", // Bind to all interfaces for remote access
    },
    (info) => {
      log.info(
        { port: info.port, appName: config.APP_NAME },
        `🚀 ${config.APP_NAME} listening on port ${info.port}`,
      );
    },
  );
}

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const controller = new AbortController();

const requestStop = (signal: string) => {
  if (controller.signal.aborted) {
    log.warn({ signal }, `${signal} received again. Forcing exit`);
    process.exit(1);
  }
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);
  controller.abort();
};

process.on("SIGTERM", () => requestStop("SIGTERM"));
process.on("SIGINT", () => requestStop("SIGINT"));

function closeServer(current: ServerType): Promise<void> {
  return new Promise((resolve) => {
    current.close((error) => {
      if (error) {
        log.warn({ error: error.message }, "HTTP server close reported an error");
      }
      resolve();
    });
  });
}

// =============================================================================
// RUN
// =============================================================================

const result = await monitor.run(controller.signal);

if (result.isErr()) {
  log.fatal({ error: result.error.type }, formatMonitorError(result.error));
  process.exitCode = 1;
}

const drained = await dispatcher.drain(config.SHUTDOWN_DRAIN_TIMEOUT_MS);
log.info({ drained, ...dispatcher.getStats() }, "Alert dispatcher stopped");

// Close SSE connections before the server so it can finish closing
disconnectAllClients();
if (server) {
  await closeServer(server);
}

log.info("Shutdown complete");
