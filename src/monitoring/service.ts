/**
 * Monitoring Module - Service Layer
 *
 * The monitor loop: reads radar lines, feeds the state machine, ticks
 * escalation on every iteration and hands alerts to the dispatcher.
 * The session is owned by the monitor instance; nothing is module-global.
 */
import { type Result, err, ok } from "neverthrow";

import { type Clock, sleep as defaultSleep, systemClock } from "../clock.js";
import {
  createLogger,
  logOperationComplete,
  logOperationStart,
} from "../logger.js";
import {
  DEFAULT_PRESENCE_MARKER,
  type PresenceSignal,
  parsePresenceFrame,
} from "../parser/index.js";
import type { SignalSource } from "../source/index.js";
import {
  type MonitorError,
  alreadyRunning,
  formatMonitorError,
  fromReadError,
  sourceUnavailable,
} from "./errors.js";
import type {
  AlertEvent,
  AlertSink,
  EscalationThresholds,
  MonitoringSession,
  MonitorObserver,
  MonitorPhase,
  MonitorSummary,
  SessionEvent,
} from "./schema.js";
import { DEFAULT_THRESHOLDS } from "./schema.js";
import { createSession, derivePhase, step } from "./transform.js";

const log = createLogger("monitoring");

// =============================================================================
// Types
// =============================================================================

export type MonitorDependencies = Readonly<{
  source: SignalSource;
  dispatcher: AlertSink;
  thresholds?: EscalationThresholds;
  marker?: string;
  /** Bounded wait for the next line (ms) */
  readTimeoutMs?: number;
  /** Pause when no line was available (ms) */
  idleDelayMs?: number;
  clock?: Clock;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  observer?: MonitorObserver;
}>;

export type Monitor = Readonly<{
  run: (signal: AbortSignal) => Promise<Result<MonitorSummary, MonitorError>>;
  getSession: () => MonitoringSession;
  getPhase: () => MonitorPhase;
  getThresholds: () => EscalationThresholds;
  isRunning: () => boolean;
}>;

// =============================================================================
// Logging
// =============================================================================

function logSessionEvent(event: SessionEvent): void {
  switch (event.type) {
    case "presence_detected":
      log.info({ at: event.timestamp }, "Presence detected");
      break;
    case "presence_lost":
      log.info({ at: event.timestamp }, "No presence detected");
      break;
    case "escalation_reset":
      log.info({ at: event.timestamp }, "Movement detected - resetting alarm status");
      break;
  }
}

function logAlert(alert: AlertEvent): void {
  const context = { tier: alert.tier, elapsedSeconds: alert.elapsedSeconds };
  if (alert.tier === "critical") {
    log.fatal(context, alert.message);
  } else {
    log.warn(context, alert.message);
  }
}

// =============================================================================
// Monitor
// =============================================================================

/**
 * Create a monitor around one signal source.
 * The session starts idle at creation time and lives as long as the monitor.
 */
export function createMonitor(deps: MonitorDependencies): Monitor {
  const clock = deps.clock ?? systemClock;
  const sleep = deps.sleep ?? defaultSleep;
  const thresholds = deps.thresholds ?? DEFAULT_THRESHOLDS;
  const marker = deps.marker ?? DEFAULT_PRESENCE_MARKER;
  const readTimeoutMs = deps.readTimeoutMs ?? 100;
  const idleDelayMs = deps.idleDelayMs ?? 100;
  const { source, dispatcher, observer } = deps;

  let session: MonitoringSession = createSession(clock.now());
  let running = false;

  /**
   * Parse one line (if any), step the state machine and forward the results.
   *
   * @returns Number of alerts raised
   */
  function processLine(line: string | null): number {
    let presence: PresenceSignal | null = null;
    if (line !== null) {
      presence = parsePresenceFrame(line, marker);
      if (!presence) {
        log.debug({ line }, "Ignoring unrecognised frame");
      }
    }

    const result = step(session, clock.now(), thresholds, presence);
    session = result.session;

    // Everything leaving the loop is labelled with wall time
    const wallTime = clock.wallTime();

    for (const { type } of result.events) {
      const event: SessionEvent = { type, timestamp: wallTime };
      logSessionEvent(event);
      observer?.onSessionEvent?.(event, session);
    }

    for (const raised of result.alerts) {
      const alert: AlertEvent = { ...raised, timestamp: wallTime };
      logAlert(alert);
      dispatcher.enqueue(alert);
      observer?.onAlert?.(alert);
    }

    return result.alerts.length;
  }

  async function loop(
    signal: AbortSignal,
    startedAt: number,
  ): Promise<Result<MonitorSummary, MonitorError>> {
    let iterations = 0;
    let alertsRaised = 0;

    while (!signal.aborted) {
      iterations++;

      const read = await source.read(readTimeoutMs);
      if (read.isErr()) {
        return err(fromReadError(source.name, read.error));
      }

      alertsRaised += processLine(read.value);

      if (read.value === null) {
        await sleep(idleDelayMs, signal);
      }
    }

    return ok({ iterations, alertsRaised, startedAt, stoppedAt: clock.wallTime() });
  }

  return {
    run: async (signal) => {
      if (running) {
        log.warn("Monitor loop already running");
        return err(alreadyRunning());
      }

      running = true;
      const startedAt = clock.wallTime();

      try {
        const opened = await source.open();
        if (opened.isErr()) {
          const error = sourceUnavailable(source.name, opened.error);
          log.error({ source: source.name }, formatMonitorError(error));
          return err(error);
        }

        logOperationStart(log, "monitor", {
          source: source.name,
          initialThresholdMs: thresholds.initialThresholdMs,
          criticalThresholdMs: thresholds.criticalThresholdMs,
          criticalCooldownMs: thresholds.criticalCooldownMs,
        });

        try {
          const result = await loop(signal, startedAt);
          if (result.isOk()) {
            logOperationComplete(log, "monitor", startedAt, {
              iterations: result.value.iterations,
              alertsRaised: result.value.alertsRaised,
            });
          } else {
            log.error({ source: source.name }, formatMonitorError(result.error));
          }
          return result;
        } finally {
          await source.close();
        }
      } finally {
        running = false;
      }
    },

    getSession: () => session,
    getPhase: () => derivePhase(session),
    getThresholds: () => thresholds,
    isRunning: () => running,
  };
}
