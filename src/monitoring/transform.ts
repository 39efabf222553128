/**
 * Monitoring Module - Pure Transformations
 *
 * The no-movement escalation state machine.
 * No side effects, no I/O - session in, session out.
 *
 * Phases (derived, not stored):
 *   idle → active            presence=1
 *   active → initial_alerted no movement beyond the initial threshold
 *   * → critically_alerted   no movement beyond the critical threshold
 *   alerted → active         presence=1 (movement clears the episode)
 *   * → idle                 presence=0
 */
import type { PresenceSignal } from "../parser/index.js";
import type {
  AlertEvent,
  EscalationThresholds,
  MonitoringSession,
  MonitorPhase,
  SessionEvent,
  StepResult,
} from "./schema.js";

// =============================================================================
// Session Lifecycle
// =============================================================================

/**
 * Fresh session: nobody present, no alarms, all timestamps at start time.
 */
export function createSession(now: number): MonitoringSession {
  return {
    presenceDetected: false,
    lastMovementTime: now,
    lastPresenceTime: now,
    initialAlarmSent: false,
    criticalAlarmSent: false,
    lastCriticalAlertTime: now,
  };
}

/**
 * Derive the current phase from the session flags.
 */
export function derivePhase(session: MonitoringSession): MonitorPhase {
  if (!session.presenceDetected) return "idle";
  if (session.criticalAlarmSent) return "critically_alerted";
  if (session.initialAlarmSent) return "initial_alerted";
  return "active";
}

/**
 * Milliseconds since the last movement, never negative.
 */
export function getElapsedSinceMovement(
  session: MonitoringSession,
  now: number,
): number {
  return Math.max(0, now - session.lastMovementTime);
}

// =============================================================================
// Alert Messages
// =============================================================================

export function formatInitialAlertMessage(elapsedSeconds: number): string {
  return `INITIAL ALERT: Person present but no vital signs detected for ${elapsedSeconds} seconds`;
}

export function formatCriticalAlertMessage(elapsedSeconds: number): string {
  return `EMERGENCY: No vital signs detected for ${elapsedSeconds} seconds!`;
}

/**
 * Build an alert for the given tier.
 */
export function createAlert(
  tier: AlertEvent["tier"],
  elapsedMs: number,
  now: number,
): AlertEvent {
  const elapsedSeconds = Math.floor(elapsedMs / 1000);
  return {
    tier,
    message:
      tier === "initial"
        ? formatInitialAlertMessage(elapsedSeconds)
        : formatCriticalAlertMessage(elapsedSeconds),
    elapsedSeconds,
    timestamp: now,
  };
}

// =============================================================================
// Signal Handling
// =============================================================================

/**
 * Apply one presence reading to the session.
 */
export function applySignal(
  session: MonitoringSession,
  signal: PresenceSignal,
  now: number,
): Readonly<{ session: MonitoringSession; events: ReadonlyArray<SessionEvent> }> {
  const events: SessionEvent[] = [];

  if (signal.present) {
    let next: MonitoringSession = {
      ...session,
      lastMovementTime: Math.max(session.lastMovementTime, now),
      lastPresenceTime: Math.max(session.lastPresenceTime, now),
    };

    if (!next.presenceDetected) {
      next = { ...next, presenceDetected: true };
      events.push({ type: "presence_detected", timestamp: now });
    }

    if (next.initialAlarmSent || next.criticalAlarmSent) {
      next = { ...next, initialAlarmSent: false, criticalAlarmSent: false };
      events.push({ type: "escalation_reset", timestamp: now });
    }

    return { session: next, events };
  }

  if (!session.presenceDetected) {
    return { session, events };
  }

  events.push({ type: "presence_lost", timestamp: now });
  return {
    session: {
      ...session,
      presenceDetected: false,
      initialAlarmSent: false,
      criticalAlarmSent: false,
    },
    events,
  };
}

// =============================================================================
// Escalation
// =============================================================================

/**
 * Check both alert tiers against the time since last movement.
 * Initial is checked before Critical; both may fire in the same tick.
 */
export function evaluateEscalation(
  session: MonitoringSession,
  now: number,
  thresholds: EscalationThresholds,
): Readonly<{ session: MonitoringSession; alerts: ReadonlyArray<AlertEvent> }> {
  if (!session.presenceDetected) {
    return { session, alerts: [] };
  }

  const elapsed = getElapsedSinceMovement(session, now);
  const alerts: AlertEvent[] = [];
  let next = session;

  if (elapsed > thresholds.initialThresholdMs && !next.initialAlarmSent) {
    alerts.push(createAlert("initial", elapsed, now));
    next = { ...next, initialAlarmSent: true };
  }

  const cooldownElapsed =
    now - next.lastCriticalAlertTime > thresholds.criticalCooldownMs;
  if (
    elapsed > thresholds.criticalThresholdMs &&
    (!next.criticalAlarmSent || cooldownElapsed)
  ) {
    alerts.push(createAlert("critical", elapsed, now));
    next = { ...next, criticalAlarmSent: true, lastCriticalAlertTime: now };
  }

  return { session: next, alerts };
}

/**
 * One state machine step: apply the signal (if any), then tick.
 */
export function step(
  session: MonitoringSession,
  now: number,
  thresholds: EscalationThresholds,
  signal: PresenceSignal | null = null,
): StepResult {
  const applied =
    signal === null ? { session, events: [] } : applySignal(session, signal, now);
  const ticked = evaluateEscalation(applied.session, now, thresholds);

  return {
    session: ticked.session,
    alerts: ticked.alerts,
    events: applied.events,
  };
}
