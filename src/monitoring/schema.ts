/**
 * Monitoring Module - Schemas and Types
 *
 * Defines the session state, alert events and thresholds for the
 * no-movement escalation state machine.
 */

// =============================================================================
// Monitoring Session
// =============================================================================

/**
 * Mutable facts about one monitoring run, held by a single owner.
 * All timestamps are readings of the monitor's monotonic clock (ms).
 */
export type MonitoringSession = Readonly<{
  /** Whether a subject is currently believed present */
  presenceDetected: boolean;
  /** Last presence=1 reading (any presence reading counts as movement) */
  lastMovementTime: number;
  /** Last presence=1 reading, kept for diagnostics */
  lastPresenceTime: number;
  /** Initial alert already raised in this no-movement episode */
  initialAlarmSent: boolean;
  /** Critical alert raised at least once in this no-movement episode */
  criticalAlarmSent: boolean;
  /** When the most recent critical alert fired (for cooldown) */
  lastCriticalAlertTime: number;
}>;

/**
 * Phase derived from the session flags. Never stored.
 */
export type MonitorPhase =
  | "idle"
  | "active"
  | "initial_alerted"
  | "critically_alerted";

// =============================================================================
// Thresholds
// =============================================================================

export type EscalationThresholds = Readonly<{
  initialThresholdMs: number;
  criticalThresholdMs: number;
  criticalCooldownMs: number;
}>;

export const DEFAULT_THRESHOLDS: EscalationThresholds = {
  initialThresholdMs: 60_000,
  criticalThresholdMs: 300_000,
  criticalCooldownMs: 600_000,
};

// =============================================================================
// Events
// =============================================================================

export type AlertTier = "initial" | "critical";

/**
 * Alert raised by the state machine and handed to the dispatcher.
 */
export type AlertEvent = Readonly<{
  tier: AlertTier;
  message: string;
  /** Seconds since last movement, truncated */
  elapsedSeconds: number;
  /** Clock reading when raised; the monitor loop restamps it in epoch ms */
  timestamp: number;
}>;

export type SessionEventType =
  | "presence_detected"
  | "presence_lost"
  | "escalation_reset";

/**
 * Session transition worth logging or broadcasting.
 */
export type SessionEvent = Readonly<{
  type: SessionEventType;
  /** Clock reading when raised; the monitor loop restamps it in epoch ms */
  timestamp: number;
}>;

/**
 * Outcome of feeding one (optional) signal and one tick into the session.
 */
export type StepResult = Readonly<{
  session: MonitoringSession;
  alerts: ReadonlyArray<AlertEvent>;
  events: ReadonlyArray<SessionEvent>;
}>;

// =============================================================================
// Monitor Loop
// =============================================================================

/**
 * Anything that accepts alerts without blocking the loop.
 */
export type AlertSink = Readonly<{
  enqueue: (alert: AlertEvent) => void;
}>;

/**
 * Optional callbacks for live views of the loop.
 */
export type MonitorObserver = Readonly<{
  onSessionEvent?: (event: SessionEvent, session: MonitoringSession) => void;
  onAlert?: (alert: AlertEvent) => void;
}>;

/**
 * Returned when the loop stops on request.
 */
export type MonitorSummary = Readonly<{
  iterations: number;
  alertsRaised: number;
  /** Epoch ms */
  startedAt: number;
  /** Epoch ms */
  stoppedAt: number;
}>;
