/**
 * Monitoring Module - Public API
 *
 * Exports types, the monitor loop and the pure escalation state machine.
 */

// Types
export type {
  AlertEvent,
  AlertSink,
  AlertTier,
  EscalationThresholds,
  MonitoringSession,
  MonitorObserver,
  MonitorPhase,
  MonitorSummary,
  SessionEvent,
  SessionEventType,
  StepResult,
} from "./schema.js";

export { DEFAULT_THRESHOLDS } from "./schema.js";

// Error types
export type { MonitorError } from "./errors.js";

export { formatMonitorError } from "./errors.js";

// Service functions
export type { Monitor, MonitorDependencies } from "./service.js";

export { createMonitor } from "./service.js";

// Pure transformations
export {
  applySignal,
  createAlert,
  createSession,
  derivePhase,
  evaluateEscalation,
  formatCriticalAlertMessage,
  formatInitialAlertMessage,
  getElapsedSinceMovement,
  step,
} from "./transform.js";
