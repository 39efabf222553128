/**
 * SSE Module - Schemas and Types
 *
 * Defines the event types for Server-Sent Events.
 */
import type {
  AlertTier,
  MonitoringSession,
  MonitorPhase,
  SessionEventType,
} from "../monitoring/index.js";

// =============================================================================
// SSE Event Types
// =============================================================================

/**
 * Presence change or escalation reset.
 */
export type PresenceEvent = Readonly<{
  type: "presence";
  present: boolean;
  reason: SessionEventType;
  phase: MonitorPhase;
  timestamp: number;
}>;

/**
 * Alert raised by the monitor loop.
 */
export type AlertBroadcastEvent = Readonly<{
  type: "alert";
  tier: AlertTier;
  message: string;
  elapsedSeconds: number;
  timestamp: number;
}>;

/**
 * Session snapshot (initial state on connect); session times are epoch ms.
 */
export type SessionStateEvent = Readonly<{
  type: "session_state";
  phase: MonitorPhase;
  session: MonitoringSession;
  elapsedSeconds: number;
}>;

/**
 * Union of all SSE event types.
 */
export type SseEvent = PresenceEvent | AlertBroadcastEvent | SessionStateEvent;
