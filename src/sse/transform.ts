/**
 * SSE Module - Pure Transformations
 *
 * Monitor values to SSE events, and SSE events to wire frames.
 */
import { type Clock, toWallTime } from "../clock.js";
import type {
  AlertEvent,
  MonitoringSession,
  SessionEvent,
} from "../monitoring/index.js";
import {
  derivePhase,
  getElapsedSinceMovement,
} from "../monitoring/transform.js";
import type {
  AlertBroadcastEvent,
  PresenceEvent,
  SessionStateEvent,
  SseEvent,
} from "./schema.js";

export function toPresenceEvent(
  event: SessionEvent,
  session: MonitoringSession,
): PresenceEvent {
  return {
    type: "presence",
    present: session.presenceDetected,
    reason: event.type,
    phase: derivePhase(session),
    timestamp: event.timestamp,
  };
}

export function toAlertEvent(alert: AlertEvent): AlertBroadcastEvent {
  return { type: "alert", ...alert };
}

/**
 * Snapshot of the session with its clock readings converted to epoch ms.
 */
export function toSessionStateEvent(
  session: MonitoringSession,
  clock: Clock,
): SessionStateEvent {
  const now = clock.now();
  return {
    type: "session_state",
    phase: derivePhase(session),
    session: {
      ...session,
      lastMovementTime: toWallTime(clock, session.lastMovementTime),
      lastPresenceTime: toWallTime(clock, session.lastPresenceTime),
      lastCriticalAlertTime: toWallTime(clock, session.lastCriticalAlertTime),
    },
    elapsedSeconds: session.presenceDetected
      ? Math.floor(getElapsedSinceMovement(session, now) / 1000)
      : 0,
  };
}

/**
 * Serialize one event in text/event-stream framing.
 */
export function formatSseFrame(eventName: string, data: unknown): string {
  return `event: ${eventName}\ndata: ${JSON.stringify(data)}\n\n`;
}

export function formatSseEvent(event: SseEvent): string {
  return formatSseFrame(event.type, event);
}
