/**
 * Dispatcher Module - Pure Transformations
 *
 * Alert wording and queue bookkeeping. No side effects.
 */
import type { AlertEvent, AlertTier } from "../monitoring/index.js";
import type { AlertMessage } from "./schema.js";

const SUBJECTS: Record<AlertTier, string> = {
  initial: "Motion Sensor - Initial Alert",
  critical: "EMERGENCY - Potential Medical Emergency Detected",
};

export function formatAlertSubject(tier: AlertTier): string {
  return SUBJECTS[tier];
}

/**
 * Human-readable body with the alert time appended.
 */
export function formatAlertBody(alert: AlertEvent): string {
  const seconds = alert.elapsedSeconds;
  const text =
    alert.tier === "initial"
      ? `A person has been detected with no movement for ${seconds} seconds.\n` +
        "This may indicate a person is unconscious or in need of assistance."
      : `URGENT: A person has been detected with absolutely no movement for ${seconds} seconds.\n` +
        "This may indicate a serious medical emergency requiring immediate attention.";

  return `${text}\n\nTimestamp: ${new Date(alert.timestamp).toISOString()}`;
}

export function buildAlertMessage(alert: AlertEvent): AlertMessage {
  return {
    subject: formatAlertSubject(alert.tier),
    body: formatAlertBody(alert),
  };
}

/**
 * Append to a bounded queue, dropping the oldest entries beyond `maxPending`.
 */
export function enqueueBounded<T>(
  queue: ReadonlyArray<T>,
  item: T,
  maxPending: number,
): Readonly<{ queue: T[]; dropped: T[] }> {
  const next = [...queue, item];
  const overflow = Math.max(0, next.length - maxPending);
  return {
    queue: next.slice(overflow),
    dropped: next.slice(0, overflow),
  };
}
