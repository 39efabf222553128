/**
 * Source Module - Schemas and Types
 *
 * A signal source yields raw radar lines with a bounded wait, so the
 * monitor loop keeps ticking while the sensor is silent.
 */
import type { Result } from "neverthrow";
import type { SourceError } from "./errors.js";

/**
 * Line-oriented radar frame source.
 */
export type SignalSource = Readonly<{
  /** Human-readable identity for logs (device path, broker/topic) */
  name: string;
  /** Acquire the underlying connection */
  open: () => Promise<Result<void, SourceError>>;
  /**
   * Next line, or null if none arrived within `timeoutMs`.
   * Fails once the connection errors or ends and no buffered line is left.
   */
  read: (timeoutMs: number) => Promise<Result<string | null, SourceError>>;
  /** Release the connection. Safe to call more than once. */
  close: () => Promise<void>;
}>;

/**
 * MQTT source settings.
 */
export type MqttSourceOptions = Readonly<{
  brokerUrl: string;
  topic: string;
  connectTimeoutMs?: number;
  reconnectPeriodMs?: number;
}>;
