/**
 * Dispatcher Module - Schemas and Types
 *
 * The dispatcher decouples alert emission (monitor loop) from alert
 * delivery (notification transport).
 */
/**
 * Delivery transport. Resolves true on success, false on failure.
 * Latency and transport details are opaque to the dispatcher.
 */
export type Notifier = Readonly<{
  name: string;
  deliver: (subject: string, body: string) => Promise<boolean>;
}>;

/**
 * Subject and body handed to the notifier.
 */
export type AlertMessage = Readonly<{
  subject: string;
  body: string;
}>;

export type DispatcherOptions = Readonly<{
  /** Maximum alerts waiting for delivery; the oldest is dropped beyond this */
  maxPending?: number;
}>;

export type DispatcherStats = Readonly<{
  delivered: number;
  failed: number;
  dropped: number;
  pending: number;
}>;

export const DEFAULT_MAX_PENDING = 100;
