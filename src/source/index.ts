/**
 * Source Module - Public API
 *
 * Exports types and factories for radar signal sources.
 */

// Types
export type { MqttSourceOptions, SignalSource } from "./schema.js";

// Error types
export type { SourceError } from "./errors.js";

export {
  connectionFailed,
  ended,
  notOpen,
  readFailed,
} from "./errors.js";

// Service functions
export type { LineQueue } from "./service.js";

export {
  createDeviceSource,
  createLineQueue,
  createMqttSource,
  createStdinSource,
  createStreamSource,
} from "./service.js";

// Pure transformations
export { describeMqttSource, splitPayloadLines } from "./transform.js";
