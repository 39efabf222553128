/**
 * Dispatcher Module - Public API
 */

export type {
  AlertMessage,
  DispatcherOptions,
  DispatcherStats,
  Notifier,
} from "./schema.js";
export { DEFAULT_MAX_PENDING } from "./schema.js";

export {
  buildAlertMessage,
  enqueueBounded,
  formatAlertBody,
  formatAlertSubject,
} from "./transform.js";

export { type AlertDispatcher, createAlertDispatcher } from "./service.js";
