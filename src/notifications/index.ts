/**
 * Notifications Module - Public API
 */

// Types
export type { WahaConfig, WahaSendTextRequest } from "./schema.js";
export { WahaSendTextRequestSchema } from "./schema.js";

// Error types
export type { NotificationError } from "./errors.js";

export {
  formatNotificationError,
  networkError,
  notConfigured,
  sendFailed,
} from "./errors.js";

// Service functions
export {
  createLogNotifier,
  createWahaNotifier,
  sendWhatsAppMessage,
} from "./service.js";

// Pure transformations
export {
  buildSendTextUrl,
  buildWahaRequest,
  formatWhatsAppText,
  phoneToWhatsAppId,
} from "./transform.js";
