/**
 * SSE Module - Public API
 *
 * Exports types and service functions for Server-Sent Events.
 */

// Types
export type {
  AlertBroadcastEvent,
  PresenceEvent,
  SessionStateEvent,
  SseEvent,
} from "./schema.js";

// Service functions
export {
  broadcast,
  broadcastAlert,
  broadcastSessionEvent,
  createSseStream,
  disconnectAllClients,
  getClientCount,
  removeClient,
  sendToClient,
} from "./service.js";

// Pure transformations
export {
  formatSseEvent,
  formatSseFrame,
  toAlertEvent,
  toPresenceEvent,
  toSessionStateEvent,
} from "./transform.js";
