/**
 * Parser Module - Public API
 *
 * Exports types and pure transformations for radar frame parsing.
 */

// Types
export type { PresenceSignal, PresenceStatus } from "./schema.js";

export { DEFAULT_PRESENCE_MARKER, PresenceStatusSchema } from "./schema.js";

// Pure transformations
export {
  decodeFrame,
  extractStatusToken,
  parsePresenceFrame,
} from "./transform.js";
