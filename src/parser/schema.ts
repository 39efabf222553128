/**
 * Parser Module - Schemas and Types
 *
 * Radar frames arrive as ASCII lines of the form `<MARKER>,<status>`.
 */
import { z } from "zod";

/**
 * Status token carried after the marker.
 * "1" = presence detected, "0" = no presence.
 */
export const PresenceStatusSchema = z
  .enum(["0", "1"])
  .describe("Presence status token");

export type PresenceStatus = z.infer<typeof PresenceStatusSchema>;

/**
 * Decoded presence reading. Transient - never retained.
 */
export type PresenceSignal = Readonly<{
  present: boolean;
}>;

/**
 * Default marker emitted by the mmWave radar module.
 */
export const DEFAULT_PRESENCE_MARKER = "SJYBSS";
