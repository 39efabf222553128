/**
 * Parser Module - Pure Transformations
 *
 * Pure functions for decoding radar frames.
 * No side effects, no I/O - just data in, data out.
 */
import type { PresenceSignal } from "./schema.js";
import { DEFAULT_PRESENCE_MARKER, PresenceStatusSchema } from "./schema.js";

/**
 * Decode raw bytes from the radar link, replacing invalid UTF-8.
 */
export function decodeFrame(payload: Uint8Array | string): string {
  if (typeof payload === "string") return payload;
  return new TextDecoder("utf-8", { fatal: false }).decode(payload);
}

/**
 * Extract the status token following `<marker>,`.
 *
 * @returns The token (possibly empty) or null if the marker is absent
 */
export function extractStatusToken(
  line: string,
  marker: string = DEFAULT_PRESENCE_MARKER,
): string | null {
  const trimmed = line.trim();
  const prefix = `${marker},`;
  if (!trimmed.startsWith(prefix)) return null;

  const [token] = trimmed.slice(prefix.length).split(",");
  return token ?? "";
}

/**
 * Parse one radar line into a presence reading.
 *
 * @param line - Decoded text line (surrounding whitespace is ignored)
 * @param marker - Frame marker, e.g. "SJYBSS"
 * @returns PresenceSignal, or null for malformed/irrelevant lines
 */
export function parsePresenceFrame(
  line: string,
  marker: string = DEFAULT_PRESENCE_MARKER,
): PresenceSignal | null {
  const token = extractStatusToken(line, marker);
  if (token === null) return null;

  const status = PresenceStatusSchema.safeParse(token);
  if (!status.success) return null;

  return { present: status.data === "1" };
}
