/**
 * Notifications Module - Schemas and Types
 *
 * Defines the data shapes for WAHA WhatsApp notifications.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// WAHA API Schemas
// =============================================================================

/**
 * WAHA sendText request payload.
 */
export const WahaSendTextRequestSchema = z.object({
  chatId: z.string().describe("WhatsApp chat ID (phone@c.us format)"),
  text: z.string().describe("Message text to send"),
  session: z.string().default("default").describe("WAHA session name"),
});

export type WahaSendTextRequest = z.infer<typeof WahaSendTextRequestSchema>;

// =============================================================================
// Transport Configuration
// =============================================================================

/**
 * Everything needed to reach one WhatsApp recipient through WAHA.
 */
export type WahaConfig = Readonly<{
  serverUrl: string;
  apiKey: string | undefined;
  session: string;
  phoneNumber: string;
  /** Upper bound for one HTTP request (ms) */
  timeoutMs: number;
}>;
