/**
 * Notifications Module - Pure Transformations
 *
 * Pure functions for building WAHA requests.
 * No side effects, no I/O - just data in, data out.
 */
import type { WahaSendTextRequest } from "./schema.js";

// =============================================================================
// Message Formatting
// =============================================================================

/**
 * Fold a subject and body into one WhatsApp message; the subject is bolded.
 */
export function formatWhatsAppText(subject: string, body: string): string {
  return `*${subject}*\n\n${body}`;
}

// =============================================================================
// WAHA Request Building
// =============================================================================

/**
 * Build WAHA sendText request payload.
 *
 * @param chatId - WhatsApp chat ID (phone@c.us format)
 * @param session - WAHA session name
 */
export function buildWahaRequest(
  chatId: string,
  message: string,
  session = "default",
): WahaSendTextRequest {
  return {
    chatId,
    text: message,
    session,
  };
}

/**
 * Convert phone number to WhatsApp chat ID format.
 *
 * @param phone - Phone number (with or without + prefix)
 * @returns Chat ID in phone@c.us format
 */
export function phoneToWhatsAppId(phone: string): string {
  // Remove + prefix and any spaces/dashes
  const cleaned = phone.replace(/[\s+-]/g, "");
  return `${cleaned}@c.us`;
}

/**
 * Join the server URL and API path without doubling the slash.
 */
export function buildSendTextUrl(serverUrl: string): string {
  return `${serverUrl.replace(/\/+$/, "")}/api/sendText`;
}
