/**
 * Notifications Module - Service Layer
 *
 * WAHA WhatsApp API integration, plus the notifier adapters the alert
 * dispatcher delivers through.
 */
import { type Result, err, ok } from "neverthrow";

import { getNotificationConfig } from "../config.js";
import type { Notifier } from "../dispatcher/index.js";
import { createLogger } from "../logger.js";
import {
  formatNotificationError,
  networkError,
  notConfigured,
  sendFailed,
} from "./errors.js";
import type { NotificationError } from "./errors.js";
import type { WahaConfig } from "./schema.js";
import {
  buildSendTextUrl,
  buildWahaRequest,
  formatWhatsAppText,
  phoneToWhatsAppId,
} from "./transform.js";

const log = createLogger("notifications");

// =============================================================================
// Core Send Function
// =============================================================================

/**
 * Send a WhatsApp message via WAHA API.
 *
 * @param message - Message text to send
 * @param wahaConfig - Transport settings; read from the environment by default
 */
export async function sendWhatsAppMessage(
  message: string,
  wahaConfig: WahaConfig | null = getNotificationConfig(),
): Promise<Result<void, NotificationError>> {
  if (!wahaConfig) {
    return err(
      notConfigured(
        "WhatsApp notifications not configured (WAHA_SERVER or NOTIFICATION_PHONE missing)",
      ),
    );
  }

  const chatId = phoneToWhatsAppId(wahaConfig.phoneNumber);
  const payload = buildWahaRequest(chatId, message, wahaConfig.session);
  const url = buildSendTextUrl(wahaConfig.serverUrl);

  log.debug({ url, chatId }, "Sending WhatsApp notification...");

  try {
    const response = await fetch(url, {
      method: "POST",
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json",
        ...(wahaConfig.apiKey ? { "X-API-Key": wahaConfig.apiKey } : {}),
      },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(wahaConfig.timeoutMs),
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => "Unknown error");
      log.error(
        { statusCode: response.status, error: errorText },
        "WAHA API request failed",
      );
      return err(
        sendFailed(
          `WAHA API returned ${response.status}: ${errorText}`,
          response.status,
        ),
      );
    }

    log.info({ chatId }, "WhatsApp notification sent successfully");
    return ok(undefined);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    log.error({ error: message }, "Failed to send WhatsApp notification");
    return err(
      networkError(message, error instanceof Error ? error : undefined),
    );
  }
}

// =============================================================================
// Notifiers
// =============================================================================

/**
 * Notifier delivering alerts over WhatsApp.
 * Resolves false (never throws) when WAHA is unreachable or not configured.
 */
export function createWahaNotifier(
  wahaConfig: WahaConfig | null = getNotificationConfig(),
): Notifier {
  if (!wahaConfig) {
    log.warn("WhatsApp notifier created without WAHA configuration");
  }

  return {
    name: "whatsapp",
    deliver: async (subject, body) => {
      const result = await sendWhatsAppMessage(
        formatWhatsAppText(subject, body),
        wahaConfig,
      );
      if (result.isErr()) {
        log.warn({ subject }, formatNotificationError(result.error));
        return false;
      }
      return true;
    },
  };
}

/**
 * Notifier that only writes alerts to the log; used when delivery is disabled.
 */
export function createLogNotifier(): Notifier {
  return {
    name: "log",
    deliver: (subject, body) => {
      log.warn({ subject, body }, "Notification (delivery disabled)");
      return Promise.resolve(true);
    },
  };
}
