/**
 * Dispatcher Module - Service Layer
 *
 * Bounded alert queue drained by a single background worker.
 * `enqueue` never blocks and never throws; delivery outcomes are logged.
 */
import { sleep } from "../clock.js";
import { createLogger, logOperationFailed } from "../logger.js";
import type { AlertEvent, AlertSink } from "../monitoring/index.js";
import type { DispatcherOptions, DispatcherStats, Notifier } from "./schema.js";
import { DEFAULT_MAX_PENDING } from "./schema.js";
import { buildAlertMessage, enqueueBounded } from "./transform.js";

const log = createLogger("dispatcher");

export type AlertDispatcher = AlertSink &
  Readonly<{
    /**
     * Wait until the queue is empty and no delivery is in flight.
     * Resolves false when `timeoutMs` elapses first.
     */
    drain: (timeoutMs?: number) => Promise<boolean>;
    getStats: () => DispatcherStats;
  }>;

/**
 * Create a dispatcher delivering alerts through one notifier, in order.
 * Failed deliveries are not retried.
 */
export function createAlertDispatcher(
  notifier: Notifier,
  options: DispatcherOptions = {},
): AlertDispatcher {
  const maxPending = Math.max(1, options.maxPending ?? DEFAULT_MAX_PENDING);

  let pending: AlertEvent[] = [];
  let worker: Promise<void> | null = null;
  let delivered = 0;
  let failed = 0;
  let dropped = 0;

  async function deliver(alert: AlertEvent): Promise<void> {
    const { subject, body } = buildAlertMessage(alert);
    const context = { tier: alert.tier, notifier: notifier.name };

    try {
      const ok = await notifier.deliver(subject, body);
      if (ok) {
        delivered++;
        log.info(context, "Alert notification sent");
      } else {
        failed++;
        log.error(context, "Alert notification failed");
      }
    } catch (error) {
      failed++;
      logOperationFailed(log, "deliverAlert", error, context);
    }
  }

  async function processQueue(): Promise<void> {
    let alert = pending.shift();
    while (alert) {
      await deliver(alert);
      alert = pending.shift();
    }
  }

  function startWorker(): void {
    if (worker) return;
    worker = processQueue().finally(() => {
      worker = null;
      if (pending.length > 0) startWorker();
    });
  }

  async function waitIdle(): Promise<void> {
    while (worker) {
      await worker;
    }
  }

  return {
    enqueue: (alert) => {
      const next = enqueueBounded(pending, alert, maxPending);
      pending = next.queue;

      for (const lost of next.dropped) {
        dropped++;
        log.warn({ tier: lost.tier, maxPending }, "Alert queue full - dropping oldest alert");
      }

      log.debug({ tier: alert.tier, pending: pending.length }, "Alert queued");
      startWorker();
    },

    drain: async (timeoutMs) => {
      if (!worker && pending.length === 0) return true;
      if (timeoutMs === undefined) {
        await waitIdle();
        return true;
      }

      const controller = new AbortController();
      const idle = waitIdle().then(() => true);
      const timedOut = sleep(timeoutMs, controller.signal).then(() => false);

      const drained = await Promise.race([idle, timedOut]);
      controller.abort();

      if (!drained) {
        log.warn({ pending: pending.length, timeoutMs }, "Alert queue not drained before timeout");
      }
      return drained;
    },

    getStats: () => ({ delivered, failed, dropped, pending: pending.length }),
  };
}
