/**
 * Source Module - Service Layer
 *
 * Signal sources over a Node stream (serial device node, recorded log,
 * stdin) and over an MQTT topic. Lines are buffered as they arrive and
 * handed out one at a time with a bounded wait.
 */
import { once } from "node:events";
import { createReadStream } from "node:fs";
import { createInterface, type Interface } from "node:readline";
import type { Readable } from "node:stream";
import mqtt from "mqtt";
import type { MqttClient } from "mqtt";
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import { decodeFrame } from "../parser/index.js";
import type { SourceError } from "./errors.js";
import {
  connectionFailed,
  ended,
  notOpen,
  readFailed,
  toError,
} from "./errors.js";
import type { MqttSourceOptions, SignalSource } from "./schema.js";
import { describeMqttSource, splitPayloadLines } from "./transform.js";

const log = createLogger("source");

// =============================================================================
// Line Queue
// =============================================================================

export type LineQueue = Readonly<{
  push: (line: string) => void;
  /** Record a terminal failure; reported once buffered lines are drained */
  fail: (error: SourceError) => void;
  next: (timeoutMs: number) => Promise<Result<string | null, SourceError>>;
  size: () => number;
}>;

/**
 * Single-consumer line buffer with a bounded wait.
 */
export function createLineQueue(): LineQueue {
  const lines: string[] = [];
  let failure: SourceError | null = null;
  let waiter: ((result: Result<string | null, SourceError>) => void) | null =
    null;

  const settle = (result: Result<string | null, SourceError>): boolean => {
    if (!waiter) return false;
    const resolve = waiter;
    waiter = null;
    resolve(result);
    return true;
  };

  return {
    push: (line) => {
      if (failure) return;
      if (!settle(ok(line))) {
        lines.push(line);
      }
    },
    fail: (error) => {
      if (failure) return;
      failure = error;
      if (lines.length === 0) {
        settle(err(error));
      }
    },
    next: (timeoutMs) => {
      const line = lines.shift();
      if (line !== undefined) return Promise.resolve(ok(line));
      if (failure) return Promise.resolve(err(failure));

      // A second concurrent reader takes over; the first sees a timeout.
      settle(ok(null));

      return new Promise((resolve) => {
        const timer = setTimeout(() => {
          waiter = null;
          resolve(ok(null));
        }, timeoutMs);
        waiter = (result) => {
          clearTimeout(timer);
          resolve(result);
        };
      });
    },
    size: () => lines.length,
  };
}

// =============================================================================
// Stream Source
// =============================================================================

/**
 * Source over any Node Readable, split into lines with readline.
 *
 * @param name - Identity for logs
 * @param openStream - Called on open(); may reject when the device is missing
 */
export function createStreamSource(
  name: string,
  openStream: () => Promise<Readable> | Readable,
): SignalSource {
  let stream: Readable | null = null;
  let reader: Interface | null = null;
  let queue: LineQueue | null = null;

  return {
    name,

    open: async () => {
      if (queue) return ok(undefined);

      log.info({ source: name }, "Opening signal source...");

      let opened: Readable;
      try {
        opened = await openStream();
      } catch (error) {
        const cause = toError(error);
        log.error({ source: name, error: cause.message }, "Failed to open signal source");
        return err(connectionFailed(name, cause.message, cause));
      }

      const lines = createLineQueue();
      const onError = (error: Error) => {
        log.error({ source: name, error: error.message }, "Signal source error");
        lines.fail(readFailed(name, error.message, error));
      };

      opened.on("error", onError);
      const rl = createInterface({ input: opened, crlfDelay: Infinity });
      rl.on("line", (line: string) => lines.push(line));
      rl.on("error", onError);
      rl.on("close", () => lines.fail(ended(name)));

      stream = opened;
      reader = rl;
      queue = lines;

      log.info({ source: name }, "Signal source connected");
      return ok(undefined);
    },

    read: (timeoutMs) => {
      if (!queue) return Promise.resolve(err(notOpen(name)));
      return queue.next(timeoutMs);
    },

    close: async () => {
      if (!reader && !stream) return;

      reader?.close();
      stream?.destroy();
      reader = null;
      stream = null;
      queue = null;

      log.info({ source: name }, "Signal source closed");
    },
  };
}

/**
 * Source over a serial device node or a recorded log file.
 * The port is expected to be configured (baud rate, raw mode) by the host.
 */
export function createDeviceSource(path: string): SignalSource {
  return createStreamSource(path, async () => {
    const stream = createReadStream(path);
    await once(stream, "open");
    return stream;
  });
}

/**
 * Source over piped input, e.g. `socat` from the serial port or a replayed log.
 */
export function createStdinSource(
  input: Readable = process.stdin,
): SignalSource {
  return createStreamSource("stdin", () => input);
}

// =============================================================================
// MQTT Source
// =============================================================================

/**
 * Source over an MQTT topic carrying radar lines.
 * Reconnects are left to the MQTT client; only the first connect must succeed.
 */
export function createMqttSource(options: MqttSourceOptions): SignalSource {
  const name = describeMqttSource(options.brokerUrl, options.topic);
  let client: MqttClient | null = null;
  let queue: LineQueue | null = null;

  const handleMessage = (topic: string, payload: Buffer) => {
    if (!queue) return;
    for (const line of splitPayloadLines(decodeFrame(payload))) {
      queue.push(line);
    }
    log.trace({ topic, bytes: payload.length }, "Radar message received");
  };

  return {
    name,

    open: () => {
      if (queue) return Promise.resolve(ok(undefined));

      log.info({ source: name }, "Connecting to MQTT broker...");

      const connectTimeoutMs = options.connectTimeoutMs ?? 10000;

      return new Promise((resolve) => {
        let settled = false;
        const finish = (result: Result<void, SourceError>) => {
          if (settled) return;
          settled = true;
          clearTimeout(timer);
          resolve(result);
        };

        const mqttClient = mqtt.connect(options.brokerUrl, {
          reconnectPeriod: options.reconnectPeriodMs ?? 5000,
          connectTimeout: connectTimeoutMs,
        });
        client = mqttClient;

        const timer = setTimeout(() => {
          if (settled) return;
          log.error({ source: name, connectTimeoutMs }, "Timed out connecting to MQTT broker");
          mqttClient.end(true);
          client = null;
          finish(err(connectionFailed(name, "Timed out connecting to MQTT broker")));
        }, connectTimeoutMs);

        mqttClient.on("connect", () => {
          log.info({ source: name }, "Connected to MQTT broker");

          mqttClient.subscribe(options.topic, (error) => {
            if (error) {
              log.error(
                { topic: options.topic, error: error.message },
                "Failed to subscribe to topic",
              );
              finish(err(connectionFailed(name, error.message, error)));
              return;
            }
            log.debug({ topic: options.topic }, "Subscribed to topic");
            if (!queue) queue = createLineQueue();
            finish(ok(undefined));
          });
        });

        mqttClient.on("message", handleMessage);

        mqttClient.on("error", (error) => {
          log.error({ source: name, error: error.message }, "MQTT client error");
          if (!settled) {
            mqttClient.end(true);
            client = null;
            finish(err(connectionFailed(name, error.message, error)));
          }
        });

        mqttClient.on("reconnect", () => {
          log.info({ source: name }, "Reconnecting to MQTT broker...");
        });

        mqttClient.on("offline", () => {
          log.warn({ source: name }, "MQTT client offline");
        });
      });
    },

    read: (timeoutMs) => {
      if (!queue) return Promise.resolve(err(notOpen(name)));
      return queue.next(timeoutMs);
    },

    close: async () => {
      const current = client;
      client = null;
      queue = null;
      if (!current) return;

      current.removeListener("message", handleMessage);
      await current.endAsync();
      log.info({ source: name }, "Disconnected from MQTT broker");
    },
  };
}
