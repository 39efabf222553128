/**
 * Alert Dispatcher Tests
 */
import { beforeEach, describe, expect, test, vi } from "vitest";

// Mock logger to reduce noise in tests
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
  logOperationFailed: vi.fn(),
}));

// Import after mocks
import type { AlertEvent } from "../../monitoring/index.js";
import type { Notifier } from "../schema.js";
import { createAlertDispatcher } from "../service.js";

const T0 = 1_700_000_000_000;

function alert(tier: AlertEvent["tier"], elapsedSeconds: number): AlertEvent {
  return { tier, message: `${tier} ${elapsedSeconds}`, elapsedSeconds, timestamp: T0 };
}

/**
 * Notifier whose deliveries resolve only when released by the test.
 */
function createGatedNotifier() {
  const releases: Array<(ok: boolean) => void> = [];
  const deliver = vi.fn(
    (_subject: string, _body: string) =>
      new Promise<boolean>((resolve) => {
        releases.push(resolve);
      }),
  );
  const notifier: Notifier = { name: "gated", deliver };
  return { notifier, deliver, releases };
}

describe("createAlertDispatcher", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  test("delivers alerts in order with subject and body", async () => {
    const deliver = vi.fn((_subject: string, _body: string) => Promise.resolve(true));
    const dispatcher = createAlertDispatcher({ name: "test", deliver });

    dispatcher.enqueue(alert("initial", 61));
    dispatcher.enqueue(alert("critical", 301));

    expect(await dispatcher.drain()).toBe(true);
    expect(deliver.mock.calls.map((call) => call[0])).toEqual([
      "Motion Sensor - Initial Alert",
      "EMERGENCY - Potential Medical Emergency Detected",
    ]);
    expect(dispatcher.getStats()).toEqual({
      delivered: 2,
      failed: 0,
      dropped: 0,
      pending: 0,
    });
  });

  test("enqueue returns before delivery completes", () => {
    const { notifier, deliver } = createGatedNotifier();
    const dispatcher = createAlertDispatcher(notifier);

    dispatcher.enqueue(alert("initial", 61));

    expect(deliver).toHaveBeenCalledTimes(1);
    expect(dispatcher.getStats().delivered).toBe(0);
  });

  test("counts failed and throwing deliveries without retrying", async () => {
    const deliver = vi
      .fn<(subject: string, body: string) => Promise<boolean>>()
      .mockResolvedValueOnce(false)
      .mockRejectedValueOnce(new Error("socket hang up"))
      .mockResolvedValueOnce(true);
    const dispatcher = createAlertDispatcher({ name: "flaky", deliver });

    dispatcher.enqueue(alert("initial", 61));
    dispatcher.enqueue(alert("critical", 301));
    dispatcher.enqueue(alert("critical", 901));
    await dispatcher.drain();

    expect(deliver).toHaveBeenCalledTimes(3);
    expect(dispatcher.getStats()).toEqual({
      delivered: 1,
      failed: 2,
      dropped: 0,
      pending: 0,
    });
  });

  test("drops the oldest pending alert when the queue is full", async () => {
    const { notifier, deliver, releases } = createGatedNotifier();
    const dispatcher = createAlertDispatcher(notifier, { maxPending: 2 });

    dispatcher.enqueue(alert("initial", 61)); // taken by the worker
    dispatcher.enqueue(alert("critical", 301));
    dispatcher.enqueue(alert("critical", 901));
    dispatcher.enqueue(alert("critical", 1501));

    expect(dispatcher.getStats()).toMatchObject({ dropped: 1, pending: 2 });

    const drained = dispatcher.drain();
    for (let i = 0; i < 3; i++) {
      await vi.waitFor(() => expect(releases).toHaveLength(i + 1));
      releases[i]?.(true);
    }
    expect(await drained).toBe(true);

    expect(deliver.mock.calls.map((call) => call[1].split(" seconds")[0])).toEqual([
      "A person has been detected with no movement for 61",
      "URGENT: A person has been detected with absolutely no movement for 901",
      "URGENT: A person has been detected with absolutely no movement for 1501",
    ]);
  });

  test("drain gives up after the timeout", async () => {
    const { notifier } = createGatedNotifier();
    const dispatcher = createAlertDispatcher(notifier);

    dispatcher.enqueue(alert("critical", 301));

    expect(await dispatcher.drain(10)).toBe(false);
    expect(dispatcher.getStats().delivered).toBe(0);
  });

  test("drain resolves immediately when idle", async () => {
    const dispatcher = createAlertDispatcher({
      name: "idle",
      deliver: () => Promise.resolve(true),
    });

    expect(await dispatcher.drain(0)).toBe(true);
  });

  test("restarts the worker for alerts queued after a drain", async () => {
    const deliver = vi.fn((_subject: string, _body: string) => Promise.resolve(true));
    const dispatcher = createAlertDispatcher({ name: "test", deliver });

    dispatcher.enqueue(alert("initial", 61));
    await dispatcher.drain();
    dispatcher.enqueue(alert("critical", 301));
    await dispatcher.drain();

    expect(deliver).toHaveBeenCalledTimes(2);
    expect(dispatcher.getStats().delivered).toBe(2);
  });
});
