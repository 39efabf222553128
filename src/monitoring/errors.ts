/**
 * Monitoring Module - Error Types
 *
 * Typed error unions for the monitor loop.
 * Errors are values, not exceptions.
 */
import type { SourceError } from "../source/index.js";

/**
 * Errors that stop the monitor loop.
 */
export type MonitorError =
  | {
      readonly type: "ALREADY_RUNNING";
      readonly message: string;
    }
  | {
      readonly type: "SOURCE_UNAVAILABLE";
      readonly message: string;
      readonly source: string;
      readonly cause: SourceError;
    }
  | {
      readonly type: "SOURCE_FAILED";
      readonly message: string;
      readonly source: string;
      readonly cause: SourceError;
    }
  | {
      readonly type: "SOURCE_ENDED";
      readonly message: string;
      readonly source: string;
    };

/**
 * Create an ALREADY_RUNNING error.
 */
export function alreadyRunning(): MonitorError {
  return { type: "ALREADY_RUNNING", message: "Monitor loop already running" };
}

/**
 * Create a SOURCE_UNAVAILABLE error.
 */
export function sourceUnavailable(
  source: string,
  cause: SourceError,
): MonitorError {
  return {
    type: "SOURCE_UNAVAILABLE",
    message: `Signal source ${source} unavailable: ${cause.message}`,
    source,
    cause,
  };
}

/**
 * Map a read failure to the loop error that ends the run.
 */
export function fromReadError(source: string, cause: SourceError): MonitorError {
  if (cause.type === "ENDED") {
    return {
      type: "SOURCE_ENDED",
      message: `Signal source ${source} ended`,
      source,
    };
  }
  return {
    type: "SOURCE_FAILED",
    message: `Signal source ${source} failed: ${cause.message}`,
    source,
    cause,
  };
}

/**
 * Format a MonitorError for logging.
 */
export function formatMonitorError(error: MonitorError): string {
  switch (error.type) {
    case "ALREADY_RUNNING":
      return error.message;
    case "SOURCE_UNAVAILABLE":
      return `Source unavailable: ${error.cause.message}`;
    case "SOURCE_FAILED":
      return `Source failed: ${error.cause.message}`;
    case "SOURCE_ENDED":
      return `Source ended: ${error.source}`;
  }
}
