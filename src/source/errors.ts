/**
 * Source Module - Error Types
 *
 * Typed error union for signal source failures.
 * Errors are values, not exceptions.
 */

export type SourceError =
  | {
      readonly type: "CONNECTION_FAILED";
      readonly source: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "READ_FAILED";
      readonly source: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "NOT_OPEN";
      readonly source: string;
      readonly message: string;
    }
  | {
      readonly type: "ENDED";
      readonly source: string;
      readonly message: string;
    };

// =============================================================================
// Error Factory Functions
// =============================================================================

/**
 * Create a CONNECTION_FAILED error.
 */
export function connectionFailed(
  source: string,
  message: string,
  cause?: Error,
): SourceError {
  return cause !== undefined
    ? { type: "CONNECTION_FAILED", source, message, cause }
    : { type: "CONNECTION_FAILED", source, message };
}

/**
 * Create a READ_FAILED error.
 */
export function readFailed(
  source: string,
  message: string,
  cause?: Error,
): SourceError {
  return cause !== undefined
    ? { type: "READ_FAILED", source, message, cause }
    : { type: "READ_FAILED", source, message };
}

/**
 * Create a NOT_OPEN error.
 */
export function notOpen(source: string): SourceError {
  return { type: "NOT_OPEN", source, message: "Source is not open" };
}

/**
 * Create an ENDED error.
 */
export function ended(source: string): SourceError {
  return { type: "ENDED", source, message: "Source stream ended" };
}

/**
 * Normalise a thrown value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
