/**
 * Base error class for Waymark.
 */

import type { ErrorPayload } from "~/errors/types.ts";

/**
 * Base error class for all Waymark errors.
 *
 * @example
 * ```typescript
 * throw new WaymarkError("Something went wrong", "INTERNAL_ERROR");
 * ```
 */
export class WaymarkError extends Error {
  /** Machine-readable error code */
  readonly code: string;
  /** Additional error details (shown in verbose output) */
  readonly details?: unknown;
  /** Whether this error is operational (caller misuse) vs a router defect */
  readonly isOperational: boolean;

  constructor(
    message: string,
    code = "INTERNAL_ERROR",
    details?: unknown,
    isOperational = true,
  ) {
    super(message);
    this.name = "WaymarkError";
    this.code = code;
    this.details = details;
    this.isOperational = isOperational;
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Convert error to a plain object.
   * @param verbose Include stack trace and details
   */
  toJSON(verbose = false): ErrorPayload {
    const payload: ErrorPayload = {
      error: {
        message: this.message,
        code: this.code,
      },
    };

    if (verbose) {
      if (this.details !== undefined) {
        payload.error.details = this.details;
      }
      if (this.stack) {
        payload.error.stack = this.stack.split("\n").map((l) => l.trim());
      }
    }

    return payload;
  }
}

export function isWaymarkError(error: unknown): error is WaymarkError {
  return error instanceof WaymarkError;
}
