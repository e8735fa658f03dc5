/**
 * @module result-utilities
 * @description Bridges between exception-based code and Result types
 */

import type { ErrorType, OperationalError } from "./types.mjs";

import { Result } from "./result.mjs";
import { createOperationalError, messageOf } from "./types.mjs";

/**
 * Carries an {@link ErrorType} through code paths that only understand
 * exceptions (factories, constructors, promise rejections).
 */
export class ResultError<E extends ErrorType = ErrorType> extends Error {
  constructor(public readonly originalError: E) {
    super(originalError.message);
    this.name = "ResultError";

    Object.setPrototypeOf(this, ResultError.prototype);
  }
}

/**
 * Type guard for {@link ResultError}
 */
export function isResultError(error: unknown): error is ResultError {
  return error instanceof ResultError;
}

/**
 * Returns the success value, or throws a {@link ResultError} holding the failure.
 *
 * @example
 * ```typescript
 * const config = unwrap(loadAppConfig(process.env));
 * ```
 */
export function unwrap<T, E extends ErrorType>(result: Result<T, E>): T {
  if (result.success) {
    return result.data;
  }
  throw new ResultError(result.error);
}

/**
 * Safely transforms an error using the provided transformer with fallback.
 * If the transformer itself throws, returns a non-retryable operational error.
 *
 * @internal
 */
function safeErrorTransform<E extends ErrorType>(
  error: unknown,
  errorTransform: (error: unknown) => E,
): E | OperationalError {
  try {
    return errorTransform(error);
  } catch (transformError) {
    return createOperationalError(
      `Error transform failed: ${messageOf(transformError)}`,
      false,
      undefined,
      transformError,
    );
  }
}

/**
 * Converts a Promise-based function into a Result.
 *
 * The `errorTransform` is required so that every call site classifies its
 * own failures. A thrown {@link ResultError} is unwrapped before it reaches
 * the transform.
 *
 * @example
 * ```typescript
 * const result = await tryCatch(
 *   () => holder.getInstance(),
 *   (error) => createOperationalError(messageOf(error), true),
 * );
 * ```
 */
export async function tryCatch<T, E extends ErrorType = ErrorType>(
  fn: () => Promise<T>,
  errorTransform: (error: unknown) => E,
): Promise<Result<T, E | OperationalError>> {
  try {
    const data = await fn();
    return Result.ok(data);
  } catch (error) {
    return Result.err(safeErrorTransform(unwrapResultError(error), errorTransform));
  }
}

function unwrapResultError(error: unknown): unknown {
  return error instanceof ResultError ? error.originalError : error;
}
