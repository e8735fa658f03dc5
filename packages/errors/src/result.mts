/**
 * @module result
 * @description Type-safe error handling without exceptions using the Result pattern.
 * A Result is either a success carrying `data` or a failure carrying `error`,
 * which keeps expected failures (bad input, missing configuration) in the
 * type signature instead of in a `throw`.
 *
 * @example
 * ```typescript
 * import { Result } from '@creational/errors';
 *
 * function parsePort(raw: string): Result<number, string> {
 *   const port = Number(raw);
 *   return Number.isInteger(port) ? Result.ok(port) : Result.err(`not a port: ${raw}`);
 * }
 *
 * const doubled = Result.map((n: number) => n * 2)(parsePort('21'));
 * // => { success: true, data: 42 }
 * ```
 */

/**
 * Either a successful operation with data or a failure with an error.
 *
 * @template T - The type of the success value
 * @template E - The type of the error value (defaults to string)
 */
export type Result<T, E = string> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Result utility functions.
 */
export const Result = {
  /**
   * Creates a successful Result containing the given data.
   *
   * @example
   * const result = Result.ok(42);
   * // => { success: true, data: 42 }
   */
  ok: <T, E = never>(data: T): Result<T, E> => ({ success: true, data }),

  /**
   * Creates a failed Result containing the given error.
   *
   * @example
   * const result = Result.err('Not found');
   * // => { success: false, error: 'Not found' }
   */
  err: <T = never, E = string>(error: E): Result<T, E> => ({
    success: false,
    error,
  }),

  isOk: <T, E>(result: Result<T, E>): result is { success: true; data: T } =>
    result.success,

  isErr: <T, E>(
    result: Result<T, E>,
  ): result is { success: false; error: E } => !result.success,
};
