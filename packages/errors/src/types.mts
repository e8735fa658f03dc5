/**
 * @module types
 * @description Core error types using tagged unions for type-safe error handling
 *
 * @remarks
 * Each error type has a discriminant `tag` field for pattern matching and
 * type narrowing. Errors are plain immutable objects, so they can travel
 * inside a {@link Result} or be attached to a thrown {@link ResultError}.
 *
 * @example
 * ```typescript
 * import type { ErrorType } from "@creational/errors";
 *
 * function describeError(error: ErrorType): string {
 *   switch (error.tag) {
 *     case "operational":
 *       return error.retryable ? "Temporary issue" : "Runtime error";
 *     case "validation":
 *       return "Bad input";
 *   }
 * }
 * ```
 *
 * @packageDocumentation
 */

/**
 * Context information that can be attached to any error
 */
export type ErrorContext = Record<string, unknown>;

export type ErrorType = OperationalError | ValidationError;

/**
 * Operational error - Recoverable runtime error
 *
 * @description
 * Represents errors that occur during normal operation, such as a failed
 * lazy initialisation that a later call may attempt again.
 */
export interface OperationalError {
  /** Discriminator for type narrowing */
  readonly tag: "operational";
  /** Human-readable error message */
  readonly message: string;
  /** Always true - operational errors can be handled gracefully */
  readonly recoverable: true;
  /** Whether retrying might succeed */
  readonly retryable: boolean;
  /** The failure that triggered this error, if any */
  readonly cause?: unknown;
  /** Optional context information */
  readonly context?: ErrorContext;
}

/**
 * Validation error - Data validation failure
 *
 * @description
 * Contains field-specific messages so callers can report every problem at once.
 *
 * @example
 * ```typescript
 * const error: ValidationError = {
 *   tag: "validation",
 *   message: "Invalid configuration",
 *   recoverable: true,
 *   retryable: false,
 *   fields: {
 *     PORT: ["must be an integer between 1 and 65535"],
 *   }
 * };
 * ```
 */
export interface ValidationError {
  /** Discriminator for type narrowing */
  readonly tag: "validation";
  /** Human-readable error message */
  readonly message: string;
  /** Always true - validation errors can be fixed by the caller */
  readonly recoverable: true;
  /** Always false - same input will fail again */
  readonly retryable: false;
  /** Field-specific error messages */
  readonly fields?: Record<string, string[]>;
  /** Optional context information */
  readonly context?: ErrorContext;
}

/**
 * Best-effort message extraction from an unknown thrown value
 */
export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Error Constructors
// ============================================================================

/**
 * Creates an operational error
 *
 * @param message - Error message
 * @param retryable - Whether operation should be retried
 * @param context - Optional context information
 * @param cause - Original failure
 */
export const createOperationalError = (
  message: string,
  retryable = true,
  context?: ErrorContext,
  cause?: unknown,
): OperationalError => ({
  tag: "operational",
  message,
  recoverable: true,
  retryable,
  cause,
  context,
});

/**
 * Creates a validation error
 *
 * @example
 * ```typescript
 * const error = createValidationError(
 *   "Invalid order",
 *   { orderId: ["is required"] },
 * );
 * ```
 */
export const createValidationError = (
  message: string,
  fields?: Record<string, string[]>,
  context?: ErrorContext,
): ValidationError => ({
  tag: "validation",
  message,
  recoverable: true,
  retryable: false,
  fields,
  context,
});
