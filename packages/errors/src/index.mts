/**
 * @creational/errors
 *
 * Result<T, E> pattern and the tagged error taxonomy used across the
 * creational packages.
 */

// ============================================================================
// Core Types
// ============================================================================

export type {
  ErrorType,
  OperationalError,
  ValidationError,
  ErrorContext,
} from "./types.mjs";

export { Result } from "./result.mjs";

// ============================================================================
// Error Constructors
// ============================================================================

export {
  messageOf,
  createOperationalError,
  createValidationError,
} from "./types.mjs";

// ============================================================================
// Result Utilities
// ============================================================================

export {
  ResultError,
  isResultError,
  unwrap,
  tryCatch,
} from "./result-utilities.mjs";
