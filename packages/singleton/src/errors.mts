/**
 * Errors raised by singleton holders and construction guards.
 *
 * Both are thrown to the immediate caller; holders never retry on their own.
 */

import { messageOf } from "@creational/errors";

export type SingletonErrorTag = "illegal-construction" | "initialization";

export type IllegalConstructionReason =
  | "external"
  | "token-reused"
  | "limit-reached";

export abstract class SingletonError extends Error {
  abstract readonly tag: SingletonErrorTag;
}

/**
 * Raised when a guarded type is constructed anywhere but its holder's factory.
 */
export class IllegalConstructionError extends SingletonError {
  readonly tag = "illegal-construction";

  constructor(
    public readonly typeName: string,
    public readonly reason: IllegalConstructionReason = "external",
  ) {
    super(illegalConstructionMessage(typeName, reason));
    this.name = "IllegalConstructionError";

    Object.setPrototypeOf(this, IllegalConstructionError.prototype);
  }
}

/**
 * Raised when a holder's factory throws or rejects. The holder stays
 * uninitialized, so the next `getInstance()` attempts construction again.
 */
export class InitializationError extends SingletonError {
  readonly tag = "initialization";

  constructor(
    public readonly holder: string,
    public readonly attempt: number,
    cause: unknown,
  ) {
    super(
      `Initialization of "${holder}" failed on attempt ${attempt}: ${messageOf(cause)}`,
      { cause },
    );
    this.name = "InitializationError";

    Object.setPrototypeOf(this, InitializationError.prototype);
  }
}

function illegalConstructionMessage(
  typeName: string,
  reason: IllegalConstructionReason,
): string {
  switch (reason) {
    case "external":
      return `${typeName} cannot be constructed directly; use getInstance()`;
    case "token-reused":
      return `${typeName} construction token was already used`;
    case "limit-reached":
      return `${typeName} has already been constructed`;
  }
}

export const isSingletonError = (error: unknown): error is SingletonError =>
  error instanceof SingletonError;

export const isIllegalConstructionError = (
  error: unknown,
): error is IllegalConstructionError => error instanceof IllegalConstructionError;

export const isInitializationError = (
  error: unknown,
): error is InitializationError => error instanceof InitializationError;
