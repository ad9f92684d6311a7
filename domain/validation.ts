/**
 * Domain validation — assertions for caller preconditions.
 * Framework-independent. No business logic.
 */

import { ValidationError } from "./errors.js";
import type { ErrorMetadata } from "./errors.js";

/** Throws ValidationError if condition is falsy. TypeScript narrows after a successful call. */
export function assert(condition: unknown, message: string, metadata?: ErrorMetadata): asserts condition {
  if (!condition) {
    throw new ValidationError(message, metadata);
  }
}

/** Call in unreachable branches (e.g. exhaustive switch). Always throws. */
export function neverReached(value: never, message = "Unreachable"): never {
  throw new Error(`${message}: ${String(value)}`);
}
