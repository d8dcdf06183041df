/**
 * Contract checks shared by the protocol modules.
 */

import { InvariantViolation, type ErrorMetadata } from "./errors.js";

/** Throws InvariantViolation if condition is falsy. Narrows after a successful call. */
export function invariant(condition: unknown, message: string, metadata?: ErrorMetadata): asserts condition {
  if (!condition) {
    throw new InvariantViolation(message, metadata);
  }
}

/** Exhaustiveness guard for switches over tagged unions. Always throws. */
export function assertNever(value: never, message = "Unexpected variant"): never {
  throw new InvariantViolation(message, { value });
}
