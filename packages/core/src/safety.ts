/**
 * Runtime Safety Primitives
 *
 * - `invariant(condition, message)`: internal assertion
 * - `requireArgument(condition, message)`: argument validation at API edges
 * - `unreachable(value?)`: mark impossible code paths
 *
 * @example
 * ```typescript
 * type Source = { kind: "array" } | { kind: "producer" };
 * function label(source: Source): string {
 *   switch (source.kind) {
 *     case "array": return "array";
 *     case "producer": return "producer";
 *     default: return unreachable(source); // Type error if Source is extended
 *   }
 * }
 * ```
 */

import { InvalidArgumentError } from "./errors.js";

/**
 * Runtime invariant check.
 *
 * @throws Error if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new Error(message ?? "Invariant violation");
  }
}

/**
 * Validate a caller-supplied argument.
 *
 * @throws InvalidArgumentError if condition is false
 */
export function requireArgument(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new InvalidArgumentError(message);
  }
}

/**
 * Validate that `value` is a whole number usable as a count or index.
 */
export function requireCount(value: number, what: string): void {
  requireArgument(
    Number.isSafeInteger(value) && value >= 0,
    `${what} must be a non-negative integer, got ${value}`
  );
}

/**
 * Mark a code path as unreachable. Useful for exhaustiveness checking.
 *
 * @param _value - A value of type `never` (for type-level exhaustiveness)
 */
export function unreachable(_value?: never): never {
  throw new Error("Unreachable code reached");
}
