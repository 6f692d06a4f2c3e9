/**
 * Operation descriptors for `Stream.pipe`.
 *
 * A descriptor is plain data naming one step. Combinator descriptors make
 * `pipe` return a new stream; terminal descriptors make it return a result.
 *
 * @example
 * ```typescript
 * stream([1, 2, 3, 4, 5]).pipe(skip(1)).pipe(group(2)).pipe(toArray());
 * // [[2, 3], [4, 5]]
 * ```
 */

import { requireArgument, requireCount } from "@pullstream/core";
import type { TextSink } from "./sinks.js";

/** Static finiteness marker carried by every stream type. */
export type Finiteness = "finite" | "infinite";

// ============================================================================
// Combinators
// ============================================================================

export interface SkipOp {
  readonly kind: "skip";
  readonly count: number;
}

export interface TakeOp {
  readonly kind: "take";
  readonly count: number;
}

export interface FilterOp<T> {
  readonly kind: "filter";
  readonly predicate: (value: T) => boolean;
}

export interface GroupOp {
  readonly kind: "group";
  readonly size: number;
}

export interface MapOp<T, U> {
  readonly kind: "map";
  readonly transform: (value: T) => U;
}

export type CombinatorOp<T> = SkipOp | TakeOp | FilterOp<T> | GroupOp | MapOp<T, unknown>;

/** Drop the first `count` elements. */
export function skip(count: number): SkipOp {
  requireCount(count, "skip count");
  return { kind: "skip", count };
}

/** Keep at most `count` elements. The result is always finite. */
export function take(count: number): TakeOp {
  requireCount(count, "take count");
  return { kind: "take", count };
}

/** Alias of {@link take}. */
export const get = take;

/** Keep the elements satisfying `predicate`, in order. */
export function filter<T>(predicate: (value: T) => boolean): FilterOp<T> {
  return { kind: "filter", predicate };
}

/** Batch consecutive elements into arrays of `size`. */
export function group(size: number): GroupOp {
  requireArgument(
    Number.isSafeInteger(size) && size > 0,
    `group size must be a positive integer, got ${size}`
  );
  return { kind: "group", size };
}

/** Transform every element. */
export function map<T, U>(transform: (value: T) => U): MapOp<T, U> {
  return { kind: "map", transform };
}

// ============================================================================
// Terminals
// ============================================================================

export interface NthOp {
  readonly kind: "nth";
  readonly index: number;
}

export interface PrintToOp<S extends TextSink> {
  readonly kind: "printTo";
  readonly sink: S;
  readonly delimiter: string | undefined;
}

export interface SumOp<T> {
  readonly kind: "sum";
  readonly add: (left: T, right: T) => T;
}

export interface ReduceOp<T, U> {
  readonly kind: "reduce";
  readonly identity: (first: T) => U;
  readonly accumulator: (acc: U, value: T) => U;
}

export interface ToArrayOp {
  readonly kind: "toArray";
}

export type TerminalOp<T> = NthOp | PrintToOp<TextSink> | SumOp<T> | ReduceOp<T, unknown> | ToArrayOp;

/** Zero-based position lookup. Legal on infinite streams. */
export function nth(index: number): NthOp {
  requireCount(index, "nth index");
  return { kind: "nth", index };
}

/**
 * Write every element to `sink`, separated by `delimiter`
 * (default: the `print.delimiter` setting, a single space unless configured).
 */
export function printTo<S extends TextSink>(sink: S, delimiter?: string): PrintToOp<S> {
  return { kind: "printTo", sink, delimiter };
}

const addNumbers = (left: number, right: number): number => left + right;

/** Left-to-right sum. Numbers add with `+`; other element types pass `add`. */
export function sum(): SumOp<number>;
export function sum<T>(add: (left: T, right: T) => T): SumOp<T>;
export function sum<T>(add?: (left: T, right: T) => T): SumOp<T> | SumOp<number> {
  return add ? { kind: "sum", add } : { kind: "sum", add: addNumbers };
}

/**
 * Fold the stream.
 *
 * With one argument the first element seeds the accumulator. With two, the
 * seed is `identity(first)` and the result type is whatever `accumulator`
 * returns.
 */
export function reduce<T extends U, U>(accumulator: (acc: U, value: T) => U): ReduceOp<T, U>;
export function reduce<T, U>(
  identity: (first: T) => U,
  accumulator: (acc: U, value: T) => U
): ReduceOp<T, U>;
export function reduce<T extends U, U>(
  ...args:
    | [accumulator: (acc: U, value: T) => U]
    | [identity: (first: T) => U, accumulator: (acc: U, value: T) => U]
): ReduceOp<T, U> {
  if (args.length === 1) {
    return { kind: "reduce", identity: (first: T): U => first, accumulator: args[0] };
  }
  return { kind: "reduce", identity: args[0], accumulator: args[1] };
}

/** Materialize the stream into an array. */
export function toArray(): ToArrayOp {
  return { kind: "toArray" };
}

/** Alias of {@link toArray}. */
export const toVector = toArray;
