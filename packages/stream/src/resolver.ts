/**
 * Entry points for creating streams.
 *
 * `stream()` inspects its arguments once and picks the source generator.
 * Rules are checked in this order; the first match wins:
 *
 * | Rule        | Arguments                                   | Generator          | Marker     |
 * |-------------|---------------------------------------------|--------------------|------------|
 * | `copy`      | an existing `Stream`                        | its clone          | unchanged  |
 * | `producer`  | a function with no parameters               | InfiniteGenerator  | infinite   |
 * | `range`     | two `Position`s over the same source        | ContainerGenerator | finite     |
 * | `container` | an iterable that is not an array or string  | ContainerGenerator | finite     |
 * | `transfer`  | a `Transfer` token from `transfer(array)`   | ContainerGenerator | finite     |
 * | `literal`   | an array                                    | ContainerGenerator | finite     |
 * | `pack`      | anything else, including no arguments       | PackGenerator      | finite     |
 *
 * `range()`, `iterate()`, `repeat()` and `generate()` cover common sources
 * directly.
 */

import {
  InvalidArgumentError,
  createLogger,
  requireArgument,
  requireCount,
  unreachable,
} from "@pullstream/core";
import type { Finiteness } from "./descriptors.js";
import {
  ContainerGenerator,
  InfiniteGenerator,
  IterateGenerator,
  PackGenerator,
  RangeGenerator,
} from "./generators.js";
import { Stream } from "./stream.js";

const log = createLogger("resolver");

// ---------------------------------------------------------------------------
// Range positions
// ---------------------------------------------------------------------------

/**
 * A position inside an array-like source. Two positions over the same source
 * delimit the half-open range `[first, last)`.
 */
export class Position<T> {
  private constructor(
    readonly source: ArrayLike<T>,
    readonly index: number
  ) {}

  static at<T>(source: ArrayLike<T>, index: number): Position<T> {
    requireCount(index, "position index");
    requireArgument(
      index <= source.length,
      `position index ${index} is past the end of a source of length ${source.length}`
    );
    return new Position(source, index);
  }
}

/** Position of the first element of `source`. */
export function begin<T>(source: ArrayLike<T>): Position<T> {
  return Position.at(source, 0);
}

/** Position one past the last element of `source`. */
export function end<T>(source: ArrayLike<T>): Position<T> {
  return Position.at(source, source.length);
}

/** Position `index` of `source`. */
export function positionAt<T>(source: ArrayLike<T>, index: number): Position<T> {
  return Position.at(source, index);
}

// ---------------------------------------------------------------------------
// Ownership transfer
// ---------------------------------------------------------------------------

/**
 * Hands an array to a stream without copying it. The caller must not modify
 * the array afterwards; the token itself can be claimed once.
 */
export class Transfer<T> {
  private values: T[] | null;

  constructor(values: T[]) {
    this.values = values;
  }

  /** Take the array out of the token. */
  claim(): T[] {
    if (this.values === null) {
      throw new InvalidArgumentError("transferred array was already claimed by another stream");
    }
    const values = this.values;
    this.values = null;
    return values;
  }
}

/**
 * Mark `values` for transfer into a stream.
 *
 * @example
 * ```typescript
 * const s = stream(transfer(buildLargeArray())); // no copy is made
 * ```
 */
export function transfer<T>(values: T[]): Transfer<T> {
  return new Transfer(values);
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

/** The construction rule chosen for a set of arguments. */
export type Resolution =
  | { readonly rule: "copy"; readonly source: Stream<unknown, Finiteness> }
  | { readonly rule: "producer"; readonly producer: () => unknown }
  | { readonly rule: "range"; readonly first: Position<unknown>; readonly last: Position<unknown> }
  | { readonly rule: "container"; readonly source: Iterable<unknown> }
  | { readonly rule: "transfer"; readonly owned: Transfer<unknown> }
  | { readonly rule: "literal"; readonly values: readonly unknown[] }
  | { readonly rule: "pack"; readonly values: readonly unknown[] };

function isIterable(value: unknown): value is Iterable<unknown> {
  if (typeof value !== "object" && typeof value !== "function") return false;
  if (value === null || !(Symbol.iterator in value)) return false;
  return typeof value[Symbol.iterator] === "function";
}

// The producer rule reads `Function.length`, which types cannot see: a
// function with optional, default or rest parameters reports fewer than it
// declares. Statically, a producer must declare no parameters at all, must
// not be a constructor and must return a value. A pack element must not be
// callable without arguments, so the ambiguous cases do not compile.

type IsAny<T> = 0 extends 1 & T ? true : false;

type CallableWithoutArguments<T> = T extends abstract new (...args: infer A) => unknown
  ? [] extends A
    ? true
    : false
  : T extends (...args: infer A) => unknown
    ? [] extends A
      ? true
      : false
    : false;

type IsProducer<P> = P extends abstract new (...args: never) => unknown
  ? false
  : P extends (...args: infer A) => infer R
    ? A extends []
      ? IsAny<R> extends true
        ? true
        : [R] extends [void]
          ? false
          : true
      : false
    : false;

/** `unknown` when `P` is a valid producer, `never` otherwise. */
export type ProducerCheck<P> = IsProducer<P> extends true ? unknown : never;

/** `unknown` unless `T` could be taken for a producer. */
export type PackCheck<T> = CallableWithoutArguments<T> extends true ? never : unknown;

/** A function declaring no parameters that is not itself iterable. */
function isValueProducer(value: unknown): value is () => unknown {
  return typeof value === "function" && value.length === 0 && !isIterable(value);
}

/** An iterable that is neither a producer, a string nor an array. */
function isContainer(value: unknown): value is Iterable<unknown> {
  return (
    !isValueProducer(value) &&
    typeof value !== "string" &&
    !Array.isArray(value) &&
    isIterable(value)
  );
}

/**
 * Pick the construction rule for `args`.
 */
export function resolveSource(args: readonly unknown[]): Resolution {
  if (args.length === 1) {
    const [only] = args;
    if (only instanceof Stream) return { rule: "copy", source: only };
    if (isValueProducer(only)) return { rule: "producer", producer: only };
  }

  if (args.length === 2) {
    const [first, last] = args;
    if (first instanceof Position && last instanceof Position) {
      return { rule: "range", first, last };
    }
  }

  if (args.length === 1) {
    const [only] = args;
    if (isContainer(only)) return { rule: "container", source: only };
    if (only instanceof Transfer) return { rule: "transfer", owned: only };
    if (Array.isArray(only)) return { rule: "literal", values: only };
  }

  return { rule: "pack", values: args };
}

function sliceRange(first: Position<unknown>, last: Position<unknown>): unknown[] {
  if (first.source !== last.source) {
    throw new InvalidArgumentError("range positions must refer to the same source");
  }
  if (first.index > last.index) {
    throw new InvalidArgumentError(
      `range start ${first.index} is after range end ${last.index}`
    );
  }

  const values: unknown[] = [];
  for (let i = first.index; i < last.index; i++) {
    values.push(first.source[i]);
  }
  return values;
}

function build(resolution: Resolution): Stream<unknown, Finiteness> {
  switch (resolution.rule) {
    case "copy":
      return resolution.source.clone();
    case "producer":
      return new Stream(new InfiniteGenerator(resolution.producer), "infinite");
    case "range":
      return new Stream(
        ContainerGenerator.adopt(sliceRange(resolution.first, resolution.last)),
        "finite"
      );
    case "container":
      return new Stream(ContainerGenerator.copyOf(resolution.source), "finite");
    case "transfer":
      return new Stream(ContainerGenerator.adopt(resolution.owned.claim()), "finite");
    case "literal":
      return new Stream(ContainerGenerator.copyOf(resolution.values), "finite");
    case "pack":
      return new Stream(PackGenerator.of(...resolution.values), "finite");
    default:
      return unreachable(resolution);
  }
}

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

/**
 * Create a stream from whatever source is given.
 *
 * @example
 * ```typescript
 * stream(() => Math.random());        // infinite
 * stream(begin(xs), end(xs));         // copy of a range
 * stream(new Set([1, 2, 3]));         // copy of a container
 * stream(transfer([1, 2, 3]));        // array taken without copying
 * stream([1, 2, 3]);                  // literal sequence
 * stream(1, 2, 3);                    // value pack
 * ```
 */
export function stream<T, F extends Finiteness>(source: Stream<T, F>): Stream<T, F>;
export function stream<P extends () => unknown>(
  producer: P & ProducerCheck<P>
): Stream<ReturnType<P>, "infinite">;
export function stream<T>(first: Position<T>, last: Position<T>): Stream<T, "finite">;
export function stream<T>(owned: Transfer<T>): Stream<T, "finite">;
export function stream<T>(container: Iterable<T>): Stream<T, "finite">;
export function stream<T>(...values: Array<T & PackCheck<T>>): Stream<T, "finite">;
export function stream(...args: unknown[]): unknown {
  const resolution = resolveSource(args);
  log.debug(`source resolved by rule '${resolution.rule}'`);
  return build(resolution);
}

/** Numbers in `[start, end)` advancing by `step`. */
export function range(start: number, end: number, step: number = 1): Stream<number, "finite"> {
  requireArgument(step !== 0, "range() step must not be zero");
  requireArgument(
    Number.isFinite(start) && Number.isFinite(end),
    "range() bounds must be finite; use iterate() for unbounded sequences"
  );
  return new Stream(new RangeGenerator(start, end, step), "finite");
}

/** Infinite stream of `seed`, `f(seed)`, `f(f(seed))`, ... */
export function iterate<T>(seed: T, f: (value: T) => T): Stream<T, "infinite"> {
  return new Stream(new IterateGenerator(seed, f), "infinite");
}

/** Infinite stream repeating `value`. */
export function repeat<T>(value: T): Stream<T, "infinite"> {
  return new Stream(new InfiniteGenerator(() => value), "infinite");
}

/** Infinite stream of the results of calling `f`. */
export function generate<T>(f: () => T): Stream<T, "infinite"> {
  return new Stream(new InfiniteGenerator(f), "infinite");
}
