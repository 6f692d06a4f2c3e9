/**
 * The pipeline wrapper.
 *
 * A `Stream` owns one generator and a finiteness marker that is part of its
 * type. Appending a combinator clones the generator into a new stream;
 * running a terminal clones it once more and drives the clone. The stream
 * itself is never advanced, so it can be reused for any number of
 * terminal operations.
 */

import { MovedStreamError, config, createLogger, unreachable } from "@pullstream/core";
import {
  FilterGenerator,
  GroupGenerator,
  MapGenerator,
  SkipGenerator,
  TakeGenerator,
} from "./combinators.js";
import * as ops from "./descriptors.js";
import type {
  CombinatorOp,
  FilterOp,
  Finiteness,
  GroupOp,
  MapOp,
  NthOp,
  PrintToOp,
  ReduceOp,
  SkipOp,
  SumOp,
  TakeOp,
  TerminalOp,
  ToArrayOp,
} from "./descriptors.js";
import type { PullGenerator } from "./pull.js";
import type { TextSink } from "./sinks.js";
import { arrayOf, nthOf, printOf, reduceOf, sumOf } from "./terminals.js";

const log = createLogger("stream");

/**
 * A lazy, reusable pipeline.
 *
 * Terminals that traverse the whole stream (`printTo`, `sum`, `reduce`,
 * `toArray`) declare `this: Stream<T, "finite">`, so calling them on an
 * infinite stream does not compile.
 *
 * @example
 * ```typescript
 * const evens = stream([1, 2, 3, 4, 5, 6]).filter((x) => x % 2 === 0);
 * evens.toArray();          // [2, 4, 6]
 * evens.map((x) => x * 10).sum(); // 120
 *
 * stream(() => 1).toArray(); // compile error: infinite stream
 * stream(() => 1).take(3).toArray(); // [1, 1, 1]
 * ```
 */
export class Stream<T, F extends Finiteness = Finiteness> {
  private generator: PullGenerator<T> | null;

  constructor(
    generator: PullGenerator<T>,
    readonly finiteness: F
  ) {
    this.generator = generator;
  }

  /**
   * Take the generator of `source` without copying it. `source` cannot be
   * used afterwards.
   */
  static transfer<T, F extends Finiteness>(source: Stream<T, F>): Stream<T, F> {
    const generator = source.current("transfer");
    source.generator = null;
    return new Stream(generator, source.finiteness);
  }

  /** Whether the stream is statically finite. */
  isFinite(): this is Stream<T, "finite"> {
    return this.finiteness === "finite";
  }

  /** An independent copy with the same marker. */
  clone(): Stream<T, F> {
    return new Stream(this.current("clone").clone(), this.finiteness);
  }

  // ---------------------------------------------------------------------------
  // Composition operator
  // ---------------------------------------------------------------------------

  pipe(op: SkipOp): Stream<T, F>;
  pipe(op: TakeOp): Stream<T, "finite">;
  pipe(op: FilterOp<T>): Stream<T, F>;
  pipe(op: GroupOp): Stream<T[], F>;
  pipe<U>(op: MapOp<T, U>): Stream<U, F>;
  pipe(op: NthOp): T;
  pipe<S extends TextSink>(this: Stream<T, "finite">, op: PrintToOp<S>): S;
  pipe(this: Stream<T, "finite">, op: SumOp<T>): T;
  pipe<U>(this: Stream<T, "finite">, op: ReduceOp<T, U>): U;
  pipe(this: Stream<T, "finite">, op: ToArrayOp): T[];
  pipe(op: CombinatorOp<T> | TerminalOp<T>): unknown {
    switch (op.kind) {
      case "skip":
        return new Stream(new SkipGenerator(this.snapshot(op.kind), op.count), this.finiteness);
      case "take":
        return new Stream(new TakeGenerator(this.snapshot(op.kind), op.count), "finite");
      case "filter":
        return new Stream(new FilterGenerator(this.snapshot(op.kind), op.predicate), this.finiteness);
      case "group":
        return new Stream(new GroupGenerator(this.snapshot(op.kind), op.size), this.finiteness);
      case "map":
        return new Stream(new MapGenerator(this.snapshot(op.kind), op.transform), this.finiteness);
      case "nth":
        return nthOf(this.run(op.kind), op.index);
      case "printTo":
        return printOf(this.run(op.kind), op.sink, op.delimiter ?? config.printDelimiter());
      case "sum":
        return sumOf(this.run(op.kind), op.add);
      case "reduce":
        return reduceOf(this.run(op.kind), op.identity, op.accumulator);
      case "toArray":
        return arrayOf(this.run(op.kind));
      default:
        return unreachable(op);
    }
  }

  // ---------------------------------------------------------------------------
  // Combinators
  // ---------------------------------------------------------------------------

  /** Drop the first `count` elements */
  skip(count: number): Stream<T, F> {
    return this.pipe(ops.skip(count));
  }

  /** Keep at most `count` elements */
  take(count: number): Stream<T, "finite"> {
    return this.pipe(ops.take(count));
  }

  /** Keep only elements that satisfy the predicate */
  filter(predicate: (value: T) => boolean): Stream<T, F> {
    return this.pipe(ops.filter(predicate));
  }

  /** Batch consecutive elements into arrays of `size` */
  group(size: number): Stream<T[], F> {
    return this.pipe(ops.group(size));
  }

  /** Transform each element */
  map<U>(transform: (value: T) => U): Stream<U, F> {
    return this.pipe(ops.map(transform));
  }

  // ---------------------------------------------------------------------------
  // Terminal operations
  // ---------------------------------------------------------------------------

  /** Element at zero-based `index` */
  nth(index: number): T {
    return this.pipe(ops.nth(index));
  }

  /** Write elements to `sink` separated by `delimiter` */
  printTo<S extends TextSink>(this: Stream<T, "finite">, sink: S, delimiter?: string): S {
    return this.pipe(ops.printTo(sink, delimiter));
  }

  /** Sum of numeric elements; use `pipe(sum(add))` for other element types */
  sum(this: Stream<number, "finite">): number {
    return this.pipe(ops.sum());
  }

  /** Fold with the first element as seed */
  reduce(this: Stream<T, "finite">, accumulator: (acc: T, value: T) => T): T;
  /** Fold with `identity(first)` as seed */
  reduce<U>(
    this: Stream<T, "finite">,
    identity: (first: T) => U,
    accumulator: (acc: U, value: T) => U
  ): U;
  reduce<U>(
    this: Stream<T, "finite">,
    ...args:
      | [accumulator: (acc: T, value: T) => T]
      | [identity: (first: T) => U, accumulator: (acc: U, value: T) => U]
  ): T | U {
    if (args.length === 1) return this.pipe(ops.reduce(args[0]));
    return this.pipe(ops.reduce(args[0], args[1]));
  }

  /** Collect all elements into an array */
  toArray(this: Stream<T, "finite">): T[] {
    return this.pipe(ops.toArray());
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private current(operation: string): PullGenerator<T> {
    if (this.generator === null) throw new MovedStreamError(operation);
    return this.generator;
  }

  /** A clone of the generator for a new stage to own. */
  private snapshot(operation: string): PullGenerator<T> {
    return this.current(operation).clone();
  }

  /** A clone of the generator for a terminal to drive. */
  private run(operation: string): PullGenerator<T> {
    log.debug(`${operation} on ${this.finiteness} stream`);
    return this.snapshot(operation);
  }
}
