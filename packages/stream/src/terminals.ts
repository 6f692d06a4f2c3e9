/**
 * Terminal operations.
 *
 * Each one drives a generator it owns, which `Stream` hands over as a
 * private clone, so the stream itself is never advanced.
 */

import { EmptyStreamError, InsufficientElementsError } from "@pullstream/core";
import { isNone, isSome, type PullGenerator } from "./pull.js";
import type { TextSink } from "./sinks.js";

/** Return the element at zero-based `index`. */
export function nthOf<T>(generator: PullGenerator<T>, index: number): T {
  for (let position = 0; ; position++) {
    const pulled = generator.next();
    if (isNone(pulled)) {
      throw new InsufficientElementsError("nth", index, position);
    }
    if (position === index) return pulled.value;
  }
}

/** Write every element to `sink` with `delimiter` between neighbours. */
export function printOf<T, S extends TextSink>(
  generator: PullGenerator<T>,
  sink: S,
  delimiter: string
): S {
  let first = true;
  for (let pulled = generator.next(); isSome(pulled); pulled = generator.next()) {
    if (!first) sink.write(delimiter);
    sink.write(String(pulled.value));
    first = false;
  }
  return sink;
}

export function sumOf<T>(generator: PullGenerator<T>, add: (left: T, right: T) => T): T {
  const first = generator.next();
  if (isNone(first)) throw new EmptyStreamError("sum");

  let total = first.value;
  for (let pulled = generator.next(); isSome(pulled); pulled = generator.next()) {
    total = add(total, pulled.value);
  }
  return total;
}

export function reduceOf<T, U>(
  generator: PullGenerator<T>,
  identity: (first: T) => U,
  accumulator: (acc: U, value: T) => U
): U {
  const first = generator.next();
  if (isNone(first)) throw new EmptyStreamError("reduce");

  let result = identity(first.value);
  for (let pulled = generator.next(); isSome(pulled); pulled = generator.next()) {
    result = accumulator(result, pulled.value);
  }
  return result;
}

export function arrayOf<T>(generator: PullGenerator<T>): T[] {
  const result: T[] = [];
  for (let pulled = generator.next(); isSome(pulled); pulled = generator.next()) {
    result.push(pulled.value);
  }
  return result;
}
