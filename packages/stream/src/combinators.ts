/**
 * Combinator generators.
 *
 * Each one owns exactly one upstream generator, received already cloned,
 * and transforms its output. Combinators never fail: running out of data is
 * reported through `None`.
 */

import { invariant } from "@pullstream/core";
import { None, isNone, isSome, some, type Pull, type PullGenerator } from "./pull.js";

/**
 * Discards the first `count` upstream values on the first pull, then forwards.
 */
export class SkipGenerator<T> implements PullGenerator<T> {
  private skipped = false;

  constructor(
    private readonly upstream: PullGenerator<T>,
    private readonly count: number
  ) {}

  next(): Pull<T> {
    if (!this.skipped) {
      this.skipped = true;
      for (let i = 0; i < this.count; i++) {
        if (isNone(this.upstream.next())) return None;
      }
    }
    return this.upstream.next();
  }

  clone(): SkipGenerator<T> {
    const copy = new SkipGenerator(this.upstream.clone(), this.count);
    copy.skipped = this.skipped;
    return copy;
  }
}

/**
 * Forwards at most `count` values.
 *
 * Quota is consumed only by values actually returned; an upstream `None` is
 * forwarded without counting. Once the quota is met upstream is not pulled
 * again.
 */
export class TakeGenerator<T> implements PullGenerator<T> {
  private taken = 0;

  constructor(
    private readonly upstream: PullGenerator<T>,
    private readonly count: number
  ) {}

  next(): Pull<T> {
    if (this.taken >= this.count) return None;

    const pulled = this.upstream.next();
    if (isSome(pulled)) this.taken++;
    return pulled;
  }

  clone(): TakeGenerator<T> {
    const copy = new TakeGenerator(this.upstream.clone(), this.count);
    copy.taken = this.taken;
    return copy;
  }
}

/**
 * Pulls until a value satisfies the predicate or upstream is exhausted.
 */
export class FilterGenerator<T> implements PullGenerator<T> {
  constructor(
    private readonly upstream: PullGenerator<T>,
    private readonly predicate: (value: T) => boolean
  ) {}

  next(): Pull<T> {
    for (let pulled = this.upstream.next(); isSome(pulled); pulled = this.upstream.next()) {
      if (this.predicate(pulled.value)) return pulled;
    }
    return None;
  }

  clone(): FilterGenerator<T> {
    return new FilterGenerator(this.upstream.clone(), this.predicate);
  }
}

/**
 * Batches consecutive values into arrays of `size` elements. The last batch
 * may be shorter; no batch is ever empty.
 */
export class GroupGenerator<T> implements PullGenerator<T[]> {
  constructor(
    private readonly upstream: PullGenerator<T>,
    private readonly size: number
  ) {
    invariant(size > 0, "group size must be positive");
  }

  next(): Pull<T[]> {
    const first = this.upstream.next();
    if (isNone(first)) return None;

    const batch: T[] = [first.value];
    while (batch.length < this.size) {
      const pulled = this.upstream.next();
      if (isNone(pulled)) break;
      batch.push(pulled.value);
    }
    return some(batch);
  }

  clone(): GroupGenerator<T> {
    return new GroupGenerator(this.upstream.clone(), this.size);
  }
}

/**
 * Applies `transform` to every upstream value.
 */
export class MapGenerator<T, U> implements PullGenerator<U> {
  constructor(
    private readonly upstream: PullGenerator<T>,
    private readonly transform: (value: T) => U
  ) {}

  next(): Pull<U> {
    const pulled = this.upstream.next();
    if (isNone(pulled)) return None;
    return some(this.transform(pulled.value));
  }

  clone(): MapGenerator<T, U> {
    return new MapGenerator(this.upstream.clone(), this.transform);
  }
}
