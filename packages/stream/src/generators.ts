/**
 * Source generators: producers with no upstream.
 */

import { None, some, type Pull, type PullGenerator } from "./pull.js";

/**
 * Calls a zero-argument producer for every element. Never exhausts.
 */
export class InfiniteGenerator<T> implements PullGenerator<T> {
  constructor(private readonly producer: () => T) {}

  next(): Pull<T> {
    return some(this.producer());
  }

  clone(): InfiniteGenerator<T> {
    return new InfiniteGenerator(this.producer);
  }
}

/**
 * Reads an owned, read-only sequence front to back. A clone shares the data
 * and starts again from its first element.
 */
abstract class SequenceGenerator<T> implements PullGenerator<T> {
  private cursor = 0;

  protected constructor(protected readonly data: readonly T[]) {}

  next(): Pull<T> {
    if (this.cursor >= this.data.length) return None;
    return some(this.data[this.cursor++]);
  }

  abstract clone(): SequenceGenerator<T>;
}

/**
 * Generator over a materialized container.
 *
 * `copyOf` duplicates the elements of any iterable; `adopt` takes an array by
 * transfer and reads it in place. Either way the generator never writes to
 * its data, so clones share it.
 */
export class ContainerGenerator<T> extends SequenceGenerator<T> {
  private constructor(data: readonly T[]) {
    super(data);
  }

  static copyOf<T>(source: Iterable<T>): ContainerGenerator<T> {
    return new ContainerGenerator(Array.from(source));
  }

  static adopt<T>(data: readonly T[]): ContainerGenerator<T> {
    return new ContainerGenerator(data);
  }

  clone(): ContainerGenerator<T> {
    return new ContainerGenerator(this.data);
  }
}

/**
 * Generator over an argument pack, yielding values in argument order.
 */
export class PackGenerator<T> extends SequenceGenerator<T> {
  private constructor(values: readonly T[]) {
    super(values);
  }

  static of<T>(...values: T[]): PackGenerator<T> {
    return new PackGenerator(values);
  }

  clone(): PackGenerator<T> {
    return new PackGenerator(this.data);
  }
}

/**
 * Yields `seed`, `step(seed)`, `step(step(seed))`, ... Never exhausts.
 */
export class IterateGenerator<T> implements PullGenerator<T> {
  constructor(
    private current: T,
    private readonly step: (value: T) => T
  ) {}

  next(): Pull<T> {
    const value = this.current;
    this.current = this.step(value);
    return some(value);
  }

  clone(): IterateGenerator<T> {
    return new IterateGenerator(this.current, this.step);
  }
}

/**
 * Numbers in `[start, end)` advancing by `step` (negative steps count down).
 */
export class RangeGenerator implements PullGenerator<number> {
  constructor(
    private current: number,
    private readonly end: number,
    private readonly step: number
  ) {}

  next(): Pull<number> {
    const inRange = this.step > 0 ? this.current < this.end : this.current > this.end;
    if (!inRange) return None;

    const value = this.current;
    this.current += this.step;
    return some(value);
  }

  clone(): RangeGenerator {
    return new RangeGenerator(this.current, this.end, this.step);
  }
}
