import { describe, it, expect } from "vitest";
import { None, isNone, some, type Pull, type PullGenerator } from "../pull.js";
import { ContainerGenerator, InfiniteGenerator, IterateGenerator, PackGenerator, RangeGenerator } from "../generators.js";
import {
  FilterGenerator,
  GroupGenerator,
  MapGenerator,
  SkipGenerator,
  TakeGenerator,
} from "../combinators.js";

// ---------------------------------------------------------------------------
// Helper: replays a fixed script of pulls and counts how often it was asked
// ---------------------------------------------------------------------------

class ScriptedGenerator<T> implements PullGenerator<T> {
  pulls = 0;

  constructor(
    private readonly script: readonly Pull<T>[],
    private position = 0
  ) {}

  next(): Pull<T> {
    this.pulls++;
    if (this.position >= this.script.length) return None;
    return this.script[this.position++];
  }

  clone(): ScriptedGenerator<T> {
    return new ScriptedGenerator(this.script, this.position);
  }
}

function drain<T>(generator: PullGenerator<T>): T[] {
  const values: T[] = [];
  for (let pulled = generator.next(); !isNone(pulled); pulled = generator.next()) {
    values.push(pulled.value);
  }
  return values;
}

// ===========================================================================
// Source generators
// ===========================================================================

describe("source generators", () => {
  it("InfiniteGenerator never signals exhaustion", () => {
    const gen = new InfiniteGenerator(() => "x");
    expect(gen.next()).toEqual(some("x"));
    expect(gen.next()).toEqual(some("x"));
    expect(gen.next()).toEqual(some("x"));
  });

  it("ContainerGenerator.copyOf does not see later changes to the source", () => {
    const source = [1, 2, 3];
    const gen = ContainerGenerator.copyOf(source);
    source.push(4);
    expect(drain(gen)).toEqual([1, 2, 3]);
  });

  it("ContainerGenerator.adopt reads the given array", () => {
    expect(drain(ContainerGenerator.adopt(["a", "b"]))).toEqual(["a", "b"]);
  });

  it("keeps returning None once exhausted", () => {
    const gen = ContainerGenerator.copyOf([1]);
    expect(gen.next()).toEqual(some(1));
    expect(gen.next()).toBe(None);
    expect(gen.next()).toBe(None);
  });

  it("boxes null and undefined elements", () => {
    const gen = ContainerGenerator.copyOf([null, undefined]);
    expect(gen.next()).toEqual({ value: null });
    expect(gen.next()).toEqual({ value: undefined });
    expect(gen.next()).toBe(None);
  });

  it("ContainerGenerator clone starts from the first element", () => {
    const gen = ContainerGenerator.copyOf([1, 2, 3]);
    gen.next();
    const copy = gen.clone();
    expect(copy.next()).toEqual(some(1));
    expect(drain(copy)).toEqual([2, 3]);
    expect(drain(gen)).toEqual([2, 3]);
  });

  it("PackGenerator clone starts from the first argument", () => {
    const gen = PackGenerator.of("a", "b");
    gen.next();
    gen.next();
    expect(gen.next()).toBe(None);
    expect(drain(gen.clone())).toEqual(["a", "b"]);
  });

  it("PackGenerator yields arguments in order", () => {
    expect(drain(PackGenerator.of(5, 4, 3))).toEqual([5, 4, 3]);
    expect(drain(PackGenerator.of())).toEqual([]);
  });

  it("IterateGenerator clones carry the current state", () => {
    const gen = new IterateGenerator(1, (x) => x * 3);
    gen.next();
    const copy = gen.clone();
    expect(copy.next()).toEqual(some(3));
    expect(gen.next()).toEqual(some(3));
    expect(gen.next()).toEqual(some(9));
  });

  it("RangeGenerator counts up and down", () => {
    expect(drain(new RangeGenerator(0, 4, 1))).toEqual([0, 1, 2, 3]);
    expect(drain(new RangeGenerator(3, 0, -1))).toEqual([3, 2, 1]);
    expect(drain(new RangeGenerator(2, 2, 1))).toEqual([]);
  });
});

// ===========================================================================
// Combinators
// ===========================================================================

describe("SkipGenerator", () => {
  it("discards the first values on the first pull only", () => {
    const gen = new SkipGenerator(ContainerGenerator.copyOf([1, 2, 3, 4]), 2);
    expect(drain(gen)).toEqual([3, 4]);
  });

  it("returns None when upstream runs out while skipping", () => {
    const upstream = ContainerGenerator.copyOf([1, 2]);
    const gen = new SkipGenerator(upstream, 5);
    expect(gen.next()).toBe(None);
    expect(gen.next()).toBe(None);
  });

  it("clone keeps the skipped state", () => {
    const gen = new SkipGenerator(new IterateGenerator(0, (x) => x + 1), 2);
    expect(gen.next()).toEqual(some(2));
    const copy = gen.clone();
    expect(copy.next()).toEqual(some(3));
    expect(gen.next()).toEqual(some(3));
  });
});

describe("TakeGenerator", () => {
  it("stops after the quota", () => {
    expect(drain(new TakeGenerator(new InfiniteGenerator(() => 1), 3))).toEqual([1, 1, 1]);
  });

  it("counts only values, not upstream exhaustion", () => {
    const upstream = new ScriptedGenerator<number>([None, some(1), some(2), some(3)]);
    const gen = new TakeGenerator(upstream, 2);

    expect(gen.next()).toBe(None);
    expect(gen.next()).toEqual(some(1));
    expect(gen.next()).toEqual(some(2));
    expect(gen.next()).toBe(None);
    expect(upstream.pulls).toBe(3);
  });

  it("does not pull upstream with a zero quota", () => {
    const upstream = new ScriptedGenerator([some("a")]);
    expect(new TakeGenerator(upstream, 0).next()).toBe(None);
    expect(upstream.pulls).toBe(0);
  });
});

describe("FilterGenerator", () => {
  it("pulls until a value matches", () => {
    const upstream = new ScriptedGenerator([some(1), some(3), some(4), some(5)]);
    const gen = new FilterGenerator(upstream, (x: number) => x % 2 === 0);
    expect(gen.next()).toEqual(some(4));
    expect(upstream.pulls).toBe(3);
    expect(gen.next()).toBe(None);
  });
});

describe("GroupGenerator", () => {
  it("returns a short final batch once", () => {
    const gen = new GroupGenerator(ContainerGenerator.copyOf([1, 2, 3, 4, 5]), 2);
    expect(gen.next()).toEqual(some([1, 2]));
    expect(gen.next()).toEqual(some([3, 4]));
    expect(gen.next()).toEqual(some([5]));
    expect(gen.next()).toBe(None);
  });

  it("never yields an empty batch", () => {
    expect(new GroupGenerator(ContainerGenerator.copyOf([]), 3).next()).toBe(None);
  });
});

describe("MapGenerator", () => {
  it("transforms values and forwards exhaustion", () => {
    const gen = new MapGenerator(ContainerGenerator.copyOf([1, 2]), (x: number) => `#${x}`);
    expect(drain(gen)).toEqual(["#1", "#2"]);
    expect(gen.next()).toBe(None);
  });
});
