/**
 * @pullstream/stream: lazy, pull-based, reusable pipelines
 *
 * A source is wrapped in a `Stream`; combinators (`skip`, `take`, `filter`,
 * `group`, `map`) build new streams without reading anything; terminals
 * (`nth`, `printTo`, `sum`, `reduce`, `toArray`) pull values from a private
 * copy of the pipeline, so a stream can be consumed any number of times.
 *
 * Whether a stream is finite is tracked in its type. Terminals that read
 * every element only compile on finite streams.
 *
 * @example
 * ```typescript
 * import { stream, group, take, toArray } from "@pullstream/stream";
 *
 * stream([1, 2, 3, 4, 5]).pipe(group(3)).pipe(toArray()); // [[1, 2, 3], [4, 5]]
 *
 * const ones = stream(() => 1);
 * ones.pipe(take(5)).pipe(toArray()); // [1, 1, 1, 1, 1]
 * ones.pipe(toArray());               // compile error: infinite stream
 * ```
 */

export { Stream } from "./stream.js";
export {
  stream,
  range,
  iterate,
  repeat,
  generate,
  begin,
  end,
  positionAt,
  transfer,
  resolveSource,
  Position,
  Transfer,
  type Resolution,
  type ProducerCheck,
  type PackCheck,
} from "./resolver.js";

export {
  skip,
  take,
  get,
  filter,
  group,
  map,
  nth,
  printTo,
  sum,
  reduce,
  toArray,
  toVector,
} from "./descriptors.js";
export type {
  Finiteness,
  SkipOp,
  TakeOp,
  FilterOp,
  GroupOp,
  MapOp,
  CombinatorOp,
  NthOp,
  PrintToOp,
  SumOp,
  ReduceOp,
  ToArrayOp,
  TerminalOp,
} from "./descriptors.js";

export { None, some, isSome, isNone } from "./pull.js";
export type { Pull, Some, PullGenerator } from "./pull.js";

export {
  InfiniteGenerator,
  ContainerGenerator,
  PackGenerator,
  IterateGenerator,
  RangeGenerator,
} from "./generators.js";
export {
  SkipGenerator,
  TakeGenerator,
  FilterGenerator,
  GroupGenerator,
  MapGenerator,
} from "./combinators.js";

export { StringSink, type TextSink } from "./sinks.js";

export {
  PullstreamError,
  StreamOperationError,
  InsufficientElementsError,
  EmptyStreamError,
  MovedStreamError,
  InvalidArgumentError,
} from "@pullstream/core";
