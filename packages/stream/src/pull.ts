/**
 * The pull protocol every generator honors.
 *
 * Calling `next()` either yields a value or signals that the generator is
 * exhausted. There is no separate "has more" query and no peeking: advancing
 * is the only way to observe.
 *
 * ## Runtime Representation
 *
 * ```typescript
 * some(42)   // { value: 42 }
 * some(null) // { value: null }  (null and undefined elements survive)
 * None       // null
 * ```
 */

/** A pulled value. */
export type Some<T> = { readonly value: T };

/** The exhaustion signal. */
export type None = null;

/** The exhaustion signal. */
export const None: None = null;

/** Result of one pull: a value or the exhaustion signal. */
export type Pull<T> = Some<T> | None;

export function some<T>(value: T): Some<T> {
  return { value };
}

export function isSome<T>(pulled: Pull<T>): pulled is Some<T> {
  return pulled !== null;
}

export function isNone<T>(pulled: Pull<T>): pulled is None {
  return pulled === null;
}

/**
 * A stateful producer of elements.
 *
 * `clone()` duplicates the traversal state, including any upstream generator,
 * so the copy and the original advance independently from the same point.
 * A generator that has returned `None` keeps returning `None`.
 */
export interface PullGenerator<T> {
  next(): Pull<T>;
  clone(): PullGenerator<T>;
}
