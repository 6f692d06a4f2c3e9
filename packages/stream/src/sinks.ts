/**
 * Text sinks for the print terminal.
 */

/**
 * Anything text can be appended to. A Node `Writable` qualifies, as does
 * `process.stdout`.
 */
export interface TextSink {
  write(chunk: string): unknown;
}

/**
 * Collects written text in memory.
 *
 * @example
 * ```typescript
 * stream([1, 2, 3]).printTo(new StringSink()).toString(); // "1 2 3"
 * ```
 */
export class StringSink implements TextSink {
  private readonly chunks: string[] = [];

  write(chunk: string): this {
    this.chunks.push(chunk);
    return this;
  }

  toString(): string {
    return this.chunks.join("");
  }
}
