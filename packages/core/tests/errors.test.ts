/**
 * Tests for error types and safety primitives
 */

import { describe, it, expect } from "vitest";
import {
  PullstreamError,
  StreamOperationError,
  InsufficientElementsError,
  EmptyStreamError,
  MovedStreamError,
  InvalidArgumentError,
  invariant,
  requireArgument,
  requireCount,
  unreachable,
} from "../src/index.js";

describe("error taxonomy", () => {
  it("InsufficientElementsError carries the lookup details", () => {
    const err = new InsufficientElementsError("nth", 5, 5);
    expect(err).toBeInstanceOf(StreamOperationError);
    expect(err).toBeInstanceOf(PullstreamError);
    expect(err.message).toBe("Stream doesn't contain enough elements to perform operation 'nth'.");
    expect(err.code).toBe("insufficient_elements");
    expect(err.name).toBe("InsufficientElementsError");
    expect(err.requested).toBe(5);
    expect(err.available).toBe(5);
  });

  it("EmptyStreamError names the operation", () => {
    const err = new EmptyStreamError("sum");
    expect(err.message).toBe("Operation 'sum' cannot be performed on empty stream.");
    expect(err.code).toBe("empty_stream");
    expect(err.operation).toBe("sum");
  });

  it("MovedStreamError uses the moved code", () => {
    expect(new MovedStreamError("toArray").code).toBe("moved");
  });
});

describe("safety primitives", () => {
  it("invariant passes on true and throws on false", () => {
    expect(() => invariant(true)).not.toThrow();
    expect(() => invariant(false, "broken")).toThrow("broken");
    expect(() => invariant(false)).toThrow("Invariant violation");
  });

  it("requireArgument throws InvalidArgumentError", () => {
    expect(() => requireArgument(false, "bad input")).toThrow(InvalidArgumentError);
  });

  it("requireCount accepts zero and positive integers", () => {
    expect(() => requireCount(0, "count")).not.toThrow();
    expect(() => requireCount(7, "count")).not.toThrow();
  });

  it("requireCount rejects negatives and fractions", () => {
    expect(() => requireCount(-1, "skip count")).toThrow(
      "skip count must be a non-negative integer, got -1"
    );
    expect(() => requireCount(1.5, "count")).toThrow(InvalidArgumentError);
  });

  it("unreachable always throws", () => {
    expect(() => unreachable()).toThrow("Unreachable code reached");
  });
});
