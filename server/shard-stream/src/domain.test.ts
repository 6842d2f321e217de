/**
 * Domain schema test suite
 */
import { Either, Schema } from "effect";
import { describe, expect, it } from "vitest";

import { encodeData, HashKey, SequenceNumber, ShardId, StreamName } from "./domain.js";

const accepts = <A, I>(schema: Schema.Schema<A, I>, value: unknown) =>
  Either.isRight(Schema.decodeUnknownEither(schema)(value));

describe("ShardId", () => {
  it("zero-pads the creation index to 12 digits", () => {
    expect(ShardId.fromIndex(0)).toBe("shardId-000000000000");
    expect(ShardId.fromIndex(12)).toBe("shardId-000000000012");
  });
});

describe("SequenceNumber", () => {
  it("formats counters without padding", () => {
    expect(SequenceNumber.fromCounter(1)).toBe("1");
    expect(SequenceNumber.fromCounter(42)).toBe("42");
  });

  it("converts to a bigint for arithmetic", () => {
    expect(SequenceNumber.toBigInt(SequenceNumber.make("10"))).toBe(10n);
  });

  it("rejects leading zeros and non-digits", () => {
    expect(accepts(SequenceNumber, "0")).toBe(true);
    expect(accepts(SequenceNumber, "123")).toBe(true);
    expect(accepts(SequenceNumber, "007")).toBe(false);
    expect(accepts(SequenceNumber, "abc")).toBe(false);
    expect(accepts(SequenceNumber, "")).toBe(false);
  });
});

describe("StreamName", () => {
  it("allows letters, digits, underscore, dot and hyphen", () => {
    expect(accepts(StreamName, "my_stream")).toBe(true);
    expect(accepts(StreamName, "orders.v2-eu")).toBe(true);
  });

  it("rejects empty, oversized and spaced names", () => {
    expect(accepts(StreamName, "")).toBe(false);
    expect(accepts(StreamName, "a".repeat(129))).toBe(false);
    expect(accepts(StreamName, "bad name")).toBe(false);
  });
});

describe("HashKey", () => {
  it("accepts the full 128-bit range and nothing beyond", () => {
    expect(accepts(HashKey, "0")).toBe(true);
    expect(accepts(HashKey, "340282366920938463463374607431768211455")).toBe(true);
    expect(accepts(HashKey, "340282366920938463463374607431768211456")).toBe(false);
    expect(accepts(HashKey, "-1")).toBe(false);
  });
});

describe("encodeData", () => {
  it("stores strings as UTF-8 and copies bytes", () => {
    expect(Array.from(encodeData("hi"))).toEqual([104, 105]);
    const bytes = new Uint8Array([1, 2, 3]);
    const encoded = encodeData(bytes);
    expect(encoded).not.toBe(bytes);
    bytes[0] = 99;
    expect(Array.from(encoded)).toEqual([1, 2, 3]);
  });
});
