/**
 * Stream routing test suite
 */
import { describe, expect, it } from "@effect/vitest";
import { Effect } from "effect";

import { HashKey, MAX_HASH_KEY, PartitionKey, StreamName } from "../../domain.js";
import * as Stream from "./stream.js";

describe("hashKeyRanges", () => {
  it("gives a single shard the whole key space", () => {
    expect(Stream.hashKeyRanges(1)).toEqual([{ start: 0n, end: MAX_HASH_KEY }]);
  });

  it("splits two shards at 2^127", () => {
    const half = 2n ** 127n;
    expect(Stream.hashKeyRanges(2)).toEqual([
      { start: 0n, end: half - 1n },
      { start: half, end: MAX_HASH_KEY },
    ]);
  });

  it("tiles the key space without gaps for uneven counts", () => {
    const ranges = Stream.hashKeyRanges(3);
    expect(ranges[0].start).toBe(0n);
    expect(ranges[1].start).toBe(ranges[0].end + 1n);
    expect(ranges[2].start).toBe(ranges[1].end + 1n);
    expect(ranges[2].end).toBe(MAX_HASH_KEY);
  });
});

describe("hashPartitionKey", () => {
  it("reads the MD5 digest as a 128-bit integer", () => {
    expect(Stream.hashPartitionKey(PartitionKey.make("abc"))).toBe(
      BigInt("0x900150983cd24fb0d6963f7d28e17f72"),
    );
  });
});

describe("routeRecord", () => {
  const makeStream = (shardCount: number) =>
    Stream.make({ name: StreamName.make("routing"), arn: "arn:test", shardCount, incarnation: 0 });

  it.effect("routes by explicit hash key when one is given", () =>
    Effect.gen(function* () {
      const stream = yield* makeStream(2);
      const key = PartitionKey.make("abc");
      expect(Stream.routeRecord(stream, { partitionKey: key, explicitHashKey: HashKey.make("0") }).id).toBe(
        "shardId-000000000000",
      );
      expect(
        Stream.routeRecord(stream, {
          partitionKey: key,
          explicitHashKey: HashKey.make(MAX_HASH_KEY.toString()),
        }).id,
      ).toBe("shardId-000000000001");
    }),
  );

  it.effect("routes by partition key hash otherwise", () =>
    Effect.gen(function* () {
      const stream = yield* makeStream(2);
      // md5("abc") starts with 0x9, so it falls in the upper half
      expect(Stream.routeRecord(stream, { partitionKey: PartitionKey.make("abc") }).id).toBe(
        "shardId-000000000001",
      );
    }),
  );

  it.effect("creates ACTIVE streams with no tags", () =>
    Effect.gen(function* () {
      const stream = yield* makeStream(3);
      expect(stream.status).toBe("ACTIVE");
      expect(stream.shards.map((shard) => shard.id)).toEqual([
        "shardId-000000000000",
        "shardId-000000000001",
        "shardId-000000000002",
      ]);
      expect(stream.tags.size).toBe(0);
    }),
  );
});
