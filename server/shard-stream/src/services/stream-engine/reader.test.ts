/**
 * readShard test suite
 */
import { describe, expect, it } from "@effect/vitest";
import { Effect } from "effect";

import { ShardId } from "../../domain.js";
import { collect, makeTestLayer } from "../../testing.js";
import { StreamRegistry } from "../stream-registry/service.js";
import { readShard } from "./reader.js";
import { StreamEngine } from "./service.js";

const seed = Effect.gen(function* () {
  const registry = yield* StreamRegistry;
  const engine = yield* StreamEngine;
  yield* registry.createStream({ streamName: "feed", shardCount: 1 });
  yield* engine.putRecords({
    streamName: "feed",
    records: Array.from({ length: 5 }, (_, i) => ({ partitionKey: `k${i}`, data: `v${i}` })),
  });
});

const base = { streamName: "feed", shardId: ShardId.fromIndex(0) };

describe("readShard", () => {
  it.effect("drains a shard across pages", () =>
    Effect.gen(function* () {
      yield* seed;
      const records = yield* collect(
        readShard({ ...base, shardIteratorType: "TRIM_HORIZON", pageSize: 2 }),
      );
      expect(records.map((r) => r.sequenceNumber)).toEqual(["1", "2", "3", "4", "5"]);
    }).pipe(Effect.provide(makeTestLayer())),
  );

  it.effect("reads everything in one page without a page size", () =>
    Effect.gen(function* () {
      yield* seed;
      const records = yield* collect(readShard({ ...base, shardIteratorType: "TRIM_HORIZON" }));
      expect(records).toHaveLength(5);
    }).pipe(Effect.provide(makeTestLayer())),
  );

  it.effect("starts after a sequence number", () =>
    Effect.gen(function* () {
      yield* seed;
      const records = yield* collect(
        readShard({
          ...base,
          shardIteratorType: "AFTER_SEQUENCE_NUMBER",
          startingSequenceNumber: "3",
        }),
      );
      expect(records.map((r) => r.partitionKey)).toEqual(["k3", "k4"]);
    }).pipe(Effect.provide(makeTestLayer())),
  );

  it.effect("ends immediately when positioned at the tip", () =>
    Effect.gen(function* () {
      yield* seed;
      const records = yield* collect(readShard({ ...base, shardIteratorType: "LATEST" }));
      expect(records).toEqual([]);
    }).pipe(Effect.provide(makeTestLayer())),
  );

  it.effect("surfaces iterator errors", () =>
    Effect.gen(function* () {
      yield* seed;
      const error = yield* Effect.flip(
        collect(readShard({ ...base, shardIteratorType: "SOMETIMES" })),
      );
      expect(error._tag).toBe("InvalidArgumentError");
    }).pipe(Effect.provide(makeTestLayer())),
  );
});
