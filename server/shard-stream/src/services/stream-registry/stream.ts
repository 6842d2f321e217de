/**
 * Stream - a named, fixed set of shards plus stream-level metadata
 */
import { createHash } from "node:crypto";

import { Array as Arr, DateTime, Effect } from "effect";

import {
  MAX_HASH_KEY,
  type HashKey,
  type PartitionKey,
  type ShardId,
  type StreamName,
  type StreamStatus,
} from "../../domain.js";
import * as Shard from "./shard.js";

export interface Stream {
  readonly name: StreamName;
  readonly arn: string;
  readonly status: StreamStatus;
  readonly createdAt: DateTime.Utc;
  /** Distinguishes this stream from earlier ones created under the same name */
  readonly incarnation: number;
  readonly shards: Arr.NonEmptyReadonlyArray<Shard.Shard>;
  readonly tags: ReadonlyMap<string, string>;
}

/**
 * Split the 128-bit hash key space into `shardCount` contiguous ranges.
 * The last range absorbs the remainder so the ranges tile [0, 2^128 - 1].
 */
export const hashKeyRanges = (
  shardCount: number,
): Arr.NonEmptyReadonlyArray<{ readonly start: bigint; readonly end: bigint }> => {
  const count = BigInt(shardCount);
  const step = (MAX_HASH_KEY + 1n) / count;
  return Arr.makeBy(shardCount, (i) => {
    const start = BigInt(i) * step;
    const end = i === shardCount - 1 ? MAX_HASH_KEY : start + step - 1n;
    return { start, end };
  });
};

/** MD5 digest of the partition key read as an unsigned 128-bit integer */
export const hashPartitionKey = (partitionKey: PartitionKey): bigint =>
  BigInt(`0x${createHash("md5").update(partitionKey, "utf8").digest("hex")}`);

export const make = (input: {
  name: StreamName;
  arn: string;
  shardCount: number;
  incarnation: number;
}): Effect.Effect<Stream> =>
  Effect.gen(function* () {
    const [head, ...tail] = hashKeyRanges(input.shardCount);
    const first = yield* Shard.make({ index: 0, startingHashKey: head.start, endingHashKey: head.end });
    const rest = yield* Effect.forEach(tail, (range, i) =>
      Shard.make({ index: i + 1, startingHashKey: range.start, endingHashKey: range.end }),
    );
    const createdAt = yield* DateTime.now;
    const stream: Stream = {
      name: input.name,
      arn: input.arn,
      incarnation: input.incarnation,
      // Creation completes synchronously, so streams are never observed as CREATING
      status: "ACTIVE",
      createdAt,
      shards: [first, ...rest],
      tags: new Map(),
    };
    return stream;
  });

export const findShard = (stream: Stream, shardId: ShardId | string): Shard.Shard | undefined =>
  stream.shards.find((shard) => shard.id === shardId);

/** Shard owning the record: explicit hash key when given, else the partition key's hash */
export const routeRecord = (
  stream: Stream,
  input: { partitionKey: PartitionKey; explicitHashKey?: HashKey | undefined },
): Shard.Shard => {
  const hashKey =
    input.explicitHashKey !== undefined
      ? BigInt(input.explicitHashKey)
      : hashPartitionKey(input.partitionKey);
  // Ranges tile [0, MAX_HASH_KEY] and the last shard ends at MAX_HASH_KEY
  return stream.shards.find((s) => s.containsHashKey(hashKey)) ?? Arr.lastNonEmpty(stream.shards);
};
