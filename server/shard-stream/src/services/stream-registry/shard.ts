/**
 * Shard - ordered, append-only record list with its own sequence counter
 */
import { DateTime, Effect, Schema } from "effect";

import {
  HashKeyRange,
  PartitionKey,
  SequenceNumber,
  SequenceNumberRange,
  ShardDescription,
  ShardId,
  StreamRecord,
} from "../../domain.js";
import { InvalidArgumentError } from "../../errors.js";

// -------------------------------------------------------------------------------------
// Read positions
// -------------------------------------------------------------------------------------

export const TrimHorizon = Schema.TaggedStruct("TrimHorizon", {});
export const AtSequenceNumber = Schema.TaggedStruct("AtSequenceNumber", {
  sequenceNumber: SequenceNumber,
});
export const AfterSequenceNumber = Schema.TaggedStruct("AfterSequenceNumber", {
  sequenceNumber: SequenceNumber,
});
export const AtIndex = Schema.TaggedStruct("AtIndex", {
  index: Schema.NonNegativeInt,
});

/**
 * Where a read starts. Sequence-anchored positions stay symbolic and are
 * resolved against the record list on every read; AtIndex is already concrete.
 */
export const Position = Schema.Union(TrimHorizon, AtSequenceNumber, AfterSequenceNumber, AtIndex);
export type Position = typeof Position.Type;

// -------------------------------------------------------------------------------------
// Shard interface
// -------------------------------------------------------------------------------------

export interface ReadResult {
  readonly records: ReadonlyArray<StreamRecord>;
  /** Index of the first record not returned; equals the shard size when caught up */
  readonly nextIndex: number;
  /** The record at nextIndex, if one exists */
  readonly firstUnread: StreamRecord | undefined;
}

export interface Shard {
  readonly id: ShardId;
  readonly startingHashKey: bigint;
  readonly endingHashKey: bigint;
  /** Assign the next sequence number, store the record and return it */
  readonly append: (input: { partitionKey: PartitionKey; data: Uint8Array }) => Effect.Effect<StreamRecord>;
  /** Append several records as one step; sequence numbers are consecutive */
  readonly appendAll: (
    inputs: ReadonlyArray<{ partitionKey: PartitionKey; data: Uint8Array }>,
  ) => Effect.Effect<ReadonlyArray<StreamRecord>>;
  /** Number of records appended so far */
  readonly size: Effect.Effect<number>;
  /** Index a read from `position` would start at */
  readonly resolve: (position: Position) => Effect.Effect<number, InvalidArgumentError>;
  /**
   * Returned records are copies. Fails when a sequence-anchored position names
   * a record this shard does not hold.
   */
  readonly read: (input: {
    position: Position;
    limit?: number | undefined;
  }) => Effect.Effect<ReadResult, InvalidArgumentError>;
  readonly containsHashKey: (hashKey: bigint) => boolean;
  readonly describe: () => ShardDescription;
}

// -------------------------------------------------------------------------------------
// Shard implementation
// -------------------------------------------------------------------------------------

/** Index of the record carrying `sequenceNumber`, or -1. Sequence n lives at index n - 1. */
const indexOf = (records: ReadonlyArray<StreamRecord>, sequenceNumber: SequenceNumber): number => {
  const index = SequenceNumber.toBigInt(sequenceNumber) - 1n;
  if (index < 0n || index >= BigInt(records.length)) return -1;
  const i = Number(index);
  return records[i]?.sequenceNumber === sequenceNumber ? i : -1;
};

/** Readers get their own buffer; the stored record stays untouched */
const copyRecord = (record: StreamRecord): StreamRecord =>
  StreamRecord.make({
    sequenceNumber: record.sequenceNumber,
    partitionKey: record.partitionKey,
    data: new Uint8Array(record.data),
    approximateArrivalTimestamp: record.approximateArrivalTimestamp,
  });

const resolveIn = (
  records: ReadonlyArray<StreamRecord>,
  position: Position,
): Effect.Effect<number, InvalidArgumentError> => {
  switch (position._tag) {
    case "TrimHorizon":
      return Effect.succeed(0);
    case "AtIndex":
      return Effect.succeed(position.index);
    case "AtSequenceNumber":
    case "AfterSequenceNumber": {
      const index = indexOf(records, position.sequenceNumber);
      if (index === -1) {
        return Effect.fail(
          InvalidArgumentError.make({
            message: `Sequence number ${position.sequenceNumber} does not exist in this shard`,
          }),
        );
      }
      return Effect.succeed(position._tag === "AtSequenceNumber" ? index : index + 1);
    }
  }
};

export const make = (input: {
  index: number;
  startingHashKey: bigint;
  endingHashKey: bigint;
}): Effect.Effect<Shard> =>
  Effect.gen(function* () {
    const { startingHashKey, endingHashKey } = input;
    const id = ShardId.fromIndex(input.index);
    const lock = yield* Effect.makeSemaphore(1);
    const records: StreamRecord[] = [];
    let nextSequence = 1;

    const push = (
      entry: { partitionKey: PartitionKey; data: Uint8Array },
      arrivedAt: DateTime.Utc,
    ): StreamRecord => {
      const record = StreamRecord.make({
        sequenceNumber: SequenceNumber.fromCounter(nextSequence++),
        partitionKey: entry.partitionKey,
        data: entry.data,
        approximateArrivalTimestamp: arrivedAt,
      });
      records.push(record);
      return record;
    };

    const appendAll = (inputs: ReadonlyArray<{ partitionKey: PartitionKey; data: Uint8Array }>) =>
      lock.withPermits(1)(
        Effect.gen(function* () {
          const arrivedAt = yield* DateTime.now;
          return inputs.map((entry) => push(entry, arrivedAt));
        }),
      );

    const append = (entry: { partitionKey: PartitionKey; data: Uint8Array }) =>
      lock.withPermits(1)(
        Effect.gen(function* () {
          const arrivedAt = yield* DateTime.now;
          return push(entry, arrivedAt);
        }),
      );

    const size = lock.withPermits(1)(Effect.sync(() => records.length));

    const resolve = (position: Position) => lock.withPermits(1)(resolveIn(records, position));

    const read = ({ position, limit }: { position: Position; limit?: number | undefined }) =>
      lock.withPermits(1)(
        Effect.gen(function* () {
          const start = yield* resolveIn(records, position);
          const end = limit === undefined ? records.length : Math.min(records.length, start + limit);
          const page = start < end ? records.slice(start, end).map(copyRecord) : [];
          const nextIndex = start + page.length;
          const firstUnread: StreamRecord | undefined = records[nextIndex];
          return {
            records: page,
            nextIndex,
            firstUnread: firstUnread === undefined ? undefined : copyRecord(firstUnread),
          };
        }),
      );

    const containsHashKey = (hashKey: bigint) =>
      hashKey >= startingHashKey && hashKey <= endingHashKey;

    const describe = () =>
      ShardDescription.make({
        shardId: id,
        hashKeyRange: HashKeyRange.make({
          startingHashKey: startingHashKey.toString(),
          endingHashKey: endingHashKey.toString(),
        }),
        sequenceNumberRange: SequenceNumberRange.make({
          startingSequenceNumber: SequenceNumber.fromCounter(1),
        }),
      });

    return {
      id,
      startingHashKey,
      endingHashKey,
      append,
      appendAll,
      size,
      resolve,
      read,
      containsHashKey,
      describe,
    };
  });
