/**
 * Shared domain types for sharded record streams
 */
import { Schema } from "effect";

// -------------------------------------------------------------------------------------
// Branded primitives
// -------------------------------------------------------------------------------------

export const StreamName = Schema.String.pipe(
  Schema.minLength(1),
  Schema.maxLength(128),
  Schema.pattern(/^[a-zA-Z0-9_.-]+$/),
  Schema.brand("StreamName"),
);
export type StreamName = typeof StreamName.Type;

const ShardId_ = Schema.String.pipe(Schema.brand("ShardId"));
type ShardId_ = typeof ShardId_.Type;

export const ShardId = Object.assign(ShardId_, {
  /** Deterministic id for the shard created at `index`, e.g. shardId-000000000001 */
  fromIndex: (index: number): ShardId_ =>
    ShardId_.make(`shardId-${index.toString().padStart(12, "0")}`),
});
export type ShardId = ShardId_;

const SequenceNumber_ = Schema.String.pipe(
  Schema.pattern(/^(0|[1-9]\d{0,128})$/),
  Schema.brand("SequenceNumber"),
);
type SequenceNumber_ = typeof SequenceNumber_.Type;

/** Sequence numbers are decimal strings without leading zeros */
export const SequenceNumber = Object.assign(SequenceNumber_, {
  fromCounter: (n: number): SequenceNumber_ => SequenceNumber_.make(n.toString()),
  toBigInt: (seq: SequenceNumber_): bigint => BigInt(seq),
});
export type SequenceNumber = SequenceNumber_;

export const PartitionKey = Schema.String.pipe(
  Schema.minLength(1),
  Schema.maxLength(256),
  Schema.brand("PartitionKey"),
);
export type PartitionKey = typeof PartitionKey.Type;

/** Upper bound (inclusive) of the 128-bit hash key space */
export const MAX_HASH_KEY = 2n ** 128n - 1n;

export const HashKey = Schema.String.pipe(
  Schema.pattern(/^\d{1,39}$/),
  Schema.filter((s) => BigInt(s) <= MAX_HASH_KEY, {
    message: () => "Hash key must be within [0, 2^128 - 1]",
  }),
  Schema.brand("HashKey"),
);
export type HashKey = typeof HashKey.Type;

// -------------------------------------------------------------------------------------
// Enumerations
// -------------------------------------------------------------------------------------

export const ShardIteratorType = Schema.Literal(
  "TRIM_HORIZON",
  "AT_SEQUENCE_NUMBER",
  "AFTER_SEQUENCE_NUMBER",
  "LATEST",
);
export type ShardIteratorType = typeof ShardIteratorType.Type;

export const StreamStatus = Schema.Literal("CREATING", "ACTIVE", "DELETING");
export type StreamStatus = typeof StreamStatus.Type;

// -------------------------------------------------------------------------------------
// Records
// -------------------------------------------------------------------------------------

/** Record data as callers hand it in; strings are stored as UTF-8 */
export type RecordData = string | Uint8Array;

/** Always returns a fresh buffer, so later writes by the caller cannot reach a stored record */
export const encodeData = (data: RecordData): Uint8Array =>
  typeof data === "string" ? new TextEncoder().encode(data) : new Uint8Array(data);

/** A record as stored in a shard, with sequence number and arrival time assigned */
export class StreamRecord extends Schema.Class<StreamRecord>("StreamRecord")({
  sequenceNumber: SequenceNumber,
  partitionKey: PartitionKey,
  data: Schema.Uint8ArrayFromSelf,
  approximateArrivalTimestamp: Schema.DateTimeUtc,
}) {}

// -------------------------------------------------------------------------------------
// Descriptions
// -------------------------------------------------------------------------------------

export class HashKeyRange extends Schema.Class<HashKeyRange>("HashKeyRange")({
  startingHashKey: Schema.String,
  endingHashKey: Schema.String,
}) {}

export class SequenceNumberRange extends Schema.Class<SequenceNumberRange>(
  "SequenceNumberRange",
)({
  startingSequenceNumber: SequenceNumber,
}) {}

export class ShardDescription extends Schema.Class<ShardDescription>("ShardDescription")({
  shardId: ShardId,
  hashKeyRange: HashKeyRange,
  sequenceNumberRange: SequenceNumberRange,
}) {}

export class StreamDescription extends Schema.Class<StreamDescription>("StreamDescription")({
  streamName: StreamName,
  streamArn: Schema.String,
  streamStatus: StreamStatus,
  streamCreationTimestamp: Schema.DateTimeUtc,
  shards: Schema.Array(ShardDescription),
  hasMoreShards: Schema.Boolean,
}) {}

export class Tag extends Schema.Class<Tag>("Tag")({
  key: Schema.String,
  value: Schema.String,
}) {}
