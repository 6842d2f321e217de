/**
 * StreamEngine service definition
 */
import { Context, Effect } from "effect";

import type { RecordData, SequenceNumber, ShardId, StreamRecord } from "../../domain.js";
import type { InvalidArgumentError, ResourceNotFoundError } from "../../errors.js";

// -------------------------------------------------------------------------------------
// Inputs / results
// -------------------------------------------------------------------------------------

export interface PutRecordsEntry {
  readonly partitionKey: string;
  readonly data: RecordData;
  /** Overrides the partition key hash when choosing a shard */
  readonly explicitHashKey?: string;
}

export interface PutRecordResult {
  readonly shardId: ShardId;
  readonly sequenceNumber: SequenceNumber;
}

export interface PutRecordsResult {
  readonly failedRecordCount: number;
  /** One entry per input record, in input order */
  readonly records: ReadonlyArray<PutRecordResult>;
}

export interface GetRecordsResult {
  readonly records: ReadonlyArray<StreamRecord>;
  /** Always resolvable, even past the end of the shard */
  readonly nextShardIterator: string;
  /** 0 when caught up; otherwise the age of the oldest unread record */
  readonly millisBehindLatest: number;
}

// -------------------------------------------------------------------------------------
// StreamEngine service
// -------------------------------------------------------------------------------------

export class StreamEngine extends Context.Tag("@app/StreamEngine")<
  StreamEngine,
  {
    readonly putRecord: (input: {
      streamName: string;
      partitionKey: string;
      data: RecordData;
      explicitHashKey?: string;
    }) => Effect.Effect<PutRecordResult, InvalidArgumentError | ResourceNotFoundError>;

    /** All entries are validated before any is appended */
    readonly putRecords: (input: {
      streamName: string;
      records: ReadonlyArray<PutRecordsEntry>;
    }) => Effect.Effect<PutRecordsResult, InvalidArgumentError | ResourceNotFoundError>;

    /**
     * Issue an opaque iterator for a shard.
     * @param shardIteratorType - TRIM_HORIZON, AT_SEQUENCE_NUMBER, AFTER_SEQUENCE_NUMBER or LATEST.
     * @param startingSequenceNumber - Required for the two sequence-anchored types, ignored otherwise.
     */
    readonly getShardIterator: (input: {
      streamName: string;
      shardId: string;
      shardIteratorType: string;
      startingSequenceNumber?: string;
    }) => Effect.Effect<{ shardIterator: string }, InvalidArgumentError | ResourceNotFoundError>;

    /**
     * Read records at an iterator.
     * @param limit - Maximum records to return. Omitted means everything available.
     */
    readonly getRecords: (input: {
      shardIterator: string;
      limit?: number;
    }) => Effect.Effect<GetRecordsResult, InvalidArgumentError | ResourceNotFoundError>;
  }
>() {}
