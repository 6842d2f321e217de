/**
 * Live implementation of StreamEngine
 */
import { DateTime, Effect, Layer, Schema } from "effect";

import { StreamEngineConfig } from "../../config.js";
import {
  encodeData,
  HashKey,
  PartitionKey,
  SequenceNumber,
  ShardIteratorType,
} from "../../domain.js";
import { InvalidArgumentError, ResourceNotFoundError, validate, validateOptional } from "../../errors.js";
import * as ShardIterator from "../../shardIterator.js";
import * as StreamRegistry from "../stream-registry/index.js";
import { StreamEngine, type PutRecordResult, type PutRecordsEntry } from "./service.js";

const MAX_RECORDS_PER_BATCH = 500;

const Batch = Schema.Array(Schema.Unknown).pipe(
  Schema.minItems(1),
  Schema.maxItems(MAX_RECORDS_PER_BATCH),
);

type Shard = StreamRegistry.Shard.Shard;

const make = Effect.gen(function* () {
  const registry = yield* StreamRegistry.StreamRegistry;
  const config = yield* StreamEngineConfig;
  const GetRecordsLimit = Schema.Int.pipe(Schema.between(1, config.maxGetRecordsLimit));
  const textEncoder = new TextEncoder();

  /** Validate a single put and encode its data */
  const prepare = (entry: PutRecordsEntry) =>
    Effect.gen(function* () {
      const partitionKey = yield* validate(PartitionKey, "PartitionKey")(entry.partitionKey);
      const explicitHashKey = yield* validateOptional(HashKey, "ExplicitHashKey")(
        entry.explicitHashKey,
      );
      const data = encodeData(entry.data);
      const size = data.byteLength + textEncoder.encode(partitionKey).byteLength;
      if (size > config.maxRecordSizeBytes) {
        return yield* InvalidArgumentError.make({
          message: `Record of ${size} bytes exceeds the ${config.maxRecordSizeBytes} byte limit`,
        });
      }
      return { partitionKey, explicitHashKey, data };
    });

  const getShard = (streamName: string, shardId: string) =>
    Effect.gen(function* () {
      const stream = yield* registry.getStream(streamName);
      const shard = StreamRegistry.Stream.findShard(stream, shardId);
      if (shard === undefined) {
        return yield* ResourceNotFoundError.make({
          message: `Shard ${shardId} in stream ${stream.name} not found`,
        });
      }
      return { stream, shard };
    });

  const positionFor = (
    shard: Shard,
    iteratorType: ShardIteratorType,
    startingSequenceNumber: string | undefined,
  ): Effect.Effect<StreamRegistry.Shard.Position, InvalidArgumentError> => {
    switch (iteratorType) {
      case "TRIM_HORIZON":
        return Effect.succeed(StreamRegistry.Shard.TrimHorizon.make({}));
      case "LATEST":
        // Anchor to the append count now, so only later records are visible
        return shard.size.pipe(Effect.map((index) => StreamRegistry.Shard.AtIndex.make({ index })));
      case "AT_SEQUENCE_NUMBER":
      case "AFTER_SEQUENCE_NUMBER":
        return Effect.gen(function* () {
          if (startingSequenceNumber === undefined) {
            return yield* InvalidArgumentError.make({
              message: `StartingSequenceNumber is required for ${iteratorType}`,
            });
          }
          const sequenceNumber = yield* validate(SequenceNumber, "StartingSequenceNumber")(
            startingSequenceNumber,
          );
          const position =
            iteratorType === "AT_SEQUENCE_NUMBER"
              ? StreamRegistry.Shard.AtSequenceNumber.make({ sequenceNumber })
              : StreamRegistry.Shard.AfterSequenceNumber.make({ sequenceNumber });
          yield* shard.resolve(position);
          return position;
        });
    }
  };

  const putRecord = Effect.fn("StreamEngine.putRecord")(function* (input: {
    streamName: string;
    partitionKey: string;
    data: PutRecordsEntry["data"];
    explicitHashKey?: string;
  }) {
    const entry = yield* prepare(input);
    const stream = yield* registry.getStream(input.streamName);
    const shard = StreamRegistry.Stream.routeRecord(stream, entry);
    const record = yield* shard.append(entry);
    yield* Effect.logDebug(`Put record ${record.sequenceNumber} to ${stream.name}/${shard.id}`);
    const result: PutRecordResult = { shardId: shard.id, sequenceNumber: record.sequenceNumber };
    return result;
  });

  const putRecords = Effect.fn("StreamEngine.putRecords")(function* (input: {
    streamName: string;
    records: ReadonlyArray<PutRecordsEntry>;
  }) {
    yield* validate(Batch, "Records")(input.records);
    const entries = yield* Effect.forEach(input.records, prepare);
    const stream = yield* registry.getStream(input.streamName);

    // Group by destination shard, remembering each entry's position in the batch
    const groups = new Map<Shard, Array<{ index: number; entry: (typeof entries)[number] }>>();
    entries.forEach((entry, index) => {
      const shard = StreamRegistry.Stream.routeRecord(stream, entry);
      const group = groups.get(shard) ?? [];
      group.push({ index, entry });
      groups.set(shard, group);
    });

    const results = new Array<PutRecordResult>(entries.length);
    for (const [shard, group] of groups) {
      const appended = yield* shard.appendAll(group.map(({ entry }) => entry));
      appended.forEach((record, i) => {
        const slot = group[i];
        if (slot !== undefined) {
          results[slot.index] = { shardId: shard.id, sequenceNumber: record.sequenceNumber };
        }
      });
    }

    yield* Effect.logDebug(`Put ${entries.length} record(s) to ${stream.name}`);
    return { failedRecordCount: 0, records: results };
  });

  const getShardIterator = Effect.fn("StreamEngine.getShardIterator")(function* (input: {
    streamName: string;
    shardId: string;
    shardIteratorType: string;
    startingSequenceNumber?: string;
  }) {
    const { stream, shard } = yield* getShard(input.streamName, input.shardId);
    const iteratorType = yield* validate(ShardIteratorType, "ShardIteratorType")(
      input.shardIteratorType,
    );
    const position = yield* positionFor(shard, iteratorType, input.startingSequenceNumber);

    const shardIterator = ShardIterator.encode(
      ShardIterator.ShardIteratorToken.make({
        streamName: stream.name,
        incarnation: stream.incarnation,
        shardId: shard.id,
        position,
      }),
    );
    return { shardIterator };
  });

  const getRecords = Effect.fn("StreamEngine.getRecords")(function* (input: {
    shardIterator: string;
    limit?: number;
  }) {
    const limit = yield* validateOptional(GetRecordsLimit, "Limit")(input.limit);
    const token = yield* ShardIterator.decode(input.shardIterator);
    const { stream, shard } = yield* getShard(token.streamName, token.shardId);
    if (stream.incarnation !== token.incarnation) {
      return yield* ResourceNotFoundError.make({
        message: `Shard ${token.shardId} in stream ${token.streamName} no longer exists`,
      });
    }

    const page = yield* shard.read({ position: token.position, limit });
    const now = yield* DateTime.now;
    const millisBehindLatest =
      page.firstUnread === undefined
        ? 0
        : Math.max(0, DateTime.distance(page.firstUnread.approximateArrivalTimestamp, now));

    const nextShardIterator = ShardIterator.encode(
      ShardIterator.ShardIteratorToken.make({
        streamName: token.streamName,
        incarnation: token.incarnation,
        shardId: token.shardId,
        position: StreamRegistry.Shard.AtIndex.make({ index: page.nextIndex }),
      }),
    );

    return { records: page.records, nextShardIterator, millisBehindLatest };
  });

  return StreamEngine.of({ putRecord, putRecords, getShardIterator, getRecords });
});

// -------------------------------------------------------------------------------------
// Layers
// -------------------------------------------------------------------------------------

export const liveLayer: Layer.Layer<
  StreamEngine,
  never,
  StreamRegistry.StreamRegistry | StreamEngineConfig
> = Layer.effect(StreamEngine, make);

/** Engine plus its in-memory registry; both services are exposed */
export const inMemoryLayer: Layer.Layer<
  StreamEngine | StreamRegistry.StreamRegistry,
  never,
  StreamEngineConfig
> = liveLayer.pipe(Layer.provideMerge(StreamRegistry.inMemoryLayer));
