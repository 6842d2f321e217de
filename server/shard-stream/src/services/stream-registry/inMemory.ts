/**
 * In-memory implementation of StreamRegistry
 */
import { Effect, Layer, Ref, Schema, SynchronizedRef } from "effect";

import { StreamEngineConfig, streamArn } from "../../config.js";
import { StreamDescription, StreamName, Tag } from "../../domain.js";
import {
  InvalidArgumentError,
  ResourceInUseError,
  ResourceNotFoundError,
  validate,
  validateOptional,
} from "../../errors.js";
import { StreamRegistry, StreamRegistryTypeId } from "./service.js";
import * as Stream from "./stream.js";

const MAX_TAGS_PER_CALL = 10;
const MAX_TAGS_PER_STREAM = 50;

const PageLimit = Schema.Int.pipe(Schema.positive());
const TagKey = Schema.String.pipe(Schema.minLength(1), Schema.maxLength(128));
const TagValue = Schema.String.pipe(Schema.maxLength(256));
const TagsInput = Schema.Record({ key: TagKey, value: TagValue }).pipe(
  Schema.filter((tags) => {
    const count = Object.keys(tags).length;
    return (count >= 1 && count <= MAX_TAGS_PER_CALL) || `expected 1 to ${MAX_TAGS_PER_CALL} tags`;
  }),
);
const TagKeysInput = Schema.Array(TagKey).pipe(Schema.minItems(1), Schema.maxItems(MAX_TAGS_PER_STREAM));

type StreamTable = ReadonlyMap<string, Stream.Stream>;

const notFound = (streamName: string) =>
  ResourceNotFoundError.make({ message: `Stream ${streamName} not found` });

export const inMemoryLayer: Layer.Layer<StreamRegistry, never, StreamEngineConfig> = Layer.effect(
  StreamRegistry,
  Effect.gen(function* () {
    const config = yield* StreamEngineConfig;
    const ShardCount = Schema.Int.pipe(Schema.between(1, config.maxShardsPerStream));

    // Keyed by raw name; Map iteration order gives creation order for listStreams
    const streamsRef = yield* SynchronizedRef.make<StreamTable>(new Map());
    // Bumped on every create; iterators minted for an earlier stream of the same name stop resolving
    const incarnations = yield* Ref.make(0);

    const getStream = (streamName: string) =>
      SynchronizedRef.get(streamsRef).pipe(
        Effect.flatMap((streams) => {
          const stream = streams.get(streamName);
          return stream === undefined ? Effect.fail(notFound(streamName)) : Effect.succeed(stream);
        }),
      );

    const lookup = (streamName: string) =>
      validate(StreamName, "StreamName")(streamName).pipe(Effect.flatMap(getStream));

    /** Atomically replace an existing stream with `f(stream)` */
    const updateStream = (
      streamName: StreamName,
      f: (stream: Stream.Stream) => Effect.Effect<Stream.Stream, InvalidArgumentError>,
    ) =>
      SynchronizedRef.updateEffect(
        streamsRef,
        (streams): Effect.Effect<StreamTable, InvalidArgumentError | ResourceNotFoundError> => {
          const stream = streams.get(streamName);
          if (stream === undefined) {
            return Effect.fail(notFound(streamName));
          }
          return f(stream).pipe(Effect.map((updated) => new Map(streams).set(streamName, updated)));
        },
      );

    const createStream = Effect.fn("StreamRegistry.createStream")(function* (input: {
      streamName: string;
      shardCount: number;
    }) {
      const streamName = yield* validate(StreamName, "StreamName")(input.streamName);
      const shardCount = yield* validate(ShardCount, "ShardCount")(input.shardCount);

      yield* SynchronizedRef.updateEffect(
        streamsRef,
        (streams): Effect.Effect<StreamTable, ResourceInUseError> => {
          if (streams.has(streamName)) {
            return Effect.fail(
              ResourceInUseError.make({ message: `Stream ${streamName} already exists` }),
            );
          }
          return Ref.getAndUpdate(incarnations, (n) => n + 1).pipe(
            Effect.flatMap((incarnation) =>
              Stream.make({
                name: streamName,
                arn: streamArn(config, streamName),
                shardCount,
                incarnation,
              }),
            ),
            Effect.map((stream) => new Map(streams).set(streamName, stream)),
          );
        },
      );

      yield* Effect.log(`Created stream ${streamName} with ${shardCount} shard(s)`);
    });

    const describeStream = Effect.fn("StreamRegistry.describeStream")(function* (input: {
      streamName: string;
      limit?: number;
      exclusiveStartShardId?: string;
    }) {
      const stream = yield* lookup(input.streamName);
      const limit = yield* validateOptional(PageLimit, "Limit")(input.limit);

      // Shard ids are zero-padded, so lexical order is creation order
      const after = input.exclusiveStartShardId;
      const remaining =
        after === undefined ? stream.shards : stream.shards.filter((shard) => shard.id > after);
      const page = limit === undefined ? remaining : remaining.slice(0, limit);

      return StreamDescription.make({
        streamName: stream.name,
        streamArn: stream.arn,
        streamStatus: stream.status,
        streamCreationTimestamp: stream.createdAt,
        shards: page.map((shard) => shard.describe()),
        hasMoreShards: page.length < remaining.length,
      });
    });

    const listStreams = Effect.fn("StreamRegistry.listStreams")(function* (input?: {
      limit?: number;
      exclusiveStartStreamName?: string;
    }) {
      const limit = yield* validateOptional(PageLimit, "Limit")(input?.limit);
      const streams = yield* SynchronizedRef.get(streamsRef);
      const names = Array.from(streams.values(), (stream) => stream.name);

      let remaining = names;
      const after = input?.exclusiveStartStreamName;
      if (after !== undefined) {
        const index = names.findIndex((name) => name === after);
        if (index === -1) {
          return yield* InvalidArgumentError.make({
            message: `ExclusiveStartStreamName ${after} is not a listed stream`,
          });
        }
        remaining = names.slice(index + 1);
      }

      const page = limit === undefined ? remaining : remaining.slice(0, limit);
      return { streamNames: page, hasMoreStreams: page.length < remaining.length };
    });

    const deleteStream = Effect.fn("StreamRegistry.deleteStream")(function* (input: {
      streamName: string;
    }) {
      const streamName = yield* validate(StreamName, "StreamName")(input.streamName);

      yield* SynchronizedRef.updateEffect(
        streamsRef,
        (streams): Effect.Effect<StreamTable, ResourceNotFoundError> => {
          if (!streams.has(streamName)) {
            return Effect.fail(notFound(streamName));
          }
          const next = new Map(streams);
          next.delete(streamName);
          return Effect.succeed(next);
        },
      );

      yield* Effect.log(`Deleted stream ${streamName}`);
    });

    const addTagsToStream = Effect.fn("StreamRegistry.addTagsToStream")(function* (input: {
      streamName: string;
      tags: Readonly<Record<string, string>>;
    }) {
      const streamName = yield* validate(StreamName, "StreamName")(input.streamName);
      const tags = yield* validate(TagsInput, "Tags")(input.tags);

      yield* updateStream(streamName, (stream) => {
        const merged = new Map(stream.tags);
        for (const [key, value] of Object.entries(tags)) {
          merged.set(key, value);
        }
        if (merged.size > MAX_TAGS_PER_STREAM) {
          return Effect.fail(
            InvalidArgumentError.make({
              message: `A stream can carry at most ${MAX_TAGS_PER_STREAM} tags`,
            }),
          );
        }
        return Effect.succeed({ ...stream, tags: merged });
      });
    });

    const listTagsForStream = Effect.fn("StreamRegistry.listTagsForStream")(function* (input: {
      streamName: string;
    }) {
      const stream = yield* lookup(input.streamName);
      return Array.from(stream.tags, ([key, value]) => Tag.make({ key, value })).sort((a, b) =>
        a.key < b.key ? -1 : a.key > b.key ? 1 : 0,
      );
    });

    const removeTagsFromStream = Effect.fn("StreamRegistry.removeTagsFromStream")(function* (input: {
      streamName: string;
      tagKeys: ReadonlyArray<string>;
    }) {
      const streamName = yield* validate(StreamName, "StreamName")(input.streamName);
      const tagKeys = yield* validate(TagKeysInput, "TagKeys")(input.tagKeys);

      yield* updateStream(streamName, (stream) => {
        const remaining = new Map(stream.tags);
        for (const key of tagKeys) {
          remaining.delete(key);
        }
        return Effect.succeed({ ...stream, tags: remaining });
      });
    });

    return StreamRegistry.of({
      [StreamRegistryTypeId]: StreamRegistryTypeId,
      createStream,
      describeStream,
      listStreams,
      deleteStream,
      addTagsToStream,
      listTagsForStream,
      removeTagsFromStream,
      getStream,
    });
  }),
);
