/**
 * Test utilities for shard-stream
 */
import { Chunk, Effect, Layer, Stream } from "effect";

import { StreamEngineConfig, type StreamEngineSettings } from "./config.js";
import { StreamEngine } from "./services/stream-engine/service.js";
import { inMemoryLayer } from "./services/stream-engine/live.js";

/** Fresh engine + registry with fixed settings; build one per test for isolation */
export const makeTestLayer = (overrides: Partial<StreamEngineSettings> = {}) =>
  inMemoryLayer.pipe(Layer.provide(StreamEngineConfig.layer(overrides)));

/** Issue an iterator and read everything currently available from it */
export const readAll = (input: {
  streamName: string;
  shardId: string;
  shardIteratorType: string;
  startingSequenceNumber?: string;
}) =>
  Effect.gen(function* () {
    const engine = yield* StreamEngine;
    const { shardIterator } = yield* engine.getShardIterator(input);
    return yield* engine.getRecords({ shardIterator });
  });

export const decodeText = (data: Uint8Array) => new TextDecoder().decode(data);

export const collect = <A, E, R>(stream: Stream.Stream<A, E, R>) =>
  Stream.runCollect(stream).pipe(Effect.map(Chunk.toReadonlyArray));
