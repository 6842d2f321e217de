/**
 * readShard - follow a shard's iterators as an Effect Stream
 */
import { Chunk, Effect, Option, Stream } from "effect";

import type { StreamRecord } from "../../domain.js";
import type { InvalidArgumentError, ResourceNotFoundError } from "../../errors.js";
import { StreamEngine } from "./service.js";

/**
 * Issue an iterator and page through getRecords until a page comes back empty,
 * i.e. until the reader has caught up with the shard.
 * @param pageSize - Limit passed to each getRecords call. Omitted means unbounded pages.
 */
export const readShard = (input: {
  streamName: string;
  shardId: string;
  shardIteratorType: string;
  startingSequenceNumber?: string;
  pageSize?: number;
}): Stream.Stream<StreamRecord, InvalidArgumentError | ResourceNotFoundError, StreamEngine> =>
  Stream.unwrap(
    Effect.gen(function* () {
      const engine = yield* StreamEngine;
      const { shardIterator } = yield* engine.getShardIterator({
        streamName: input.streamName,
        shardId: input.shardId,
        shardIteratorType: input.shardIteratorType,
        ...(input.startingSequenceNumber !== undefined && {
          startingSequenceNumber: input.startingSequenceNumber,
        }),
      });

      return Stream.paginateChunkEffect(shardIterator, (iterator) =>
        engine
          .getRecords({
            shardIterator: iterator,
            ...(input.pageSize !== undefined && { limit: input.pageSize }),
          })
          .pipe(
            Effect.map(({ records, nextShardIterator }) => {
              const next =
                records.length === 0 ? Option.none<string>() : Option.some(nextShardIterator);
              return [Chunk.fromIterable(records), next] as const;
            }),
          ),
      );
    }),
  );
