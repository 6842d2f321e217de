/**
 * Shard iterator tokens
 *
 * Internally an iterator is a structured cursor (stream, shard, position).
 * Callers only ever see it as an opaque URL-safe base64 string.
 */
import { Effect, Encoding, Schema } from "effect";

import { ShardId, StreamName } from "./domain.js";
import { InvalidArgumentError } from "./errors.js";
import { Position } from "./services/stream-registry/shard.js";

export class ShardIteratorToken extends Schema.Class<ShardIteratorToken>("ShardIteratorToken")({
  streamName: StreamName,
  /** Incarnation of the stream the iterator was issued for */
  incarnation: Schema.NonNegativeInt,
  shardId: ShardId,
  position: Position,
}) {}

const TokenJson = Schema.parseJson(ShardIteratorToken);

export const encode = (token: ShardIteratorToken): string =>
  Encoding.encodeBase64Url(Schema.encodeSync(TokenJson)(token));

export const decode = (iterator: string): Effect.Effect<ShardIteratorToken, InvalidArgumentError> =>
  Effect.gen(function* () {
    const json = yield* Encoding.decodeBase64UrlString(iterator);
    return yield* Schema.decodeUnknown(TokenJson)(json);
  }).pipe(
    Effect.mapError(() => InvalidArgumentError.make({ message: "ShardIterator is malformed" })),
  );
