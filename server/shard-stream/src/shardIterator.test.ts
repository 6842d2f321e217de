/**
 * ShardIterator test suite
 */
import { describe, expect, it } from "@effect/vitest";
import { Effect, Encoding } from "effect";

import { SequenceNumber, ShardId, StreamName } from "./domain.js";
import { AtSequenceNumber } from "./services/stream-registry/shard.js";
import * as ShardIterator from "./shardIterator.js";

const token = ShardIterator.ShardIteratorToken.make({
  streamName: StreamName.make("my_stream"),
  incarnation: 4,
  shardId: ShardId.fromIndex(0),
  position: AtSequenceNumber.make({ sequenceNumber: SequenceNumber.make("7") }),
});

describe("ShardIterator", () => {
  it("encodes to a URL-safe opaque string", () => {
    expect(ShardIterator.encode(token)).toMatch(/^[A-Za-z0-9_-]+$/);
  });

  it.effect("decodes what it encodes", () =>
    Effect.gen(function* () {
      const decoded = yield* ShardIterator.decode(ShardIterator.encode(token));
      expect(decoded.streamName).toBe("my_stream");
      expect(decoded.incarnation).toBe(4);
      expect(decoded.shardId).toBe("shardId-000000000000");
      expect(decoded.position).toEqual({ _tag: "AtSequenceNumber", sequenceNumber: "7" });
    }),
  );

  it.effect("rejects strings that are not base64", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(ShardIterator.decode("%%%"));
      expect(error._tag).toBe("InvalidArgumentError");
    }),
  );

  it.effect("rejects well-encoded payloads missing cursor fields", () =>
    Effect.gen(function* () {
      const forged = Encoding.encodeBase64Url(JSON.stringify({ streamName: "my_stream" }));
      const error = yield* Effect.flip(ShardIterator.decode(forged));
      expect(error._tag).toBe("InvalidArgumentError");
      expect(error.message).toBe("ShardIterator is malformed");
    }),
  );

  it.effect("rejects negative indexes", () =>
    Effect.gen(function* () {
      const forged = Encoding.encodeBase64Url(
        JSON.stringify({
          streamName: "my_stream",
          incarnation: 0,
          shardId: "shardId-000000000000",
          position: { _tag: "AtIndex", index: -1 },
        }),
      );
      const error = yield* Effect.flip(ShardIterator.decode(forged));
      expect(error._tag).toBe("InvalidArgumentError");
    }),
  );
});
