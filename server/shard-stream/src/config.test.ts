/**
 * StreamEngineConfig test suite
 */
import { describe, expect, it } from "@effect/vitest";
import { ConfigProvider, Effect, Exit, Layer } from "effect";

import { defaultSettings, StreamEngineConfig, streamArn } from "./config.js";
import { StreamName } from "./domain.js";

const fromMap = (entries: ReadonlyArray<readonly [string, string]>) =>
  StreamEngineConfig.defaultLayer.pipe(
    Layer.provide(Layer.setConfigProvider(ConfigProvider.fromMap(new Map(entries)))),
  );

describe("StreamEngineConfig", () => {
  it.effect("falls back to defaults when nothing is set", () =>
    Effect.gen(function* () {
      const settings = yield* StreamEngineConfig;
      expect({ ...settings }).toEqual(defaultSettings);
    }).pipe(Effect.provide(fromMap([]))),
  );

  it.effect("reads SHARD_STREAM_* settings", () =>
    Effect.gen(function* () {
      const settings = yield* StreamEngineConfig;
      expect(settings.region).toBe("eu-west-1");
      expect(settings.maxGetRecordsLimit).toBe(50);
      expect(settings.accountId).toBe("123456789012");
    }).pipe(
      Effect.provide(
        fromMap([
          ["SHARD_STREAM.REGION", "eu-west-1"],
          ["SHARD_STREAM.MAX_GET_RECORDS_LIMIT", "50"],
        ]),
      ),
    ),
  );

  it.effect("rejects non-positive limits", () =>
    Effect.gen(function* () {
      const exit = yield* Effect.exit(
        StreamEngineConfig.pipe(
          Effect.provide(fromMap([["SHARD_STREAM.MAX_SHARDS_PER_STREAM", "0"]])),
        ),
      );
      expect(Exit.isFailure(exit)).toBe(true);
    }),
  );

  it.effect("layer applies overrides on top of the defaults", () =>
    Effect.gen(function* () {
      const settings = yield* StreamEngineConfig;
      expect(settings.region).toBe("us-west-2");
      expect(settings.partition).toBe("aws");
    }).pipe(Effect.provide(StreamEngineConfig.layer({ region: "us-west-2" }))),
  );
});

describe("streamArn", () => {
  it("joins partition, service, region, account and name", () => {
    expect(streamArn(defaultSettings, StreamName.make("orders"))).toBe(
      "arn:aws:kinesis:us-east-1:123456789012:orders",
    );
    expect(
      streamArn({ ...defaultSettings, region: "us-west-2" }, StreamName.make("my_stream")),
    ).toBe("arn:aws:kinesis:us-west-2:123456789012:my_stream");
  });
});
