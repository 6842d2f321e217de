/**
 * StreamEngineConfig - emulated account identity and service limits
 */
import { Config, Context, Effect, Layer } from "effect";

import type { StreamName } from "./domain.js";

export const DEFAULT_PARTITION = "aws";
export const DEFAULT_SERVICE = "kinesis";
export const DEFAULT_REGION = "us-east-1";
export const DEFAULT_ACCOUNT_ID = "123456789012";
export const DEFAULT_MAX_SHARDS_PER_STREAM = 500;
export const DEFAULT_MAX_RECORD_SIZE_BYTES = 1024 * 1024;
export const DEFAULT_MAX_GET_RECORDS_LIMIT = 10_000;

export interface StreamEngineSettings {
  readonly partition: string;
  readonly service: string;
  readonly region: string;
  readonly accountId: string;
  readonly maxShardsPerStream: number;
  /** Upper bound on data bytes + partition key bytes for a single record */
  readonly maxRecordSizeBytes: number;
  readonly maxGetRecordsLimit: number;
}

const positiveInt = (name: string, fallback: number) =>
  Config.integer(name).pipe(
    Config.withDefault(fallback),
    Config.validate({ message: `${name} must be a positive integer`, validation: (n) => n > 0 }),
  );

/** Reads SHARD_STREAM_* variables from the active ConfigProvider */
const settingsConfig: Config.Config<StreamEngineSettings> = Config.all({
  partition: Config.string("PARTITION").pipe(Config.withDefault(DEFAULT_PARTITION)),
  service: Config.string("SERVICE").pipe(Config.withDefault(DEFAULT_SERVICE)),
  region: Config.string("REGION").pipe(Config.withDefault(DEFAULT_REGION)),
  accountId: Config.string("ACCOUNT_ID").pipe(Config.withDefault(DEFAULT_ACCOUNT_ID)),
  maxShardsPerStream: positiveInt("MAX_SHARDS_PER_STREAM", DEFAULT_MAX_SHARDS_PER_STREAM),
  maxRecordSizeBytes: positiveInt("MAX_RECORD_SIZE_BYTES", DEFAULT_MAX_RECORD_SIZE_BYTES),
  maxGetRecordsLimit: positiveInt("MAX_GET_RECORDS_LIMIT", DEFAULT_MAX_GET_RECORDS_LIMIT),
}).pipe(Config.nested("SHARD_STREAM"));

export const defaultSettings: StreamEngineSettings = {
  partition: DEFAULT_PARTITION,
  service: DEFAULT_SERVICE,
  region: DEFAULT_REGION,
  accountId: DEFAULT_ACCOUNT_ID,
  maxShardsPerStream: DEFAULT_MAX_SHARDS_PER_STREAM,
  maxRecordSizeBytes: DEFAULT_MAX_RECORD_SIZE_BYTES,
  maxGetRecordsLimit: DEFAULT_MAX_GET_RECORDS_LIMIT,
};

export class StreamEngineConfig extends Context.Tag("@app/StreamEngineConfig")<
  StreamEngineConfig,
  StreamEngineSettings
>() {
  /** Settings from the environment, falling back to the defaults above */
  static defaultLayer = Layer.effect(
    StreamEngineConfig,
    Effect.gen(function* () {
      const settings = yield* settingsConfig;
      yield* Effect.logDebug(`Stream engine region=${settings.region} account=${settings.accountId}`);
      return settings;
    }),
  );

  /** Fixed settings, e.g. for tests */
  static layer = (overrides: Partial<StreamEngineSettings> = {}) =>
    Layer.succeed(StreamEngineConfig, { ...defaultSettings, ...overrides });
}

export const streamArn = (settings: StreamEngineSettings, name: StreamName): string =>
  `arn:${settings.partition}:${settings.service}:${settings.region}:${settings.accountId}:${name}`;
