/**
 * shard-stream - in-memory sharded record streams
 */
export * from "./domain.js";
export * from "./errors.js";
export { StreamEngineConfig, defaultSettings, streamArn } from "./config.js";
export type { StreamEngineSettings } from "./config.js";
export * as ShardIterator from "./shardIterator.js";
export * as StreamEngine from "./services/stream-engine/index.js";
export * as StreamRegistry from "./services/stream-registry/index.js";
