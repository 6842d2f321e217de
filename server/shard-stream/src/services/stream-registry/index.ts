/**
 * StreamRegistry - control plane for streams and their shards
 */

// Re-export service definition
export { StreamRegistry, StreamRegistryTypeId } from "./service.js";
export type { ListStreamsResult } from "./service.js";

// Re-export data types
export * as Shard from "./shard.js";
export * as Stream from "./stream.js";

// Re-export layers
export { inMemoryLayer } from "./inMemory.js";
