/**
 * StreamEngine - data plane: put records, issue iterators, read records
 */

// Re-export service definition
export { StreamEngine } from "./service.js";
export type {
  GetRecordsResult,
  PutRecordResult,
  PutRecordsEntry,
  PutRecordsResult,
} from "./service.js";

// Re-export layers
export { inMemoryLayer, liveLayer } from "./live.js";

export { readShard } from "./reader.js";
