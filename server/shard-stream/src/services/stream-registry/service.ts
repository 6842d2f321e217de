/**
 * StreamRegistry service definition
 */
import { Context, Effect } from "effect";

import type { StreamDescription, StreamName, Tag } from "../../domain.js";
import type { InvalidArgumentError, ResourceInUseError, ResourceNotFoundError } from "../../errors.js";
import type { Stream } from "./stream.js";

// -------------------------------------------------------------------------------------
// Type ID (for nominal uniqueness)
// -------------------------------------------------------------------------------------

export const StreamRegistryTypeId: unique symbol = Symbol.for("@app/StreamRegistry");
export type StreamRegistryTypeId = typeof StreamRegistryTypeId;

// -------------------------------------------------------------------------------------
// StreamRegistry interface + tag
// -------------------------------------------------------------------------------------

export interface ListStreamsResult {
  readonly streamNames: ReadonlyArray<StreamName>;
  readonly hasMoreStreams: boolean;
}

/**
 * Table of streams keyed by name. Inputs arrive unvalidated from the request
 * layer; malformed values fail with InvalidArgumentError.
 */
export interface StreamRegistry {
  readonly [StreamRegistryTypeId]: StreamRegistryTypeId;

  /** Fails with ResourceInUseError if the name is taken */
  readonly createStream: (input: {
    streamName: string;
    shardCount: number;
  }) => Effect.Effect<void, InvalidArgumentError | ResourceInUseError>;

  /**
   * Describe a stream and (a page of) its shards.
   * @param limit - Maximum number of shards to return.
   * @param exclusiveStartShardId - Return shards after this one.
   */
  readonly describeStream: (input: {
    streamName: string;
    limit?: number;
    exclusiveStartShardId?: string;
  }) => Effect.Effect<StreamDescription, InvalidArgumentError | ResourceNotFoundError>;

  /** Stream names in creation order */
  readonly listStreams: (input?: {
    limit?: number;
    exclusiveStartStreamName?: string;
  }) => Effect.Effect<ListStreamsResult, InvalidArgumentError>;

  readonly deleteStream: (input: {
    streamName: string;
  }) => Effect.Effect<void, InvalidArgumentError | ResourceNotFoundError>;

  readonly addTagsToStream: (input: {
    streamName: string;
    tags: Readonly<Record<string, string>>;
  }) => Effect.Effect<void, InvalidArgumentError | ResourceNotFoundError>;

  /** Tags sorted by key */
  readonly listTagsForStream: (input: {
    streamName: string;
  }) => Effect.Effect<ReadonlyArray<Tag>, InvalidArgumentError | ResourceNotFoundError>;

  readonly removeTagsFromStream: (input: {
    streamName: string;
    tagKeys: ReadonlyArray<string>;
  }) => Effect.Effect<void, InvalidArgumentError | ResourceNotFoundError>;

  /** Live stream handle, used by the data plane */
  readonly getStream: (streamName: string) => Effect.Effect<Stream, ResourceNotFoundError>;
}

export const StreamRegistry = Context.GenericTag<StreamRegistry>("@app/StreamRegistry");
