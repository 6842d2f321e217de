/**
 * Typed failures surfaced by the registry and engine
 */
import { Effect, Schema } from "effect";

/** Unknown stream, shard, or iterator target */
export class ResourceNotFoundError extends Schema.TaggedError<ResourceNotFoundError>()(
  "ResourceNotFoundError",
  {
    message: Schema.String,
  },
) {}

/** Malformed input, unknown iterator type, out-of-range limit */
export class InvalidArgumentError extends Schema.TaggedError<InvalidArgumentError>()(
  "InvalidArgumentError",
  {
    message: Schema.String,
  },
) {}

/** A stream with the requested name already exists */
export class ResourceInUseError extends Schema.TaggedError<ResourceInUseError>()(
  "ResourceInUseError",
  {
    message: Schema.String,
  },
) {}

/**
 * Decode `value` with `schema`, reporting parse failures as InvalidArgumentError
 * prefixed with the offending field name.
 */
export const validate =
  <A, I>(schema: Schema.Schema<A, I>, field: string) =>
  (value: unknown): Effect.Effect<A, InvalidArgumentError> =>
    Schema.decodeUnknown(schema)(value).pipe(
      Effect.mapError((error) =>
        InvalidArgumentError.make({ message: `Invalid ${field}: ${error.message}` }),
      ),
    );

/** Like validate, but passes an absent value through untouched */
export const validateOptional =
  <A, I>(schema: Schema.Schema<A, I>, field: string) =>
  (value: unknown): Effect.Effect<A | undefined, InvalidArgumentError> =>
    value === undefined ? Effect.succeed(undefined) : validate(schema, field)(value);
