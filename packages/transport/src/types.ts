/**
 * Represents a value that can be either synchronous (`T`) or asynchronous (`Promise<T>`).
 * Used throughout the transport contract for event handlers that may or may not
 * perform asynchronous work.
 *
 * @template T The type of the value.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * A primitive value that survives a round trip through JSON text.
 *
 * @remarks
 * Binary data never travels inside message metadata. It is carried by the
 * single payload buffer that accompanies every message, so `Uint8Array` is
 * deliberately absent here.
 */
export type JsonPrimitive = string | number | boolean | null;

/** A JSON array, where each element is a valid `JsonValue`. */
export type JsonArray = JsonValue[];

/** A JSON object, mapping string keys to valid `JsonValue`s. */
export type JsonObject = {
  [key: string]: JsonValue;
};

/**
 * Any value that can be losslessly converted to JSON text and back. Channel
 * metadata is always a `JsonObject`.
 */
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;
