// Common types used across the protocol

/**
 * UUID string identifier (RFC 4122, version 4)
 */
export type Id = string;

export type JsonPrimitive = string | number | boolean | null;

export type JsonArray = JsonValue[];

export type JsonObject = { [key: string]: JsonValue };

/**
 * Any value representable in a snapshot.
 * Numbers must be finite; NaN and Infinity have no JSON form.
 */
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

/**
 * A single problem found while validating serialized data
 */
export type FieldIssue = {
  /**
   * Dotted path to the offending field, relative to the value being validated
   */
  path: string;
  message: string;
};
