/** ISO 8601 timestamp. */
export type Timestamp = string;

/** Any value that survives a JSON round trip unchanged. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** A schemaless key-value document. */
export type JsonObject = { [key: string]: JsonValue };
