import { z } from "zod";
import type {
  EntityRef,
  JsonObject,
  JsonValue,
  MessageData,
  MultiAgentState,
  SessionAgentData,
  SessionData,
  SessionMessageData,
} from "@strata/types";
import { StorageFailureError } from "./errors.js";

// ─── Schemas ────────────────────────────────────────────────────────
//
// Object schemas pass unknown keys through so a document written by a
// newer framework version reads back unchanged.

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

export const sessionDataSchema: z.ZodType<SessionData> = z
  .object({
    sessionId: z.string().min(1),
    sessionType: z.enum(["AGENT", "MULTI_AGENT"]),
    createdAt: z.string(),
    updatedAt: z.string(),
  })
  .passthrough();

export const sessionAgentDataSchema: z.ZodType<SessionAgentData> = z
  .object({
    agentId: z.string().min(1),
    state: jsonObjectSchema,
    conversationManagerState: jsonObjectSchema,
    createdAt: z.string(),
    updatedAt: z.string(),
  })
  .passthrough();

export const messageDataSchema: z.ZodType<MessageData> = z
  .object({
    role: z.enum(["user", "assistant"]),
    content: z.array(jsonObjectSchema),
  })
  .passthrough();

export const sessionMessageDataSchema: z.ZodType<SessionMessageData> = z
  .object({
    messageId: z.number().int().nonnegative(),
    message: messageDataSchema,
    redactMessage: messageDataSchema.nullable(),
    createdAt: z.string(),
    updatedAt: z.string(),
  })
  .passthrough();

export const multiAgentStateSchema: z.ZodType<MultiAgentState> = jsonObjectSchema;

// ─── Encode / decode ────────────────────────────────────────────────
//
// zod only checks the shape. Its parsed output rebuilds objects and drops
// `__proto__` keys, so the caller's value (or the freshly parsed JSON) is
// what gets written and returned.

function assertConforms<T>(schema: z.ZodType<T>, value: unknown): asserts value is T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw parsed.error;
  }
}

/**
 * Validate `value` against `schema` and serialize it for the `data` column.
 *
 * @throws StorageFailureError when the value is not a valid document.
 */
export function encodeDocument<T>(
  schema: z.ZodType<T>,
  value: T,
  operation: string,
  entity?: EntityRef
): string {
  try {
    assertConforms(schema, value);
    return JSON.stringify(value);
  } catch (err) {
    throw new StorageFailureError(operation, err, entity);
  }
}

/**
 * Parse the text of a `data` column back into a fresh document.
 *
 * @throws StorageFailureError when the text is not JSON or does not match.
 */
export function decodeDocument<T>(
  schema: z.ZodType<T>,
  text: string,
  operation: string,
  entity?: EntityRef
): T {
  try {
    const value: unknown = JSON.parse(text);
    assertConforms(schema, value);
    return value;
  } catch (err) {
    throw new StorageFailureError(operation, err, entity);
  }
}
