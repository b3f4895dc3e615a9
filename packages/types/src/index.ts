export type { Timestamp, JsonValue, JsonObject } from "./foundational.js";
export type {
  SessionType,
  SessionData,
  SessionAgentData,
  MessageRole,
  MessageData,
  SessionMessageData,
  MultiAgentState,
  SessionRepository,
} from "./session.js";
export type { StrataErrorCode, EntityKind, EntityRef, StrataError } from "./error.js";
export type { LogLevel } from "./observability.js";
