import type { JsonObject, Timestamp } from "./foundational.js";

export type SessionType = "AGENT" | "MULTI_AGENT";

/**
 * Root unit of durable conversational state. Agents, messages and
 * multi-agent records all hang off a session and die with it.
 */
export interface SessionData {
  readonly sessionId: string;
  readonly sessionType: SessionType;
  readonly createdAt: Timestamp;
  readonly updatedAt: Timestamp;
}

/** One conversational participant's state within a session. */
export interface SessionAgentData {
  readonly agentId: string;
  readonly state: JsonObject;
  /** Opaque state owned by the framework's conversation manager. */
  readonly conversationManagerState: JsonObject;
  readonly createdAt: Timestamp;
  readonly updatedAt: Timestamp;
}

export type MessageRole = "user" | "assistant";

/** A model turn: a role plus structured content blocks. */
export interface MessageData {
  readonly role: MessageRole;
  readonly content: JsonObject[];
}

/** One ordered turn of conversation belonging to an agent. */
export interface SessionMessageData {
  /** Position within the agent's history. Ordering key, not arrival time. */
  readonly messageId: number;
  readonly message: MessageData;
  /** Replacement shown instead of `message` once redacted. */
  readonly redactMessage: MessageData | null;
  readonly createdAt: Timestamp;
  readonly updatedAt: Timestamp;
}

/** Shared orchestration state for a multi-agent workflow. No fixed shape. */
export type MultiAgentState = JsonObject;

/**
 * Storage contract consumed by the agent framework.
 *
 * Every method is synchronous: it returns once the write is committed
 * or the row has been read.
 *
 * Absence is reported two ways. `readSession` and `readAgent` return
 * `null`; `readMessage`, `readMultiAgent`, the `update*` methods and
 * `deleteSession` throw a NOT_FOUND error.
 */
export interface SessionRepository {
  createSession(session: SessionData): SessionData;
  readSession(sessionId: string): SessionData | null;
  deleteSession(sessionId: string): void;

  createAgent(sessionId: string, agent: SessionAgentData): void;
  readAgent(sessionId: string, agentId: string): SessionAgentData | null;
  updateAgent(sessionId: string, agent: SessionAgentData): void;

  createMessage(sessionId: string, agentId: string, message: SessionMessageData): void;
  readMessage(sessionId: string, agentId: string, messageId: number): SessionMessageData;
  updateMessage(sessionId: string, agentId: string, message: SessionMessageData): void;
  /**
   * Messages in ascending `messageId` order. `offset` only applies when a
   * `limit` is given; without one the full history is returned.
   */
  listMessages(
    sessionId: string,
    agentId: string,
    limit?: number,
    offset?: number
  ): SessionMessageData[];

  createMultiAgent(sessionId: string, multiAgentId: string, state: MultiAgentState): void;
  readMultiAgent(sessionId: string, multiAgentId: string): MultiAgentState;
  updateMultiAgent(sessionId: string, multiAgentId: string, state: MultiAgentState): void;
}
