import { v7 as uuidv7 } from "uuid";
import type {
  JsonObject,
  MessageData,
  MultiAgentState,
  SessionData,
  SessionMessageData,
  SessionRepository,
  SessionType,
  StrataErrorCode,
} from "@strata/types";
import { createLogger, resolveStoreConfig, type Logger } from "@strata/persistence";

/**
 * The slice of a framework agent the session manager reads and restores.
 * Restoring overwrites `state`, `conversationManagerState` and `messages`.
 */
export interface AgentSnapshot {
  readonly agentId: string;
  state: JsonObject;
  conversationManagerState: JsonObject;
  messages: MessageData[];
}

export interface RepositorySessionManagerOptions {
  /** Defaults to a fresh UUIDv7. */
  sessionId?: string;
  repository: SessionRepository;
  /** Type recorded when the session has to be created. Defaults to "AGENT". */
  sessionType?: SessionType;
  /** Defaults to a pino logger at the LOG_LEVEL found in `env`. */
  logger?: Logger;
  /** Environment consulted for LOG_LEVEL. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

/**
 * Binds one session id to a SessionRepository and drives it on behalf of
 * the framework's agents.
 *
 * The session is read, or created, on construction. Each agent must be
 * passed through `initializeAgent` once before its messages are appended;
 * message ids are assigned here, sequentially from 0 per agent.
 */
export class RepositorySessionManager {
  readonly sessionId: string;
  readonly session: SessionData;
  protected readonly repository: SessionRepository;
  protected readonly logger: Logger;
  /** Latest stored message id per initialized agent; -1 when it has none. */
  private readonly latestMessageIds = new Map<string, number>();

  constructor(options: RepositorySessionManagerOptions) {
    this.sessionId = options.sessionId ?? uuidv7();
    this.repository = options.repository;
    this.logger =
      options.logger ??
      createLogger("strata.session-manager", resolveStoreConfig({}, options.env).logLevel);

    const existing = this.repository.readSession(this.sessionId);
    if (existing) {
      this.session = existing;
    } else {
      const now = timestamp();
      this.session = this.repository.createSession({
        sessionId: this.sessionId,
        sessionType: options.sessionType ?? "AGENT",
        createdAt: now,
        updatedAt: now,
      });
      this.logger.info({ sessionId: this.sessionId }, "Created session");
    }
  }

  /**
   * Persist a new agent with the messages it already holds, or restore a
   * stored agent's state and history onto `agent`.
   */
  initializeAgent(agent: AgentSnapshot): void {
    if (this.latestMessageIds.has(agent.agentId)) {
      throw new Error(
        `Agent "${agent.agentId}" is already initialized in session "${this.sessionId}"`
      );
    }

    const stored = this.repository.readAgent(this.sessionId, agent.agentId);
    if (!stored) {
      const now = timestamp();
      this.repository.createAgent(this.sessionId, {
        agentId: agent.agentId,
        state: agent.state,
        conversationManagerState: agent.conversationManagerState,
        createdAt: now,
        updatedAt: now,
      });
      agent.messages.forEach((message, index) => {
        this.repository.createMessage(this.sessionId, agent.agentId, {
          messageId: index,
          message,
          redactMessage: null,
          createdAt: now,
          updatedAt: now,
        });
      });
      this.latestMessageIds.set(agent.agentId, agent.messages.length - 1);
      this.logger.debug(
        { sessionId: this.sessionId, agentId: agent.agentId, messages: agent.messages.length },
        "Persisted new agent"
      );
      return;
    }

    const history = this.repository.listMessages(this.sessionId, agent.agentId);
    agent.state = stored.state;
    agent.conversationManagerState = stored.conversationManagerState;
    agent.messages = history.map((entry) => entry.redactMessage ?? entry.message);
    this.latestMessageIds.set(agent.agentId, history.at(-1)?.messageId ?? -1);
    this.logger.debug(
      { sessionId: this.sessionId, agentId: agent.agentId, messages: history.length },
      "Restored agent"
    );
  }

  /** Store `message` as the agent's next message and return the stored document. */
  appendMessage(message: MessageData, agent: AgentSnapshot): SessionMessageData {
    const messageId = this.latestMessageId(agent.agentId) + 1;
    const now = timestamp();
    const entry: SessionMessageData = {
      messageId,
      message,
      redactMessage: null,
      createdAt: now,
      updatedAt: now,
    };
    this.repository.createMessage(this.sessionId, agent.agentId, entry);
    this.latestMessageIds.set(agent.agentId, messageId);
    return entry;
  }

  /** Replace what the agent's latest message reads as when history is restored. */
  redactLatestMessage(redactMessage: MessageData, agent: AgentSnapshot): void {
    const messageId = this.latestMessageId(agent.agentId);
    if (messageId < 0) {
      throw new Error(
        `Agent "${agent.agentId}" in session "${this.sessionId}" has no message to redact`
      );
    }

    const stored = this.repository.readMessage(this.sessionId, agent.agentId, messageId);
    this.repository.updateMessage(this.sessionId, agent.agentId, {
      ...stored,
      redactMessage,
      updatedAt: timestamp(),
    });
  }

  /** Write the agent's current state through to storage. */
  syncAgent(agent: AgentSnapshot): void {
    const stored = this.repository.readAgent(this.sessionId, agent.agentId);
    const now = timestamp();
    this.repository.updateAgent(this.sessionId, {
      agentId: agent.agentId,
      state: agent.state,
      conversationManagerState: agent.conversationManagerState,
      createdAt: stored?.createdAt ?? now,
      updatedAt: now,
    });
  }

  /** Stored state for `multiAgentId`, or `state` after storing it. */
  initializeMultiAgent(multiAgentId: string, state: MultiAgentState): MultiAgentState {
    try {
      return this.repository.readMultiAgent(this.sessionId, multiAgentId);
    } catch (err) {
      if (!hasErrorCode(err, "NOT_FOUND")) throw err;
    }
    this.repository.createMultiAgent(this.sessionId, multiAgentId, state);
    return state;
  }

  syncMultiAgent(multiAgentId: string, state: MultiAgentState): void {
    this.repository.updateMultiAgent(this.sessionId, multiAgentId, state);
  }

  /** Delete the bound session and everything under it. */
  deleteSession(): void {
    this.repository.deleteSession(this.sessionId);
    this.latestMessageIds.clear();
  }

  private latestMessageId(agentId: string): number {
    const latest = this.latestMessageIds.get(agentId);
    if (latest === undefined) {
      throw new Error(
        `Agent "${agentId}" must be initialized in session "${this.sessionId}" first`
      );
    }
    return latest;
  }
}

function hasErrorCode(err: unknown, code: StrataErrorCode): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

function timestamp(): string {
  return new Date().toISOString();
}
