import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type {
  EntityRef,
  MultiAgentState,
  SessionAgentData,
  SessionData,
  SessionMessageData,
  SessionRepository,
} from "@strata/types";
import {
  decodeDocument,
  encodeDocument,
  multiAgentStateSchema,
  sessionAgentDataSchema,
  sessionDataSchema,
  sessionMessageDataSchema,
} from "./codec.js";
import { resolveStoreConfig, type StoreConfig } from "./config.js";
import {
  NotFoundError,
  StorageFailureError,
  StrataStoreError,
  mapInsertError,
} from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { SCHEMA_SQL, type DataRow, type TimestampRow } from "./schema.js";

/** better-sqlite3's own busy timeout. */
export const DEFAULT_TIMEOUT_MS = 5000;

export interface SQLiteSessionRepositoryOptions {
  /** Database file, or ":memory:". Falls back to STRATA_DB_PATH, then ./sessions.db. */
  dbPath?: string;
  logger?: Logger;
  /** How long a statement waits on another connection's lock before failing. */
  timeoutMs?: number;
  /** Environment consulted for fallbacks. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

/**
 * SQLite-backed implementation of SessionRepository.
 *
 * One connection per instance, opened in WAL mode with foreign keys on.
 * Each entity is stored as its JSON document in a `data` column next to
 * copies of its key fields; SQLite enforces uniqueness and the
 * session → agent → message cascade.
 *
 * All calls are synchronous and auto-commit. Several instances may share
 * one file; cross-connection locking is left to SQLite.
 */
export class SQLiteSessionRepository implements SessionRepository {
  readonly dbPath: string;
  readonly inMemory: boolean;
  /** Busy timeout the connection was opened with. */
  readonly timeoutMs: number;
  private readonly db: Database.Database;
  private readonly logger: Logger;

  constructor(options: SQLiteSessionRepositoryOptions = {}) {
    const config = resolveStoreConfig({ dbPath: options.dbPath }, options.env);
    this.dbPath = config.dbPath;
    this.inMemory = config.inMemory;
    this.logger = options.logger ?? createLogger("strata.persistence", config.logLevel);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.db = openDatabase(config, this.timeoutMs, this.logger);
  }

  /** False once `close()` has run. */
  get isOpen(): boolean {
    return this.db.open;
  }

  /** Release the connection. Safe to call more than once. */
  close(): void {
    if (!this.db.open) return;
    this.db.close();
    this.logger.info({ path: this.dbPath }, "Session store closed");
  }

  // ─── Sessions ─────────────────────────────────────────────────────

  createSession(session: SessionData): SessionData {
    const entity: EntityRef = { kind: "session", sessionId: session.sessionId };
    return this.guard("create session", entity, () => {
      const data = encodeDocument(sessionDataSchema, session, "encode session", entity);
      const now = timestamp();
      try {
        this.db
          .prepare<[string, string, string, string]>(
            "INSERT INTO sessions (session_id, data, created_at, updated_at) VALUES (?, ?, ?, ?)"
          )
          .run(session.sessionId, data, now, now);
      } catch (err) {
        throw mapInsertError("create session", err, entity);
      }
      this.logger.debug({ sessionId: session.sessionId }, "Created session");
      return session;
    });
  }

  readSession(sessionId: string): SessionData | null {
    const entity: EntityRef = { kind: "session", sessionId };
    return this.guard("read session", entity, () => {
      const row = this.db
        .prepare<[string], DataRow>("SELECT data FROM sessions WHERE session_id = ?")
        .get(sessionId);
      if (!row) return null;
      return decodeDocument(sessionDataSchema, row.data, "decode session", entity);
    });
  }

  /** Deletes the session; its agents, messages and multi-agent rows cascade. */
  deleteSession(sessionId: string): void {
    const entity: EntityRef = { kind: "session", sessionId };
    this.guard("delete session", entity, () => {
      const info = this.db
        .prepare<[string]>("DELETE FROM sessions WHERE session_id = ?")
        .run(sessionId);
      if (info.changes === 0) {
        throw new NotFoundError(entity);
      }
      this.logger.debug({ sessionId }, "Deleted session");
    });
  }

  // ─── Agents ───────────────────────────────────────────────────────

  createAgent(sessionId: string, agent: SessionAgentData): void {
    const entity: EntityRef = { kind: "agent", sessionId, agentId: agent.agentId };
    this.guard("create agent", entity, () => {
      const data = encodeDocument(sessionAgentDataSchema, agent, "encode agent", entity);
      const now = timestamp();
      try {
        this.db
          .prepare<[string, string, string, string, string]>(
            `INSERT INTO agents (session_id, agent_id, data, created_at, updated_at)
             VALUES (?, ?, ?, ?, ?)`
          )
          .run(sessionId, agent.agentId, data, now, now);
      } catch (err) {
        throw mapInsertError("create agent", err, entity, { kind: "session", sessionId });
      }
      this.logger.debug({ sessionId, agentId: agent.agentId }, "Created agent");
    });
  }

  readAgent(sessionId: string, agentId: string): SessionAgentData | null {
    const entity: EntityRef = { kind: "agent", sessionId, agentId };
    return this.guard("read agent", entity, () => {
      const row = this.db
        .prepare<[string, string], DataRow>(
          "SELECT data FROM agents WHERE session_id = ? AND agent_id = ?"
        )
        .get(sessionId, agentId);
      if (!row) return null;
      return decodeDocument(sessionAgentDataSchema, row.data, "decode agent", entity);
    });
  }

  /** Overwrites an existing agent. Never creates one. */
  updateAgent(sessionId: string, agent: SessionAgentData): void {
    const entity: EntityRef = { kind: "agent", sessionId, agentId: agent.agentId };
    this.guard("update agent", entity, () => {
      const existing = this.db
        .prepare<[string, string], TimestampRow>(
          "SELECT created_at FROM agents WHERE session_id = ? AND agent_id = ?"
        )
        .get(sessionId, agent.agentId);
      if (!existing) {
        throw new NotFoundError(entity);
      }

      const data = encodeDocument(sessionAgentDataSchema, agent, "encode agent", entity);
      this.db
        .prepare<[string, string, string, string]>(
          `UPDATE agents SET data = ?, updated_at = ?
           WHERE session_id = ? AND agent_id = ?`
        )
        .run(data, timestamp(), sessionId, agent.agentId);
      this.logger.debug({ sessionId, agentId: agent.agentId }, "Updated agent");
    });
  }

  // ─── Messages ─────────────────────────────────────────────────────

  createMessage(sessionId: string, agentId: string, message: SessionMessageData): void {
    const entity: EntityRef = {
      kind: "message",
      sessionId,
      agentId,
      messageId: message.messageId,
    };
    this.guard("create message", entity, () => {
      const data = encodeDocument(sessionMessageDataSchema, message, "encode message", entity);
      const now = timestamp();
      try {
        this.db
          .prepare<[string, string, number, string, string, string]>(
            `INSERT INTO messages (session_id, agent_id, message_id, data, created_at, updated_at)
             VALUES (?, ?, ?, ?, ?, ?)`
          )
          .run(sessionId, agentId, message.messageId, data, now, now);
      } catch (err) {
        throw mapInsertError("create message", err, entity, {
          kind: "agent",
          sessionId,
          agentId,
        });
      }
      this.logger.debug({ sessionId, agentId, messageId: message.messageId }, "Created message");
    });
  }

  readMessage(sessionId: string, agentId: string, messageId: number): SessionMessageData {
    const entity: EntityRef = { kind: "message", sessionId, agentId, messageId };
    return this.guard("read message", entity, () => {
      const row = this.db
        .prepare<[string, string, number], DataRow>(
          `SELECT data FROM messages
           WHERE session_id = ? AND agent_id = ? AND message_id = ?`
        )
        .get(sessionId, agentId, messageId);
      if (!row) {
        throw new NotFoundError(entity);
      }
      return decodeDocument(sessionMessageDataSchema, row.data, "decode message", entity);
    });
  }

  /** Overwrites an existing message. Never creates one. */
  updateMessage(sessionId: string, agentId: string, message: SessionMessageData): void {
    const entity: EntityRef = {
      kind: "message",
      sessionId,
      agentId,
      messageId: message.messageId,
    };
    this.guard("update message", entity, () => {
      const existing = this.db
        .prepare<[string, string, number], TimestampRow>(
          `SELECT created_at FROM messages
           WHERE session_id = ? AND agent_id = ? AND message_id = ?`
        )
        .get(sessionId, agentId, message.messageId);
      if (!existing) {
        throw new NotFoundError(entity);
      }

      const data = encodeDocument(sessionMessageDataSchema, message, "encode message", entity);
      this.db
        .prepare<[string, string, string, string, number]>(
          `UPDATE messages SET data = ?, updated_at = ?
           WHERE session_id = ? AND agent_id = ? AND message_id = ?`
        )
        .run(data, timestamp(), sessionId, agentId, message.messageId);
      this.logger.debug({ sessionId, agentId, messageId: message.messageId }, "Updated message");
    });
  }

  /**
   * Messages in ascending `message_id` order. With a `limit`, skips
   * `offset` rows and returns at most `limit`; without one, returns all.
   */
  listMessages(
    sessionId: string,
    agentId: string,
    limit?: number,
    offset: number = 0
  ): SessionMessageData[] {
    const entity: EntityRef = { kind: "agent", sessionId, agentId };
    return this.guard("list messages", entity, () => {
      const base = `SELECT data FROM messages
        WHERE session_id = ? AND agent_id = ?
        ORDER BY message_id ASC`;

      let rows: DataRow[];
      if (limit === undefined) {
        rows = this.db.prepare<[string, string], DataRow>(base).all(sessionId, agentId);
      } else {
        assertPageBound("limit", limit);
        assertPageBound("offset", offset);
        rows = this.db
          .prepare<[string, string, number, number], DataRow>(`${base} LIMIT ? OFFSET ?`)
          .all(sessionId, agentId, limit, offset);
      }

      return rows.map((row) =>
        decodeDocument(sessionMessageDataSchema, row.data, "decode message", entity)
      );
    });
  }

  // ─── Multi-agent state ────────────────────────────────────────────

  createMultiAgent(sessionId: string, multiAgentId: string, state: MultiAgentState): void {
    const entity: EntityRef = { kind: "multi_agent", sessionId, multiAgentId };
    this.guard("create multi-agent", entity, () => {
      const data = encodeDocument(multiAgentStateSchema, state, "encode multi-agent", entity);
      const now = timestamp();
      try {
        this.db
          .prepare<[string, string, string, string, string]>(
            `INSERT INTO multi_agents (session_id, multi_agent_id, data, created_at, updated_at)
             VALUES (?, ?, ?, ?, ?)`
          )
          .run(sessionId, multiAgentId, data, now, now);
      } catch (err) {
        throw mapInsertError("create multi-agent", err, entity, { kind: "session", sessionId });
      }
      this.logger.debug({ sessionId, multiAgentId }, "Created multi-agent state");
    });
  }

  readMultiAgent(sessionId: string, multiAgentId: string): MultiAgentState {
    const entity: EntityRef = { kind: "multi_agent", sessionId, multiAgentId };
    return this.guard("read multi-agent", entity, () => {
      const row = this.db
        .prepare<[string, string], DataRow>(
          "SELECT data FROM multi_agents WHERE session_id = ? AND multi_agent_id = ?"
        )
        .get(sessionId, multiAgentId);
      if (!row) {
        throw new NotFoundError(entity);
      }
      return decodeDocument(multiAgentStateSchema, row.data, "decode multi-agent", entity);
    });
  }

  /** Overwrites existing multi-agent state. Never creates it. */
  updateMultiAgent(sessionId: string, multiAgentId: string, state: MultiAgentState): void {
    const entity: EntityRef = { kind: "multi_agent", sessionId, multiAgentId };
    this.guard("update multi-agent", entity, () => {
      const existing = this.db
        .prepare<[string, string], TimestampRow>(
          "SELECT created_at FROM multi_agents WHERE session_id = ? AND multi_agent_id = ?"
        )
        .get(sessionId, multiAgentId);
      if (!existing) {
        throw new NotFoundError(entity);
      }

      const data = encodeDocument(multiAgentStateSchema, state, "encode multi-agent", entity);
      this.db
        .prepare<[string, string, string, string]>(
          `UPDATE multi_agents SET data = ?, updated_at = ?
           WHERE session_id = ? AND multi_agent_id = ?`
        )
        .run(data, timestamp(), sessionId, multiAgentId);
      this.logger.debug({ sessionId, multiAgentId }, "Updated multi-agent state");
    });
  }

  // ─── Internals ────────────────────────────────────────────────────

  /**
   * Run `fn`, letting repository errors through and wrapping anything
   * else (lock timeouts, a closed connection) as a storage failure.
   */
  private guard<T>(operation: string, entity: EntityRef, fn: () => T): T {
    if (!this.db.open) {
      throw new StorageFailureError(operation, new Error("The session store is closed"), entity);
    }
    try {
      return fn();
    } catch (err) {
      if (err instanceof StrataStoreError) throw err;
      throw new StorageFailureError(operation, err, entity);
    }
  }
}

/**
 * Open the connection, switch on WAL and foreign keys, and create the
 * schema. Anything opened is closed again if a step fails.
 */
function openDatabase(config: StoreConfig, timeout: number, logger: Logger): Database.Database {
  let db: Database.Database | undefined;
  try {
    if (!config.inMemory) {
      fs.mkdirSync(path.dirname(path.resolve(config.dbPath)), { recursive: true });
    }

    db = new Database(config.dbPath, { timeout });
    const journalMode = db.pragma("journal_mode = WAL", { simple: true });
    // In-memory databases report "memory"; a file that refuses WAL is an error.
    if (!config.inMemory && journalMode !== "wal") {
      throw new Error(`journal_mode is "${String(journalMode)}", expected "wal"`);
    }
    db.pragma("foreign_keys = ON");
    db.exec(SCHEMA_SQL);

    logger.info({ path: config.dbPath, journalMode }, "Session store opened");
    return db;
  } catch (err) {
    db?.close();
    throw new StorageFailureError(`open session store at ${config.dbPath}`, err);
  }
}

function assertPageBound(name: "limit" | "offset", value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}

function timestamp(): string {
  return new Date().toISOString();
}
