import type { SessionType } from "@strata/types";
import { SQLiteSessionRepository, type Logger } from "@strata/persistence";
import { RepositorySessionManager } from "./session-manager.js";

export interface SQLiteSessionManagerOptions {
  sessionId?: string;
  /** Database file, or ":memory:". Falls back to STRATA_DB_PATH, then ./sessions.db. */
  dbPath?: string;
  sessionType?: SessionType;
  logger?: Logger;
  /** Lock wait handed to the store. */
  timeoutMs?: number;
  /** Environment consulted for STRATA_DB_PATH and LOG_LEVEL. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

/**
 * A session manager that owns its own SQLite store. Call `close()` when
 * done to release the connection.
 */
export class SQLiteSessionManager extends RepositorySessionManager {
  readonly store: SQLiteSessionRepository;

  private constructor(store: SQLiteSessionRepository, options: SQLiteSessionManagerOptions) {
    super({
      sessionId: options.sessionId,
      repository: store,
      sessionType: options.sessionType,
      logger: options.logger,
      env: options.env,
    });
    this.store = store;
  }

  /** Open the store and bind the session, creating it if needed. */
  static open(options: SQLiteSessionManagerOptions = {}): SQLiteSessionManager {
    const store = new SQLiteSessionRepository({
      dbPath: options.dbPath,
      logger: options.logger,
      timeoutMs: options.timeoutMs,
      env: options.env,
    });
    try {
      return new SQLiteSessionManager(store, options);
    } catch (err) {
      store.close();
      throw err;
    }
  }

  close(): void {
    this.store.close();
  }
}
