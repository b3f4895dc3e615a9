/**
 * Table layout for the session store. Every statement is guarded with
 * IF NOT EXISTS so opening an initialized file is a no-op.
 *
 * `data` holds the entity's JSON document; the key columns are copies of
 * the identity fields so SQLite can enforce uniqueness and cascades.
 */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS sessions (
  session_id  TEXT PRIMARY KEY,
  data        TEXT NOT NULL,
  created_at  TEXT NOT NULL,
  updated_at  TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS agents (
  session_id  TEXT NOT NULL,
  agent_id    TEXT NOT NULL,
  data        TEXT NOT NULL,
  created_at  TEXT NOT NULL,
  updated_at  TEXT NOT NULL,
  PRIMARY KEY (session_id, agent_id),
  FOREIGN KEY (session_id) REFERENCES sessions(session_id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS messages (
  session_id  TEXT NOT NULL,
  agent_id    TEXT NOT NULL,
  message_id  INTEGER NOT NULL,
  data        TEXT NOT NULL,
  created_at  TEXT NOT NULL,
  updated_at  TEXT NOT NULL,
  PRIMARY KEY (session_id, agent_id, message_id),
  FOREIGN KEY (session_id, agent_id)
    REFERENCES agents(session_id, agent_id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS multi_agents (
  session_id      TEXT NOT NULL,
  multi_agent_id  TEXT NOT NULL,
  data            TEXT NOT NULL,
  created_at      TEXT NOT NULL,
  updated_at      TEXT NOT NULL,
  PRIMARY KEY (session_id, multi_agent_id),
  FOREIGN KEY (session_id) REFERENCES sessions(session_id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_messages_session_agent
  ON messages(session_id, agent_id, message_id);

CREATE INDEX IF NOT EXISTS idx_agents_session
  ON agents(session_id);

CREATE INDEX IF NOT EXISTS idx_multi_agents_session
  ON multi_agents(session_id);
`;

export const TABLE_NAMES = ["sessions", "agents", "messages", "multi_agents"] as const;

// ─── Row types ──────────────────────────────────────────────────────

export interface DataRow {
  data: string;
}

export interface TimestampRow {
  created_at: string;
}
