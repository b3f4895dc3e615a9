export {
  RepositorySessionManager,
  type AgentSnapshot,
  type RepositorySessionManagerOptions,
} from "./session-manager.js";
export { SQLiteSessionManager, type SQLiteSessionManagerOptions } from "./sqlite-session-manager.js";
