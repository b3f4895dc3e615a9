export {
  SQLiteSessionRepository,
  DEFAULT_TIMEOUT_MS,
  type SQLiteSessionRepositoryOptions,
} from "./session-store.js";
export {
  StrataStoreError,
  DuplicateEntityError,
  NotFoundError,
  StorageFailureError,
  InvalidConfigError,
  describeEntity,
  classifyConstraint,
  type ConstraintViolation,
} from "./errors.js";
export {
  resolveStoreConfig,
  MEMORY_DB_PATH,
  DEFAULT_DB_PATH,
  type StoreConfig,
  type StoreConfigOptions,
} from "./config.js";
export {
  encodeDocument,
  decodeDocument,
  jsonValueSchema,
  jsonObjectSchema,
  sessionDataSchema,
  sessionAgentDataSchema,
  messageDataSchema,
  sessionMessageDataSchema,
  multiAgentStateSchema,
} from "./codec.js";
export { createLogger, type Logger } from "./logger.js";
export { SCHEMA_SQL, TABLE_NAMES } from "./schema.js";
