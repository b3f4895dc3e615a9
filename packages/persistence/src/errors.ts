import Database from "better-sqlite3";
import type { EntityRef, StrataError, StrataErrorCode } from "@strata/types";

/** Base class for every error a session repository throws. */
export class StrataStoreError extends Error implements StrataError {
  readonly code: StrataErrorCode;
  readonly entity?: EntityRef;

  constructor(
    code: StrataErrorCode,
    message: string,
    options: { entity?: EntityRef; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.entity = options.entity;
  }
}

export class DuplicateEntityError extends StrataStoreError {
  constructor(entity: EntityRef, cause?: unknown) {
    super("DUPLICATE_ENTITY", `${describeEntity(entity)} already exists`, {
      entity,
      cause,
    });
  }
}

export class NotFoundError extends StrataStoreError {
  constructor(entity: EntityRef, cause?: unknown) {
    super("NOT_FOUND", `${describeEntity(entity)} not found`, { entity, cause });
  }
}

export class StorageFailureError extends StrataStoreError {
  /** @param operation - Repository operation that failed, e.g. "createAgent". */
  constructor(operation: string, cause: unknown, entity?: EntityRef) {
    const target = entity ? ` for ${describeEntity(entity)}` : "";
    super("STORAGE_FAILURE", `Failed to ${operation}${target}: ${reason(cause)}`, {
      entity,
      cause,
    });
  }
}

export class InvalidConfigError extends StrataStoreError {
  constructor(message: string, cause?: unknown) {
    super("INVALID_CONFIG", message, { cause });
  }
}

/**
 * Human-readable identity, e.g.
 * `Message 3 of agent "writer" in session "s-1"`.
 */
export function describeEntity(entity: EntityRef): string {
  const session = `session "${entity.sessionId}"`;
  switch (entity.kind) {
    case "session":
      return `Session "${entity.sessionId}"`;
    case "agent":
      return `Agent "${entity.agentId ?? ""}" in ${session}`;
    case "message":
      return `Message ${entity.messageId ?? "?"} of agent "${entity.agentId ?? ""}" in ${session}`;
    case "multi_agent":
      return `Multi-agent "${entity.multiAgentId ?? ""}" in ${session}`;
  }
}

// ─── Constraint classification ──────────────────────────────────────

export type ConstraintViolation = "duplicate" | "missing_parent";

/**
 * Classify a failed INSERT by the extended result code better-sqlite3
 * attaches to `SqliteError`. Returns `undefined` for anything that is
 * not a key constraint.
 */
export function classifyConstraint(err: unknown): ConstraintViolation | undefined {
  if (!(err instanceof Database.SqliteError)) return undefined;
  switch (err.code) {
    case "SQLITE_CONSTRAINT_PRIMARYKEY":
    case "SQLITE_CONSTRAINT_UNIQUE":
      return "duplicate";
    case "SQLITE_CONSTRAINT_FOREIGNKEY":
      return "missing_parent";
    default:
      return undefined;
  }
}

/**
 * Map an INSERT failure onto the repository taxonomy.
 *
 * @param entity - Identity of the row being inserted.
 * @param parent - Identity reported when the foreign key has no target.
 */
export function mapInsertError(
  operation: string,
  err: unknown,
  entity: EntityRef,
  parent: EntityRef = entity
): StrataStoreError {
  if (err instanceof StrataStoreError) return err;
  switch (classifyConstraint(err)) {
    case "duplicate":
      return new DuplicateEntityError(entity, err);
    case "missing_parent":
      return new NotFoundError(parent, err);
    default:
      return new StorageFailureError(operation, err, entity);
  }
}

function reason(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
