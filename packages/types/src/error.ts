/**
 * Error codes raised by a session repository.
 * Uses discriminated union pattern for exhaustive error handling.
 */
export type StrataErrorCode =
  | "DUPLICATE_ENTITY"  // Create where the identity already exists
  | "NOT_FOUND"         // Entity, or its required parent, does not exist
  | "STORAGE_FAILURE"   // Unexpected engine or decode failure
  | "INVALID_CONFIG";   // Storage location or log level could not be resolved

export type EntityKind = "session" | "agent" | "message" | "multi_agent";

/** Identity of the entity an error is about. */
export interface EntityRef {
  readonly kind: EntityKind;
  readonly sessionId: string;
  readonly agentId?: string;
  readonly messageId?: number;
  readonly multiAgentId?: string;
}

export interface StrataError {
  readonly code: StrataErrorCode;
  readonly message: string;
  readonly entity?: EntityRef;
  /** The original error, if wrapping a lower-level failure. */
  readonly cause?: unknown;
}
