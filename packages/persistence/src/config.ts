import { z } from "zod";
import { InvalidConfigError } from "./errors.js";

/** Sentinel path selecting an ephemeral store discarded on close. */
export const MEMORY_DB_PATH = ":memory:";

export const DEFAULT_DB_PATH = "./sessions.db";

const envSchema = z.object({
  STRATA_DB_PATH: z
    .string()
    .optional()
    .transform((value) => (value === "" ? undefined : value)),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info"),
});

export interface StoreConfigOptions {
  /** Explicit database location. Wins over the environment. */
  dbPath?: string;
}

export interface StoreConfig {
  readonly dbPath: string;
  /** True when `dbPath` is the in-memory sentinel. */
  readonly inMemory: boolean;
  readonly logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];
}

/**
 * Resolve where the store lives.
 *
 * Priority:
 * 1. `options.dbPath`
 * 2. STRATA_DB_PATH env var
 * 3. `./sessions.db`
 */
export function resolveStoreConfig(
  options: StoreConfigOptions = {},
  env: NodeJS.ProcessEnv = process.env
): StoreConfig {
  const result = envSchema.safeParse({
    STRATA_DB_PATH: env.STRATA_DB_PATH,
    LOG_LEVEL: env.LOG_LEVEL,
  });

  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new InvalidConfigError(`Invalid store environment: ${detail}`, result.error);
  }

  const explicit = options.dbPath === "" ? undefined : options.dbPath;
  const dbPath = explicit ?? result.data.STRATA_DB_PATH ?? DEFAULT_DB_PATH;

  return {
    dbPath,
    inMemory: dbPath === MEMORY_DB_PATH,
    logLevel: result.data.LOG_LEVEL,
  };
}
