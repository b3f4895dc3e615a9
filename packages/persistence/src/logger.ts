import { pino, type Logger } from "pino";
import type { LogLevel } from "@strata/types";

export type { Logger };

/**
 * Creates a named pino logger. `silent` turns output off entirely,
 * which is what the tests pass.
 */
export function createLogger(name: string, level: LogLevel | "silent" = "info"): Logger {
  return pino({ name, level });
}
