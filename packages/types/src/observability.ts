/** Severity levels shared by every component's structured logs. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";
