import { describe, it, expect } from "vitest";
import { DEFAULT_DB_PATH, MEMORY_DB_PATH, resolveStoreConfig } from "./config.js";
import { InvalidConfigError } from "./errors.js";

describe("resolveStoreConfig", () => {
  it("prefers an explicit path", () => {
    const config = resolveStoreConfig({ dbPath: "/data/a.db" }, { STRATA_DB_PATH: "/data/b.db" });
    expect(config).toEqual({ dbPath: "/data/a.db", inMemory: false, logLevel: "info" });
  });

  it("falls back to STRATA_DB_PATH", () => {
    expect(resolveStoreConfig({}, { STRATA_DB_PATH: "/data/b.db" }).dbPath).toBe("/data/b.db");
  });

  it("falls back to the default path", () => {
    expect(resolveStoreConfig({}, {}).dbPath).toBe(DEFAULT_DB_PATH);
    expect(DEFAULT_DB_PATH).toBe("./sessions.db");
  });

  it("treats empty values as unset", () => {
    expect(resolveStoreConfig({ dbPath: "" }, { STRATA_DB_PATH: "" }).dbPath).toBe(
      DEFAULT_DB_PATH
    );
  });

  it("recognises the in-memory sentinel", () => {
    expect(resolveStoreConfig({}, { STRATA_DB_PATH: MEMORY_DB_PATH })).toMatchObject({
      dbPath: ":memory:",
      inMemory: true,
    });
  });

  it("reads the log level", () => {
    expect(resolveStoreConfig({}, { LOG_LEVEL: "silent" }).logLevel).toBe("silent");
  });

  it("rejects an unknown log level", () => {
    expect(() => resolveStoreConfig({}, { LOG_LEVEL: "loud" })).toThrow(InvalidConfigError);
    expect(() => resolveStoreConfig({}, { LOG_LEVEL: "loud" })).toThrow(
      /^Invalid store environment: LOG_LEVEL: /
    );
  });
});
