import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  InvalidConfigError,
  MEMORY_DB_PATH,
  NotFoundError,
  SQLiteSessionRepository,
  createLogger,
} from "@strata/persistence";
import type { MessageData } from "@strata/types";
import { RepositorySessionManager, type AgentSnapshot } from "./session-manager.js";

const logger = createLogger("test", "silent");

function text(role: MessageData["role"], value: string): MessageData {
  return { role, content: [{ text: value }] };
}

class LevelReportingManager extends RepositorySessionManager {
  get logLevel(): string {
    return this.logger.level;
  }
}

function makeAgent(agentId = "agent-1", messages: MessageData[] = []): AgentSnapshot {
  return { agentId, state: {}, conversationManagerState: {}, messages };
}

describe("RepositorySessionManager", () => {
  let repo: SQLiteSessionRepository;

  beforeEach(() => {
    repo = new SQLiteSessionRepository({ dbPath: MEMORY_DB_PATH, logger });
  });

  afterEach(() => {
    repo.close();
  });

  function createManager(sessionId = "test-session"): RepositorySessionManager {
    return new RepositorySessionManager({ sessionId, repository: repo, logger });
  }

  describe("construction", () => {
    it("creates the session if it does not exist", () => {
      const manager = createManager();
      expect(manager.session.sessionType).toBe("AGENT");
      expect(repo.readSession("test-session")).toEqual(manager.session);
    });

    it("uses an existing session", () => {
      repo.createSession({
        sessionId: "test-session",
        sessionType: "MULTI_AGENT",
        createdAt: "t0",
        updatedAt: "t0",
      });
      const manager = createManager();
      expect(manager.session.sessionType).toBe("MULTI_AGENT");
      expect(manager.session.createdAt).toBe("t0");
    });

    it("generates a session id when none is given", () => {
      const manager = new RepositorySessionManager({ repository: repo, logger });
      expect(manager.sessionId).toMatch(/^[0-9a-f-]{36}$/);
      expect(repo.readSession(manager.sessionId)).not.toBeNull();
    });

    it("takes its default log level from LOG_LEVEL", () => {
      const manager = new LevelReportingManager({ repository: repo, env: { LOG_LEVEL: "warn" } });
      expect(manager.logLevel).toBe("warn");
    });

    it("rejects an unknown LOG_LEVEL", () => {
      expect(
        () => new RepositorySessionManager({ repository: repo, env: { LOG_LEVEL: "loud" } })
      ).toThrow(InvalidConfigError);
    });
  });

  describe("initializeAgent", () => {
    it("persists a new agent with its existing messages", () => {
      const manager = createManager();
      const agent = makeAgent("agent-1", [text("user", "Hello"), text("assistant", "Hi there")]);
      agent.state = { mood: "curious" };

      manager.initializeAgent(agent);

      expect(repo.readAgent("test-session", "agent-1")?.state).toEqual({ mood: "curious" });
      const stored = repo.listMessages("test-session", "agent-1");
      expect(stored.map((m) => m.messageId)).toEqual([0, 1]);
      expect(stored[1]?.message).toEqual(text("assistant", "Hi there"));
    });

    it("restores state and history onto a stored agent", () => {
      const first = createManager();
      const original = makeAgent();
      first.initializeAgent(original);
      first.appendMessage(text("user", "Remember blue"), original);
      original.state = { favourite: "blue" };
      original.conversationManagerState = { removedMessageCount: 0 };
      first.syncAgent(original);

      const restored = makeAgent();
      createManager().initializeAgent(restored);

      expect(restored.state).toEqual({ favourite: "blue" });
      expect(restored.conversationManagerState).toEqual({ removedMessageCount: 0 });
      expect(restored.messages).toEqual([text("user", "Remember blue")]);
    });

    it("refuses to initialize the same agent twice", () => {
      const manager = createManager();
      manager.initializeAgent(makeAgent());
      expect(() => manager.initializeAgent(makeAgent())).toThrow(
        'Agent "agent-1" is already initialized in session "test-session"'
      );
    });
  });

  describe("appendMessage", () => {
    it("assigns sequential ids per agent", () => {
      const manager = createManager();
      const a = makeAgent("a");
      const b = makeAgent("b");
      manager.initializeAgent(a);
      manager.initializeAgent(b);

      expect(manager.appendMessage(text("user", "1"), a).messageId).toBe(0);
      expect(manager.appendMessage(text("user", "2"), a).messageId).toBe(1);
      expect(manager.appendMessage(text("user", "x"), b).messageId).toBe(0);
    });

    it("continues numbering after a restore", () => {
      const first = createManager();
      const agent = makeAgent("agent-1", [text("user", "one"), text("assistant", "two")]);
      first.initializeAgent(agent);

      const second = createManager();
      const restored = makeAgent();
      second.initializeAgent(restored);

      expect(second.appendMessage(text("user", "three"), restored).messageId).toBe(2);
    });

    it("requires the agent to be initialized", () => {
      expect(() => createManager().appendMessage(text("user", "hi"), makeAgent())).toThrow(
        'Agent "agent-1" must be initialized in session "test-session" first'
      );
    });
  });

  describe("redactLatestMessage", () => {
    it("restores the redaction in place of the original", () => {
      const manager = createManager();
      const agent = makeAgent();
      manager.initializeAgent(agent);
      manager.appendMessage(text("user", "my password is test-secret"), agent);
      manager.redactLatestMessage(text("user", "[redacted]"), agent);

      const stored = repo.readMessage("test-session", "agent-1", 0);
      expect(stored.message).toEqual(text("user", "my password is test-secret"));
      expect(stored.redactMessage).toEqual(text("user", "[redacted]"));

      const restored = makeAgent();
      createManager().initializeAgent(restored);
      expect(restored.messages).toEqual([text("user", "[redacted]")]);
    });

    it("fails when the agent has no messages", () => {
      const manager = createManager();
      const agent = makeAgent();
      manager.initializeAgent(agent);
      expect(() => manager.redactLatestMessage(text("user", "x"), agent)).toThrow(
        'Agent "agent-1" in session "test-session" has no message to redact'
      );
    });
  });

  describe("syncAgent", () => {
    it("keeps the stored creation time", () => {
      const manager = createManager();
      const agent = makeAgent();
      manager.initializeAgent(agent);
      const createdAt = repo.readAgent("test-session", "agent-1")?.createdAt;

      agent.state = { step: 2 };
      manager.syncAgent(agent);

      const stored = repo.readAgent("test-session", "agent-1");
      expect(stored?.createdAt).toBe(createdAt);
      expect(stored?.state).toEqual({ step: 2 });
    });

    it("does not create an unknown agent", () => {
      expect(() => createManager().syncAgent(makeAgent("ghost"))).toThrow(NotFoundError);
      expect(repo.readAgent("test-session", "ghost")).toBeNull();
    });
  });

  describe("multi-agent state", () => {
    it("stores initial state and returns it", () => {
      const manager = createManager();
      const state = { nodes: ["a", "b"], current: "a" };
      expect(manager.initializeMultiAgent("graph", state)).toBe(state);
      expect(repo.readMultiAgent("test-session", "graph")).toEqual(state);
    });

    it("returns stored state instead of the initial one", () => {
      createManager().initializeMultiAgent("graph", { current: "a" });
      createManager().syncMultiAgent("graph", { current: "b" });

      expect(createManager().initializeMultiAgent("graph", { current: "a" })).toEqual({
        current: "b",
      });
    });

    it("does not create state on sync", () => {
      expect(() => createManager().syncMultiAgent("graph", {})).toThrow(NotFoundError);
    });
  });

  describe("deleteSession", () => {
    it("removes the session and everything under it", () => {
      const manager = createManager();
      const agent = makeAgent("agent-1", [text("user", "hi")]);
      manager.initializeAgent(agent);
      manager.initializeMultiAgent("graph", {});

      manager.deleteSession();

      expect(repo.readSession("test-session")).toBeNull();
      expect(repo.readAgent("test-session", "agent-1")).toBeNull();
      expect(() => repo.readMultiAgent("test-session", "graph")).toThrow(NotFoundError);
      expect(() => manager.deleteSession()).toThrow(NotFoundError);
    });
  });
});
