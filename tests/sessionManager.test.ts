import { describe, expect, it } from "vitest";
import { SessionManager } from "../src/services/sessionManager.js";

describe("SessionManager", () => {
  it("numbers sessions in creation order", () => {
    const sessions = new SessionManager(2);

    expect(sessions.createSession()).toBe("session_1");
    expect(sessions.createSession()).toBe("session_2");
  });

  it("keeps only the most recent maxHistory exchanges", () => {
    const sessions = new SessionManager(2);
    const id = sessions.createSession();

    sessions.addExchange(id, "q1", "a1");
    sessions.addExchange(id, "q2", "a2");
    sessions.addExchange(id, "q3", "a3");

    expect(sessions.getTurns(id)).toEqual([
      { query: "q2", answer: "a2" },
      { query: "q3", answer: "a3" },
    ]);
    expect(sessions.getConversationHistory(id)).toBe("User: q2\nAssistant: a2\nUser: q3\nAssistant: a3");
  });

  it("creates a session on first exchange for an unknown id", () => {
    const sessions = new SessionManager(2);

    sessions.addExchange("external", "hello", "hi");

    expect(sessions.getConversationHistory("external")).toBe("User: hello\nAssistant: hi");
  });

  it("returns null history for unknown, empty or missing sessions", () => {
    const sessions = new SessionManager(2);
    const id = sessions.createSession();

    expect(sessions.getConversationHistory(id)).toBeNull();
    expect(sessions.getConversationHistory("nope")).toBeNull();
    expect(sessions.getConversationHistory(undefined)).toBeNull();
  });

  it("keeps nothing when maxHistory is zero", () => {
    const sessions = new SessionManager(0);
    const id = sessions.createSession();

    sessions.addExchange(id, "q", "a");

    expect(sessions.getTurns(id)).toEqual([]);
    expect(sessions.getConversationHistory(id)).toBeNull();
  });

  it("clears a session", () => {
    const sessions = new SessionManager(2);
    const id = sessions.createSession();
    sessions.addExchange(id, "q", "a");

    expect(sessions.clearSession(id)).toBe(true);
    expect(sessions.clearSession(id)).toBe(false);
    expect(sessions.getConversationHistory(id)).toBeNull();
  });
});
