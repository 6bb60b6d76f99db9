import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  moderationGuard,
  isSessionBlocked,
  resetSession,
  LOCK_MESSAGE,
} from "@/lib/moderation/guard";
import { createSessionStore, type SessionStore } from "@/lib/booking/session-store";

describe("moderation guard", () => {
  let sessions: SessionStore;

  beforeEach(() => {
    sessions = createSessionStore();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("checks the lock without creating session state", () => {
    expect(isSessionBlocked(sessions, "unknown")).toBe(false);
    expect(sessions.has("unknown")).toBe(false);
  });

  it("escalates warn, warn, blocked", () => {
    const results = [1, 2, 3].map(() => moderationGuard(sessions, "s1"));

    expect(results.map((r) => r.status)).toEqual(["warn", "warn", "blocked"]);
    expect(results[0].message).toBe(
      "Please keep our conversation respectful. I'm happy to help you with your dental appointment."
    );
    expect(results[1].message).toBe(
      "This is your final warning. One more inappropriate message will lock this conversation."
    );
    expect(results[2]).toEqual({
      status: "blocked",
      message: LOCK_MESSAGE,
      violations: 3,
      locked: true,
    });
  });

  it("blocks the session from the third violation on", () => {
    moderationGuard(sessions, "s1");
    moderationGuard(sessions, "s1");
    expect(isSessionBlocked(sessions, "s1")).toBe(false);

    moderationGuard(sessions, "s1");
    expect(isSessionBlocked(sessions, "s1")).toBe(true);

    expect(moderationGuard(sessions, "s1").status).toBe("blocked");
  });

  it("starts counting again after a reset", () => {
    [1, 2, 3].forEach(() => moderationGuard(sessions, "s1"));

    resetSession(sessions, "s1");

    expect(isSessionBlocked(sessions, "s1")).toBe(false);
    expect(moderationGuard(sessions, "s1")).toMatchObject({ status: "warn", violations: 1 });
  });

  it("does not carry violations across sessions", () => {
    [1, 2, 3].forEach(() => moderationGuard(sessions, "s1"));

    expect(isSessionBlocked(sessions, "s2")).toBe(false);
    expect(moderationGuard(sessions, "s2").status).toBe("warn");
  });
});
