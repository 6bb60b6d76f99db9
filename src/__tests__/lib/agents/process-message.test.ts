import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

// Mock ChatOpenAI (imported by engine.ts)
vi.mock("@langchain/openai", () => ({ ChatOpenAI: vi.fn() }));

// Mock the tool loop
vi.mock("@/lib/agents/engine", () => ({
  chatWithToolLoop: vi.fn(),
}));

import { processMessage } from "@/lib/agents/process-message";
import type { ProcessMessageDeps } from "@/lib/agents/process-message";
import { chatWithToolLoop } from "@/lib/agents/engine";
import type { EngineResult } from "@/lib/agents/types";
import { saveUserProfile } from "@/lib/booking/repository";
import { createSessionStore } from "@/lib/booking/session-store";
import { LOCK_MESSAGE } from "@/lib/moderation/guard";
import { createInMemoryCalendar } from "@/services/in-memory-calendar";
import { createMemoryRecordStore } from "@/services/record-store";

const NOW = new Date("2026-08-10T04:30:00Z");

function createDeps(): ProcessMessageDeps {
  return {
    calendar: createInMemoryCalendar(),
    records: createMemoryRecordStore(),
    sessions: createSessionStore(),
    clinicName: "Smile Dental",
    apiKey: "test-key",
    now: () => NOW,
  };
}

function engineReply(overrides: Partial<EngineResult> = {}): EngineResult {
  return {
    responseText: "Sure, which date works for you?",
    toolCallNames: [],
    locked: false,
    ...overrides,
  };
}

describe("processMessage", () => {
  beforeEach(() => {
    vi.mocked(chatWithToolLoop).mockReset();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("runs the agent and records the exchange", async () => {
    vi.mocked(chatWithToolLoop).mockResolvedValue(engineReply());
    const deps = createDeps();

    const result = await processMessage({ sessionId: "s1", message: "I need a cleaning" }, deps);

    expect(result).toEqual({
      sessionId: "s1",
      responseText: "Sure, which date works for you?",
      toolCallCount: 0,
      toolCallNames: [],
      blocked: false,
    });
    expect(deps.sessions.getHistory("s1")).toEqual([
      { role: "user", content: "I need a cleaning" },
      { role: "assistant", content: "Sure, which date works for you?" },
    ]);
  });

  it("passes clinic context and history to the tool loop", async () => {
    vi.mocked(chatWithToolLoop).mockResolvedValue(engineReply());
    const deps = createDeps();
    deps.sessions.appendHistory(
      "s1",
      { role: "user", content: "Hello" },
      { role: "assistant", content: "Hi! How can I help?" }
    );

    await processMessage({ sessionId: "s1", message: "Book me in" }, deps);

    const options = vi.mocked(chatWithToolLoop).mock.calls[0][0];
    const systemPrompt = String(options.messages[0].content);
    expect(systemPrompt).toContain("Smile Dental");
    expect(systemPrompt).toContain("Monday, 10 August 2026");
    expect(options.messages).toHaveLength(4);
    expect(String(options.messages[3].content)).toBe("Book me in");
    expect(options.apiKey).toBe("test-key");
    expect(options.toolCallContext.sessionId).toBe("s1");
    expect(options.tools.map((t) => t.name)).toContain("book");
  });

  it("includes saved preferences of the last booking", async () => {
    vi.mocked(chatWithToolLoop).mockResolvedValue(engineReply());
    const deps = createDeps();
    deps.sessions.setLastBooking("s1", {
      id: "a1",
      patientName: "Asha Verma",
      reason: "Cleaning",
      date: "2026-08-17",
      time: "10:00 AM",
      startTime: "2026-08-17T10:00:00+05:30",
      endTime: "2026-08-17T10:30:00+05:30",
      status: "confirmed",
      email: "asha@example.com",
      calendarEventId: "evt-1",
    });
    await saveUserProfile(deps.records, {
      userId: "asha@example.com",
      name: "Asha Verma",
      email: "asha@example.com",
      phone: "9876543210",
      preferences: { preferredDentist: "Dr. Rao" },
    });

    await processMessage({ sessionId: "s1", message: "Thanks" }, deps);

    const systemPrompt = String(vi.mocked(chatWithToolLoop).mock.calls[0][0].messages[0].content);
    expect(systemPrompt).toContain("Asha Verma");
    expect(systemPrompt).toContain("Dr. Rao");
  });

  it("never calls the model for a locked session", async () => {
    const deps = createDeps();
    for (let i = 0; i < 3; i++) deps.sessions.recordViolation("s1");

    const result = await processMessage({ sessionId: "s1", message: "hello?" }, deps);

    expect(chatWithToolLoop).not.toHaveBeenCalled();
    expect(result).toEqual({
      sessionId: "s1",
      responseText: LOCK_MESSAGE,
      toolCallCount: 0,
      toolCallNames: [],
      blocked: true,
    });
    expect(deps.sessions.getHistory("s1")).toEqual([]);
  });

  it("answers with the lock message when the turn locks the session", async () => {
    vi.mocked(chatWithToolLoop).mockResolvedValue(
      engineReply({
        responseText: "Goodbye.",
        locked: true,
        toolCallNames: ["moderation_guard"],
        lastOutcome: { operation: "moderation_guard", status: "blocked" },
      })
    );
    const deps = createDeps();

    const result = await processMessage({ sessionId: "s1", message: "abuse" }, deps);

    expect(result.blocked).toBe(true);
    expect(result.responseText).toBe(LOCK_MESSAGE);
    expect(result.toolCallNames).toEqual(["moderation_guard"]);
    expect(deps.sessions.getHistory("s1")[1]).toEqual({ role: "assistant", content: LOCK_MESSAGE });
  });

  it("reports the last booking operation of the turn", async () => {
    vi.mocked(chatWithToolLoop).mockResolvedValue(
      engineReply({
        responseText: "You're booked for Monday at 10:00 AM.",
        toolCallNames: ["check_slot", "book"],
        lastOutcome: { operation: "book", status: "confirmed" },
      })
    );

    const result = await processMessage({ sessionId: "s1", message: "Yes, book it" }, createDeps());

    expect(result).toEqual({
      sessionId: "s1",
      responseText: "You're booked for Monday at 10:00 AM.",
      toolCallCount: 2,
      toolCallNames: ["check_slot", "book"],
      lastOutcome: { operation: "book", status: "confirmed" },
      blocked: false,
    });
  });
});
