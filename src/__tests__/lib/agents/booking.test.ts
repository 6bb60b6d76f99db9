import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

// Mock ChatOpenAI (imported by engine.ts)
vi.mock("@langchain/openai", () => ({ ChatOpenAI: vi.fn() }));

import { registerAgentType, requireAgentType } from "@/lib/agents";
import type { AgentTypeConfig, ToolCallContext } from "@/lib/agents";
import { createSessionStore } from "@/lib/booking/session-store";
import { LOCK_MESSAGE } from "@/lib/moderation/guard";
import { createInMemoryCalendar } from "@/services/in-memory-calendar";
import { createMemoryRecordStore } from "@/services/record-store";

// 2026-08-10 10:00 IST
const NOW = new Date("2026-08-10T04:30:00Z");

function createToolCallContext(overrides?: Partial<ToolCallContext>): ToolCallContext {
  return {
    calendar: createInMemoryCalendar(),
    records: createMemoryRecordStore(),
    sessions: createSessionStore(),
    sessionId: "session-1",
    now: () => NOW,
    ...overrides,
  };
}

function bookingAgent(): AgentTypeConfig {
  return requireAgentType("booking");
}

// ── Tests ──

describe("booking agent", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("registration", () => {
    it("registers the 'booking' type in the global registry", () => {
      expect(bookingAgent().type).toBe("booking");
    });

    it("refuses a second registration of the same type", () => {
      expect(() => registerAgentType(bookingAgent())).toThrow(
        '[agent-registry] Agent type "booking" is already registered'
      );
    });

    it("throws for an unknown type", () => {
      expect(() => requireAgentType("billing")).toThrow(
        '[agent-registry] no agent registered for "billing"'
      );
    });
  });

  describe("tools", () => {
    it("exposes every booking operation plus the moderation guard", () => {
      const names = bookingAgent()
        .getTools()
        .map((t) => t.name);

      expect(names).toEqual([
        "book",
        "check_slot",
        "reschedule",
        "cancel",
        "lookup",
        "update_preferences",
        "get_preferences",
        "moderation_guard",
      ]);
    });

    it("keeps the base prompt in English", () => {
      const prompt = bookingAgent().buildSystemPrompt({
        agentName: "Clinic Assistant",
        clinic: {
          clinicName: "Smile Dental",
          timezone: "Asia/Kolkata",
          today: "Monday, 10 August 2026",
          workingHours: "We are open 9 AM to 6 PM.",
          slotMinutes: 30,
        },
      });

      expect(prompt).toContain("Always respond in English.");
    });
  });

  describe("handleToolCall", () => {
    it("dispatches check_slot to the calendar", async () => {
      const result = await bookingAgent().handleToolCall(
        { name: "check_slot", args: { date: "17 August", time: "10 AM" } },
        createToolCallContext()
      );

      expect(result.outcome).toEqual({ operation: "check_slot", status: "available" });
      expect(JSON.parse(result.result)).toEqual({
        status: "available",
        message: "Monday, 17 August 2026 at 10:00 AM is available for booking.",
        slot: { start: "2026-08-17T10:00:00+05:30", end: "2026-08-17T10:30:00+05:30" },
      });
    });

    it("books and stores the session's last booking", async () => {
      const context = createToolCallContext();

      const result = await bookingAgent().handleToolCall(
        {
          name: "book",
          args: {
            patient_name: "Asha Verma",
            date: "17 August",
            time: "10 AM",
            reason: "Cleaning",
            contact_email: "asha@example.com",
            contact_phone: "9876543210",
          },
        },
        context
      );

      expect(result.outcome).toEqual({ operation: "book", status: "confirmed" });
      expect(context.sessions.getLastBooking("session-1")).toMatchObject({
        patientName: "Asha Verma",
        email: "asha@example.com",
        date: "2026-08-17",
        time: "10:00 AM",
      });
    });

    it("returns invalid_input for malformed arguments", async () => {
      const result = await bookingAgent().handleToolCall(
        { name: "lookup", args: { contact_email: "not-an-email" } },
        createToolCallContext()
      );

      expect(JSON.parse(result.result)).toEqual({
        status: "invalid_input",
        field: "contact_email",
        message: "Please provide a valid email address.",
      });
    });

    it("answers unknown tools with an error", async () => {
      const result = await bookingAgent().handleToolCall(
        { name: "send_invoice", args: {} },
        createToolCallContext()
      );

      expect(JSON.parse(result.result)).toEqual({
        status: "error",
        message: 'Sorry, I can\'t do "send_invoice".',
      });
    });
  });

  describe("moderation", () => {
    it("warns twice, then locks the conversation", async () => {
      const context = createToolCallContext();
      const call = { name: "moderation_guard", args: { reason: "insult" } };

      const first = await bookingAgent().handleToolCall(call, context);
      const second = await bookingAgent().handleToolCall(call, context);
      const third = await bookingAgent().handleToolCall(call, context);

      expect(JSON.parse(first.result).status).toBe("warn");
      expect(first.locked).toBe(false);
      expect(JSON.parse(second.result).message).toBe(
        "This is your final warning. One more inappropriate message will lock this conversation."
      );
      expect(third.locked).toBe(true);
      expect(JSON.parse(third.result)).toEqual({
        status: "blocked",
        message: LOCK_MESSAGE,
        violations: 3,
        locked: true,
      });
    });

    it("refuses other tools once the session is locked", async () => {
      const context = createToolCallContext();
      for (let i = 0; i < 3; i++) context.sessions.recordViolation("session-1");

      const result = await bookingAgent().handleToolCall(
        { name: "check_slot", args: { date: "17 August", time: "10 AM" } },
        context
      );

      expect(result.locked).toBe(true);
      expect(JSON.parse(result.result)).toEqual({
        status: "blocked",
        message: LOCK_MESSAGE,
        locked: true,
      });
    });

    it("keeps counters per session", async () => {
      const context = createToolCallContext();
      for (let i = 0; i < 3; i++) context.sessions.recordViolation("session-1");

      const result = await bookingAgent().handleToolCall(
        { name: "check_slot", args: { date: "17 August", time: "10 AM" } },
        { ...context, sessionId: "session-2" }
      );

      expect(JSON.parse(result.result).status).toBe("available");
    });
  });
});
