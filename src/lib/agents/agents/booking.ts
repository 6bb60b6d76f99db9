import { tool } from "@langchain/core/tools";
import { z } from "zod";

import {
  bookAppointment,
  cancelAppointment,
  checkSlot,
  getPreferences,
  lookupAppointment,
  rescheduleAppointment,
  updatePreferences,
} from "@/lib/booking/workflow";
import { LOCK_MESSAGE, isSessionBlocked, moderationGuard } from "@/lib/moderation/guard";
import { moderationGuardSchema } from "@/lib/validations/booking";
import { registerAgentType } from "../registry";
import type {
  AgentTypeConfig,
  SystemPromptParams,
  ToolCallContext,
  ToolCallInput,
  ToolCallResult,
} from "../types";

export const BOOKING_AGENT_TYPE = "booking";

// ── Base System Prompt ──

const BASE_PROMPT = `You are the front-desk assistant of a dental clinic. Your role is to help patients book, check, reschedule or cancel appointments and to remember their preferences.

Rules:
- To book: collect the patient's full name, preferred date, preferred time, reason for the visit, email and 10-digit mobile number. Then call book. Pass the date and time exactly as the patient said them.
- To check a time without booking: use check_slot.
- To reschedule: ask for the email used for the booking and the new date and time, then call reschedule.
- To cancel: ask for the email used for the booking, confirm, then call cancel.
- To tell the patient about their next appointment: use lookup.
- When the patient mentions a preference (times of day, dentist, insurance, anxiety, brief answers, emojis, formal or friendly tone), call update_preferences. Use get_preferences to read them back.
- Every tool returns JSON with a "status" and a "message". Relay the message to the patient without changing its facts. When the status is "unavailable", offer the listed alternatives and never book one without the patient's confirmation.
- NEVER invent dates, times or availability. Always use the tools.
- If the patient is abusive, insulting or sends inappropriate content, call moderation_guard and relay its message.
- Always respond in English.`;

// ── Tool Definitions (Stubs) ──

const preferenceSchema = {
  preferred_times: z
    .array(z.string())
    .optional()
    .describe('Preferred times of day, e.g. ["morning", "after 4 pm"]'),
  preferred_dentist: z.string().optional().describe("Name of the dentist the patient prefers"),
  insurance_provider: z.string().optional().describe("Patient's dental insurance provider"),
  dental_anxiety: z.boolean().optional().describe("True if the patient is anxious about dental visits"),
  prefers_brief_responses: z.boolean().optional().describe("True if the patient wants short answers"),
  prefers_emojis: z.boolean().optional().describe("True if the patient likes emojis in replies"),
  tone: z.enum(["formal", "friendly"]).optional().describe("Tone the patient prefers"),
};

const bookTool = tool(
  async (input) => JSON.stringify({ action: "book", ...input }),
  {
    name: "book",
    description:
      "Books an appointment. Checks working hours and calendar availability first; if the slot is taken it returns alternatives instead of booking.",
    schema: z.object({
      patient_name: z.string().describe("Patient's full name"),
      date: z.string().describe('Requested date as the patient said it, e.g. "15 August" or "next monday"'),
      time: z.string().describe('Requested time as the patient said it, e.g. "10:30 AM" or "3 pm"'),
      reason: z.string().describe("Reason for the visit, e.g. cleaning, toothache"),
      contact_email: z.string().describe("Patient's email address"),
      contact_phone: z.string().describe("Patient's 10-digit Indian mobile number"),
      ...preferenceSchema,
    }),
  }
);

const checkSlotTool = tool(
  async (input) => JSON.stringify({ action: "check_slot", ...input }),
  {
    name: "check_slot",
    description:
      "Checks whether a date and time can be booked, without booking it. Returns alternatives when it is taken.",
    schema: z.object({
      date: z.string().describe("Requested date as the patient said it"),
      time: z.string().describe("Requested time as the patient said it"),
    }),
  }
);

const rescheduleTool = tool(
  async (input) => JSON.stringify({ action: "reschedule", ...input }),
  {
    name: "reschedule",
    description:
      "Moves the patient's next upcoming appointment to a new date and time. Only call this AFTER the patient has confirmed the new time.",
    schema: z.object({
      contact_email: z.string().describe("Email used for the booking"),
      new_date: z.string().describe("New date as the patient said it"),
      new_time: z.string().describe("New time as the patient said it"),
    }),
  }
);

const emailOnlySchema = z.object({
  contact_email: z.string().describe("Email used for the booking"),
});

const cancelTool = tool(
  async (input) => JSON.stringify({ action: "cancel", ...input }),
  {
    name: "cancel",
    description:
      "Cancels the patient's next upcoming appointment. Only call this AFTER the patient has confirmed the cancellation.",
    schema: emailOnlySchema,
  }
);

const lookupTool = tool(
  async (input) => JSON.stringify({ action: "lookup", ...input }),
  {
    name: "lookup",
    description: "Returns the patient's next upcoming confirmed appointment.",
    schema: emailOnlySchema,
  }
);

const updatePreferencesTool = tool(
  async (input) => JSON.stringify({ action: "update_preferences", ...input }),
  {
    name: "update_preferences",
    description:
      "Saves preferences for a patient who has booked before. Only the fields you pass are changed.",
    schema: z.object({
      contact_email: z.string().describe("Email used for the booking"),
      ...preferenceSchema,
    }),
  }
);

const getPreferencesTool = tool(
  async (input) => JSON.stringify({ action: "get_preferences", ...input }),
  {
    name: "get_preferences",
    description: "Reads the preferences saved for a patient.",
    schema: emailOnlySchema,
  }
);

const moderationGuardTool = tool(
  async (input) => JSON.stringify({ action: "moderation_guard", ...input }),
  {
    name: "moderation_guard",
    description:
      "Call this when the patient's message is abusive or inappropriate. Returns a warning, or locks the conversation after repeated violations.",
    schema: z.object({
      reason: z.string().optional().describe("Short note on why the message was flagged"),
    }),
  }
);

// ── Tool Handlers ──

interface OperationOutcome {
  status: string;
  message: string;
}

function toToolResult(operation: string, outcome: OperationOutcome): ToolCallResult {
  return {
    result: JSON.stringify(outcome),
    outcome: { operation, status: outcome.status },
  };
}

function handleModerationGuard(
  args: Record<string, unknown>,
  context: ToolCallContext
): ToolCallResult {
  const parsed = moderationGuardSchema.safeParse(args);
  const reason = parsed.success && parsed.data.reason ? parsed.data.reason : "unspecified";
  console.log(`[booking] moderation_guard session=${context.sessionId} reason="${reason}"`);

  const outcome = moderationGuard(context.sessions, context.sessionId);
  return {
    ...toToolResult("moderation_guard", outcome),
    locked: outcome.locked,
  };
}

function blockedResult(): ToolCallResult {
  return {
    result: JSON.stringify({ status: "blocked", message: LOCK_MESSAGE, locked: true }),
    locked: true,
  };
}

// ── Agent Config ──

const bookingConfig: AgentTypeConfig = {
  type: BOOKING_AGENT_TYPE,

  buildSystemPrompt(_params: SystemPromptParams): string {
    // Name, tools and clinic/session context are added by context-builder.ts.
    return BASE_PROMPT;
  },

  getTools() {
    return [
      bookTool,
      checkSlotTool,
      rescheduleTool,
      cancelTool,
      lookupTool,
      updatePreferencesTool,
      getPreferencesTool,
      moderationGuardTool,
    ];
  },

  async handleToolCall(
    toolCall: ToolCallInput,
    context: ToolCallContext
  ): Promise<ToolCallResult> {
    if (toolCall.name === "moderation_guard") {
      return handleModerationGuard(toolCall.args, context);
    }

    if (isSessionBlocked(context.sessions, context.sessionId)) {
      console.warn(`[booking] refused ${toolCall.name} for blocked session ${context.sessionId}`);
      return blockedResult();
    }

    switch (toolCall.name) {
      case "book":
        return toToolResult("book", await bookAppointment(toolCall.args, context));
      case "check_slot":
        return toToolResult("check_slot", await checkSlot(toolCall.args, context));
      case "reschedule":
        return toToolResult("reschedule", await rescheduleAppointment(toolCall.args, context));
      case "cancel":
        return toToolResult("cancel", await cancelAppointment(toolCall.args, context));
      case "lookup":
        return toToolResult("lookup", await lookupAppointment(toolCall.args, context));
      case "update_preferences":
        return toToolResult("update_preferences", await updatePreferences(toolCall.args, context));
      case "get_preferences":
        return toToolResult("get_preferences", await getPreferences(toolCall.args, context));
      default:
        console.warn(`[booking] Unknown tool call: ${toolCall.name}`);
        return {
          result: JSON.stringify({
            status: "error",
            message: `Sorry, I can't do "${toolCall.name}".`,
          }),
        };
    }
  },
};

registerAgentType(bookingConfig);

export { bookingConfig };
