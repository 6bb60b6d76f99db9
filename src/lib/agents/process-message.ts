import { getUserProfile } from "@/lib/booking/repository";
import { filterPreferences } from "@/lib/booking/preferences";
import type { SessionStore } from "@/lib/booking/session-store";
import type {
  CalendarCollaborator,
  PreferencePatch,
  RecordStore,
} from "@/lib/booking/types";
import { LOCK_MESSAGE, isSessionBlocked } from "@/lib/moderation/guard";
import { CLINIC_TIMEZONE, SLOT_DURATION_MINUTES } from "@/lib/scheduling/constants";
import { errorMessage } from "@/lib/scheduling/errors";
import { formatClinicDate } from "@/lib/scheduling/temporal";
import { describeWorkingHours } from "@/lib/scheduling/working-hours";

import { BOOKING_AGENT_TYPE } from "./agents/booking";
import { previewText } from "./content";
import { buildSystemPrompt } from "./context-builder";
import { chatWithToolLoop } from "./engine";
import { buildMessages } from "./history";
import { requireAgentType } from "./registry";
import type { ProcessMessageResult } from "./types";

export interface ProcessMessageInput {
  sessionId: string;
  message: string;
}

export interface ProcessMessageDeps {
  calendar: CalendarCollaborator;
  records: RecordStore;
  sessions: SessionStore;
  clinicName: string;
  model?: string;
  apiKey?: string;
  now?: () => Date;
}

const AGENT_NAME = "Clinic Assistant";

async function loadPreferences(
  records: RecordStore,
  email: string
): Promise<PreferencePatch | undefined> {
  try {
    const profile = await getUserProfile(records, email);
    return profile ? filterPreferences(profile.preferences) : undefined;
  } catch (err) {
    console.warn(`[process-message] could not load preferences for ${email}:`, errorMessage(err));
    return undefined;
  }
}

/**
 * One user turn: refuse locked sessions, run the booking agent, then
 * record the exchange in the session history.
 */
export async function processMessage(
  input: ProcessMessageInput,
  deps: ProcessMessageDeps
): Promise<ProcessMessageResult> {
  const { sessionId, message } = input;
  const { sessions } = deps;

  // 1. Locked sessions never reach the model
  if (isSessionBlocked(sessions, sessionId)) {
    console.log(`[process-message] session ${sessionId} is locked, skipping agent`);
    return {
      sessionId,
      responseText: LOCK_MESSAGE,
      toolCallCount: 0,
      toolCallNames: [],
      blocked: true,
    };
  }

  // 2. Build system prompt
  const agentConfig = requireAgentType(BOOKING_AGENT_TYPE);
  const now = deps.now ? deps.now() : new Date();
  const lastBooking = sessions.getLastBooking(sessionId);
  const preferences = lastBooking
    ? await loadPreferences(deps.records, lastBooking.email)
    : undefined;

  const systemPrompt = buildSystemPrompt(agentConfig, {
    agentName: AGENT_NAME,
    clinic: {
      clinicName: deps.clinicName,
      timezone: CLINIC_TIMEZONE,
      today: formatClinicDate(now),
      workingHours: describeWorkingHours(),
      slotMinutes: SLOT_DURATION_MINUTES,
    },
    lastBooking,
    preferences,
  });

  // 3. Run tool loop
  const messages = buildMessages(systemPrompt, sessions.getHistory(sessionId), message);

  const engineResult = await chatWithToolLoop({
    model: deps.model,
    apiKey: deps.apiKey,
    messages,
    tools: agentConfig.getTools(),
    agentConfig,
    toolCallContext: {
      calendar: deps.calendar,
      records: deps.records,
      sessions,
      sessionId,
      now: deps.now,
    },
  });

  // 4. A lock during this turn overrides the model's text
  const blocked = engineResult.locked || isSessionBlocked(sessions, sessionId);
  const responseText = blocked ? LOCK_MESSAGE : engineResult.responseText;

  // 5. Save exchange
  sessions.appendHistory(
    sessionId,
    { role: "user", content: message },
    { role: "assistant", content: responseText }
  );

  console.log(
    `[process-message] session=${sessionId} tools=[${engineResult.toolCallNames.join(",")}] reply="${previewText(responseText)}"`
  );

  return {
    sessionId,
    responseText,
    toolCallCount: engineResult.toolCallNames.length,
    toolCallNames: engineResult.toolCallNames,
    lastOutcome: engineResult.lastOutcome,
    blocked,
  };
}
