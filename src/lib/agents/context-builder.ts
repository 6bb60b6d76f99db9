import { describePreferences } from "@/lib/booking/preferences";
import type { LastBooking } from "@/lib/booking/types";

import type { AgentTypeConfig, ClinicContext, SystemPromptParams } from "./types";

export function buildSystemPrompt(
  agentConfig: AgentTypeConfig,
  params: SystemPromptParams
): string {
  const sections: string[] = [];

  // 1. Base prompt from agent type
  const basePrompt = agentConfig.buildSystemPrompt(params);
  if (basePrompt) {
    sections.push(basePrompt);
  }

  // 2. Agent name
  sections.push(`Your name is "${params.agentName}".`);

  // 3. Tool instructions
  const tools = agentConfig.getTools();
  if (tools.length > 0) {
    const toolDescriptions = tools
      .map((t) => `- ${t.name}: ${t.description}`)
      .join("\n");
    sections.push(`Available tools:\n${toolDescriptions}`);
  }

  // 4. Clinic context
  sections.push(formatClinicContext(params.clinic));

  // 5. Session context (always last)
  if (params.lastBooking || params.preferences) {
    sections.push(formatSessionContext(params.lastBooking ?? null, params));
  }

  return sections.join("\n\n");
}

function formatClinicContext(clinic: ClinicContext): string {
  const lines: string[] = [`Clinic context:`];
  lines.push(`- Clinic: ${clinic.clinicName}`);
  lines.push(`- Timezone: ${clinic.timezone}`);
  lines.push(`- Today: ${clinic.today}`);
  lines.push(`- ${clinic.workingHours}`);
  lines.push(`- Every appointment lasts ${clinic.slotMinutes} minutes.`);
  return lines.join("\n");
}

function formatSessionContext(
  lastBooking: LastBooking | null,
  params: SystemPromptParams
): string {
  const lines: string[] = [`Session context:`];
  if (lastBooking) {
    lines.push(
      `- Last booking in this conversation: ${lastBooking.patientName}, ` +
        `${lastBooking.date} at ${lastBooking.time} (${lastBooking.reason}), ` +
        `email ${lastBooking.email}`
    );
  }
  const preferences = params.preferences ? describePreferences(params.preferences) : "";
  if (preferences) {
    lines.push(`- Patient preferences: ${preferences}`);
  }
  return lines.join("\n");
}
