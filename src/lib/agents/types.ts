import type { StructuredToolInterface } from "@langchain/core/tools";
import type { BookingContext, LastBooking, PreferencePatch } from "@/lib/booking/types";

// ── Tool Call Context ──
export type ToolCallContext = BookingContext;

// ── Tool Call Result ──
/** Which booking operation a tool call ran and the status it ended in. */
export interface ToolOutcome {
  operation: string;
  status: string;
}

export interface ToolCallResult {
  /** JSON handed back to the model as the tool message. */
  result: string;
  outcome?: ToolOutcome;
  /** Set when the call locked the conversation. */
  locked?: boolean;
}

// ── Tool Call Input ──
export interface ToolCallInput {
  name: string;
  args: Record<string, unknown>;
}

// ── Clinic Context ──
export interface ClinicContext {
  clinicName: string;
  timezone: string;
  today: string;
  workingHours: string;
  slotMinutes: number;
}

// ── System Prompt Build Params ──
export interface SystemPromptParams {
  agentName: string;
  clinic: ClinicContext;
  lastBooking?: LastBooking | null;
  preferences?: PreferencePatch;
}

// ── Agent Type Config ──
export interface AgentTypeConfig {
  type: string;
  buildSystemPrompt(params: SystemPromptParams): string;
  getTools(): StructuredToolInterface[];
  handleToolCall(
    toolCall: ToolCallInput,
    context: ToolCallContext
  ): Promise<ToolCallResult>;
}

// ── Engine Result ──
export interface EngineResult {
  responseText: string;
  toolCallNames: string[];
  lastOutcome?: ToolOutcome;
  locked: boolean;
}

// ── Message Processing Result ──
export interface ProcessMessageResult {
  sessionId: string;
  responseText: string;
  toolCallCount: number;
  toolCallNames: string[];
  lastOutcome?: ToolOutcome;
  blocked: boolean;
}
