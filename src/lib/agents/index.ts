// Types
export type {
  ToolCallContext,
  ToolCallResult,
  ToolOutcome,
  ToolCallInput,
  ClinicContext,
  SystemPromptParams,
  AgentTypeConfig,
  EngineResult,
  ProcessMessageResult,
} from "./types";

// Registry
export { registerAgentType, requireAgentType } from "./registry";

// Content extraction
export { extractTextContent, previewText } from "./content";

// History builder
export { buildMessages } from "./history";

// Context builder
export { buildSystemPrompt } from "./context-builder";

// Engine
export { chatWithToolLoop } from "./engine";

// Process message orchestrator
export { processMessage } from "./process-message";
export type { ProcessMessageInput, ProcessMessageDeps } from "./process-message";

// Agent auto-registration
export { BOOKING_AGENT_TYPE, bookingConfig } from "./agents/booking";
