import { ChatOpenAI } from "@langchain/openai";
import { AIMessage, ToolMessage } from "@langchain/core/messages";
import type { BaseMessage } from "@langchain/core/messages";
import type { StructuredToolInterface } from "@langchain/core/tools";

import { extractTextContent } from "./content";
import type { AgentTypeConfig, EngineResult, ToolCallContext } from "./types";

const MAX_ITERATIONS = 5;
const DEFAULT_MODEL = "gpt-4o-mini";
const GIVE_UP_TEXT = "I was unable to complete this request. Please try again.";

interface ChatWithToolLoopOptions {
  model?: string;
  apiKey?: string;
  messages: BaseMessage[];
  tools: StructuredToolInterface[];
  agentConfig: AgentTypeConfig;
  toolCallContext: ToolCallContext;
  maxIterations?: number;
}

/**
 * Lets the model call tools until it answers in plain text or runs out of
 * iterations. Tool results go back to the model as ToolMessages.
 */
export async function chatWithToolLoop(
  options: ChatWithToolLoopOptions
): Promise<EngineResult> {
  const { agentConfig, toolCallContext, maxIterations = MAX_ITERATIONS } = options;

  const llm = new ChatOpenAI({
    model: options.model ?? DEFAULT_MODEL,
    apiKey: options.apiKey,
    temperature: 0,
    maxRetries: 2,
  });
  const model = options.tools.length > 0 ? llm.bindTools(options.tools) : llm;

  const conversation = [...options.messages];
  const turn: Omit<EngineResult, "responseText"> = { toolCallNames: [], locked: false };
  let lastText: string | null = null;

  for (let iteration = 0; iteration < maxIterations; iteration++) {
    const reply = await model.invoke(conversation);
    const toolCalls = reply.tool_calls ?? [];
    lastText = extractTextContent(reply.content);

    if (toolCalls.length === 0) {
      return { ...turn, responseText: lastText };
    }

    conversation.push(new AIMessage({ content: reply.content, tool_calls: toolCalls }));

    for (const call of toolCalls) {
      turn.toolCallNames.push(call.name);

      const result = await agentConfig.handleToolCall(
        { name: call.name, args: call.args ?? {} },
        toolCallContext
      );
      if (result.outcome) turn.lastOutcome = result.outcome;
      if (result.locked) turn.locked = true;

      conversation.push(
        new ToolMessage({ content: result.result, tool_call_id: call.id ?? call.name })
      );
    }
  }

  console.warn(`[engine] stopped after ${maxIterations} iterations`);
  return { ...turn, responseText: lastText || GIVE_UP_TEXT };
}
