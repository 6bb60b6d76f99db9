import { AIMessage, HumanMessage, SystemMessage } from "@langchain/core/messages";
import type { BaseMessage } from "@langchain/core/messages";

import { MAX_HISTORY_MESSAGES } from "@/lib/booking/session-store";
import type { HistoryMessage } from "@/lib/booking/session-store";

export function buildMessages(
  systemPrompt: string,
  history: HistoryMessage[],
  userMessage: string
): BaseMessage[] {
  const trimmed =
    history.length > MAX_HISTORY_MESSAGES
      ? history.slice(history.length - MAX_HISTORY_MESSAGES)
      : history;

  return [
    new SystemMessage(systemPrompt),
    ...trimmed.map((m) =>
      m.role === "user" ? new HumanMessage(m.content) : new AIMessage(m.content)
    ),
    new HumanMessage(userMessage),
  ];
}
