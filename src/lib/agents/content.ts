import type { MessageContent } from "@langchain/core/messages";

/** Plain text of a model reply; non-text content blocks are dropped. */
export function extractTextContent(content: MessageContent): string {
  if (typeof content === "string") return content;
  return content
    .filter(
      (b): b is { type: "text"; text: string } =>
        typeof b === "object" &&
        b !== null &&
        "type" in b &&
        b.type === "text" &&
        "text" in b &&
        typeof b.text === "string"
    )
    .map((b) => b.text)
    .join("");
}

/** Single-line preview for logs. */
export function previewText(text: string, maxLength = 80): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > maxLength ? `${flat.slice(0, maxLength - 1)}…` : flat;
}
