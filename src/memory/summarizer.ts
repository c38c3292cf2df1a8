import type { Conversation } from "../chat-types.js";
import { appendMessage, cloneConversation, messageText, userMessage } from "../core/conversation.js";
import type { ModelClient } from "../model/types.js";
import type { ToolDeclaration } from "../tools/types.js";
import { appendMemoryEntries } from "./storage.js";
import { MemoryFormatError } from "./types.js";

export const MEMORY_MAX_OUTPUT_TOKENS = 1_024;

const ENTRY_HEADER_PATTERN = /^# \[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] \S/m;

export function buildMemoryPrompt(timestamp: string): string {
  return [
    "Summarize the above interaction in one or two entries for a memory log.",
    "Each entry MUST follow this EXACT format (including the --- separators):",
    "",
    "---",
    "# [YYYY-MM-DD HH:MM:SS] One-line summary title",
    "",
    "Optional short summary if there's more to say than the title.",
    "---",
    "",
    "Rules:",
    `- Use timestamp: ${timestamp}`,
    "- Focus on WHAT was done and the OUTCOME, not the process",
    "- If the task was simple, the title alone is enough (no body)",
    "- If it was complex, add a 1-3 sentence body",
    "- Output ONLY the entry/entries, nothing else",
  ].join("\n");
}

/** Unwraps a fenced block and checks that at least one entry header is present. */
export function parseMemoryEntriesText(text: string): string {
  const fenced = text.match(/^\s*```[a-z]*\s*\n([\s\S]*?)\n\s*```\s*$/i);
  const body = (fenced?.[1] ?? text).trim();
  if (!body) {
    throw new MemoryFormatError("memory model returned an empty summary");
  }
  if (!ENTRY_HEADER_PATTERN.test(body)) {
    throw new MemoryFormatError("memory model output has no `# [YYYY-MM-DD HH:MM:SS] title` entry");
  }
  return body;
}

/**
 * Asks the memory model to summarize the whole session and appends the result
 * to the log. The session conversation itself is left untouched.
 */
export async function saveSessionMemory(params: {
  model: ModelClient;
  conversation: Conversation;
  timestamp: string;
  logPath: string;
  // the transcript carries tool calls, so the declarations travel with it
  tools?: ToolDeclaration[];
  maxTokens?: number;
}): Promise<string> {
  const summaryConversation = cloneConversation(params.conversation);
  appendMessage(summaryConversation, userMessage(buildMemoryPrompt(params.timestamp)));

  const reply = await params.model.complete({
    conversation: summaryConversation,
    tools: params.tools ?? [],
    maxTokens: params.maxTokens ?? MEMORY_MAX_OUTPUT_TOKENS,
  });
  const entries = parseMemoryEntriesText(messageText(reply));
  appendMemoryEntries(params.logPath, entries);
  return entries;
}
