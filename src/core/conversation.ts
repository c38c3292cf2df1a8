import type {
  ChatMessage,
  ChatPart,
  Conversation,
  PendingAttachment,
  ToolCallRequest,
  ToolCallResult,
} from "../chat-types.js";

export function createConversation(systemInstruction: string, prompt: string): Conversation {
  return {
    messages: [
      { role: "system", parts: [{ type: "text", text: systemInstruction }] },
      userMessage(prompt),
    ],
  };
}

export function userMessage(
  text: string,
  attachments: { images?: PendingAttachment[]; documents?: PendingAttachment[] } = {},
): ChatMessage {
  const parts: ChatPart[] = [{ type: "text", text }];
  for (const attachment of attachments.images ?? []) {
    parts.push({ type: "image", attachment });
  }
  for (const attachment of attachments.documents ?? []) {
    parts.push({ type: "document", attachment });
  }
  return { role: "user", parts };
}

export function toolResultsMessage(results: ToolCallResult[]): ChatMessage {
  return {
    role: "tool",
    parts: results.map((result) => ({ type: "tool_result", result })),
  };
}

export function appendMessage(conversation: Conversation, message: ChatMessage): void {
  conversation.messages.push(message);
}

// parts are never mutated after append, so a shallow copy of the message list is enough
export function cloneConversation(conversation: Conversation): Conversation {
  return {
    messages: conversation.messages.map((message) => ({
      role: message.role,
      parts: [...message.parts],
    })),
  };
}

export function partitionAssistantParts(message: ChatMessage): {
  texts: string[];
  toolCalls: ToolCallRequest[];
} {
  const texts: string[] = [];
  const toolCalls: ToolCallRequest[] = [];
  for (const part of message.parts) {
    if (part.type === "text" && part.text) {
      texts.push(part.text);
    } else if (part.type === "tool_call") {
      toolCalls.push(part.call);
    }
  }
  return { texts, toolCalls };
}

export function messageText(message: ChatMessage): string {
  return message.parts
    .map((part) => (part.type === "text" ? part.text : ""))
    .join("");
}
