import type { ChatMessage, Conversation } from "../chat-types.js";
import type { ToolDeclaration } from "../tools/types.js";

export type ModelTurnRequest = {
  conversation: Conversation;
  tools: ToolDeclaration[];
  maxTokens: number;
  // unset defers to the provider default
  temperature?: number;
};

export interface ModelClient {
  readonly model: string;
  /** One assistant turn; text and tool-call parts keep the order the model emitted them in. */
  complete(request: ModelTurnRequest): Promise<ChatMessage>;
}
