import Anthropic from "@anthropic-ai/sdk";
import type { ChatMessage, ChatPart, Conversation, PendingAttachment } from "../chat-types.js";
import { parseDataUrl } from "../core/attachments.js";
import type { JsonValue, ToolDeclaration, ToolInput } from "../tools/types.js";
import type { ModelClient, ModelTurnRequest } from "./types.js";

type ImageMediaType = "image/jpeg" | "image/png" | "image/gif" | "image/webp";

type WireRequest = {
  system: string;
  messages: Anthropic.Messages.MessageParam[];
};

export class AnthropicModelClient implements ModelClient {
  private readonly client: Anthropic;

  constructor(
    readonly model: string,
    options: { apiKey?: string } = {},
  ) {
    // the sdk falls back to ANTHROPIC_API_KEY when apiKey is undefined
    this.client = new Anthropic({ apiKey: options.apiKey });
  }

  async complete(request: ModelTurnRequest): Promise<ChatMessage> {
    const wire = toWireRequest(request.conversation);
    const tools = request.tools.map(toWireTool);
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: request.maxTokens,
      messages: wire.messages,
      ...(wire.system ? { system: wire.system } : {}),
      ...(tools.length > 0 ? { tools } : {}),
      ...(typeof request.temperature === "number" ? { temperature: request.temperature } : {}),
    });
    return fromWireContent(response.content);
  }
}

function toWireRequest(conversation: Conversation): WireRequest {
  const systemTexts: string[] = [];
  const messages: Anthropic.Messages.MessageParam[] = [];

  for (const message of conversation.messages) {
    if (message.role === "system") {
      for (const part of message.parts) {
        if (part.type === "text" && part.text) {
          systemTexts.push(part.text);
        }
      }
      continue;
    }

    const role = message.role === "assistant" ? "assistant" : "user";
    const content = message.parts.flatMap(toWireBlocks);
    if (content.length === 0) {
      continue;
    }

    // tool results and the attachment follow-up are both user turns; the api wants them merged
    const previous = messages[messages.length - 1];
    if (previous && previous.role === role && Array.isArray(previous.content)) {
      previous.content.push(...content);
      continue;
    }
    messages.push({ role, content });
  }

  return {
    system: systemTexts.join("\n\n"),
    messages,
  };
}

function toWireBlocks(part: ChatPart): Anthropic.Messages.ContentBlockParam[] {
  switch (part.type) {
    case "text":
      return part.text ? [{ type: "text", text: part.text }] : [];
    case "tool_call":
      return [
        {
          type: "tool_use",
          id: part.call.id,
          name: part.call.name,
          input: part.call.arguments,
        },
      ];
    case "tool_result":
      return [
        part.result.ok
          ? {
              type: "tool_result",
              tool_use_id: part.result.call.id,
              content: part.result.response,
            }
          : {
              type: "tool_result",
              tool_use_id: part.result.call.id,
              content: part.result.error,
              is_error: true,
            },
      ];
    case "image":
      return toImageBlock(part.attachment);
    case "document":
      return toDocumentBlock(part.attachment);
  }
}

function toImageBlock(attachment: PendingAttachment): Anthropic.Messages.ContentBlockParam[] {
  const parsed = parseDataUrl(attachment.dataUrl);
  const mediaType = parsed ? toImageMediaType(parsed.mimeType) : null;
  if (!parsed || !mediaType) {
    return [];
  }
  return [
    {
      type: "image",
      source: {
        type: "base64",
        media_type: mediaType,
        data: parsed.base64,
      },
    },
  ];
}

function toDocumentBlock(attachment: PendingAttachment): Anthropic.Messages.ContentBlockParam[] {
  const parsed = parseDataUrl(attachment.dataUrl);
  if (!parsed || parsed.mimeType !== "application/pdf") {
    return [];
  }
  return [
    {
      type: "document",
      source: {
        type: "base64",
        media_type: "application/pdf",
        data: parsed.base64,
      },
    },
  ];
}

function toImageMediaType(mimeType: string): ImageMediaType | null {
  switch (mimeType) {
    case "image/jpeg":
    case "image/png":
    case "image/gif":
    case "image/webp":
      return mimeType;
    default:
      return null;
  }
}

function toWireTool(declaration: ToolDeclaration): Anthropic.Messages.Tool {
  const properties: Record<string, { type: string; description: string }> = {};
  const required: string[] = [];
  for (const parameter of declaration.parameters) {
    properties[parameter.name] = {
      type: parameter.type,
      description: parameter.description,
    };
    if (parameter.required) {
      required.push(parameter.name);
    }
  }
  return {
    name: declaration.name,
    description: declaration.description,
    input_schema: {
      type: "object",
      properties,
      required,
    },
  };
}

function fromWireContent(content: Anthropic.Messages.ContentBlock[]): ChatMessage {
  const parts: ChatPart[] = [];
  for (const block of content) {
    if (block.type === "text") {
      parts.push({ type: "text", text: block.text });
    } else if (block.type === "tool_use") {
      parts.push({
        type: "tool_call",
        call: {
          id: block.id,
          name: block.name,
          arguments: toToolInput(block.input),
        },
      });
    }
  }
  return { role: "assistant", parts };
}

function toToolInput(value: unknown): ToolInput {
  if (!isRecord(value)) {
    return {};
  }
  const input: ToolInput = {};
  for (const [key, entry] of Object.entries(value)) {
    if (isJsonValue(entry)) {
      input[key] = entry;
    }
  }
  return input;
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return true;
  }
  if (typeof value === "number") {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (isRecord(value)) {
    return Object.values(value).every(isJsonValue);
  }
  return false;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export const __anthropicInternals = {
  toWireRequest,
  toWireTool,
  fromWireContent,
  toToolInput,
};
