import type { ToolInput } from "./tools/types.js";

export type ChatRole = "system" | "user" | "assistant" | "tool";

export type AttachmentKind = "image" | "document";

export type PendingAttachment = {
  kind: AttachmentKind;
  path: string;
  mimeType: string;
  dataUrl: string;
  byteSize: number;
};

export type ToolCallRequest = {
  id: string;
  name: string;
  arguments: ToolInput;
};

export type ToolCallResult =
  | {
      call: ToolCallRequest;
      ok: true;
      response: string;
    }
  | {
      call: ToolCallRequest;
      ok: false;
      error: string;
    };

export type ChatPart =
  | { type: "text"; text: string }
  | { type: "tool_call"; call: ToolCallRequest }
  | { type: "tool_result"; result: ToolCallResult }
  | { type: "image"; attachment: PendingAttachment }
  | { type: "document"; attachment: PendingAttachment };

export type ChatMessage = {
  role: ChatRole;
  parts: ChatPart[];
};

export type Conversation = {
  messages: ChatMessage[];
};

export type DebugEvent = {
  stage: string;
  data: unknown;
};
