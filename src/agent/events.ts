import type { DebugEvent, ToolCallRequest, ToolCallResult } from "../chat-types.js";

export type AgentEvent =
  | { type: "text"; text: string }
  | { type: "tool_result"; result: ToolCallResult }
  | { type: "tool_denied"; call: ToolCallRequest }
  | { type: "attachments_flushed"; images: number; documents: number }
  | { type: "step_limit"; maxSteps: number }
  | { type: "debug"; event: DebugEvent };

export type SessionEvent = AgentEvent | { type: "warning"; message: string };
