import type { Conversation, ToolCallRequest, ToolCallResult } from "../chat-types.js";
import type { ConfirmationGate } from "../confirm/gate.js";
import { DENIED_MESSAGE } from "../confirm/gate.js";
import type { AttachmentStager } from "../core/attachments.js";
import {
  appendMessage,
  partitionAssistantParts,
  toolResultsMessage,
  userMessage,
} from "../core/conversation.js";
import type { ModelClient } from "../model/types.js";
import type { ToolRuntime } from "../tools/runtime.js";
import type { ToolContext, ToolDeclaration } from "../tools/types.js";
import type { AgentEvent } from "./events.js";

export const MAX_STEPS = 20;
export const MAX_OUTPUT_TOKENS = 16_384;
export const ATTACHMENT_LEAD_IN = "Here are the requested files:";

export type LoopState = "awaiting_model_turn" | "handling_tool_calls" | "flushing_attachments" | "terminated";

export type LoopTermination = "completed" | "step_limit";

export type AgentLoopResult = {
  reason: LoopTermination;
  steps: number;
};

export type AgentLoopOptions = {
  model: ModelClient;
  conversation: Conversation;
  tools: ToolDeclaration[];
  runtime: ToolRuntime;
  gate: ConfirmationGate;
  stager: AttachmentStager;
  cwd: string;
  bashTimeoutMs: number;
  onEvent?: (event: AgentEvent) => void;
  maxSteps?: number;
  maxTokens?: number;
};

/**
 * Drives model turns and tool calls until the model answers without tool
 * calls or the step bound is reached. Each step is one model turn, the
 * resolution of its tool calls, and the flush of any staged attachments.
 * Staged media reaches the model on the following turn.
 */
export async function runAgentLoop(options: AgentLoopOptions): Promise<AgentLoopResult> {
  const maxSteps = Math.max(1, Math.floor(options.maxSteps ?? MAX_STEPS));
  const maxTokens = options.maxTokens ?? MAX_OUTPUT_TOKENS;
  const emit = (event: AgentEvent) => options.onEvent?.(event);

  let state: LoopState = "awaiting_model_turn";
  let steps = 0;
  let reason: LoopTermination = "completed";
  let pendingCalls: ToolCallRequest[] = [];

  while (state !== "terminated") {
    switch (state) {
      case "awaiting_model_turn": {
        emit({
          type: "debug",
          event: {
            stage: "model_request",
            data: { step: steps + 1, model: options.model.model, messages: options.conversation.messages.length },
          },
        });
        const message = await options.model.complete({
          conversation: options.conversation,
          tools: options.tools,
          maxTokens,
        });
        // kept even without tool calls so the final answer stays in history
        appendMessage(options.conversation, message);

        const { texts, toolCalls } = partitionAssistantParts(message);
        if (texts.length > 0) {
          emit({ type: "text", text: texts.join("") });
        }

        if (toolCalls.length === 0) {
          steps += 1;
          reason = "completed";
          state = "terminated";
          break;
        }
        pendingCalls = toolCalls;
        state = "handling_tool_calls";
        break;
      }

      case "handling_tool_calls": {
        const results: ToolCallResult[] = [];
        for (const call of pendingCalls) {
          results.push(await resolveToolCall(call, options, emit));
        }
        appendMessage(options.conversation, toolResultsMessage(results));
        pendingCalls = [];
        state = "flushing_attachments";
        break;
      }

      case "flushing_attachments": {
        if (!options.stager.isEmpty()) {
          const { images, documents } = options.stager.drain();
          appendMessage(options.conversation, userMessage(ATTACHMENT_LEAD_IN, { images, documents }));
          emit({ type: "attachments_flushed", images: images.length, documents: documents.length });
        }

        steps += 1;
        if (steps >= maxSteps) {
          reason = "step_limit";
          state = "terminated";
          emit({ type: "step_limit", maxSteps });
          break;
        }
        state = "awaiting_model_turn";
        break;
      }
    }
  }

  return { reason, steps };
}

async function resolveToolCall(
  call: ToolCallRequest,
  options: AgentLoopOptions,
  emit: (event: AgentEvent) => void,
): Promise<ToolCallResult> {
  const allowed = await options.gate.confirm(call);
  if (!allowed) {
    emit({ type: "tool_denied", call });
    return { call, ok: false, error: DENIED_MESSAGE };
  }

  const context: ToolContext = {
    now: new Date(),
    cwd: options.cwd,
    stager: options.stager,
    bashTimeoutMs: options.bashTimeoutMs,
    log: (message) => emit({ type: "debug", event: { stage: `tool:${call.name}`, data: message } }),
  };
  const result = await options.runtime.execute(call, context);
  emit({ type: "tool_result", result });
  return result;
}
