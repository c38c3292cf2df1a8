import path from "node:path";
import type { Conversation } from "../chat-types.js";
import type { PawConfig } from "../config.js";
import { ConfirmationGate } from "../confirm/gate.js";
import type { Prompter } from "../confirm/types.js";
import { AttachmentStager } from "../core/attachments.js";
import { createConversation } from "../core/conversation.js";
import { formatTimestamp } from "../core/timestamp.js";
import { readRecentMemoryEntries } from "../memory/storage.js";
import { saveSessionMemory } from "../memory/summarizer.js";
import { MEMORY_FILE_NAME, RECENT_MEMORY_ENTRY_COUNT } from "../memory/types.js";
import { createModelClient, type ModelClient } from "../model/index.js";
import { createDefaultToolRegistry, ToolRuntime } from "../tools/index.js";
import type { SessionEvent } from "./events.js";
import { buildSystemInstruction, loadAgentInstructions } from "./instructions.js";
import { runAgentLoop, type AgentLoopResult } from "./loop.js";

export type SessionOptions = {
  prompt: string;
  cwd: string;
  config: PawConfig;
  prompter: Prompter;
  onEvent?: (event: SessionEvent) => void;
  model?: ModelClient;
  memoryModel?: ModelClient;
  now?: () => Date;
  maxSteps?: number;
};

export type SessionResult = {
  loop: AgentLoopResult;
  conversation: Conversation;
  memorySaved: boolean;
};

/**
 * One prompt, start to finish: bootstrap instructions, run the agent loop,
 * then summarize into the memory log. Memory failures only produce a warning.
 */
export async function runSession(options: SessionOptions): Promise<SessionResult> {
  const now = options.now ?? (() => new Date());
  const emit = (event: SessionEvent) => options.onEvent?.(event);
  const memoryPath = path.join(options.cwd, MEMORY_FILE_NAME);

  const system = buildSystemInstruction({
    instructions: loadAgentInstructions(options.cwd),
    cwd: options.cwd,
    timestamp: formatTimestamp(now()),
    recentMemory: readRecentMemoryEntries(memoryPath, RECENT_MEMORY_ENTRY_COUNT),
  });

  const registry = createDefaultToolRegistry();
  const runtime = new ToolRuntime(registry);
  const stager = new AttachmentStager(options.cwd);
  const gate = new ConfirmationGate({
    prompter: options.prompter,
    requiresConfirmation: (name) => registry.requiresConfirmation(name),
  });
  const model = options.model ?? createModelClient(options.config.llm);
  const conversation = createConversation(system, options.prompt);
  const tools = registry.listDeclarations();

  let loop: AgentLoopResult;
  try {
    loop = await runAgentLoop({
      model,
      conversation,
      tools,
      runtime,
      gate,
      stager,
      cwd: options.cwd,
      bashTimeoutMs: options.config.bashTimeoutSeconds * 1_000,
      onEvent: emit,
      maxSteps: options.maxSteps,
    });
  } finally {
    // staged media never outlives its session
    stager.drain();
  }

  let memorySaved = false;
  try {
    await saveSessionMemory({
      model: options.memoryModel ?? createModelClient(options.config.memoryLlm),
      conversation,
      timestamp: formatTimestamp(now()),
      logPath: memoryPath,
      tools,
    });
    memorySaved = true;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    emit({ type: "warning", message: `failed to save memory: ${message}` });
  }

  return { loop, conversation, memorySaved };
}
