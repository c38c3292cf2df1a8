import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import type { ChatMessage } from "../chat-types.js";
import type { ToolInput } from "../tools/types.js";
import { ConfirmationGate, DENIED_MESSAGE } from "../confirm/gate.js";
import type { Prompter } from "../confirm/types.js";
import { AttachmentStager } from "../core/attachments.js";
import { createConversation } from "../core/conversation.js";
import type { ModelClient, ModelTurnRequest } from "../model/types.js";
import { createDefaultToolRegistry, ToolRuntime } from "../tools/index.js";
import type { AgentEvent } from "./events.js";
import { ATTACHMENT_LEAD_IN, MAX_STEPS, runAgentLoop } from "./loop.js";

const cleanupDirs: string[] = [];

afterEach(() => {
  for (const dir of cleanupDirs.splice(0, cleanupDirs.length)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

class ScriptedModel implements ModelClient {
  readonly model = "test-model";
  readonly conversationLengths: number[] = [];

  constructor(private readonly script: (turn: number) => ChatMessage) {}

  async complete(request: ModelTurnRequest): Promise<ChatMessage> {
    this.conversationLengths.push(request.conversation.messages.length);
    return this.script(this.conversationLengths.length);
  }
}

class ScriptedPrompter implements Prompter {
  readonly shown: string[] = [];
  asked = 0;

  constructor(private readonly answers: string[] = []) {}

  show(text: string): void {
    this.shown.push(text);
  }

  async ask(): Promise<string | null> {
    this.asked += 1;
    return this.answers.shift() ?? null;
  }
}

function assistantText(text: string): ChatMessage {
  return { role: "assistant", parts: [{ type: "text", text }] };
}

function assistantCalls(...calls: Array<[string, string, ToolInput]>): ChatMessage {
  return {
    role: "assistant",
    parts: calls.map(([id, name, args]) => ({ type: "tool_call", call: { id, name, arguments: args } })),
  };
}

function setup(cwd: string, model: ModelClient, prompter: Prompter) {
  const registry = createDefaultToolRegistry();
  const events: AgentEvent[] = [];
  const conversation = createConversation("system text", "user prompt");
  const options = {
    model,
    conversation,
    tools: registry.listDeclarations(),
    runtime: new ToolRuntime(registry),
    gate: new ConfirmationGate({ prompter, requiresConfirmation: (name) => registry.requiresConfirmation(name) }),
    stager: new AttachmentStager(cwd),
    cwd,
    bashTimeoutMs: 10_000,
    onEvent: (event: AgentEvent) => events.push(event),
  };
  return { options, conversation, events };
}

function createTempDir(): string {
  const dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "paw-loop-")));
  cleanupDirs.push(dir);
  return dir;
}

describe("agent loop", () => {
  it("runs an approved bash call and finishes on a text-only reply", async () => {
    const dir = createTempDir();
    fs.writeFileSync(path.join(dir, "a.txt"), "");
    fs.writeFileSync(path.join(dir, "b.txt"), "");
    const model = new ScriptedModel((turn) =>
      turn === 1
        ? { role: "assistant", parts: [{ type: "text", text: "Listing." }, ...assistantCalls(["t1", "bash", { command: "ls" }]).parts] }
        : assistantText("There are two files."),
    );
    const prompter = new ScriptedPrompter(["y"]);
    const { options, conversation, events } = setup(dir, model, prompter);

    const result = await runAgentLoop(options);

    expect(result).toEqual({ reason: "completed", steps: 2 });
    expect(prompter.asked).toBe(1);
    expect(prompter.shown).toEqual(["\n  ── bash ──\n  command: ls"]);
    expect(conversation.messages.map((message) => message.role)).toEqual([
      "system",
      "user",
      "assistant",
      "tool",
      "assistant",
    ]);
    expect(conversation.messages[3]?.parts).toEqual([
      {
        type: "tool_result",
        result: { call: { id: "t1", name: "bash", arguments: { command: "ls" } }, ok: true, response: "a.txt\nb.txt\n" },
      },
    ]);
    expect(events.filter((event) => event.type === "text")).toEqual([
      { type: "text", text: "Listing." },
      { type: "text", text: "There are two files." },
    ]);
  });

  it("sends a denial result and skips the side effect", async () => {
    const dir = createTempDir();
    const model = new ScriptedModel((turn) =>
      turn === 1 ? assistantCalls(["w1", "write_file", { path: "x.txt", content: "hi" }]) : assistantText("ok"),
    );
    const { options, conversation, events } = setup(dir, model, new ScriptedPrompter(["n"]));

    await runAgentLoop(options);

    expect(fs.existsSync(path.join(dir, "x.txt"))).toBe(false);
    expect(conversation.messages[3]?.parts).toEqual([
      {
        type: "tool_result",
        result: {
          call: { id: "w1", name: "write_file", arguments: { path: "x.txt", content: "hi" } },
          ok: false,
          error: DENIED_MESSAGE,
        },
      },
    ]);
    expect(events.some((event) => event.type === "tool_denied")).toBe(true);
    expect(events.some((event) => event.type === "tool_result")).toBe(false);
  });

  it("answers every call of a turn in order in one tool message", async () => {
    const dir = createTempDir();
    fs.writeFileSync(path.join(dir, "a.txt"), "A");
    const model = new ScriptedModel((turn) =>
      turn === 1
        ? assistantCalls(["c1", "read_file", { path: "a.txt" }], ["c2", "nope", {}], ["c3", "read_file", { path: "b.txt" }])
        : assistantText("done"),
    );
    const { options, conversation } = setup(dir, model, new ScriptedPrompter());

    await runAgentLoop(options);

    const toolMessage = conversation.messages[3];
    expect(toolMessage?.role).toBe("tool");
    expect(
      toolMessage?.parts.map((part) =>
        part.type === "tool_result" ? [part.result.call.id, part.result.ok ? part.result.response : part.result.error] : null,
      ),
    ).toEqual([
      ["c1", "A"],
      ["c2", "unknown tool: nope"],
      ["c3", "file not found: b.txt"],
    ]);
  });

  it("delivers staged media as a user message after the tool results", async () => {
    const dir = createTempDir();
    fs.writeFileSync(path.join(dir, "one.png"), Buffer.from([1]));
    fs.writeFileSync(path.join(dir, "doc.pdf"), Buffer.from([2]));
    fs.writeFileSync(path.join(dir, "two.gif"), Buffer.from([3]));
    const model = new ScriptedModel((turn) =>
      turn === 1
        ? assistantCalls(
            ["r1", "read_file", { path: "one.png" }],
            ["r2", "read_file", { path: "doc.pdf" }],
            ["r3", "read_file", { path: "two.gif" }],
          )
        : assistantText("I see them."),
    );
    const { options, conversation, events } = setup(dir, model, new ScriptedPrompter());

    await runAgentLoop(options);

    // system, user, assistant, tool, attachments
    expect(model.conversationLengths).toEqual([2, 5]);
    const attachmentMessage = conversation.messages[4];
    expect(attachmentMessage?.role).toBe("user");
    expect(
      attachmentMessage?.parts.map((part) => {
        if (part.type === "text") {
          return part.text;
        }
        return part.type === "image" || part.type === "document" ? `${part.type}:${path.basename(part.attachment.path)}` : part.type;
      }),
    ).toEqual([ATTACHMENT_LEAD_IN, "image:one.png", "image:two.gif", "document:doc.pdf"]);
    expect(events).toContainEqual({ type: "attachments_flushed", images: 2, documents: 1 });
    expect(options.stager.isEmpty()).toBe(true);
  });

  it("stops after the step bound when the model keeps calling tools", async () => {
    const dir = createTempDir();
    fs.writeFileSync(path.join(dir, "loop.txt"), "again");
    const model = new ScriptedModel((turn) => assistantCalls([`s${turn}`, "read_file", { path: "loop.txt" }]));
    const { options, events } = setup(dir, model, new ScriptedPrompter());

    const result = await runAgentLoop(options);

    expect(result).toEqual({ reason: "step_limit", steps: MAX_STEPS });
    expect(model.conversationLengths).toHaveLength(MAX_STEPS);
    expect(events.filter((event) => event.type === "step_limit")).toEqual([{ type: "step_limit", maxSteps: MAX_STEPS }]);
  });

  it("honors a smaller step bound", async () => {
    const dir = createTempDir();
    const model = new ScriptedModel(() => assistantCalls(["x", "read_file", { path: "missing.txt" }]));
    const { options } = setup(dir, model, new ScriptedPrompter());

    const result = await runAgentLoop({ ...options, maxSteps: 2 });

    expect(result).toEqual({ reason: "step_limit", steps: 2 });
    expect(model.conversationLengths).toEqual([2, 4]);
  });
});
