import { describe, expect, it } from "vitest";
import { AttachmentStager } from "../core/attachments.js";
import { ToolError } from "./errors.js";
import { createDefaultToolRegistry, createToolRegistry, ToolRuntime } from "./index.js";
import type { ToolContext, ToolDefinition } from "./types.js";

const context: ToolContext = {
  now: new Date(),
  cwd: process.cwd(),
  stager: new AttachmentStager(),
  bashTimeoutMs: 1_000,
};

const echoTool: ToolDefinition = {
  name: "echo",
  description: "echo",
  parameters: [{ name: "text", type: "string", description: "text", required: true }],
  requiresConfirmation: false,
  run: (input) => ({ ok: true, output: String(input.text) }),
};

const failingTool: ToolDefinition = {
  name: "fail",
  description: "fail",
  parameters: [],
  requiresConfirmation: true,
  run: () => {
    throw new ToolError("io_error", "disk on fire");
  },
};

describe("tool registry", () => {
  it("rejects duplicate names", () => {
    const registry = createToolRegistry().register(echoTool);

    expect(() => registry.register(echoTool)).toThrow("tool already registered: echo");
  });

  it("registers the four built-ins with their confirmation flags", () => {
    const registry = createDefaultToolRegistry();

    expect(registry.list().map((tool) => tool.name)).toEqual(["read_file", "write_file", "update_file", "bash"]);
    expect(registry.requiresConfirmation("read_file")).toBe(false);
    expect(registry.requiresConfirmation("write_file")).toBe(true);
    expect(registry.requiresConfirmation("update_file")).toBe(true);
    expect(registry.requiresConfirmation("bash")).toBe(true);
    expect(registry.requiresConfirmation("unknown")).toBe(false);
  });

  it("lists declarations without runtime fields", () => {
    const registry = createToolRegistry().register(echoTool);

    expect(registry.listDeclarations()).toEqual([
      {
        name: "echo",
        description: "echo",
        parameters: [{ name: "text", type: "string", description: "text", required: true }],
      },
    ]);
  });
});

describe("tool runtime", () => {
  const runtime = new ToolRuntime(createToolRegistry().registerMany([echoTool, failingTool]));

  it("returns the tool output as a response", async () => {
    const call = { id: "c1", name: "echo", arguments: { text: "hi" } };

    await expect(runtime.execute(call, context)).resolves.toEqual({ call, ok: true, response: "hi" });
  });

  it("turns unknown tools into an error result", async () => {
    const call = { id: "c2", name: "missing", arguments: {} };

    await expect(runtime.execute(call, context)).resolves.toEqual({ call, ok: false, error: "unknown tool: missing" });
  });

  it("turns thrown errors into an error result", async () => {
    const call = { id: "c3", name: "fail", arguments: {} };

    await expect(runtime.execute(call, context)).resolves.toEqual({ call, ok: false, error: "disk on fire" });
  });
});
