import type { ToolCallRequest, ToolCallResult } from "../chat-types.js";
import { ToolRegistry } from "./registry.js";
import type { ToolContext } from "./types.js";

export class ToolRuntime {
  constructor(private readonly registry: ToolRegistry) {}

  /** Never throws: every failure comes back as an error result. */
  async execute(call: ToolCallRequest, context: ToolContext): Promise<ToolCallResult> {
    const tool = this.registry.get(call.name);
    if (!tool) {
      return {
        call,
        ok: false,
        error: `unknown tool: ${call.name}`,
      };
    }

    try {
      const result = await tool.run(call.arguments, context);
      if (result.ok) {
        return { call, ok: true, response: result.output };
      }
      return { call, ok: false, error: result.error };
    } catch (error) {
      return {
        call,
        ok: false,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
