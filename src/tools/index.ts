import { BASH_BUILTIN_TOOLS } from "./builtin/bash.js";
import { FILE_OPS_BUILTIN_TOOLS } from "./builtin/file-ops.js";
import { createToolRegistry, type ToolRegistry } from "./registry.js";

export function createDefaultToolRegistry(): ToolRegistry {
  return createToolRegistry().registerMany(FILE_OPS_BUILTIN_TOOLS).registerMany(BASH_BUILTIN_TOOLS);
}

export { ToolRegistry, createToolRegistry } from "./registry.js";
export { ToolRuntime } from "./runtime.js";
export type { ToolContext, ToolDeclaration, ToolDefinition, ToolParameter, ToolResult } from "./types.js";
