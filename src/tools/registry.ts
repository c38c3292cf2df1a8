import type { ToolDeclaration, ToolDefinition } from "./types.js";

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();

  register(tool: ToolDefinition): this {
    if (this.tools.has(tool.name)) {
      throw new Error(`tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  registerMany(tools: ToolDefinition[]): this {
    for (const tool of tools) {
      this.register(tool);
    }
    return this;
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  list(): ToolDefinition[] {
    return [...this.tools.values()];
  }

  /** Name, description and parameters only; the model transport builds its own schema from these. */
  listDeclarations(): ToolDeclaration[] {
    return this.list().map((tool) => ({
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters.map((parameter) => ({ ...parameter })),
    }));
  }

  requiresConfirmation(name: string): boolean {
    return this.tools.get(name)?.requiresConfirmation === true;
  }
}

export function createToolRegistry(): ToolRegistry {
  return new ToolRegistry();
}
