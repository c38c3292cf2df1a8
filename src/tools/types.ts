import type { AttachmentStager } from "../core/attachments.js";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type ToolInput = Record<string, JsonValue>;

export type ToolContext = {
  now: Date;
  cwd: string;
  stager: AttachmentStager;
  bashTimeoutMs: number;
  log?: (message: string) => void;
};

export type ToolResult =
  | {
      ok: true;
      output: string;
    }
  | {
      ok: false;
      error: string;
    };

export type ToolParameter = {
  name: string;
  type: "string" | "number" | "boolean";
  description: string;
  required: boolean;
};

export type ToolDeclaration = {
  name: string;
  description: string;
  parameters: ToolParameter[];
};

export type ToolDefinition<TInput extends ToolInput = ToolInput> = ToolDeclaration & {
  // mutating and shell tools ask the user before they run
  requiresConfirmation: boolean;
  run: (input: TInput, context: ToolContext) => Promise<ToolResult> | ToolResult;
};
