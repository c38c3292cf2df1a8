import fs from "node:fs/promises";
import path from "node:path";
import { classifyMediaPath } from "../../core/attachments.js";
import { describeFsError, isErrnoException, ToolError } from "../errors.js";
import type { JsonValue, ToolContext, ToolDefinition, ToolInput, ToolResult } from "../types.js";

type ReadFileInput = ToolInput & {
  path?: JsonValue;
};

type WriteFileInput = ToolInput & {
  path?: JsonValue;
  content?: JsonValue;
};

type UpdateFileInput = ToolInput & {
  path?: JsonValue;
  old?: JsonValue;
  new?: JsonValue;
};

const readFileTool: ToolDefinition<ReadFileInput> = {
  name: "read_file",
  description: "Read the contents of a file. Supports text files, images, and PDFs.",
  parameters: [
    { name: "path", type: "string", description: "Path to the file to read", required: true },
  ],
  requiresConfirmation: false,
  run: async (input, context) => {
    const filePath = asPathString(input.path);
    if (!filePath) {
      return invalidInput("read_file requires a string `path`.");
    }

    const kind = classifyMediaPath(filePath);
    if (kind) {
      context.log?.(`staging ${kind} ${filePath}`);
      const confirmation = await context.stager.stage(filePath, kind);
      return { ok: true, output: confirmation };
    }

    const text = await readTextFile(filePath, context);
    return { ok: true, output: text };
  },
};

const writeFileTool: ToolDefinition<WriteFileInput> = {
  name: "write_file",
  description: "Create or overwrite a file with the given content.",
  parameters: [
    { name: "path", type: "string", description: "Path to the file to write", required: true },
    { name: "content", type: "string", description: "The full content to write", required: true },
  ],
  requiresConfirmation: true,
  run: async (input, context) => {
    const filePath = asPathString(input.path);
    if (!filePath) {
      return invalidInput("write_file requires a string `path`.");
    }
    if (typeof input.content !== "string") {
      return invalidInput("write_file requires a string `content`.");
    }

    const resolvedPath = resolveToolPath(filePath, context);
    try {
      await fs.mkdir(path.dirname(resolvedPath), { recursive: true });
      await fs.writeFile(resolvedPath, input.content, "utf8");
    } catch (error) {
      throw new ToolError("io_error", `failed to write ${filePath}: ${describeFsError(error)}`);
    }
    return {
      ok: true,
      output: `Written ${Buffer.byteLength(input.content, "utf8")} bytes to ${filePath}`,
    };
  },
};

const updateFileTool: ToolDefinition<UpdateFileInput> = {
  name: "update_file",
  description: "Update a file by replacing the first occurrence of a string.",
  parameters: [
    { name: "path", type: "string", description: "Path to the file to update", required: true },
    { name: "old", type: "string", description: "The exact string to find and replace", required: true },
    { name: "new", type: "string", description: "The replacement string", required: true },
  ],
  requiresConfirmation: true,
  run: async (input, context) => {
    const filePath = asPathString(input.path);
    if (!filePath) {
      return invalidInput("update_file requires a string `path`.");
    }
    if (typeof input.old !== "string") {
      return invalidInput("update_file requires a string `old`.");
    }
    if (typeof input.new !== "string") {
      return invalidInput("update_file requires a string `new`.");
    }

    const text = await readTextFile(filePath, context);
    const updated = replaceFirst(text, input.old, input.new);
    if (updated === null) {
      throw new ToolError("string_not_found", `String not found in ${filePath}`);
    }

    try {
      await fs.writeFile(resolveToolPath(filePath, context), updated, "utf8");
    } catch (error) {
      throw new ToolError("io_error", `failed to write ${filePath}: ${describeFsError(error)}`);
    }
    return { ok: true, output: `Updated ${filePath}` };
  },
};

export const FILE_OPS_BUILTIN_TOOLS: ToolDefinition[] = [readFileTool, writeFileTool, updateFileTool];

/** Returns null when `search` does not occur in `text`. */
export function replaceFirst(text: string, search: string, replacement: string): string | null {
  const index = text.indexOf(search);
  if (index < 0) {
    return null;
  }
  // slicing keeps `$&`-style sequences in the replacement literal
  return `${text.slice(0, index)}${replacement}${text.slice(index + search.length)}`;
}

async function readTextFile(filePath: string, context: ToolContext): Promise<string> {
  try {
    return await fs.readFile(resolveToolPath(filePath, context), "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new ToolError("file_not_found", `file not found: ${filePath}`);
    }
    throw new ToolError("io_error", `failed to read ${filePath}: ${describeFsError(error)}`);
  }
}

function resolveToolPath(filePath: string, context: ToolContext): string {
  return path.resolve(context.cwd, filePath);
}

// blank paths are rejected, others pass through untouched
function asPathString(value: JsonValue | undefined): string {
  return typeof value === "string" && value.trim() ? value : "";
}

function invalidInput(message: string): ToolResult {
  return {
    ok: false,
    error: message,
  };
}
