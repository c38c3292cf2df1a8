import type { ToolCallRequest } from "../chat-types.js";
import type { JsonValue, ToolInput } from "../tools/types.js";
import type { Prompter } from "./types.js";

export const DENIED_MESSAGE = "User denied this action.";
export const CONFIRM_QUESTION = "  Allow? [Y/n] ";

const MAX_PREVIEW_VALUE_CHARS = 300;

export type ConfirmationGateOptions = {
  prompter: Prompter;
  requiresConfirmation: (toolName: string) => boolean;
};

export class ConfirmationGate {
  constructor(private readonly options: ConfirmationGateOptions) {}

  requiresConfirmation(toolName: string): boolean {
    return this.options.requiresConfirmation(toolName);
  }

  /**
   * Shows the call preview and, for confirm-required tools, blocks until the
   * user answers. Unrecognized answers are asked again.
   */
  async confirm(call: Pick<ToolCallRequest, "name" | "arguments">): Promise<boolean> {
    this.options.prompter.show(renderToolCallPreview(call.name, call.arguments));
    if (!this.requiresConfirmation(call.name)) {
      return true;
    }

    for (;;) {
      const answer = await this.options.prompter.ask(CONFIRM_QUESTION);
      if (answer === null) {
        return false;
      }
      const decision = parseConfirmationAnswer(answer);
      if (decision !== null) {
        return decision;
      }
    }
  }
}

/** true to allow, false to deny, null when the answer is neither. */
export function parseConfirmationAnswer(answer: string): boolean | null {
  const normalized = answer.trim().toLowerCase();
  if (normalized === "" || normalized === "y" || normalized === "yes") {
    return true;
  }
  if (normalized === "n" || normalized === "no") {
    return false;
  }
  return null;
}

export function renderToolCallPreview(name: string, args: ToolInput): string {
  const lines = ["", `  ── ${name} ──`];
  for (const [key, value] of Object.entries(args)) {
    const text = truncatePreviewValue(stringifyArgument(value));
    if (text.includes("\n")) {
      lines.push(`  ${key}:`);
      for (const line of splitLines(text)) {
        lines.push(`    ${line}`);
      }
    } else {
      lines.push(`  ${key}: ${text}`);
    }
  }
  return lines.join("\n");
}

function stringifyArgument(value: JsonValue): string {
  if (typeof value === "string") {
    return value;
  }
  return JSON.stringify(value);
}

function truncatePreviewValue(value: string): string {
  if (value.length <= MAX_PREVIEW_VALUE_CHARS) {
    return value;
  }
  return `${value.slice(0, MAX_PREVIEW_VALUE_CHARS)}…`;
}

function splitLines(text: string): string[] {
  const lines = text.replace(/\r\n/g, "\n").split("\n");
  if (lines.length > 1 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}
