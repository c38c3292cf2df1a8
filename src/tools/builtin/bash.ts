import { spawn } from "node:child_process";
import { ToolError } from "../errors.js";
import type { JsonValue, ToolDefinition, ToolInput } from "../types.js";

type BashInput = ToolInput & {
  command?: JsonValue;
};

export type ProcessRunResult = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  spawnError: string | null;
  durationMs: number;
  truncated: boolean;
};

export const NO_OUTPUT_PLACEHOLDER = "(no output)";

const DEFAULT_TIMEOUT_MS = 120_000;
const MAX_CAPTURE_CHARS = 300_000;
const KILL_GRACE_MS = 1_500;

const bashTool: ToolDefinition<BashInput> = {
  name: "bash",
  description: "Execute a shell command and return its output.",
  parameters: [
    { name: "command", type: "string", description: "The shell command to execute", required: true },
  ],
  requiresConfirmation: true,
  run: async (input, context) => {
    const command = typeof input.command === "string" ? input.command.trim() : "";
    if (!command) {
      return { ok: false, error: "bash requires a non-empty string `command`." };
    }

    context.log?.(`running shell command in ${context.cwd} (timeout ${context.bashTimeoutMs}ms)`);
    const result = await runShellCommand(command, { cwd: context.cwd, timeoutMs: context.bashTimeoutMs });
    context.log?.(`shell command finished in ${result.durationMs}ms with exit code ${String(result.exitCode)}`);
    if (result.truncated) {
      context.log?.("shell output exceeded the capture limit and was truncated");
    }

    if (result.timedOut) {
      throw new ToolError("timeout", `command timed out after ${Math.round(context.bashTimeoutMs / 1_000)}s`);
    }
    if (result.spawnError) {
      throw new ToolError("io_error", `failed to start shell: ${result.spawnError}`);
    }

    return { ok: true, output: formatCommandOutput(result) };
  },
};

export const BASH_BUILTIN_TOOLS: ToolDefinition[] = [bashTool];

/**
 * stdout followed by stderr, then an exit code marker when the command failed.
 * Never returns an empty string.
 */
export function formatCommandOutput(result: Pick<ProcessRunResult, "stdout" | "stderr" | "exitCode" | "signal">): string {
  let output = result.stdout;
  if (result.stderr) {
    output += result.stderr;
  }
  if (result.exitCode !== null && result.exitCode !== 0) {
    output += `\n(exit code: ${result.exitCode})`;
  } else if (result.exitCode === null && result.signal) {
    output += `\n(killed by signal: ${result.signal})`;
  }
  return output || NO_OUTPUT_PLACEHOLDER;
}

type CappedBuffer = {
  text: string;
  truncated: boolean;
};

function appendCapped(buffer: CappedBuffer, chunk: Buffer | string): void {
  if (buffer.truncated) {
    return;
  }
  const room = MAX_CAPTURE_CHARS - buffer.text.length;
  const piece = String(chunk);
  if (piece.length > room) {
    buffer.text += piece.slice(0, room);
    buffer.truncated = true;
    return;
  }
  buffer.text += piece;
}

export function runShellCommand(
  command: string,
  options: { cwd?: string; env?: NodeJS.ProcessEnv; timeoutMs?: number } = {},
): Promise<ProcessRunResult> {
  const limitMs = options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : DEFAULT_TIMEOUT_MS;
  const out: CappedBuffer = { text: "", truncated: false };
  const err: CappedBuffer = { text: "", truncated: false };
  const startedAt = Date.now();
  let timedOut = false;

  const ownGroup = process.platform !== "win32";
  // /bin/sh on unix, cmd.exe on windows; the shell leads its own process group
  const child = spawn(command, {
    cwd: options.cwd || process.cwd(),
    env: options.env ?? process.env,
    shell: true,
    stdio: ["ignore", "pipe", "pipe"],
    windowsHide: true,
    detached: ownGroup,
  });
  child.stdout?.on("data", (chunk: Buffer) => appendCapped(out, chunk));
  child.stderr?.on("data", (chunk: Buffer) => appendCapped(err, chunk));

  const killGroup = (signal: NodeJS.Signals) => {
    const pid = child.pid;
    if (ownGroup && pid) {
      try {
        process.kill(-pid, signal);
        return;
      } catch {
        // group already gone, fall through to the shell itself
      }
    }
    child.kill(signal);
  };

  return new Promise((resolve) => {
    let settled = false;
    let escalate: NodeJS.Timeout | undefined;
    const finish = (exitCode: number | null, signal: NodeJS.Signals | null, spawnError: string | null) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      clearTimeout(escalate);
      if (timedOut) {
        // grandchildren may still hold the pipes
        child.stdout?.destroy();
        child.stderr?.destroy();
      }
      resolve({
        exitCode,
        signal,
        stdout: out.text,
        stderr: err.text,
        timedOut,
        spawnError,
        durationMs: Date.now() - startedAt,
        truncated: out.truncated || err.truncated,
      });
    };

    const timer = setTimeout(() => {
      timedOut = true;
      child.once("exit", (exitCode, signal) => finish(exitCode, signal, null));
      killGroup("SIGTERM");
      escalate = setTimeout(() => {
        killGroup("SIGKILL");
        finish(child.exitCode, child.signalCode, null);
      }, KILL_GRACE_MS);
    }, limitMs);

    child.once("close", (exitCode, signal) => finish(exitCode, signal, null));
    child.once("error", (error) => finish(null, null, error.message));
  });
}
