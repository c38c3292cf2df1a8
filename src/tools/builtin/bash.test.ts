import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { AttachmentStager } from "../../core/attachments.js";
import type { ToolContext, ToolDefinition, ToolInput } from "../types.js";
import { BASH_BUILTIN_TOOLS, formatCommandOutput, NO_OUTPUT_PLACEHOLDER } from "./bash.js";

const bashTool = getTool("bash");
const cleanupDirs: string[] = [];

afterEach(() => {
  for (const dir of cleanupDirs.splice(0, cleanupDirs.length)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("bash built-in tool", () => {
  it("returns stdout", async () => {
    const result = await runBash({ command: "printf hello" });

    expect(result).toEqual({ ok: true, output: "hello" });
  });

  it("returns a placeholder when a command prints nothing", async () => {
    const result = await runBash({ command: "true" });

    expect(result).toEqual({ ok: true, output: NO_OUTPUT_PLACEHOLDER });
  });

  it("puts stderr after stdout", async () => {
    const result = await runBash({ command: "echo err 1>&2; echo out" });

    expect(result).toEqual({ ok: true, output: "out\nerr\n" });
  });

  it("appends the exit code of a failing command", async () => {
    const result = await runBash({ command: "exit 3" });

    expect(result).toEqual({ ok: true, output: "\n(exit code: 3)" });
  });

  it("runs in the session working directory", async () => {
    const dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "paw-bash-")));
    cleanupDirs.push(dir);

    const result = await runBash({ command: "pwd" }, { cwd: dir });

    expect(result).toEqual({ ok: true, output: `${dir}\n` });
  });

  it("rejects an empty command", async () => {
    const result = await runBash({ command: "   " });

    expect(result).toEqual({ ok: false, error: "bash requires a non-empty string `command`." });
  });

  it(
    "fails with a timeout error when the command runs too long",
    async () => {
      await expect(runBash({ command: "exec sleep 5" }, { bashTimeoutMs: 1_000 })).rejects.toThrow(
        "command timed out after 1s",
      );
    },
    10_000,
  );

  it(
    "stops a compound command at the time limit",
    async () => {
      const startedAt = Date.now();

      await expect(runBash({ command: "sleep 5; echo done" }, { bashTimeoutMs: 1_000 })).rejects.toThrow(
        "command timed out after 1s",
      );
      expect(Date.now() - startedAt).toBeLessThan(3_000);
    },
    10_000,
  );
});

describe("formatCommandOutput", () => {
  it("notes a signal when there is no exit code", () => {
    expect(formatCommandOutput({ stdout: "", stderr: "", exitCode: null, signal: "SIGTERM" })).toBe(
      "\n(killed by signal: SIGTERM)",
    );
  });

  it("omits the marker for a zero exit code", () => {
    expect(formatCommandOutput({ stdout: "a\n", stderr: "b\n", exitCode: 0, signal: null })).toBe("a\nb\n");
  });
});

async function runBash(input: ToolInput, overrides: Partial<ToolContext> = {}) {
  const cwd = overrides.cwd ?? process.cwd();
  return bashTool.run(input, {
    now: new Date(),
    cwd,
    stager: new AttachmentStager(cwd),
    bashTimeoutMs: 10_000,
    ...overrides,
  });
}

function getTool(name: string): ToolDefinition {
  const tool = BASH_BUILTIN_TOOLS.find((candidate) => candidate.name === name);
  if (!tool) {
    throw new Error(`missing tool ${name}`);
  }
  return tool;
}
