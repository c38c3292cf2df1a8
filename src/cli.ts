#!/usr/bin/env node
import { runSession } from "./agent/session.js";
import { loadPawConfig } from "./config.js";
import { TerminalPrompter } from "./confirm/terminal.js";
import { createTerminalReporter } from "./terminal.js";

const argv = process.argv.slice(2);

void main(argv).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[paw] fatal: ${message}`);
  process.exitCode = 1;
});

async function main(args: string[]): Promise<void> {
  const prompt = args.join(" ").trim();
  if (!prompt) {
    console.error("Usage: paw <prompt>");
    process.exitCode = 1;
    return;
  }

  const config = loadPawConfig();
  const prompter = new TerminalPrompter();
  try {
    await runSession({
      prompt,
      cwd: process.cwd(),
      config,
      prompter,
      onEvent: createTerminalReporter({ debug: config.debug }),
    });
  } finally {
    prompter.close();
  }
}
