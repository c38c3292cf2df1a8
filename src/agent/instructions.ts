import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../config.js";
import { formatMemoryContext } from "../memory/storage.js";
import { MEMORY_FILE_NAME } from "../memory/types.js";

export const AGENT_FILE_NAME = "AGENT.md";

export const AGENT_TEMPLATE = [
  "# Agent",
  "",
  "You are Paw, a helpful AI assistant with access to the local filesystem and shell.",
  "",
  "## Tools",
  "",
  "You have 4 tools available:",
  "",
  "- **read_file**: Read the contents of a file (text, images, and PDFs)",
  "- **write_file**: Create or overwrite a file",
  "- **update_file**: Replace a string in a file (for surgical edits)",
  "- **bash**: Execute a shell command",
  "",
  "## Memory",
  "",
  `You have a persistent memory log at \`${MEMORY_FILE_NAME}\`. It contains timestamped summaries of past interactions. Since this file grows large over time:`,
  `- Use \`bash\` with \`tail -n 30 ${MEMORY_FILE_NAME}\` to see recent entries`,
  `- Use \`bash\` with \`grep -n "search term" ${MEMORY_FILE_NAME}\` to search for specific topics`,
  "",
  "Consult your memory when it might be relevant to the current task.",
  "",
  "## Guidelines",
  "",
  "- Read files before modifying them",
  "- Use update_file for small changes, write_file for creating new files or full rewrites",
  "- Keep changes minimal and focused",
  "- Explain what you're doing and why",
  "",
].join("\n");

/** Writes the default template when the file is missing, then reads it. */
export function loadAgentInstructions(cwd: string): string {
  const agentPath = path.join(cwd, AGENT_FILE_NAME);
  try {
    if (!fs.existsSync(agentPath)) {
      fs.writeFileSync(agentPath, AGENT_TEMPLATE, "utf8");
    }
    return fs.readFileSync(agentPath, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`unable to prepare ${AGENT_FILE_NAME}: ${reason}`);
  }
}

export function buildSystemInstruction(params: {
  instructions: string;
  cwd: string;
  timestamp: string;
  recentMemory: string[];
}): string {
  let system = `${params.instructions}\n\n## Environment\n\n- Working directory: ${path.resolve(params.cwd)}\n- Date/time: ${params.timestamp}`;
  const memory = formatMemoryContext(params.recentMemory);
  if (memory) {
    system += `\n\n## Recent Memory\n\n${memory}`;
  }
  return system;
}
