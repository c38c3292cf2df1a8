import fs from "node:fs";
import path from "node:path";
import { MEMORY_ENTRY_SEPARATOR, RECENT_MEMORY_ENTRY_COUNT } from "./types.js";

export function splitMemoryEntries(text: string): string[] {
  const entries: string[] = [];
  let current: string[] = [];
  const flush = () => {
    const entry = current.join("\n").trim();
    if (entry) {
      entries.push(entry);
    }
    current = [];
  };

  for (const line of text.replace(/\r\n/g, "\n").split("\n")) {
    if (line.trim() === MEMORY_ENTRY_SEPARATOR) {
      flush();
      continue;
    }
    current.push(line);
  }
  flush();
  return entries;
}

/** The trailing `count` entries of the log, oldest first. A missing log has no entries. */
export function readRecentMemoryEntries(logPath: string, count = RECENT_MEMORY_ENTRY_COUNT): string[] {
  if (count <= 0 || !fs.existsSync(logPath)) {
    return [];
  }
  const entries = splitMemoryEntries(fs.readFileSync(logPath, "utf8"));
  return entries.slice(-count);
}

export function formatMemoryContext(entries: string[]): string {
  if (entries.length === 0) {
    return "";
  }
  return [MEMORY_ENTRY_SEPARATOR, entries.join(`\n${MEMORY_ENTRY_SEPARATOR}\n`), MEMORY_ENTRY_SEPARATOR].join("\n");
}

/**
 * Appends raw summary text. Leading and trailing blank lines of `text` are
 * dropped, the previous content is closed with a newline if it lacks one, and
 * the file always ends with exactly one newline.
 */
export function appendMemoryEntries(logPath: string, text: string): void {
  const body = text.replace(/\r\n/g, "\n").replace(/^\s*\n/, "").trimEnd();
  if (!body) {
    return;
  }

  fs.mkdirSync(path.dirname(logPath), { recursive: true });
  const existing = fs.existsSync(logPath) ? fs.readFileSync(logPath, "utf8") : "";
  const prefix = existing.length > 0 && !existing.endsWith("\n") ? "\n" : "";
  fs.appendFileSync(logPath, `${prefix}${body}\n`, "utf8");
}
