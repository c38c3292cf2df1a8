import pc from "picocolors";
import type { SessionEvent } from "./agent/events.js";

const MAX_RESPONSE_PREVIEW_CHARS = 500;

export type TerminalReporterOptions = {
  debug: boolean;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
};

export function previewToolResponse(response: string): string {
  if (response.length <= MAX_RESPONSE_PREVIEW_CHARS) {
    return response;
  }
  return `${response.slice(0, MAX_RESPONSE_PREVIEW_CHARS)}…`;
}

/** Maps session events to terminal lines. */
export function createTerminalReporter(options: TerminalReporterOptions): (event: SessionEvent) => void {
  const out = options.stdout ?? ((line: string) => console.log(line));
  const err = options.stderr ?? ((line: string) => console.error(line));

  return (event) => {
    switch (event.type) {
      case "text":
        out(`\n${event.text}`);
        return;
      case "tool_result":
        if (event.result.ok) {
          out(pc.dim(`  -> ${previewToolResponse(event.result.response)}`));
        } else {
          out(pc.red(`  ERROR: ${event.result.error}`));
        }
        return;
      case "tool_denied":
        out(pc.yellow("  DENIED"));
        return;
      case "attachments_flushed":
        out(pc.dim(`  (attached ${describeAttachmentCounts(event.images, event.documents)})`));
        return;
      case "step_limit":
        out("\n(max steps reached)");
        return;
      case "warning":
        err(pc.yellow(`\n(${event.message})`));
        return;
      case "debug":
        if (options.debug) {
          err(pc.dim(`[paw:debug] ${event.event.stage} ${formatDebugData(event.event.data)}`));
        }
        return;
    }
  };
}

function describeAttachmentCounts(images: number, documents: number): string {
  const parts: string[] = [];
  if (images > 0) {
    parts.push(`${images} image${images === 1 ? "" : "s"}`);
  }
  if (documents > 0) {
    parts.push(`${documents} document${documents === 1 ? "" : "s"}`);
  }
  return parts.join(", ");
}

function formatDebugData(data: unknown): string {
  if (typeof data === "string") {
    return data;
  }
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}
