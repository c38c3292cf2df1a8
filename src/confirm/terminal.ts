import { createInterface, type Interface } from "node:readline/promises";
import type { Prompter } from "./types.js";

/**
 * Line-oriented prompter. Lines that arrive before a question is asked are
 * queued, so piped answers are consumed one per question.
 */
export class TerminalPrompter implements Prompter {
  private rl: Interface | null = null;
  private readonly pending: string[] = [];
  private waiter: ((line: string | null) => void) | null = null;
  private ended = false;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  show(text: string): void {
    this.output.write(`${text}\n`);
  }

  ask(question: string): Promise<string | null> {
    const rl = this.getInterface();
    if (this.ended) {
      // the interface is closed, but queued lines still answer in order
      this.output.write(question);
    } else {
      rl.setPrompt(question);
      rl.prompt();
    }

    const queued = this.pending.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  close(): void {
    if (!this.ended) {
      this.rl?.close();
    }
  }

  private getInterface(): Interface {
    if (!this.rl) {
      const rl = createInterface({
        input: this.input,
        output: this.output,
        terminal: "isTTY" in this.input && this.input.isTTY === true,
      });
      rl.on("line", (line) => {
        const waiter = this.takeWaiter();
        if (waiter) {
          waiter(line);
        } else {
          this.pending.push(line);
        }
      });
      rl.on("close", () => {
        this.ended = true;
        this.takeWaiter()?.(null);
      });
      this.rl = rl;
    }
    return this.rl;
  }

  private takeWaiter(): ((line: string | null) => void) | null {
    const waiter = this.waiter;
    this.waiter = null;
    return waiter;
  }
}
