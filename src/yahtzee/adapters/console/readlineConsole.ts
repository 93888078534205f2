import { createInterface, type Interface } from "node:readline";
import { InputClosedError } from "../../domain/errors";
import type { ConsolePort } from "../../ports/consolePort";

type PendingAnswer = {
  resolve: (line: string) => void;
  reject: (err: Error) => void;
};

/**
 * Line-oriented console over a readable stream. Lines are queued as they
 * arrive, so several answers in one chunk (piped or pasted input) are
 * handed out one per `ask()`.
 */
export class ReadlineConsole implements ConsolePort {
  private rl: Interface;
  private queued: string[] = [];
  private pending: PendingAnswer | null = null;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = createInterface({ input, terminal: false });

    this.rl.on("line", (line: string) => {
      const waiting = this.pending;
      if (waiting) {
        this.pending = null;
        waiting.resolve(line);
      } else {
        this.queued.push(line);
      }
    });

    this.rl.on("close", () => {
      this.closed = true;
      const waiting = this.pending;
      if (waiting) {
        this.pending = null;
        waiting.reject(new InputClosedError());
      }
    });
  }

  ask(prompt: string): Promise<string> {
    this.output.write(prompt);

    const next = this.queued.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.reject(new InputClosedError());
    }
    return new Promise<string>((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  print(line = ""): void {
    this.output.write(`${line}\n`);
  }

  close(): void {
    this.rl.close();
  }
}
