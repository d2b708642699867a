/**
 * Line prompts for the interactive shell.
 */

import * as readline from "node:readline";

/**
 * Input ended before an answer was given.
 */
export class InputClosedError extends Error {
  constructor(public readonly reason: "interrupt" | "eof") {
    super(reason === "interrupt" ? "Input interrupted" : "Input closed");
    this.name = "InputClosedError";
  }
}

export interface Prompter {
  /** Print `question` and resolve with the next line typed, without its newline. */
  ask(question: string): Promise<string>;
  close(): void;
}

export interface ReadlinePrompterOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

interface Waiter {
  resolve(line: string): void;
  reject(err: InputClosedError): void;
}

/**
 * Prompter over a readline interface. Ctrl-C and end of input reject
 * pending questions with InputClosedError.
 *
 * Lines that arrive while no question is pending (piped input) are
 * queued for the next ask().
 */
export function createReadlinePrompter(options: ReadlinePrompterOptions = {}): Prompter {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const rl = readline.createInterface({
    input,
    output,
    terminal: "isTTY" in input && input.isTTY === true,
  });

  const buffered: string[] = [];
  const waiting: Waiter[] = [];
  let closedReason: "interrupt" | "eof" | null = null;

  rl.on("line", (line) => {
    const waiter = waiting.shift();
    if (waiter) {
      waiter.resolve(line);
    } else {
      buffered.push(line);
    }
  });
  rl.on("SIGINT", () => {
    closedReason = "interrupt";
    rl.close();
  });
  rl.on("close", () => {
    const reason = closedReason ?? "eof";
    closedReason = reason;
    for (const waiter of waiting.splice(0)) {
      waiter.reject(new InputClosedError(reason));
    }
  });

  return {
    ask(question: string): Promise<string> {
      const line = buffered.shift();
      if (line !== undefined) {
        output.write(question);
        return Promise.resolve(line);
      }
      if (closedReason !== null) {
        return Promise.reject(new InputClosedError(closedReason));
      }
      return new Promise((resolve, reject) => {
        waiting.push({ resolve, reject });
        rl.setPrompt(question);
        rl.prompt();
      });
    },
    close(): void {
      if (closedReason === null) {
        closedReason = "eof";
        rl.close();
      }
    },
  };
}
