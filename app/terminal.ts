import readline, { type Interface } from "readline";
import type { Readable, Writable } from "stream";
import { formatQuestion, style } from "@/app/format";
import type { Quiz } from "@/lib/quiz";
import { interpretInput, type QuizUI } from "@/lib/session";
import type { Hinter, Question, UserEvent } from "@/types/vocab";

type TtyAware = { isTTY?: boolean };

export type SignalSource = {
  once(event: "SIGINT", listener: () => void): unknown;
  off(event: "SIGINT", listener: () => void): unknown;
};

export type ResultFormatter<S> = (question: Question, quiz: Quiz<S>) => string;

const UP = "\x1b[1A";
const CLEAR_LINE = "\x1b[2K\r";

/**
 * `QuizUI` over node's readline. On a terminal the hint is drawn dimmed after
 * the cursor and redrawn on every keypress; on a pipe lines are read plainly.
 */
export class TerminalUI<S> implements QuizUI<S> {
  private readonly rl: Interface;
  private readonly interactive: boolean;
  private readonly queued: UserEvent[] = [];
  private pending: ((event: UserEvent) => void) | null = null;
  private hinter: Hinter | null = null;
  private closed = false;

  constructor(
    private readonly input: Readable & TtyAware,
    private readonly output: Writable & TtyAware,
    private readonly formatResult: ResultFormatter<S>,
    private readonly signals: SignalSource = process,
  ) {
    this.interactive = Boolean(input.isTTY && output.isTTY);
    this.rl = readline.createInterface({ input, output, terminal: this.interactive });

    this.rl.on("line", (line) => this.settle(interpretInput(line)));
    this.rl.on("SIGINT", () => this.settle({ kind: "quit" }));
    this.rl.on("close", () => {
      this.closed = true;
      this.settle({ kind: "quit" });
    });
    this.rl.on("error", this.onError);
    // readline only turns Ctrl-C into "SIGINT" in terminal mode
    if (this.interactive) input.on("keypress", this.onKeypress);
    else signals.once("SIGINT", this.onInterrupt);
  }

  notifyQuestion(question: Question): void {
    this.write(formatQuestion(question) + "\n");
  }

  notifyCorrect(question: Question, quiz: Quiz<S>): void {
    // Replace the echoed answer with the result line; a pipe has no echo to replace
    const prefix = this.interactive ? UP + CLEAR_LINE : "\n";
    this.write(prefix + this.formatResult(question, quiz) + "\n");
  }

  notifyIncorrect(): void {
    // Erase the wrong answer so the prompt reappears in place, else start a fresh line
    this.write(this.interactive ? UP + CLEAR_LINE : "\n");
  }

  notifyError(error: Error): void {
    this.write(`${style.red}input error: ${error.message}${style.reset}\n`);
  }

  requestLine(prompt: string, hint: Hinter): Promise<UserEvent> {
    const next = this.queued.shift();
    if (next) return Promise.resolve(next);
    if (this.closed) return Promise.resolve({ kind: "quit" });

    return new Promise((resolve) => {
      this.pending = resolve;
      this.hinter = hint;
      this.rl.setPrompt(prompt);
      this.rl.prompt();
      this.drawHint();
    });
  }

  close(): void {
    this.input.off("keypress", this.onKeypress);
    this.signals.off("SIGINT", this.onInterrupt);
    if (!this.closed) this.rl.close();
  }

  private settle(event: UserEvent): void {
    const resolve = this.pending;
    this.pending = null;
    this.hinter = null;
    if (resolve) resolve(event);
    else this.queued.push(event);
  }

  private readonly onError = (error: Error): void => {
    this.settle({ kind: "error", error });
  };

  private readonly onInterrupt = (): void => {
    this.settle({ kind: "quit" });
  };

  private readonly onKeypress = (): void => {
    this.drawHint();
  };

  private drawHint(): void {
    if (!this.interactive || !this.hinter) return;
    readline.clearLine(this.output, 1);
    // Only suggest while typing at the end of the buffer
    if (this.rl.cursor !== this.rl.line.length) return;
    const hint = this.hinter(this.rl.line);
    if (!hint) return;
    this.write(style.grey + hint + style.reset);
    readline.moveCursor(this.output, -Array.from(hint).length, 0);
  }

  private write(text: string): void {
    this.output.write(text);
  }
}
