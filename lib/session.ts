import { createHinter } from "@/lib/hint";
import type { Quiz } from "@/lib/quiz";
import type { Hinter, Question, SessionOutcome, UserEvent } from "@/types/vocab";

export const COMMAND_PREFIX = ":";
export const PROMPT = "> ";

const COMMANDS = ["quit"] as const;

/** The terminal side of a session. Implementations own all rendering. */
export interface QuizUI<S> {
  notifyQuestion(question: Question, quiz: Quiz<S>): void;
  notifyCorrect(question: Question, quiz: Quiz<S>): void;
  notifyIncorrect(question: Question, quiz: Quiz<S>): void;
  notifyError(error: Error): void;
  /** Resolves with one line of input, already passed through `interpretInput`. */
  requestLine(prompt: string, hint: Hinter): Promise<UserEvent>;
}

// `:q`, `:qu` ... `:quit` and a bare `:` all quit; anything else is an answer
export function interpretInput(input: string): UserEvent {
  if (input.startsWith(COMMAND_PREFIX)) {
    const command = input.slice(COMMAND_PREFIX.length);
    const match = COMMANDS.find((name) => name.startsWith(command));
    if (match === "quit") return { kind: "quit" };
  }
  return { kind: "submitted", text: input };
}

export async function runSession<S>(quiz: Quiz<S>, ui: QuizUI<S>): Promise<SessionOutcome> {
  for (let question = quiz.nextQuestion(); question; question = quiz.nextQuestion()) {
    ui.notifyQuestion(question, quiz);

    for (;;) {
      const event = await ui.requestLine(PROMPT, createHinter(question.entry, quiz.mistakes));
      if (event.kind === "quit") return "quit";
      if (event.kind === "error") {
        ui.notifyError(event.error);
        return "error";
      }
      if (quiz.answerQuestion(question, event.text)) {
        ui.notifyCorrect(question, quiz);
        break;
      }
      ui.notifyIncorrect(question, quiz);
    }
  }
  return "finished";
}
