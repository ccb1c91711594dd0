export type Phrase = {
  readonly body: string;    // definition text, whitespace kept as written
  readonly comment: string; // text after `;`, empty when absent
};

export type Entry = {
  readonly term: string;
  readonly phrases: readonly Phrase[];
};

export type Question = {
  readonly index: number; // position in the loaded list, 0-based
  readonly entry: Entry;
};

export type UserEvent =
  | { kind: "submitted"; text: string }
  | { kind: "quit" }
  | { kind: "error"; error: Error };

export type SessionOutcome = "finished" | "quit" | "error";

/** Returns the suggestion to draw after the current input buffer. */
export type Hinter = (buffer: string) => string;
