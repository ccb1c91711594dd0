import type { ScoringPolicy } from "@/lib/scoring";
import type { Scores } from "@/lib/storage";
import type { Entry, Question } from "@/types/vocab";

/**
 * Walks the entry list once, in order.
 *
 * The list is held by reference and never mutated; each question points at
 * its entry. Scores change only when a question is answered correctly.
 */
export class Quiz<S> {
  private cursor = 0;
  private mistakeCount = 0;
  private answeredCount = 0;

  constructor(
    private readonly entries: readonly Entry[],
    readonly scores: Scores<S>,
    readonly policy: ScoringPolicy<S>,
  ) {}

  get progress(): number {
    return this.cursor;
  }

  /** Wrong submissions against the current question. */
  get mistakes(): number {
    return this.mistakeCount;
  }

  /** Questions answered correctly so far. */
  get answered(): number {
    return this.answeredCount;
  }

  get total(): number {
    return this.entries.length;
  }

  get finished(): boolean {
    return this.cursor === this.entries.length;
  }

  nextQuestion(): Question | null {
    if (this.cursor >= this.entries.length) return null;
    const index = this.cursor;
    this.cursor++;
    this.mistakeCount = 0;
    return { index, entry: this.entries[index] };
  }

  answerQuestion(question: Question, answer: string): boolean {
    const term = question.entry.term;
    if (answer !== term) {
      this.mistakeCount++;
      return false;
    }
    const previous = this.scores.get(term) ?? this.policy.initial();
    this.scores.set(term, this.policy.record(previous, this.mistakeCount));
    this.answeredCount++;
    return true;
  }

  getScore(term: string): S | undefined {
    return this.scores.get(term);
  }
}
