export type PairScore = {
  correct: number;   // answered right on the first try
  incorrect: number; // answered right after one or more mistakes
};

export type SignedScore = number;

export type ScoringName = "pair" | "signed";

export type ScoreSummary = {
  tries: number | null;
  correctRate: number | null; // null where the policy does not track it
  score: number | null;
};

export interface ScoringPolicy<S> {
  readonly name: ScoringName;
  /** Score file name inside the config directory. */
  readonly fileName: string;
  initial(): S;
  /** Score after one correct answer reached with `mistakes` wrong submissions first. */
  record(previous: S, mistakes: number): S;
  serialize(score: S): string[];
  deserialize(fields: string[]): S;
  summarize(score: S): ScoreSummary;
}

function parseCount(field: string | undefined): number {
  if (field === undefined || !/^-?\d+$/.test(field.trim())) return 0;
  const n = parseInt(field, 10);
  return Number.isSafeInteger(n) ? n : 0;
}

export function correctRate(score: PairScore): number {
  const tries = totalTries(score);
  return tries === 0 ? 1 : score.correct / tries;
}

export function totalTries(score: PairScore): number {
  return score.correct + score.incorrect;
}

export const pairScoring: ScoringPolicy<PairScore> = {
  name: "pair",
  fileName: "scores.txt",
  initial: () => ({ correct: 0, incorrect: 0 }),
  record: (previous, mistakes) =>
    mistakes === 0
      ? { ...previous, correct: previous.correct + 1 }
      : { ...previous, incorrect: previous.incorrect + 1 },
  serialize: (score) => [String(score.correct), String(score.incorrect)],
  deserialize: (fields) => ({
    correct: Math.max(0, parseCount(fields[0])),
    incorrect: Math.max(0, parseCount(fields[1])),
  }),
  summarize: (score) => ({ tries: totalTries(score), correctRate: correctRate(score), score: null }),
};

export const signedScoring: ScoringPolicy<SignedScore> = {
  name: "signed",
  fileName: "scores-signed.txt",
  initial: () => 0,
  record: (previous, mistakes) => (mistakes === 0 ? previous + 1 : previous - 1),
  serialize: (score) => [String(score)],
  deserialize: (fields) => parseCount(fields[0]),
  summarize: (score) => ({ tries: null, correctRate: null, score }),
};
