import { correctRate, totalTries, type PairScore, type SignedScore } from "@/lib/scoring";
import type { TermStats } from "@/lib/stats";
import type { Question } from "@/types/vocab";

export const style = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  grey: "\x1b[90m",
  red: "\x1b[91m",
  green: "\x1b[92m",
  yellow: "\x1b[93m",
  blue: "\x1b[94m",
} as const;

// 1st, 2nd, 3rd, then "th" for everything else
export function ordinal(n: number): string {
  switch (n) {
    case 1:
      return `${n}st`;
    case 2:
      return `${n}nd`;
    case 3:
      return `${n}rd`;
    default:
      return `${n}th`;
  }
}

export function formatQuestion(question: Question): string {
  let out = `${style.bold}${style.yellow}Q${question.index + 1}${style.reset} `;
  for (const phrase of question.entry.phrases) {
    out += `/${style.bold}${style.blue}${phrase.body}`;
    if (phrase.comment) out += `${style.grey};${phrase.comment}`;
    out += style.reset;
  }
  return `${out}/`;
}

function outcome(mistakes: number): { color: string; label: string } {
  return mistakes === 0
    ? { color: style.green, label: "perfect" }
    : { color: style.red, label: `${mistakes} mistakes` };
}

export function formatPairResult(term: string, mistakes: number, score: PairScore): string {
  const { color, label } = outcome(mistakes);
  const percent = Math.round(correctRate(score) * 100);
  return `> ${term} ${color}(${label}, ${ordinal(totalTries(score))} try, ${percent}% correct)${style.reset}`;
}

export function formatSignedResult(term: string, mistakes: number, score: SignedScore): string {
  const { color, label } = outcome(mistakes);
  return `> ${term} ${color}(${label}, score ${score})${style.reset}`;
}

export function formatStatsRow(row: TermStats): string {
  if (row.score !== null) return `${row.term}\tscore ${row.score}`;
  const percent = Math.round((row.correctRate ?? 1) * 100);
  return `${row.term}\t${row.tries ?? 0} tries\t${percent}% correct`;
}
