import type { ScoreSummary, ScoringPolicy } from "@/lib/scoring";
import type { Scores } from "@/lib/storage";

export type TermStats = ScoreSummary & { term: string };

// Weakest terms first: most tries then lowest rate for pairs, lowest score for signed
export function getAllTermStats<S>(scores: Scores<S>, policy: ScoringPolicy<S>): TermStats[] {
  const stats: TermStats[] = [];
  for (const [term, score] of scores) {
    stats.push({ term, ...policy.summarize(score) });
  }
  return stats.sort((a, b) => {
    if (a.score !== null && b.score !== null) {
      return a.score - b.score || a.term.localeCompare(b.term);
    }
    return (
      (b.tries ?? 0) - (a.tries ?? 0) ||
      (a.correctRate ?? 1) - (b.correctRate ?? 1) ||
      a.term.localeCompare(b.term)
    );
  });
}
