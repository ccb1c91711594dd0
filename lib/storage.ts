import fs from "fs";
import path from "path";
import { StorageError } from "@/lib/errors";
import type { ScoringPolicy } from "@/lib/scoring";

export type Scores<S> = Map<string, S>;

export function scoreFilePath<S>(configDir: string, policy: ScoringPolicy<S>): string {
  return path.join(configDir, policy.fileName);
}

// ----- Text layout: `term\tfield\tfield...` per line -----

export function parseScores<S>(raw: string, policy: ScoringPolicy<S>): Scores<S> {
  const scores: Scores<S> = new Map();
  for (const line of raw.split(/\r?\n/)) {
    if (!line) continue;
    const [term, ...fields] = line.split("\t");
    if (!term) continue;
    scores.set(term, policy.deserialize(fields));
  }
  return scores;
}

// Tabs and line breaks are the layout's separators, so such terms cannot be stored
export function isStorableTerm(term: string): boolean {
  return term.length > 0 && !/[\t\r\n]/.test(term);
}

export function formatScores<S>(scores: Scores<S>, policy: ScoringPolicy<S>): string {
  let out = "";
  for (const [term, score] of scores) {
    if (!isStorableTerm(term)) continue;
    out += [term, ...policy.serialize(score)].join("\t") + "\n";
  }
  return out;
}

// ----- File storage -----

export function loadScores<S>(filePath: string, policy: ScoringPolicy<S>): Scores<S> {
  // No file yet means no history
  if (!fs.existsSync(filePath)) return new Map();
  try {
    const raw = fs.readFileSync(filePath, "utf8");
    return parseScores(raw, policy);
  } catch (error) {
    throw new StorageError("load", filePath, error);
  }
}

/** Writes every storable term and returns the terms that had to be left out. */
export function saveScores<S>(filePath: string, scores: Scores<S>, policy: ScoringPolicy<S>): string[] {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, formatScores(scores, policy), "utf8");
  } catch (error) {
    throw new StorageError("save", filePath, error);
  }
  return [...scores.keys()].filter((term) => !isStorableTerm(term));
}
