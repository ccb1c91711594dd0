import { describe, expect, it } from "vitest";
import { pairScoring, signedScoring, type PairScore } from "@/lib/scoring";
import { getAllTermStats } from "@/lib/stats";

describe("getAllTermStats", () => {
  it("orders pair scores by tries, then lowest correct rate", () => {
    const scores = new Map<string, PairScore>([
      ["ant", { correct: 1, incorrect: 0 }],
      ["bee", { correct: 1, incorrect: 3 }],
      ["cow", { correct: 2, incorrect: 2 }],
    ]);
    expect(getAllTermStats(scores, pairScoring)).toEqual([
      { term: "bee", tries: 4, correctRate: 0.25, score: null },
      { term: "cow", tries: 4, correctRate: 0.5, score: null },
      { term: "ant", tries: 1, correctRate: 1, score: null },
    ]);
  });

  it("orders signed scores from lowest", () => {
    const scores = new Map([
      ["ant", 2],
      ["bee", -1],
      ["cow", 0],
    ]);
    expect(getAllTermStats(scores, signedScoring).map((row) => row.term)).toEqual(["bee", "cow", "ant"]);
  });
});
