import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StorageError } from "@/lib/errors";
import { pairScoring, signedScoring, type PairScore } from "@/lib/scoring";
import { formatScores, loadScores, parseScores, saveScores, scoreFilePath } from "@/lib/storage";

describe("score text layout", () => {
  it("writes one tab-separated line per term", () => {
    const scores = new Map<string, PairScore>([
      ["dog", { correct: 1, incorrect: 0 }],
      ["ice cream", { correct: 0, incorrect: 2 }],
    ]);
    expect(formatScores(scores, pairScoring)).toBe("dog\t1\t0\nice cream\t0\t2\n");
    expect(formatScores(new Map([["dog", -2]]), signedScoring)).toBe("dog\t-2\n");
  });

  it("defaults missing fields to zero and skips blank lines", () => {
    const scores = parseScores("dog\ncat\t3\n\nfox\tx\t1\n", pairScoring);
    expect(Object.fromEntries(scores)).toEqual({
      dog: { correct: 0, incorrect: 0 },
      cat: { correct: 3, incorrect: 0 },
      fox: { correct: 0, incorrect: 1 },
    });
  });
});

describe("score files", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "vocab-drill-scores-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("names the file after the policy", () => {
    expect(scoreFilePath(dir, pairScoring)).toBe(path.join(dir, "scores.txt"));
    expect(scoreFilePath(dir, signedScoring)).toBe(path.join(dir, "scores-signed.txt"));
  });

  it("returns an empty mapping when no file exists", () => {
    expect(loadScores(path.join(dir, "scores.txt"), pairScoring).size).toBe(0);
  });

  it("round-trips the counter pair layout", () => {
    const file = path.join(dir, "nested", "deeper", "scores.txt");
    const scores = new Map<string, PairScore>([
      ["dog", { correct: 4, incorrect: 1 }],
      ["cat", { correct: 0, incorrect: 3 }],
    ]);
    saveScores(file, scores, pairScoring);
    expect(loadScores(file, pairScoring)).toEqual(scores);
  });

  it("round-trips the signed layout", () => {
    const file = path.join(dir, "scores-signed.txt");
    const scores = new Map([
      ["dog", 2],
      ["cat", -1],
    ]);
    saveScores(file, scores, signedScoring);
    expect(loadScores(file, signedScoring)).toEqual(scores);
  });

  it("overwrites the whole file on save", () => {
    const file = path.join(dir, "scores.txt");
    fs.writeFileSync(file, "elephant\t10\t10\nhippopotamus\t20\t20\n", "utf8");
    saveScores(file, new Map([["ox", { correct: 1, incorrect: 0 }]]), pairScoring);
    expect(fs.readFileSync(file, "utf8")).toBe("ox\t1\t0\n");
  });

  it("wraps read failures in StorageError", () => {
    // A directory where the file should be cannot be read as text
    const file = path.join(dir, "scores.txt");
    fs.mkdirSync(file);
    expect(() => loadScores(file, pairScoring)).toThrow(StorageError);
  });
});

describe("terms the layout cannot hold", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "vocab-drill-tabs-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("leaves out a term containing a tab and reports it", () => {
    const file = path.join(dir, "scores.txt");
    const scores = new Map<string, PairScore>([
      ["a\tb", { correct: 1, incorrect: 0 }],
      ["dog", { correct: 2, incorrect: 1 }],
    ]);
    expect(saveScores(file, scores, pairScoring)).toEqual(["a\tb"]);
    expect(fs.readFileSync(file, "utf8")).toBe("dog\t2\t1\n");
    expect(loadScores(file, pairScoring)).toEqual(new Map([["dog", { correct: 2, incorrect: 1 }]]));
  });

  it("returns nothing to report when every term fits", () => {
    const file = path.join(dir, "scores.txt");
    expect(saveScores(file, new Map([["dog", 1]]), signedScoring)).toEqual([]);
  });
});
