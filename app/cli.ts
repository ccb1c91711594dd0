import fs from "fs";
import tty from "tty";
import type { Readable, Writable } from "stream";
import { formatPairResult, formatSignedResult, formatStatsRow } from "@/app/format";
import { TerminalUI, type ResultFormatter, type SignalSource } from "@/app/terminal";
import { loadConfig, USAGE, type AppConfig } from "@/lib/config";
import { loadEntriesFromFile, readEntriesFromStream } from "@/lib/entries";
import { ConfigError } from "@/lib/errors";
import { createLogger, type Logger } from "@/lib/logger";
import { Quiz } from "@/lib/quiz";
import { pairScoring, signedScoring, type PairScore, type ScoringPolicy, type SignedScore } from "@/lib/scoring";
import { runSession } from "@/lib/session";
import { getAllTermStats } from "@/lib/stats";
import { loadScores, saveScores, scoreFilePath } from "@/lib/storage";
import type { Entry, SessionOutcome } from "@/types/vocab";

type Env = Record<string, string | undefined>;

export type CliStreams = {
  stdin: Readable & { isTTY?: boolean };
  stdout: Writable & { isTTY?: boolean };
  /** Opens the controlling terminal, where answers come from when stdin carried the entries. */
  openTerminal: () => Readable & { isTTY?: boolean };
  signals: SignalSource;
};

export const processStreams: CliStreams = {
  stdin: process.stdin,
  stdout: process.stdout,
  openTerminal: () => new tty.ReadStream(fs.openSync("/dev/tty", "r")),
  signals: process,
};

const pairResult: ResultFormatter<PairScore> = (question, quiz) =>
  formatPairResult(
    question.entry.term,
    quiz.mistakes,
    quiz.getScore(question.entry.term) ?? pairScoring.initial(),
  );

const signedResult: ResultFormatter<SignedScore> = (question, quiz) =>
  formatSignedResult(
    question.entry.term,
    quiz.mistakes,
    quiz.getScore(question.entry.term) ?? signedScoring.initial(),
  );

// Without a file, stdin is read to its end for entries and cannot answer questions
export function answerSource(config: Pick<AppConfig, "file">): "stdin" | "terminal" {
  return config.file ? "stdin" : "terminal";
}

async function loadEntries(config: AppConfig, streams: CliStreams): Promise<Entry[]> {
  if (config.file) return loadEntriesFromFile(config.file);
  return readEntriesFromStream(streams.stdin);
}

function printStats<S>(config: AppConfig, policy: ScoringPolicy<S>, streams: CliStreams, logger: Logger): void {
  const scorePath = scoreFilePath(config.configDir, policy);
  const scores = loadScores(scorePath, policy);
  logger.debug(`${policy.name} scores from ${scorePath}`);
  if (scores.size === 0) {
    logger.info("No scores recorded yet.");
    return;
  }
  for (const row of getAllTermStats(scores, policy)) {
    streams.stdout.write(formatStatsRow(row) + "\n");
  }
}

export async function drill<S>(
  config: AppConfig,
  policy: ScoringPolicy<S>,
  formatResult: ResultFormatter<S>,
  streams: CliStreams,
  logger: Logger,
): Promise<SessionOutcome> {
  const entries = await loadEntries(config, streams);
  logger.debug(`loaded ${entries.length} entries`);

  const scorePath = scoreFilePath(config.configDir, policy);
  const quiz = new Quiz(entries, loadScores(scorePath, policy), policy);
  logger.debug(`loaded ${quiz.scores.size} ${policy.name} scores from ${scorePath}`);

  const owned = answerSource(config) === "terminal";
  const input = owned ? streams.openTerminal() : streams.stdin;
  const ui = new TerminalUI(input, streams.stdout, formatResult, streams.signals);
  let outcome: SessionOutcome;
  try {
    outcome = await runSession(quiz, ui);
  } finally {
    ui.close();
    if (owned) input.destroy();
  }

  logger.info(`answered ${quiz.answered}/${quiz.total}`);
  if (config.save) {
    const skipped = saveScores(scorePath, quiz.scores, policy);
    for (const term of skipped) {
      logger.warn(`not saving score for ${JSON.stringify(term)}: terms with tabs or line breaks cannot be stored`);
    }
    logger.debug(`saved ${quiz.scores.size - skipped.length} scores to ${scorePath}`);
  }
  return outcome;
}

export async function main(
  argv: string[],
  env: Env = process.env,
  streams: CliStreams = processStreams,
): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig(argv, env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      console.error(USAGE);
      return 2;
    }
    throw error;
  }
  if (config.help) {
    console.log(USAGE);
    return 0;
  }

  const logger = createLogger(config.logLevel);
  try {
    if (config.stats) {
      if (config.scoring === "signed") printStats(config, signedScoring, streams, logger);
      else printStats(config, pairScoring, streams, logger);
      return 0;
    }
    const outcome =
      config.scoring === "signed"
        ? await drill(config, signedScoring, signedResult, streams, logger)
        : await drill(config, pairScoring, pairResult, streams, logger);
    return outcome === "error" ? 1 : 0;
  } catch (error) {
    logger.error("vocab-drill failed:", error);
    return 1;
  }
}
