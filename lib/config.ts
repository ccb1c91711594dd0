import os from "os";
import path from "path";
import { parseArgs } from "util";
import { z } from "zod";
import { ConfigError } from "@/lib/errors";

export const APP_NAME = "vocab-drill";

const logLevelSchema = z.enum(["silent", "error", "warn", "info", "debug"]);
export type LogLevel = z.infer<typeof logLevelSchema>;

const schema = z.object({
  file: z.string().min(1).nullable(),
  scoring: z.enum(["pair", "signed"]),
  configDir: z.string().min(1),
  logLevel: logLevelSchema,
  stats: z.boolean(),
  save: z.boolean(),
  help: z.boolean(),
});

export type AppConfig = z.infer<typeof schema>;

type Env = Record<string, string | undefined>;

export const USAGE = `Usage: ${APP_NAME} [options] [file]

Quizzes every entry of <file> (or standard input) in order.

Options:
  --scoring <pair|signed>  scoring policy (env VOCAB_DRILL_SCORING, default pair)
  --config-dir <dir>       where scores are kept (env VOCAB_DRILL_CONFIG_DIR)
  --log-level <level>      silent, error, warn, info or debug (env VOCAB_DRILL_LOG_LEVEL)
  --stats                  print stored scores and exit
  --no-save                do not write scores at the end
  -h, --help               show this help

Type the term for each definition. ":quit" (or any prefix of it) ends the session.`;

// XDG_CONFIG_HOME, then ~/.config, then the temp dir
export function detectConfigDirectory(env: Env = process.env): string {
  const base = env.XDG_CONFIG_HOME
    ? env.XDG_CONFIG_HOME
    : env.HOME
      ? path.join(env.HOME, ".config")
      : os.tmpdir();
  return path.join(base, APP_NAME);
}

export function loadConfig(argv: string[], env: Env = process.env): AppConfig {
  let values: ReturnType<typeof parseFlags>["values"];
  let positionals: string[];
  try {
    ({ values, positionals } = parseFlags(argv));
  } catch (error) {
    throw new ConfigError([error instanceof Error ? error.message : String(error)]);
  }
  if (positionals.length > 1) {
    throw new ConfigError([`expected at most one entry file, got ${positionals.length}`]);
  }

  const result = schema.safeParse({
    file: positionals[0] ?? null,
    scoring: values.scoring ?? env.VOCAB_DRILL_SCORING ?? "pair",
    configDir: values["config-dir"] ?? env.VOCAB_DRILL_CONFIG_DIR ?? detectConfigDirectory(env),
    logLevel: values["log-level"] ?? env.VOCAB_DRILL_LOG_LEVEL ?? "info",
    stats: values.stats ?? false,
    save: !(values["no-save"] ?? false),
    help: values.help ?? false,
  });
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`),
    );
  }
  return result.data;
}

function parseFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      scoring: { type: "string" },
      "config-dir": { type: "string" },
      "log-level": { type: "string" },
      stats: { type: "boolean" },
      "no-save": { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });
}
