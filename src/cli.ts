import {
  ConfigError,
  MAX_TIMER_MS,
  loadConfig,
  modelNameSchema,
  type Config,
} from "./config/index.js";
import { logger } from "./config/logger.js";
import { batchExitCode, runBatch, type BatchOptions } from "./pipeline/index.js";

export interface CliOptions {
  model?: string;
  host?: string;
  concurrency?: number;
  timeoutMs?: number;
  help: boolean;
  files: string[];
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const USAGE = `
Usage: mail-risk-classifier [options] <email files...>

Classify .eml (RFC 822) and .msg (Outlook) files as Safe, Spam, Phishing or
Malicious with a local Ollama model. Prints a JSON array with one entry per
file, in the order given.

Options:
  -m, --model <name>            Model to use (default: $OLLAMA_MODEL or gemma2:27b)
  -H, --host <url>              Ollama host (default: $OLLAMA_HOST or http://127.0.0.1:11434)
  -c, --concurrency <number>    Files classified at the same time (default: 2)
  -t, --timeout <ms>            Per-call backend timeout in milliseconds (default: 120000)
  -h, --help                    Show this help

Exit status:
  0  at least one file was classified
  1  every file failed
  2  invalid arguments or configuration
`.trim();

const VALUE_FLAGS: Record<string, "model" | "host" | "concurrency" | "timeout"> = {
  "-m": "model",
  "--model": "model",
  "-H": "host",
  "--host": "host",
  "-c": "concurrency",
  "--concurrency": "concurrency",
  "-t": "timeout",
  "--timeout": "timeout",
};

function parsePositiveInt(flag: string, value: string, max = Number.MAX_SAFE_INTEGER): number {
  const number = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(number) || number < 1) {
    throw new UsageError(`${flag} must be a positive integer, got "${value}"`);
  }
  if (number > max) {
    throw new UsageError(`${flag} must be at most ${max}, got "${value}"`);
  }
  return number;
}

export function parseArgs(args: string[]): CliOptions {
  const result: CliOptions = { help: false, files: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--") {
      result.files.push(...args.slice(i + 1));
      break;
    }
    if (arg === "-h" || arg === "--help") {
      result.help = true;
      continue;
    }
    if (!arg.startsWith("-") || arg === "-") {
      result.files.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const flag = arg.startsWith("--") && eq > 0 ? arg.slice(0, eq) : arg;
    const key = VALUE_FLAGS[flag];
    if (!key) {
      throw new UsageError(`Unknown option "${arg}"`);
    }

    let value: string | undefined;
    if (flag !== arg) {
      value = arg.slice(eq + 1);
    } else {
      value = args[i + 1];
      i++;
    }
    if (value === undefined || value === "") {
      throw new UsageError(`Option ${flag} requires a value`);
    }

    switch (key) {
      case "model":
        result.model = value;
        break;
      case "host":
        result.host = value;
        break;
      case "concurrency":
        result.concurrency = parsePositiveInt(flag, value);
        break;
      case "timeout":
        result.timeoutMs = parsePositiveInt(flag, value, MAX_TIMER_MS);
        break;
    }
  }

  return result;
}

/**
 * Merge command-line overrides into the environment configuration. An
 * invalid model name stops the run before any file is attempted.
 */
export function resolveBatchOptions(cli: CliOptions, config: Config): BatchOptions {
  const model = cli.model ?? config.backend.model;
  const checked = modelNameSchema.safeParse(model);
  if (!checked.success) {
    throw new UsageError(`Invalid model name "${model}": ${checked.error.issues[0]?.message ?? "invalid"}`);
  }

  return {
    backend: {
      model,
      host: cli.host ?? config.backend.host,
      timeoutMs: cli.timeoutMs ?? config.backend.timeoutMs,
    },
    concurrency: cli.concurrency ?? config.batch.concurrency,
    maxBodyChars: config.batch.maxBodyChars,
    timeoutRetries: config.batch.timeoutRetries,
    retryDelayMs: config.batch.retryDelayMs,
  };
}

/**
 * Run the command line and resolve to the process exit code. The JSON result
 * is written to stdout; everything else goes to stderr.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let options: BatchOptions;
  let files: string[];

  try {
    const cli = parseArgs(argv);
    if (cli.help) {
      console.log(USAGE);
      return 0;
    }
    if (cli.files.length === 0) {
      throw new UsageError("At least one email file is required");
    }
    files = cli.files;
    options = resolveBatchOptions(cli, loadConfig());
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`${err.message}\n\n${USAGE}`);
      return 2;
    }
    if (err instanceof ConfigError) {
      logger.fatal({ fields: err.fieldErrors }, err.message);
      return 2;
    }
    throw err;
  }

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn({ signal }, "Interrupted, cancelling in-flight backend calls");
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const records = await runBatch(files, { ...options, signal: controller.signal });
    process.stdout.write(`${JSON.stringify(records, null, 2)}\n`);
    return batchExitCode(records);
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}
