import { parseArgs } from "util";
import { Dayjs } from "dayjs";
import { Config, EnvMap } from "./config";
import { AlertDeduplicator } from "./dedup/alertDeduplicator";
import { FileDedupStateStore } from "./dedup/stateStore";
import { checkMetricThresholds } from "./metrics/check";
import { buildOpsReport } from "./report/opsReport";
import { parseTimestamp } from "./utils/time";

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const OPTIONS = {
  line: { type: "string" },
  "cooldown-sec": { type: "string" },
  "ttl-sec": { type: "string" },
  now: { type: "string" },
  "state-path": { type: "string" },
  top: { type: "string" },
  backup: { type: "boolean" },
  days: { type: "string" },
  "logs-dir": { type: "string" },
} as const;

const PARSE_CONFIG = { options: OPTIONS, allowPositionals: true, strict: true } as const;

type OptionName = keyof typeof OPTIONS;

const COMMAND_OPTIONS = {
  "alert-dedup-check": ["line", "cooldown-sec", "ttl-sec", "now", "state-path"],
  "alert-dedup-status": ["top", "now", "state-path"],
  "alert-dedup-reset": ["backup", "now", "state-path"],
  "alert-dedup-prune": ["ttl-sec", "now", "state-path"],
  "metrics-check": ["days", "now", "logs-dir"],
  "ops-report": ["days", "now", "logs-dir"],
} satisfies Record<string, readonly OptionName[]>;

export type CommandName = keyof typeof COMMAND_OPTIONS;

export const USAGE = [
  "Usage: ops-health <command> [options]",
  "",
  "Commands:",
  "  alert-dedup-check   --line <text> [--cooldown-sec N] [--ttl-sec N] [--now ISO] [--state-path P]",
  "  alert-dedup-status  [--top N] [--now ISO] [--state-path P]",
  "  alert-dedup-reset   [--backup] [--now ISO] [--state-path P]",
  "  alert-dedup-prune   [--ttl-sec N] [--now ISO] [--state-path P]",
  "  metrics-check       [--days N] [--now ISO] [--logs-dir D]",
  "  ops-report          [--days N] [--now ISO] [--logs-dir D]",
].join("\n");

export interface CliResult {
  exitCode: number;
  output: unknown;
}

function isCommandName(value: string): value is CommandName {
  return Object.keys(COMMAND_OPTIONS).includes(value);
}

function parseIntegerFlag(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const text = value.trim();
  if (!/^[+-]?\d+$/.test(text)) {
    throw new CliUsageError(`--${flag} must be an integer, got '${value}'`);
  }
  return Number(text);
}

function parseNowFlag(value: string | undefined): Dayjs | undefined {
  if (value === undefined) return undefined;
  const parsed = parseTimestamp(value);
  if (!parsed) {
    throw new CliUsageError(`--now must be an ISO-8601 timestamp, got '${value}'`);
  }
  return parsed;
}

function parseCommandLine(argv: string[]) {
  try {
    return parseArgs({ ...PARSE_CONFIG, args: argv });
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }
}

// Run one command and return its JSON-ready result; usage mistakes throw CliUsageError
export async function runCli(argv: string[], env: EnvMap = process.env): Promise<CliResult> {
  const { values, positionals } = parseCommandLine(argv);
  const [command, ...extra] = positionals;

  if (!command) throw new CliUsageError("Missing command");
  if (!isCommandName(command)) throw new CliUsageError(`Unknown command '${command}'`);
  if (extra.length > 0) throw new CliUsageError(`Unexpected argument '${extra[0]}'`);

  const allowed: readonly OptionName[] = COMMAND_OPTIONS[command];
  for (const name of Object.keys(values)) {
    if (!allowed.some((option) => option === name)) {
      throw new CliUsageError(`Option '--${name}' is not accepted by ${command}`);
    }
  }

  const now = parseNowFlag(values.now);
  const config = Config.fromEnv(env).withPaths({
    logsDir: values["logs-dir"],
    dedupStatePath: values["state-path"],
  });
  const deduplicator = () =>
    new AlertDeduplicator(new FileDedupStateStore(config.dedupStatePath), {
      cooldownSec: config.dedupCooldownSec,
      ttlSec: config.dedupTtlSec,
    });

  switch (command) {
    case "alert-dedup-check": {
      if (values.line === undefined) throw new CliUsageError("alert-dedup-check requires --line");
      const output = await deduplicator().shouldEmit(values.line, {
        cooldownSec: parseIntegerFlag(values["cooldown-sec"], "cooldown-sec"),
        ttlSec: parseIntegerFlag(values["ttl-sec"], "ttl-sec"),
        now,
      });
      return { exitCode: 0, output };
    }
    case "alert-dedup-status":
      return { exitCode: 0, output: await deduplicator().summarize({ topN: parseIntegerFlag(values.top, "top"), now }) };
    case "alert-dedup-reset":
      return { exitCode: 0, output: await deduplicator().reset({ backup: values.backup ?? false, now }) };
    case "alert-dedup-prune":
      return {
        exitCode: 0,
        output: await deduplicator().prune({ ttlSec: parseIntegerFlag(values["ttl-sec"], "ttl-sec"), now }),
      };
    case "metrics-check": {
      const output = await checkMetricThresholds(config.logsDir, {
        config,
        days: parseIntegerFlag(values.days, "days"),
        now,
      });
      return { exitCode: output.violations.length > 0 ? 1 : 0, output };
    }
    case "ops-report": {
      const output = await buildOpsReport({ config, days: parseIntegerFlag(values.days, "days"), now });
      return { exitCode: 0, output };
    }
  }
}

export async function main(argv: string[] = process.argv.slice(2), env: EnvMap = process.env): Promise<number> {
  try {
    const { exitCode, output } = await runCli(argv, env);
    process.stdout.write(`${JSON.stringify(output, null, 2)}\n`);
    return exitCode;
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`${error.message}\n\n${USAGE}\n`);
      return 2;
    }
    console.error("ops-health command failed", {
      error: error instanceof Error ? error.message : String(error),
    });
    return 1;
  }
}
