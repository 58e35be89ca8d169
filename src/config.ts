import { PIPELINE_NAMES, PipelineName } from "./types";

export type RawSetting = string | number | undefined;
export type EnvMap = Record<string, string | undefined>;

export const DEFAULT_LOGS_DIR = "logs";
export const DEFAULT_RUNBOOK_PATH = "docs/runbook.md";
export const DEFAULT_ALERT_DEDUP_STATE_PATH = "logs/alert_dedup_state.json";
export const DEFAULT_ALERT_DEDUP_COOLDOWN_SEC = 600;
export const DEFAULT_ALERT_DEDUP_TTL_SEC = 7 * 24 * 60 * 60;

const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;
const INT_PATTERN = /^[+-]?\d+$/;

// Raw threshold overrides; resolved (validated, clamped, defaulted) in metrics/thresholds
export interface ThresholdSettings {
  profile?: string;
  maxDurationSec: Partial<Record<PipelineName, RawSetting>>;
  maxFailureRate: Partial<Record<PipelineName, RawSetting>>;
}

export interface ContinuitySettings {
  warningLimit?: RawSetting;
  criticalLimit?: RawSetting;
}

export interface ConfigOptions {
  logsDir?: string;
  runbookPath?: string;
  dedupStatePath?: string;
  dedupCooldownSec?: RawSetting;
  dedupTtlSec?: RawSetting;
  thresholds?: Partial<ThresholdSettings>;
  continuity?: ContinuitySettings;
}

/**
 * Explicit configuration, built once at process entry and handed to each component.
 * Nothing below reads process.env on its own.
 */
export class Config {
  readonly logsDir: string;
  readonly runbookPath: string;
  readonly dedupStatePath: string;
  readonly dedupCooldownSec: number;
  readonly dedupTtlSec: number;
  readonly thresholds: ThresholdSettings;
  readonly continuity: ContinuitySettings;

  constructor(options: ConfigOptions = {}) {
    this.logsDir = nonEmpty(options.logsDir) ?? DEFAULT_LOGS_DIR;
    this.runbookPath = nonEmpty(options.runbookPath) ?? DEFAULT_RUNBOOK_PATH;
    this.dedupStatePath = nonEmpty(options.dedupStatePath) ?? DEFAULT_ALERT_DEDUP_STATE_PATH;
    this.dedupCooldownSec = readIntSetting(options.dedupCooldownSec, {
      name: "ALERT_DEDUP_COOLDOWN_SEC",
      defaultValue: DEFAULT_ALERT_DEDUP_COOLDOWN_SEC,
      minimum: 0,
    });
    this.dedupTtlSec = readIntSetting(options.dedupTtlSec, {
      name: "ALERT_DEDUP_TTL_SEC",
      defaultValue: DEFAULT_ALERT_DEDUP_TTL_SEC,
      minimum: 0,
    });
    this.thresholds = {
      profile: options.thresholds?.profile,
      maxDurationSec: { ...options.thresholds?.maxDurationSec },
      maxFailureRate: { ...options.thresholds?.maxFailureRate },
    };
    this.continuity = { ...options.continuity };
  }

  // Copy with path overrides from the command line; everything else is carried over unchanged
  withPaths(paths: Pick<ConfigOptions, "logsDir" | "dedupStatePath">): Config {
    return new Config({
      logsDir: paths.logsDir ?? this.logsDir,
      runbookPath: this.runbookPath,
      dedupStatePath: paths.dedupStatePath ?? this.dedupStatePath,
      dedupCooldownSec: this.dedupCooldownSec,
      dedupTtlSec: this.dedupTtlSec,
      thresholds: this.thresholds,
      continuity: this.continuity,
    });
  }

  static fromEnv(env: EnvMap = process.env): Config {
    const maxDurationSec: Partial<Record<PipelineName, RawSetting>> = {};
    const maxFailureRate: Partial<Record<PipelineName, RawSetting>> = {};
    for (const pipeline of PIPELINE_NAMES) {
      maxDurationSec[pipeline] = env[durationEnvKey(pipeline)];
      maxFailureRate[pipeline] = env[failureRateEnvKey(pipeline)];
    }

    return new Config({
      logsDir: env.OPS_LOGS_DIR,
      runbookPath: env.OPS_RUNBOOK_PATH,
      dedupStatePath: env.ALERT_DEDUP_STATE_PATH,
      dedupCooldownSec: env.ALERT_DEDUP_COOLDOWN_SEC,
      dedupTtlSec: env.ALERT_DEDUP_TTL_SEC,
      thresholds: {
        profile: env.METRIC_THRESHOLD_PROFILE,
        maxDurationSec,
        maxFailureRate,
      },
      continuity: {
        warningLimit: env.METRIC_SLO_CONSECUTIVE_ALERT_N,
        criticalLimit: env.METRIC_SLO_CONSECUTIVE_ALERT_CRITICAL_N,
      },
    });
  }
}

export function durationEnvKey(pipeline: PipelineName): string {
  return `METRIC_MAX_DURATION_${pipeline.toUpperCase()}_SEC`;
}

export function failureRateEnvKey(pipeline: PipelineName): string {
  return `METRIC_MAX_FAILURE_RATE_${pipeline.toUpperCase()}`;
}

interface SettingBounds {
  name: string;
  defaultValue: number;
  minimum: number;
  maximum?: number;
}

// Empty means "not configured"; unparsable input falls back to the default with a warning
export function readFloatSetting(raw: RawSetting, bounds: SettingBounds): number {
  const value = parseRaw(raw, FLOAT_PATTERN, bounds);
  if (value === undefined) return bounds.defaultValue;
  return clamp(value, bounds.minimum, bounds.maximum);
}

export function readIntSetting(raw: RawSetting, bounds: SettingBounds): number {
  const value = parseRaw(raw, INT_PATTERN, bounds);
  if (value === undefined) return bounds.defaultValue;
  if (!Number.isInteger(value)) {
    console.warn(`Non-integer value for ${bounds.name}: ${value}, using default ${bounds.defaultValue}`);
    return bounds.defaultValue;
  }
  return clamp(value, bounds.minimum, bounds.maximum);
}

function parseRaw(raw: RawSetting, pattern: RegExp, bounds: SettingBounds): number | undefined {
  if (raw === undefined) return undefined;

  if (typeof raw === "number") {
    if (Number.isFinite(raw)) return raw;
    console.warn(`Invalid value for ${bounds.name}: ${raw}, using default ${bounds.defaultValue}`);
    return undefined;
  }

  const text = raw.trim();
  if (!text) return undefined;
  if (!pattern.test(text)) {
    console.warn(`Invalid value for ${bounds.name}: '${raw}', using default ${bounds.defaultValue}`);
    return undefined;
  }
  return Number(text);
}

function clamp(value: number, minimum: number, maximum?: number): number {
  if (value < minimum) return minimum;
  if (maximum !== undefined && value > maximum) return maximum;
  return value;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
