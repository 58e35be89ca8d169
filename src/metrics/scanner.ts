import { promises as fs } from "fs";
import * as path from "path";
import { Dayjs } from "dayjs";
import { z } from "zod";
import {
  PIPELINE_NAMES,
  PipelineAggregate,
  PipelineMetricsSummary,
  PipelineName,
  RunTelemetryDocument,
  ScannedRun,
} from "../types";
import { formatTimestamp, isWithinWindow, parseTimestamp, resolveWindowStart } from "../utils/time";

export const METRICS_FILE_PATTERN = /^.+-metrics-.+\.json$/;

const lenientNumber = z.coerce.number().finite().catch(0);
const lenientInt = z.coerce.number().finite().transform(Math.trunc).catch(0);
const optionalText = z.string().optional().catch(undefined);

// Unknown fields are dropped; only a missing or unknown pipeline rejects the document
export const RunTelemetryDocumentSchema = z.object({
  pipeline: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(PIPELINE_NAMES)),
  started_at: optionalText,
  finished_at: optionalText,
  duration_sec: lenientNumber,
  success: z.boolean().catch(false),
  command_failures: lenientInt,
  alert_count: lenientInt,
});

export interface ScanOptions {
  days: number;
  now: Dayjs;
}

export interface RunScan {
  windowStart: Dayjs | null;
  runs: ScannedRun[];
}

// List telemetry documents in discovery (file-name) order; a missing directory yields nothing
export async function listMetricsFiles(logsDir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.readdir(logsDir);
  } catch {
    return [];
  }
  return names
    .filter((name) => METRICS_FILE_PATTERN.test(name))
    .sort()
    .map((name) => path.join(logsDir, name));
}

export function decodeRunTelemetry(payload: unknown): RunTelemetryDocument | null {
  const parsed = RunTelemetryDocumentSchema.safeParse(payload);
  return parsed.success ? parsed.data : null;
}

// Event time is finished_at, falling back to started_at (empty strings count as absent)
export function resolveEventTimestamp(record: RunTelemetryDocument): string {
  return (record.finished_at?.trim() || record.started_at?.trim() || "").trim();
}

export async function scanRunRecords(logsDir: string, options: ScanOptions): Promise<RunScan> {
  const windowStart = resolveWindowStart(options.days, options.now);
  const runs: ScannedRun[] = [];
  const files = await listMetricsFiles(logsDir);

  for (const [scanIndex, sourcePath] of files.entries()) {
    let payload: unknown;
    try {
      payload = JSON.parse(await fs.readFile(sourcePath, "utf8"));
    } catch (error) {
      console.warn("Skipping unreadable run telemetry document", {
        sourcePath,
        error: error instanceof Error ? error.message : String(error),
      });
      continue;
    }

    const record = decodeRunTelemetry(payload);
    if (!record) continue;

    const timestamp = resolveEventTimestamp(record);
    const eventTime = parseTimestamp(timestamp);
    if (!eventTime) continue;
    if (!isWithinWindow(eventTime, windowStart, options.now)) continue;

    runs.push({ record, timestamp, timestampMs: eventTime.valueOf(), scanIndex, sourcePath });
  }

  return { windowStart, runs };
}

interface PipelineAccumulator {
  runs: number;
  successCount: number;
  durationTotal: number;
  maxDurationSec: number;
  latestMs: number;
  latestRun: { timestamp: string; success: boolean };
}

export function aggregateRuns(scan: RunScan, options: ScanOptions): PipelineMetricsSummary {
  const accumulators = new Map<PipelineName, PipelineAccumulator>();
  let commandFailures = 0;
  let alertCount = 0;

  for (const run of scan.runs) {
    const { record } = run;
    let stats = accumulators.get(record.pipeline);
    if (!stats) {
      stats = {
        runs: 0,
        successCount: 0,
        durationTotal: 0,
        maxDurationSec: 0,
        latestMs: Number.NEGATIVE_INFINITY,
        latestRun: { timestamp: "", success: false },
      };
      accumulators.set(record.pipeline, stats);
    }

    stats.runs += 1;
    if (record.success) stats.successCount += 1;
    stats.durationTotal += record.duration_sec;
    stats.maxDurationSec = Math.max(stats.maxDurationSec, record.duration_sec);

    // ">=" so the last run seen in scan order wins a timestamp tie
    if (run.timestampMs >= stats.latestMs) {
      stats.latestMs = run.timestampMs;
      stats.latestRun = { timestamp: run.timestamp, success: record.success };
    }

    commandFailures += record.command_failures;
    alertCount += record.alert_count;
  }

  const pipelines: Partial<Record<PipelineName, PipelineAggregate>> = {};
  for (const pipeline of PIPELINE_NAMES) {
    const stats = accumulators.get(pipeline);
    if (!stats) continue;
    pipelines[pipeline] = {
      runs: stats.runs,
      success_rate: stats.runs ? stats.successCount / stats.runs : 0,
      avg_duration_sec: stats.runs ? stats.durationTotal / stats.runs : 0,
      max_duration_sec: stats.maxDurationSec,
      latest_run: stats.latestRun,
    };
  }

  return {
    generated_at: formatTimestamp(options.now),
    days: options.days,
    window_start: scan.windowStart ? formatTimestamp(scan.windowStart) : null,
    total_runs: scan.runs.length,
    pipelines,
    totals: {
      command_failures: commandFailures,
      alert_count: alertCount,
    },
  };
}

// Scan the logs directory and aggregate per pipeline in one step
export async function summarizePipelineMetrics(logsDir: string, options: ScanOptions): Promise<PipelineMetricsSummary> {
  const scan = await scanRunRecords(logsDir, options);
  return aggregateRuns(scan, options);
}
