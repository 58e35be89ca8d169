import { promises as fs } from "fs";
import * as path from "path";
import { parseAlertLines, rankAlertTypes, summarizeAlerts } from "../alerts";
import { Config } from "../config";
import { checkMetricThresholds } from "../metrics/check";
import { OpsReport, ParsedAlert, PIPELINE_NAMES, PipelineName, SCHEMA_VERSION } from "../types";
import { formatTimestamp, normalizeDays, resolveWindowStart, TimeInput, toUtc } from "../utils/time";
import { loadArtifactIntegrity } from "./artifactIntegrity";
import { collectFailedCommandRetryGuides } from "./retryGuides";

export const DEFAULT_REPORT_WINDOW_DAYS = 7;
export const ALERTS_LOG_FILE_NAME = "alerts.log";
export const TOP_ALERT_TYPES = 3;
export const DAILY_ALERT_ROLLUP_DAYS = 7;

export interface OpsReportOptions {
  config: Config;
  days?: number;
  now?: TimeInput;
}

export async function readAlertLog(logsDir: string, fileName = ALERTS_LOG_FILE_NAME): Promise<ParsedAlert[]> {
  let content: string;
  try {
    content = await fs.readFile(path.join(logsDir, fileName), "utf8");
  } catch {
    return [];
  }
  return parseAlertLines(content.split(/\r?\n/));
}

/**
 * Build the operational report for the window ending at `now`.
 * Every input is optional: a missing file contributes empty values instead of failing the report.
 */
export async function buildOpsReport(options: OpsReportOptions): Promise<OpsReport> {
  const { config } = options;
  const days = normalizeDays(options.days ?? DEFAULT_REPORT_WINDOW_DAYS);
  const now = toUtc(options.now);
  const windowStart = resolveWindowStart(days, now);
  const logsDir = config.logsDir;

  const check = await checkMetricThresholds(logsDir, { config, days, now });
  const alerts = summarizeAlerts(await readAlertLog(logsDir), windowStart, now);
  const artifactIntegrity = await loadArtifactIntegrity(logsDir);
  const retryGuides = await collectFailedCommandRetryGuides(logsDir, {
    runbookPath: config.runbookPath,
    windowStart,
    now,
  });

  const pipelineSuccessRates: OpsReport["pipeline_success_rates"] = {};
  for (const pipeline of PIPELINE_NAMES) {
    const item = check.summary.pipelines[pipeline];
    if (!item) continue;
    pipelineSuccessRates[pipeline] = { runs: item.runs, success_rate: item.success_rate };
  }

  const violationsByPipeline: Partial<Record<PipelineName, number>> = {};
  for (const violation of check.violations) {
    violationsByPipeline[violation.pipeline] = (violationsByPipeline[violation.pipeline] ?? 0) + 1;
  }

  const { score, ...healthBreakdown } = check.health;

  const report: OpsReport = {
    schema_version: SCHEMA_VERSION,
    generated_at: formatTimestamp(now),
    days,
    window_start: windowStart ? formatTimestamp(windowStart) : null,
    total_runs: check.summary.total_runs,
    threshold_profile: check.threshold_profile,
    thresholds: check.thresholds,
    health_score: score,
    health_breakdown: healthBreakdown,
    pipeline_success_rates: pipelineSuccessRates,
    threshold_violations: check.violations,
    threshold_violations_count: check.violations.length,
    threshold_violations_by_pipeline: violationsByPipeline,
    continuous_alert: check.continuous_alert,
    top_alert_types: rankAlertTypes(alerts.byType, TOP_ALERT_TYPES),
    daily_alert_counts: alerts.perDay.slice(0, DAILY_ALERT_ROLLUP_DAYS),
    alert_counts_by_pipeline: alerts.byPipeline,
    artifact_integrity: artifactIntegrity,
    recent_command_failures: check.summary.totals.command_failures,
    recent_alert_count: check.summary.totals.alert_count,
    failed_command_retry_guides: retryGuides,
  };

  console.log("Built ops report", {
    days,
    totalRuns: report.total_runs,
    healthScore: report.health_score,
    violations: report.threshold_violations_count,
  });

  return report;
}
