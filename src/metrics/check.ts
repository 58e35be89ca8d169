import { Config } from "../config";
import { MetricsCheckResult } from "../types";
import { normalizeDays, TimeInput, toUtc } from "../utils/time";
import { calculateHealthScore } from "./health";
import { aggregateRuns, scanRunRecords } from "./scanner";
import { evaluateConsecutiveFailures, evaluateMetricThresholds, loadMetricThresholds, resolveThresholdProfile } from "./thresholds";

export const DEFAULT_METRICS_WINDOW_DAYS = 30;

export interface MetricsCheckOptions {
  config: Config;
  days?: number;
  now?: TimeInput;
}

// Scan once, then evaluate thresholds, consecutive failures and health from the same runs
export async function checkMetricThresholds(logsDir: string, options: MetricsCheckOptions): Promise<MetricsCheckResult> {
  const { config } = options;
  const days = normalizeDays(options.days ?? DEFAULT_METRICS_WINDOW_DAYS);
  const scanOptions = { days, now: toUtc(options.now) };

  const scan = await scanRunRecords(logsDir, scanOptions);
  const summary = aggregateRuns(scan, scanOptions);
  const thresholds = loadMetricThresholds(config.thresholds);
  const violations = evaluateMetricThresholds(summary, thresholds);
  const continuousAlert = evaluateConsecutiveFailures(scan.runs, config.continuity);
  const health = calculateHealthScore(summary, violations);

  if (violations.length > 0 || continuousAlert.active) {
    console.warn("Pipeline metrics outside thresholds", {
      violations: violations.length,
      continuousAlert: continuousAlert.severity,
      healthScore: health.score,
    });
  }

  return {
    days,
    threshold_profile: resolveThresholdProfile(config.thresholds),
    thresholds,
    violations,
    continuous_alert: continuousAlert,
    health,
    summary,
  };
}
