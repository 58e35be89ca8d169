import _ from "lodash";
import { ContinuitySettings, readFloatSetting, readIntSetting, ThresholdSettings, durationEnvKey, failureRateEnvKey } from "../config";
import {
  ConsecutiveFailureViolation,
  ContinuitySeverity,
  ContinuousAlertState,
  isPipelineName,
  isThresholdProfileName,
  MetricThresholds,
  PIPELINE_NAMES,
  PipelineMetricsSummary,
  PipelineName,
  ScannedRun,
  ThresholdProfileName,
  ThresholdViolation,
} from "../types";

type ProfileDefaults = {
  duration_sec: Record<PipelineName, number>;
  failure_rate: Record<PipelineName, number>;
};

// Hard-coded defaults; also the "prod" profile
const DEFAULT_DURATION_THRESHOLDS_SEC: Record<PipelineName, number> = {
  daily: 900,
  weekly: 1800,
  monthly: 3600,
};

const DEFAULT_FAILURE_RATE_THRESHOLDS: Record<PipelineName, number> = {
  daily: 0.1,
  weekly: 0.2,
  monthly: 0.25,
};

export const THRESHOLD_PROFILES: Record<ThresholdProfileName, ProfileDefaults> = {
  dev: {
    duration_sec: { daily: 1800, weekly: 3600, monthly: 7200 },
    failure_rate: { daily: 0.3, weekly: 0.4, monthly: 0.5 },
  },
  stg: {
    duration_sec: { daily: 1200, weekly: 2400, monthly: 4800 },
    failure_rate: { daily: 0.2, weekly: 0.3, monthly: 0.35 },
  },
  prod: {
    duration_sec: DEFAULT_DURATION_THRESHOLDS_SEC,
    failure_rate: DEFAULT_FAILURE_RATE_THRESHOLDS,
  },
};

export const DEFAULT_THRESHOLD_PROFILE: ThresholdProfileName = "prod";
export const DEFAULT_CONSECUTIVE_WARNING_LIMIT = 3;
export const DEFAULT_CONSECUTIVE_CRITICAL_LIMIT = 5;

const SEVERITY_RANK: Record<ContinuitySeverity, number> = { none: 0, warning: 1, critical: 2 };

// Unknown or missing profile names fall back to prod
export function resolveThresholdProfile(settings: Pick<ThresholdSettings, "profile">): ThresholdProfileName {
  const raw = (settings.profile ?? "").trim().toLowerCase();
  if (isThresholdProfileName(raw)) return raw;
  if (raw) {
    console.warn(`Unknown threshold profile '${settings.profile}', using ${DEFAULT_THRESHOLD_PROFILE}`);
  }
  return DEFAULT_THRESHOLD_PROFILE;
}

// Explicit override > profile default; each of the six values is resolved independently
export function loadMetricThresholds(settings: ThresholdSettings): MetricThresholds {
  const profile = THRESHOLD_PROFILES[resolveThresholdProfile(settings)];
  const resolve = (pipeline: PipelineName) => ({
    max_duration_sec: readFloatSetting(settings.maxDurationSec[pipeline], {
      name: durationEnvKey(pipeline),
      defaultValue: profile.duration_sec[pipeline],
      minimum: 1,
    }),
    max_failure_rate: readFloatSetting(settings.maxFailureRate[pipeline], {
      name: failureRateEnvKey(pipeline),
      defaultValue: profile.failure_rate[pipeline],
      minimum: 0,
      maximum: 1,
    }),
  });

  return {
    daily: resolve("daily"),
    weekly: resolve("weekly"),
    monthly: resolve("monthly"),
  };
}

export function evaluateMetricThresholds(
  summary: PipelineMetricsSummary,
  thresholds: MetricThresholds,
): ThresholdViolation[] {
  const violations: ThresholdViolation[] = [];

  for (const pipeline of PIPELINE_NAMES) {
    const values = summary.pipelines[pipeline];
    if (!values || values.runs <= 0) continue;
    const threshold = thresholds[pipeline];

    if (values.max_duration_sec > threshold.max_duration_sec) {
      violations.push({
        pipeline,
        metric: "max_duration_sec",
        threshold: threshold.max_duration_sec,
        observed: values.max_duration_sec,
      });
    }

    const observedFailureRate = _.clamp(1 - values.success_rate, 0, 1);
    if (observedFailureRate > threshold.max_failure_rate) {
      violations.push({
        pipeline,
        metric: "failure_rate",
        threshold: threshold.max_failure_rate,
        observed: observedFailureRate,
      });
    }
  }

  return violations;
}

// warning limit >= 1; critical limit >= warning limit
export function resolveContinuityLimits(settings: ContinuitySettings): { warningLimit: number; criticalLimit: number } {
  const warningLimit = readIntSetting(settings.warningLimit, {
    name: "METRIC_SLO_CONSECUTIVE_ALERT_N",
    defaultValue: DEFAULT_CONSECUTIVE_WARNING_LIMIT,
    minimum: 1,
  });
  const criticalLimit = readIntSetting(settings.criticalLimit, {
    name: "METRIC_SLO_CONSECUTIVE_ALERT_CRITICAL_N",
    defaultValue: Math.max(DEFAULT_CONSECUTIVE_CRITICAL_LIMIT, warningLimit),
    minimum: warningLimit,
  });
  return { warningLimit, criticalLimit };
}

// Count failures from the newest run backwards, stopping at the first success
export function countConsecutiveFailures(runs: ScannedRun[]): { count: number; latestRun: string } {
  // Newest first; a timestamp tie goes to the run processed last
  const ordered = _.orderBy(runs, ["timestampMs", "scanIndex"], ["desc", "desc"]);
  let count = 0;
  for (const run of ordered) {
    if (run.record.success) break;
    count += 1;
  }
  return { count, latestRun: ordered[0]?.timestamp ?? "" };
}

export function evaluateConsecutiveFailures(runs: ScannedRun[], settings: ContinuitySettings): ContinuousAlertState {
  const { warningLimit, criticalLimit } = resolveContinuityLimits(settings);
  const runsByPipeline = _.groupBy(runs, (run) => run.record.pipeline);

  const violatedPipelines: ConsecutiveFailureViolation[] = [];
  let overall: ContinuitySeverity = "none";

  for (const pipeline of Object.keys(runsByPipeline).sort()) {
    if (!isPipelineName(pipeline)) continue;
    const { count, latestRun } = countConsecutiveFailures(runsByPipeline[pipeline]);
    if (count < warningLimit) continue;

    const severity = count >= criticalLimit ? "critical" : "warning";
    if (SEVERITY_RANK[severity] > SEVERITY_RANK[overall]) {
      overall = severity;
    }
    violatedPipelines.push({
      pipeline,
      consecutive_failures: count,
      latest_run: latestRun,
      severity,
    });
  }

  return {
    warning_limit: warningLimit,
    critical_limit: criticalLimit,
    severity: overall,
    active: overall !== "none",
    violated_pipelines: violatedPipelines,
  };
}
