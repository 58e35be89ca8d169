// Core types for the operational health pipeline

export const PIPELINE_NAMES = ["daily", "weekly", "monthly"] as const;
export type PipelineName = (typeof PIPELINE_NAMES)[number];

export const THRESHOLD_PROFILE_NAMES = ["dev", "stg", "prod"] as const;
export type ThresholdProfileName = (typeof THRESHOLD_PROFILE_NAMES)[number];

export const ALERT_TYPES = ["threshold", "webhook_failed", "command_failed", "monthly_scheduled", "other"] as const;
export type AlertType = (typeof ALERT_TYPES)[number];

export type AlertPipeline = PipelineName | "unknown";

export const SCHEMA_VERSION = 1;

export function isPipelineName(value: string): value is PipelineName {
  return PIPELINE_NAMES.some((name) => name === value);
}

export function isThresholdProfileName(value: string): value is ThresholdProfileName {
  return THRESHOLD_PROFILE_NAMES.some((name) => name === value);
}

// Persisted dedup document: signature -> ISO8601 UTC timestamp of last emission
export interface DedupStateDocument {
  last_sent: Record<string, string>;
}

// One run telemetry document after lenient decoding (unknown keys dropped)
export interface RunTelemetryDocument {
  pipeline: PipelineName;
  started_at?: string;
  finished_at?: string;
  duration_sec: number;
  success: boolean;
  command_failures: number;
  alert_count: number;
}

// A telemetry document that passed the window filter
export interface ScannedRun {
  record: RunTelemetryDocument;
  timestamp: string; // raw finished_at (or started_at) text
  timestampMs: number; // epoch millis, UTC
  scanIndex: number; // position in discovery order
  sourcePath: string;
}

export interface LatestRun {
  timestamp: string;
  success: boolean;
}

export interface PipelineAggregate {
  runs: number;
  success_rate: number;
  avg_duration_sec: number;
  max_duration_sec: number;
  latest_run: LatestRun;
}

export interface PipelineMetricsSummary {
  generated_at: string;
  days: number;
  window_start: string | null;
  total_runs: number;
  pipelines: Partial<Record<PipelineName, PipelineAggregate>>;
  totals: {
    command_failures: number;
    alert_count: number;
  };
}

export interface PipelineThreshold {
  max_duration_sec: number;
  max_failure_rate: number;
}

export type MetricThresholds = Record<PipelineName, PipelineThreshold>;

export type ViolationMetric = "max_duration_sec" | "failure_rate";

export interface ThresholdViolation {
  pipeline: PipelineName;
  metric: ViolationMetric;
  threshold: number;
  observed: number;
}

export type ContinuitySeverity = "none" | "warning" | "critical";

export interface ConsecutiveFailureViolation {
  pipeline: PipelineName;
  consecutive_failures: number;
  latest_run: string;
  severity: Exclude<ContinuitySeverity, "none">;
}

export interface ContinuousAlertState {
  warning_limit: number;
  critical_limit: number;
  severity: ContinuitySeverity;
  active: boolean;
  violated_pipelines: ConsecutiveFailureViolation[];
}

export interface HealthScore {
  score: number;
  factors: {
    average_pipeline_success_rate: number;
    violation_count: number;
    command_failures: number;
    alert_count: number;
  };
  penalties: {
    success_rate: number;
    violations: number;
    command_failures: number;
    alerts: number;
  };
  formula: string;
}

export interface MetricsCheckResult {
  days: number;
  threshold_profile: ThresholdProfileName;
  thresholds: MetricThresholds;
  violations: ThresholdViolation[];
  continuous_alert: ContinuousAlertState;
  health: HealthScore;
  summary: PipelineMetricsSummary;
}

export interface ParsedAlert {
  raw_line: string;
  message: string;
  timestamp: string | null; // normalized ISO8601 UTC, null when absent or unparsable
  pipeline: AlertPipeline;
  alert_type: AlertType;
}

export interface AlertTypeCount {
  type: AlertType;
  count: number;
}

export interface DailyAlertCount {
  date: string; // YYYY-MM-DD (UTC)
  count: number;
  command_failures: number;
  sample_alerts: string[]; // first messages of the day, in log order
}

export type ArtifactStatus = "OK" | "MISSING";

export interface ArtifactIntegrity {
  source: string;
  ok_count: number;
  missing_count: number;
  total_count: number;
  files: Array<{ path: string; status: ArtifactStatus }>;
}

export interface FailedCommandRetryGuide {
  pipeline: PipelineName;
  failed_command: string;
  suggested_retry_command: string;
  runbook_reference: string;
  runbook_reference_anchor: string;
}

export interface OpsReport {
  schema_version: number;
  generated_at: string;
  days: number;
  window_start: string | null;
  total_runs: number;
  threshold_profile: ThresholdProfileName;
  thresholds: MetricThresholds;
  health_score: number;
  health_breakdown: Omit<HealthScore, "score">;
  pipeline_success_rates: Partial<Record<PipelineName, { runs: number; success_rate: number }>>;
  threshold_violations: ThresholdViolation[];
  threshold_violations_count: number;
  threshold_violations_by_pipeline: Partial<Record<PipelineName, number>>;
  continuous_alert: ContinuousAlertState;
  top_alert_types: AlertTypeCount[];
  daily_alert_counts: DailyAlertCount[];
  alert_counts_by_pipeline: Record<AlertPipeline, number>;
  artifact_integrity: ArtifactIntegrity;
  recent_command_failures: number;
  recent_alert_count: number;
  failed_command_retry_guides: FailedCommandRetryGuide[];
}
