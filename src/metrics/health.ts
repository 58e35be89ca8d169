import _ from "lodash";
import { HealthScore, PIPELINE_NAMES, PipelineMetricsSummary, ThresholdViolation } from "../types";

export const HEALTH_SCORE_FORMULA =
  "score = clamp(100 - ((1 - avg_success_rate) * 60 + min(25, violations * 5) " +
  "+ min(10, command_failures * 2) + min(5, alert_count * 0.2)), 0, 100)";

/**
 * Operational health score (0-100) from weighted penalties:
 * - success rate: (1 - avg_success_rate) * 60, averaged over pipelines with runs > 0 (0 when none)
 * - violations: min(25, violation_count * 5)
 * - command failures: min(10, command_failures * 2)
 * - alert volume: min(5, alert_count * 0.2)
 */
export function calculateHealthScore(summary: PipelineMetricsSummary, violations: ThresholdViolation[] = []): HealthScore {
  const activeSuccessRates = PIPELINE_NAMES.flatMap((pipeline) => {
    const item = summary.pipelines[pipeline];
    return item && item.runs > 0 ? [_.clamp(item.success_rate, 0, 1)] : [];
  });
  const averageSuccessRate = activeSuccessRates.length > 0 ? _.mean(activeSuccessRates) : 0;

  const commandFailures = Math.max(0, summary.totals.command_failures);
  const alertCount = Math.max(0, summary.totals.alert_count);
  const violationCount = violations.length;

  const penalties = {
    success_rate: (1 - averageSuccessRate) * 60,
    violations: Math.min(25, violationCount * 5),
    command_failures: Math.min(10, commandFailures * 2),
    alerts: Math.min(5, alertCount * 0.2),
  };

  const rawScore =
    100 - (penalties.success_rate + penalties.violations + penalties.command_failures + penalties.alerts);

  return {
    score: Math.min(100, Math.max(0, roundHalfToEven(rawScore))),
    factors: {
      average_pipeline_success_rate: averageSuccessRate,
      violation_count: violationCount,
      command_failures: commandFailures,
      alert_count: alertCount,
    },
    penalties,
    formula: HEALTH_SCORE_FORMULA,
  };
}

// Ties go to the even neighbour, so 92.5 scores 92 and 93.5 scores 94
export function roundHalfToEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}
