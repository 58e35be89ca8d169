import _ from "lodash";
import { Dayjs } from "dayjs";
import { ALERT_TYPES, AlertPipeline, AlertType, AlertTypeCount, DailyAlertCount, ParsedAlert, PIPELINE_NAMES } from "./types";
import { formatDateKey, formatTimestamp, isWithinWindow, parseTimestamp } from "./utils/time";

export const DAILY_ALERT_SAMPLE_LIMIT = 3;

const ALERT_LINE_PATTERN = /^\[(?<timestamp>[^\]]+)\]\s*(?<message>.*)$/;

// Detect which pipeline an alert message refers to
export function detectPipeline(message: string): AlertPipeline {
  const lower = message.toLowerCase();
  for (const pipeline of PIPELINE_NAMES) {
    if (
      lower.includes(`${pipeline} pipeline`) ||
      lower.includes(`"pipeline":"${pipeline}"`) ||
      lower.includes(`pipeline=${pipeline}`)
    ) {
      return pipeline;
    }
  }
  return "unknown";
}

// Classify alert by message keywords; order matters, first match wins
export function detectAlertType(message: string): AlertType {
  const lower = message.toLowerCase();
  if (lower.includes("command failed")) return "command_failed";
  if (lower.includes("monthly report scheduled")) return "monthly_scheduled";
  if (lower.includes("webhook") && (lower.includes("failed") || lower.includes("failure"))) {
    return "webhook_failed";
  }
  if (lower.includes("threshold")) return "threshold";
  return "other";
}

export function parseAlertLine(line: string): ParsedAlert {
  const trimmed = line.trim();
  const match = ALERT_LINE_PATTERN.exec(trimmed);
  const message = match?.groups ? match.groups.message.trim() : trimmed;
  const parsedTimestamp = match?.groups ? parseTimestamp(match.groups.timestamp) : null;

  return {
    raw_line: line,
    message,
    timestamp: parsedTimestamp ? formatTimestamp(parsedTimestamp) : null,
    pipeline: detectPipeline(message),
    alert_type: detectAlertType(message),
  };
}

export function parseAlertLines(lines: string[]): ParsedAlert[] {
  return lines.filter((line) => line.trim()).map(parseAlertLine);
}

export interface AlertRollup {
  perDay: DailyAlertCount[];
  byPipeline: Record<AlertPipeline, number>;
  byType: Record<AlertType, number>;
}

// Alerts without a timestamp are classifiable but never counted in windowed rollups
export function selectAlertsInWindow(alerts: ParsedAlert[], windowStart: Dayjs | null, now: Dayjs): Array<ParsedAlert & { at: Dayjs }> {
  const selected: Array<ParsedAlert & { at: Dayjs }> = [];
  for (const alert of alerts) {
    const at = parseTimestamp(alert.timestamp);
    if (!at || !isWithinWindow(at, windowStart, now)) continue;
    selected.push({ ...alert, at });
  }
  return selected;
}

export function summarizeAlerts(alerts: ParsedAlert[], windowStart: Dayjs | null, now: Dayjs): AlertRollup {
  const inWindow = selectAlertsInWindow(alerts, windowStart, now);

  const perDayAlerts = _.groupBy(inWindow, (alert) => formatDateKey(alert.at));
  const perDay = _.orderBy(
    Object.entries(perDayAlerts).map(([date, dayAlerts]) => ({
      date,
      count: dayAlerts.length,
      command_failures: dayAlerts.filter((alert) => alert.alert_type === "command_failed").length,
      sample_alerts: dayAlerts.slice(0, DAILY_ALERT_SAMPLE_LIMIT).map((alert) => alert.message),
    })),
    ["date"],
    ["desc"],
  );

  const byPipeline: Record<AlertPipeline, number> = { daily: 0, weekly: 0, monthly: 0, unknown: 0 };
  const byType: Record<AlertType, number> = {
    threshold: 0,
    webhook_failed: 0,
    command_failed: 0,
    monthly_scheduled: 0,
    other: 0,
  };
  for (const alert of inWindow) {
    byPipeline[alert.pipeline] += 1;
    byType[alert.alert_type] += 1;
  }

  return { perDay, byPipeline, byType };
}

// Rank alert types by count (desc), then name (asc); zero counts are dropped
export function rankAlertTypes(byType: Record<AlertType, number>, topN: number): AlertTypeCount[] {
  const rows = ALERT_TYPES.filter((type) => byType[type] > 0)
    .map((type) => ({ type, count: byType[type] }));
  return _.orderBy(rows, ["count", "type"], ["desc", "asc"]).slice(0, Math.max(0, topN));
}
