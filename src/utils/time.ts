import dayjs, { Dayjs } from "dayjs";
import utc from "dayjs/plugin/utc";

dayjs.extend(utc);

// Date, optional time, optional Z or +HH:MM, +HHMM, +HH offset after the time.
// Without an offset the value is read as UTC.
const ISO_TIMESTAMP_PATTERN =
  /^\d{4}-\d{2}-\d{2}(?:[T ](?:[01]\d|2[0-3]):[0-5]\d(?::[0-5]\d(?:\.\d{1,9})?)?(?<offset>Z|[+-](?:[01]\d|2[0-3])(?::?[0-5]\d)?)?)?$/;

const SECONDS_PER_DAY = 24 * 60 * 60;

export type TimeInput = Date | Dayjs | string | number;

// Parse an ISO8601 timestamp; returns null instead of throwing on anything malformed
export function parseTimestamp(value: unknown): Dayjs | null {
  if (typeof value !== "string") return null;
  const text = value.trim();
  const groups = ISO_TIMESTAMP_PATTERN.exec(text)?.groups;
  if (!text || !groups) return null;

  // Reject calendar overflow such as 2026-02-30, which the parser would roll forward
  const datePart = text.slice(0, 10);
  if (dayjs.utc(datePart).format("YYYY-MM-DD") !== datePart) return null;

  const offset = groups.offset ?? "";
  const local = text.slice(0, text.length - offset.length);
  const parsed = dayjs.utc(`${local}${normalizeOffset(offset)}`);
  return parsed.isValid() ? parsed : null;
}

// +0900 and +09 become +09:00, the only offset form the date parser reads reliably
function normalizeOffset(offset: string): string {
  if (!offset || offset === "Z") return offset;
  const digits = offset.slice(1).replace(":", "");
  return `${offset.slice(0, 1)}${digits.slice(0, 2)}:${digits.slice(2) || "00"}`;
}

// Parse the compact YYYYMMDD + HHmmss pair used in log file names
export function parseCompactTimestamp(date: string, time: string): Dayjs | null {
  if (!/^\d{8}$/.test(date) || !/^\d{6}$/.test(time)) return null;
  return parseTimestamp(
    `${date.slice(0, 4)}-${date.slice(4, 6)}-${date.slice(6, 8)}T${time.slice(0, 2)}:${time.slice(2, 4)}:${time.slice(4, 6)}`,
  );
}

export function toUtc(value: TimeInput = new Date()): Dayjs {
  if (typeof value === "string") {
    const parsed = parseTimestamp(value);
    if (!parsed) {
      throw new Error(`Invalid timestamp: '${value}'. Expected ISO8601 format.`);
    }
    return parsed;
  }
  return dayjs.utc(value);
}

// ISO8601 in UTC with a Z suffix; milliseconds only when present
export function formatTimestamp(value: TimeInput): string {
  const utcValue = toUtc(value);
  return utcValue.millisecond() === 0
    ? utcValue.format("YYYY-MM-DDTHH:mm:ss[Z]")
    : utcValue.format("YYYY-MM-DDTHH:mm:ss.SSS[Z]");
}

export function formatDateKey(value: Dayjs): string {
  return value.utc().format("YYYY-MM-DD");
}

export function resolveWindowStart(days: number, now: Dayjs): Dayjs | null {
  if (days <= 0) return null;
  return now.subtract(days * SECONDS_PER_DAY, "second");
}

// Inclusive on both ends; an unbounded window (null start) admits everything
export function isWithinWindow(timestamp: Dayjs, windowStart: Dayjs | null, now: Dayjs): boolean {
  if (!windowStart) return true;
  return !timestamp.isBefore(windowStart) && !timestamp.isAfter(now);
}

export function normalizeDays(days: number): number {
  return Number.isFinite(days) ? Math.max(0, Math.trunc(days)) : 0;
}
