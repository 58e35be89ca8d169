import { promises as fs } from "fs";
import * as path from "path";
import _ from "lodash";
import { Dayjs } from "dayjs";
import { FailedCommandRetryGuide, isPipelineName, PIPELINE_NAMES, PipelineName } from "../types";
import { isWithinWindow, parseCompactTimestamp, parseTimestamp } from "../utils/time";

export const RUN_LOG_FILE_PATTERN = /^(daily|weekly|monthly)-run-(\d{8})-(\d{6})\.log$/;
export const FAILED_COMMAND_PATTERN =
  /^\[(?<timestamp>[^\]]+)\]\s+ERROR\s+(?<pipeline>daily|weekly|monthly)\s+pipeline:\s+command failed:\s+(?<command>.+)$/i;
const RUNBOOK_HEADING_PATTERN = /^#{1,6}\s+(.+?)\s*$/;

export const DEFAULT_RETRY_GUIDE_LIMIT = 12;

export type RunbookHeadings = Partial<Record<PipelineName, string>>;

interface FailedCommandRow {
  eventMs: number;
  pipeline: PipelineName;
  command: string;
}

export interface RetryGuideOptions {
  runbookPath: string;
  windowStart: Dayjs | null;
  now: Dayjs;
  limit?: number;
}

// GitHub-style heading anchor: lower-case, punctuation dropped, spaces to dashes
export function githubAnchorFromHeading(heading: string): string {
  return heading
    .trim()
    .toLowerCase()
    .replace(/\s+/g, " ")
    .replace(/[^\p{L}\p{N}_\- ]/gu, "")
    .replace(/ /g, "-")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");
}

// First heading mentioning "<pipeline> pipeline" wins for each pipeline
export function parseRunbookHeadings(markdown: string): RunbookHeadings {
  const headings: RunbookHeadings = {};
  for (const line of markdown.split(/\r?\n/)) {
    const match = RUNBOOK_HEADING_PATTERN.exec(line);
    if (!match) continue;
    const heading = match[1].trim();
    const lower = heading.toLowerCase();
    const pipeline = PIPELINE_NAMES.find((name) => lower.includes(`${name} pipeline`));
    if (pipeline && headings[pipeline] === undefined) {
      headings[pipeline] = heading;
    }
  }
  return headings;
}

export async function loadRunbookHeadings(runbookPath: string): Promise<RunbookHeadings> {
  try {
    return parseRunbookHeadings(await fs.readFile(runbookPath, "utf8"));
  } catch {
    return {};
  }
}

export function buildRunbookReference(
  runbookPath: string,
  headings: RunbookHeadings,
  pipeline: PipelineName,
): { reference: string; anchor: string } {
  const heading = headings[pipeline];
  const slug = heading ? githubAnchorFromHeading(heading) : "";
  if (!slug) return { reference: runbookPath, anchor: "" };
  return { reference: `${runbookPath}#${slug}`, anchor: `#${slug}` };
}

async function readFailedCommands(
  logsDir: string,
  windowStart: Dayjs | null,
  now: Dayjs,
): Promise<FailedCommandRow[]> {
  let names: string[];
  try {
    names = await fs.readdir(logsDir);
  } catch {
    return [];
  }

  const rows: FailedCommandRow[] = [];
  // Newest file names first; the later sort is stable so this order breaks ties
  for (const name of names.sort().reverse()) {
    const fileMatch = RUN_LOG_FILE_PATTERN.exec(name);
    if (!fileMatch) continue;
    const fileTime = parseCompactTimestamp(fileMatch[2], fileMatch[3]);
    if (!fileTime || !isWithinWindow(fileTime, windowStart, now)) continue;

    let content: string;
    try {
      content = await fs.readFile(path.join(logsDir, name), "utf8");
    } catch (error) {
      console.warn("Skipping unreadable run log", {
        name,
        error: error instanceof Error ? error.message : String(error),
      });
      continue;
    }

    for (const line of content.split(/\r?\n/)) {
      const match = FAILED_COMMAND_PATTERN.exec(line.trim());
      if (!match?.groups) continue;
      const command = match.groups.command.trim();
      const pipeline = match.groups.pipeline.toLowerCase();
      if (!command || !isPipelineName(pipeline)) continue;

      const eventTime = parseTimestamp(match.groups.timestamp) ?? fileTime;
      if (!isWithinWindow(eventTime, windowStart, now)) continue;
      rows.push({ eventMs: eventTime.valueOf(), pipeline, command });
    }
  }
  return rows;
}

// Most recent failed commands, one guide per (pipeline, command)
export async function collectFailedCommandRetryGuides(
  logsDir: string,
  options: RetryGuideOptions,
): Promise<FailedCommandRetryGuide[]> {
  const limit = Math.max(0, options.limit ?? DEFAULT_RETRY_GUIDE_LIMIT);
  const rows = await readFailedCommands(logsDir, options.windowStart, options.now);
  if (rows.length === 0 || limit === 0) return [];

  const headings = await loadRunbookHeadings(options.runbookPath);
  const unique = _.uniqBy(_.orderBy(rows, ["eventMs"], ["desc"]), (row) => `${row.pipeline}\u0000${row.command}`);

  return unique.slice(0, limit).map((row) => {
    const { reference, anchor } = buildRunbookReference(options.runbookPath, headings, row.pipeline);
    return {
      pipeline: row.pipeline,
      failed_command: row.command,
      suggested_retry_command: row.command,
      runbook_reference: reference,
      runbook_reference_anchor: anchor,
    };
  });
}
