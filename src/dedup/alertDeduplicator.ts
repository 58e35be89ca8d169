import _ from "lodash";
import { Dayjs } from "dayjs";
import { buildAlertSignature } from "../signature";
import { formatTimestamp, parseTimestamp, TimeInput, toUtc } from "../utils/time";
import { DedupEntries, DedupStateStore } from "./stateStore";

export interface DedupDefaults {
  cooldownSec: number;
  ttlSec: number;
}

export interface ShouldEmitOptions {
  cooldownSec?: number;
  ttlSec?: number;
  now?: TimeInput;
}

export interface ShouldEmitResult {
  send: boolean;
  signature: string;
  lastSent: string | null;
  sentAt?: string;
  cooldownSec: number;
  ttlSec: number;
  prunedCount: number;
}

export interface PruneResult {
  statePath: string;
  ttlSec: number;
  countBefore: number;
  countAfter: number;
  removed: number;
}

export interface ResetResult {
  statePath: string;
  existedBefore: boolean;
  ttlSec: number;
  prunedCount: number;
  countBeforePrune: number;
  countBefore: number;
  countAfter: 0;
  backupPath: string | null;
}

export interface SummaryEntry {
  signature: string;
  signaturePreview: string;
  timestamp: string;
}

export interface SummaryResult {
  statePath: string;
  exists: boolean;
  ttlSec: number;
  prunedCount: number;
  count: number;
  oldestTimestamp: string;
  newestTimestamp: string;
  topEntries: SummaryEntry[];
}

export const DEFAULT_SUMMARY_TOP_N = 5;
export const DEFAULT_SIGNATURE_PREVIEW_LENGTH = 12;
const MIN_SIGNATURE_PREVIEW_LENGTH = 4;

// Drop entries older than the TTL. Unparsable timestamps are kept; a TTL of 0 never expires anything.
export function pruneDedupEntries(
  entries: DedupEntries,
  ttlSec: number,
  now: Dayjs,
): { retained: DedupEntries; removed: number } {
  if (ttlSec <= 0) {
    return { retained: { ...entries }, removed: 0 };
  }

  const cutoff = now.subtract(ttlSec, "second");
  const retained: DedupEntries = {};
  let removed = 0;
  for (const [signature, timestamp] of Object.entries(entries)) {
    const parsed = parseTimestamp(timestamp);
    if (!parsed || !parsed.isBefore(cutoff)) {
      retained[signature] = timestamp;
    } else {
      removed += 1;
    }
  }
  return { retained, removed };
}

// Emission is allowed with no prior record, no cooldown, or once the cooldown has fully elapsed
export function isCooldownElapsed(lastSent: string | null, cooldownSec: number, now: Dayjs): boolean {
  if (cooldownSec <= 0) return true;
  const last = parseTimestamp(lastSent);
  if (!last) return true;
  return now.diff(last, "millisecond") >= cooldownSec * 1000;
}

export class AlertDeduplicator {
  constructor(
    private readonly store: DedupStateStore,
    private readonly defaults: DedupDefaults,
  ) {}

  // Decide whether an alert line may be emitted now; stamps and persists the signature when it may
  async shouldEmit(line: string, options: ShouldEmitOptions = {}): Promise<ShouldEmitResult> {
    const now = toUtc(options.now);
    const cooldownSec = nonNegative(options.cooldownSec ?? this.defaults.cooldownSec);
    const ttlSec = nonNegative(options.ttlSec ?? this.defaults.ttlSec);
    const signature = buildAlertSignature(line);

    const { entries, prunedCount } = await this.loadPruned(ttlSec, now);
    const lastSent = entries[signature] ?? null;
    const send = isCooldownElapsed(lastSent, cooldownSec, now);

    const result: ShouldEmitResult = {
      send,
      signature,
      lastSent,
      cooldownSec,
      ttlSec,
      prunedCount,
    };

    if (send) {
      const sentAt = formatTimestamp(now);
      await this.store.save({ ...entries, [signature]: sentAt });
      result.sentAt = sentAt;
    }

    console.log("Alert dedup decision", {
      signature,
      send,
      lastSent,
      cooldownSec,
      prunedCount,
    });

    return result;
  }

  async prune(options: { ttlSec?: number; now?: TimeInput } = {}): Promise<PruneResult> {
    const now = toUtc(options.now);
    const ttlSec = nonNegative(options.ttlSec ?? this.defaults.ttlSec);
    const { entries, prunedCount, countBeforePrune } = await this.loadPruned(ttlSec, now);

    return {
      statePath: this.store.location,
      ttlSec,
      countBefore: countBeforePrune,
      countAfter: Object.keys(entries).length,
      removed: prunedCount,
    };
  }

  // Clear all entries. Expired entries are pruned first, so a backup holds only live state.
  async reset(options: { backup?: boolean; now?: TimeInput } = {}): Promise<ResetResult> {
    const now = toUtc(options.now);
    const ttlSec = this.defaults.ttlSec;
    const existedBefore = await this.store.exists();
    const { entries, prunedCount, countBeforePrune } = await this.loadPruned(ttlSec, now);

    const backupPath = existedBefore && options.backup ? await this.store.backup(now.format("YYYYMMDD-HHmmss")) : null;

    await this.store.save({});
    console.log("Alert dedup state reset", {
      statePath: this.store.location,
      countBefore: Object.keys(entries).length,
      backupPath,
    });

    return {
      statePath: this.store.location,
      existedBefore,
      ttlSec,
      prunedCount,
      countBeforePrune,
      countBefore: Object.keys(entries).length,
      countAfter: 0,
      backupPath,
    };
  }

  /**
   * Read-only view of the state, newest entries first.
   * Expired entries are pruned (and the pruned state persisted) before summarizing.
   */
  async summarize(
    options: { topN?: number; previewLength?: number; now?: TimeInput } = {},
  ): Promise<SummaryResult> {
    const now = toUtc(options.now);
    const ttlSec = this.defaults.ttlSec;
    const exists = await this.store.exists();
    const { entries, prunedCount } = await this.loadPruned(ttlSec, now);

    const rows = Object.entries(entries).map(([signature, timestamp]) => {
      const parsed = parseTimestamp(timestamp);
      return { signature, timestamp, parsedMs: parsed ? parsed.valueOf() : null };
    });

    // Parsed timestamps first (newest to oldest), unparsable ones last
    const ranked = _.orderBy(
      rows,
      [(row) => row.parsedMs !== null, (row) => row.parsedMs ?? 0],
      ["desc", "desc"],
    );

    const parsedValues = rows.flatMap((row) => (row.parsedMs === null ? [] : [row.parsedMs]));
    const oldest = _.min(parsedValues);
    const newest = _.max(parsedValues);

    const limit = nonNegative(finiteOr(options.topN, DEFAULT_SUMMARY_TOP_N));
    const previewLength = Math.max(
      MIN_SIGNATURE_PREVIEW_LENGTH,
      nonNegative(finiteOr(options.previewLength, DEFAULT_SIGNATURE_PREVIEW_LENGTH)),
    );

    return {
      statePath: this.store.location,
      exists,
      ttlSec,
      prunedCount,
      count: rows.length,
      oldestTimestamp: oldest === undefined ? "" : formatTimestamp(oldest),
      newestTimestamp: newest === undefined ? "" : formatTimestamp(newest),
      topEntries: ranked.slice(0, limit).map((row) => ({
        signature: row.signature,
        signaturePreview:
          row.signature.length > previewLength ? `${row.signature.slice(0, previewLength)}...` : row.signature,
        timestamp: row.timestamp,
      })),
    };
  }

  // Load, prune by TTL, and persist only when something was actually removed
  private async loadPruned(
    ttlSec: number,
    now: Dayjs,
  ): Promise<{ entries: DedupEntries; prunedCount: number; countBeforePrune: number }> {
    const loaded = await this.store.load();
    const { retained, removed } = pruneDedupEntries(loaded, ttlSec, now);
    if (removed > 0) {
      await this.store.save(retained);
      console.log("Pruned expired alert dedup entries", {
        statePath: this.store.location,
        removed,
        ttlSec,
      });
    }
    return { entries: retained, prunedCount: removed, countBeforePrune: Object.keys(loaded).length };
  }
}

function finiteOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) ? value : fallback;
}

function nonNegative(value: number): number {
  return Number.isFinite(value) ? Math.max(0, Math.trunc(value)) : 0;
}
