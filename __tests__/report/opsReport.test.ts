import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import { Config } from '../../src/config';
import { HEALTH_SCORE_FORMULA } from '../../src/metrics/health';
import { buildOpsReport, readAlertLog } from '../../src/report/opsReport';
import {
  createTempDir,
  removeTempDir,
  runDocument,
  TEST_NOW,
  writeJsonFile,
  writeTextFile,
} from '../utils/test-fixtures';

describe('buildOpsReport', () => {
  let dir: string;
  let config: Config;

  beforeEach(async () => {
    dir = await createTempDir();
    config = new Config({ logsDir: dir, runbookPath: path.join(dir, 'runbook.md') });
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  async function writeFixtures(): Promise<void> {
    await writeJsonFile(dir, 'daily-metrics-1.json', runDocument('daily', '2026-03-14T01:10:00Z', { duration_sec: 10 }));
    await writeJsonFile(
      dir,
      'daily-metrics-2.json',
      runDocument('daily', '2026-03-15T01:10:00Z', {
        duration_sec: 20,
        success: false,
        command_failures: 1,
        alert_count: 3,
      })
    );
    await writeJsonFile(dir, 'weekly-metrics-1.json', runDocument('weekly', '2026-03-09T02:00:00Z', { duration_sec: 30 }));

    await writeTextFile(
      dir,
      'alerts.log',
      [
        '[2026-03-15T01:10:00Z] ERROR daily pipeline: command failed: make ingest',
        '[2026-03-15T01:11:00Z] WARN daily pipeline threshold exceeded',
        '[2026-03-14T09:00:00Z] WARN webhook delivery failed',
        '[2026-03-13T09:00:00Z] INFO monthly report scheduled',
        '[2026-03-01T00:00:00Z] WARN weekly pipeline threshold exceeded',
        '',
      ].join('\n')
    );
    await writeTextFile(
      dir,
      'daily-run-20260315-010000.log',
      '[2026-03-15T01:10:00Z] ERROR daily pipeline: command failed: make ingest\n'
    );
    await writeTextFile(dir, 'runbook.md', '## Daily pipeline recovery\n');
    await writeJsonFile(dir, 'weekly-artifact-verify.json', {
      checks: [
        { path: 'reports/weekly.json', status: 'OK' },
        { path: 'reports/summary.md', status: 'MISSING' },
      ],
    });
  }

  it('should compose every section for the window', async () => {
    await writeFixtures();

    const report = await buildOpsReport({ config, now: TEST_NOW });

    expect(report).toMatchObject({
      schema_version: 1,
      generated_at: '2026-03-15T12:00:00Z',
      days: 7,
      window_start: '2026-03-08T12:00:00Z',
      total_runs: 3,
      threshold_profile: 'prod',
      health_score: 77,
      pipeline_success_rates: {
        daily: { runs: 2, success_rate: 0.5 },
        weekly: { runs: 1, success_rate: 1 },
      },
      threshold_violations: [{ pipeline: 'daily', metric: 'failure_rate', threshold: 0.1, observed: 0.5 }],
      threshold_violations_count: 1,
      threshold_violations_by_pipeline: { daily: 1 },
      top_alert_types: [
        { type: 'command_failed', count: 1 },
        { type: 'monthly_scheduled', count: 1 },
        { type: 'threshold', count: 1 },
      ],
      daily_alert_counts: [
        {
          date: '2026-03-15',
          count: 2,
          command_failures: 1,
          sample_alerts: ['ERROR daily pipeline: command failed: make ingest', 'WARN daily pipeline threshold exceeded'],
        },
        { date: '2026-03-14', count: 1, command_failures: 0, sample_alerts: ['WARN webhook delivery failed'] },
        { date: '2026-03-13', count: 1, command_failures: 0, sample_alerts: ['INFO monthly report scheduled'] },
      ],
      alert_counts_by_pipeline: { daily: 2, weekly: 0, monthly: 0, unknown: 2 },
      artifact_integrity: {
        source: path.join(dir, 'weekly-artifact-verify.json'),
        ok_count: 1,
        missing_count: 1,
        total_count: 2,
      },
      recent_command_failures: 1,
      recent_alert_count: 3,
      failed_command_retry_guides: [
        {
          pipeline: 'daily',
          failed_command: 'make ingest',
          suggested_retry_command: 'make ingest',
          runbook_reference: `${path.join(dir, 'runbook.md')}#daily-pipeline-recovery`,
          runbook_reference_anchor: '#daily-pipeline-recovery',
        },
      ],
    });
    expect(report.continuous_alert.severity).toBe('none');
    expect(report.health_breakdown.formula).toBe(HEALTH_SCORE_FORMULA);
    expect(report.health_breakdown).not.toHaveProperty('score');
  });

  it('should count older alerts when the window is unbounded', async () => {
    await writeFixtures();

    const report = await buildOpsReport({ config, days: 0, now: TEST_NOW });

    expect(report.window_start).toBeNull();
    expect(report.alert_counts_by_pipeline.weekly).toBe(1);
    expect(report.top_alert_types[0]).toEqual({ type: 'threshold', count: 2 });
  });

  it('should degrade to empty sections when nothing has been written', async () => {
    const report = await buildOpsReport({ config, now: TEST_NOW });

    expect(report).toMatchObject({
      total_runs: 0,
      health_score: 40,
      pipeline_success_rates: {},
      threshold_violations: [],
      threshold_violations_by_pipeline: {},
      top_alert_types: [],
      daily_alert_counts: [],
      alert_counts_by_pipeline: { daily: 0, weekly: 0, monthly: 0, unknown: 0 },
      artifact_integrity: { ok_count: 0, missing_count: 0, total_count: 0, files: [] },
      recent_command_failures: 0,
      recent_alert_count: 0,
      failed_command_retry_guides: [],
    });
  });

  it('should limit the daily rollup to the seven newest days', async () => {
    const lines = Array.from(
      { length: 10 },
      (_, index) => `[2026-03-${String(index + 1).padStart(2, '0')}T00:00:00Z] WARN daily pipeline threshold exceeded`
    );
    await writeTextFile(dir, 'alerts.log', lines.join('\n'));

    const report = await buildOpsReport({ config, days: 30, now: TEST_NOW });

    expect(report.daily_alert_counts.map((row) => row.date)).toEqual([
      '2026-03-10',
      '2026-03-09',
      '2026-03-08',
      '2026-03-07',
      '2026-03-06',
      '2026-03-05',
      '2026-03-04',
    ]);
  });
});

describe('readAlertLog', () => {
  it('should return nothing when the log is missing', async () => {
    expect(await readAlertLog(path.join('/nonexistent', 'ops-health'))).toEqual([]);
  });
});
