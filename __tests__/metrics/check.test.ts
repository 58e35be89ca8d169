import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Config } from '../../src/config';
import { checkMetricThresholds } from '../../src/metrics/check';
import { createTempDir, removeTempDir, runDocument, TEST_NOW, writeJsonFile } from '../utils/test-fixtures';

describe('checkMetricThresholds', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
    await writeJsonFile(dir, 'daily-metrics-20260310.json', runDocument('daily', '2026-03-10T01:10:00Z', { duration_sec: 10 }));
    await writeJsonFile(
      dir,
      'daily-metrics-20260311.json',
      runDocument('daily', '2026-03-11T01:20:00Z', {
        duration_sec: 20,
        success: false,
        command_failures: 1,
        alert_count: 2,
      })
    );
    await writeJsonFile(dir, 'weekly-metrics-20260309.json', runDocument('weekly', '2026-03-09T02:30:00Z', { duration_sec: 30 }));
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should aggregate, evaluate and score a 30-day window with the prod profile', async () => {
    const result = await checkMetricThresholds(dir, { config: new Config(), days: 30, now: TEST_NOW });

    expect(result.days).toBe(30);
    expect(result.threshold_profile).toBe('prod');
    expect(result.summary.total_runs).toBe(3);
    expect(result.summary.window_start).toBe('2026-02-13T12:00:00Z');
    expect(result.summary.pipelines.daily).toEqual({
      runs: 2,
      success_rate: 0.5,
      avg_duration_sec: 15,
      max_duration_sec: 20,
      latest_run: { timestamp: '2026-03-11T01:20:00Z', success: false },
    });
    expect(result.summary.pipelines.weekly).toMatchObject({ runs: 1, success_rate: 1, max_duration_sec: 30 });
    expect(result.summary.pipelines.monthly).toBeUndefined();

    expect(result.violations).toEqual([{ pipeline: 'daily', metric: 'failure_rate', threshold: 0.1, observed: 0.5 }]);
    expect(result.violations.filter((violation) => violation.pipeline === 'weekly')).toEqual([]);

    expect(result.continuous_alert.severity).toBe('none');
    expect(result.health.score).toBe(78);
    expect(console.warn).toHaveBeenCalledWith('Pipeline metrics outside thresholds', {
      violations: 1,
      continuousAlert: 'none',
      healthScore: 78,
    });
  });

  it('should honour threshold overrides from configuration', async () => {
    const config = Config.fromEnv({ METRIC_MAX_FAILURE_RATE_DAILY: '0.6' });

    const result = await checkMetricThresholds(dir, { config, now: TEST_NOW });

    expect(result.days).toBe(30);
    expect(result.thresholds.daily).toEqual({ max_duration_sec: 900, max_failure_rate: 0.6 });
    expect(result.violations).toEqual([]);
  });

  it('should raise a continuity alert for repeated failures', async () => {
    await writeJsonFile(dir, 'daily-metrics-20260312.json', runDocument('daily', '2026-03-12T01:00:00Z', { success: false }));
    await writeJsonFile(dir, 'daily-metrics-20260313.json', runDocument('daily', '2026-03-13T01:00:00Z', { success: false }));

    const result = await checkMetricThresholds(dir, { config: new Config(), now: TEST_NOW });

    expect(result.continuous_alert).toMatchObject({
      severity: 'warning',
      active: true,
      violated_pipelines: [
        { pipeline: 'daily', consecutive_failures: 3, latest_run: '2026-03-13T01:00:00Z', severity: 'warning' },
      ],
    });
  });

  it('should exclude runs outside a shorter window', async () => {
    const result = await checkMetricThresholds(dir, { config: new Config(), days: 5, now: TEST_NOW });

    expect(result.summary.total_runs).toBe(1);
    expect(result.summary.pipelines.daily?.runs).toBe(1);
    expect(result.violations).toHaveLength(1);
  });
});
