import { describe, it, expect } from 'vitest';
import {
  Config,
  DEFAULT_ALERT_DEDUP_TTL_SEC,
  readFloatSetting,
  readIntSetting,
} from '../src/config';

describe('Config', () => {
  it('should fall back to defaults', () => {
    const config = new Config();

    expect(config.logsDir).toBe('logs');
    expect(config.runbookPath).toBe('docs/runbook.md');
    expect(config.dedupStatePath).toBe('logs/alert_dedup_state.json');
    expect(config.dedupCooldownSec).toBe(600);
    expect(config.dedupTtlSec).toBe(DEFAULT_ALERT_DEDUP_TTL_SEC);
    expect(DEFAULT_ALERT_DEDUP_TTL_SEC).toBe(604800);
    expect(config.thresholds).toEqual({ profile: undefined, maxDurationSec: {}, maxFailureRate: {} });
    expect(config.continuity).toEqual({});
  });

  it('should read every key from the environment map', () => {
    const config = Config.fromEnv({
      OPS_LOGS_DIR: '/var/ops/logs',
      OPS_RUNBOOK_PATH: '/var/ops/runbook.md',
      ALERT_DEDUP_STATE_PATH: '/var/ops/state.json',
      ALERT_DEDUP_COOLDOWN_SEC: '30',
      ALERT_DEDUP_TTL_SEC: '0',
      METRIC_THRESHOLD_PROFILE: 'stg',
      METRIC_MAX_DURATION_DAILY_SEC: '100',
      METRIC_MAX_FAILURE_RATE_MONTHLY: '0.4',
      METRIC_SLO_CONSECUTIVE_ALERT_N: '2',
      METRIC_SLO_CONSECUTIVE_ALERT_CRITICAL_N: '4',
    });

    expect(config.logsDir).toBe('/var/ops/logs');
    expect(config.runbookPath).toBe('/var/ops/runbook.md');
    expect(config.dedupStatePath).toBe('/var/ops/state.json');
    expect(config.dedupCooldownSec).toBe(30);
    expect(config.dedupTtlSec).toBe(0);
    expect(config.thresholds.profile).toBe('stg');
    expect(config.thresholds.maxDurationSec.daily).toBe('100');
    expect(config.thresholds.maxDurationSec.weekly).toBeUndefined();
    expect(config.thresholds.maxFailureRate.monthly).toBe('0.4');
    expect(config.continuity).toEqual({ warningLimit: '2', criticalLimit: '4' });
  });

  it('should treat blank paths as unset', () => {
    const config = Config.fromEnv({ OPS_LOGS_DIR: '   ' });
    expect(config.logsDir).toBe('logs');
  });

  it('should warn and use defaults for invalid dedup settings', () => {
    const config = Config.fromEnv({ ALERT_DEDUP_COOLDOWN_SEC: 'soon', ALERT_DEDUP_TTL_SEC: '-5' });

    expect(config.dedupCooldownSec).toBe(600);
    expect(config.dedupTtlSec).toBe(0);
    expect(console.warn).toHaveBeenCalledWith(
      "Invalid value for ALERT_DEDUP_COOLDOWN_SEC: 'soon', using default 600"
    );
  });

  it('should override paths without touching other settings', () => {
    const config = new Config({ dedupCooldownSec: 42, thresholds: { profile: 'dev' } });
    const copy = config.withPaths({ logsDir: '/tmp/other-logs' });

    expect(copy.logsDir).toBe('/tmp/other-logs');
    expect(copy.dedupStatePath).toBe('logs/alert_dedup_state.json');
    expect(copy.dedupCooldownSec).toBe(42);
    expect(copy.thresholds.profile).toBe('dev');
  });
});

describe('readFloatSetting', () => {
  const bounds = { name: 'TEST_RATE', defaultValue: 0.1, minimum: 0, maximum: 1 };

  it('should parse decimal and exponent forms', () => {
    expect(readFloatSetting('0.25', bounds)).toBe(0.25);
    expect(readFloatSetting(' 1e-1 ', bounds)).toBe(0.1);
    expect(readFloatSetting(0.3, bounds)).toBe(0.3);
  });

  it('should clamp to the bounds', () => {
    expect(readFloatSetting('1.5', bounds)).toBe(1);
    expect(readFloatSetting('-0.2', bounds)).toBe(0);
  });

  it('should use the default for blank or invalid values', () => {
    expect(readFloatSetting(undefined, bounds)).toBe(0.1);
    expect(readFloatSetting('', bounds)).toBe(0.1);
    expect(console.warn).not.toHaveBeenCalled();

    expect(readFloatSetting('ten percent', bounds)).toBe(0.1);
    expect(readFloatSetting(Number.NaN, bounds)).toBe(0.1);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });
});

describe('readIntSetting', () => {
  const bounds = { name: 'TEST_LIMIT', defaultValue: 3, minimum: 1 };

  it('should parse integers and apply the minimum', () => {
    expect(readIntSetting('7', bounds)).toBe(7);
    expect(readIntSetting('0', bounds)).toBe(1);
  });

  it('should reject fractional values', () => {
    expect(readIntSetting('2.5', bounds)).toBe(3);
    expect(readIntSetting(2.5, bounds)).toBe(3);
    expect(console.warn).toHaveBeenCalledWith('Non-integer value for TEST_LIMIT: 2.5, using default 3');
  });
});
