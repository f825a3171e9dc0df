import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from '../../src/config';
import { ConfigurationError } from '../../src/utils/errors';

describe('loadConfig', () => {
  it('applies defaults from the bundled settings', () => {
    const config = loadConfig({ env: {} });

    expect(config.leads.max_output).toBe(25);
    expect(config.leads.min_output).toBe(10);
    expect(config.scoring.thresholds).toEqual({ hot: 70, medium: 45 });
    expect(config.enrichment.locale).toBe('en-GB');
    expect(config.runtime.lookbackDays).toBe(30);
    expect(config.runtime.searchMaxCallsPerRun).toBe(80);
    expect(config.runtime.sqlitePath).toBe('./data/lead_radar.sqlite');
    expect(config.runtime.hiringIntentEnabled).toBe(false);
    expect(config.logging).toEqual({ level: 'info', production: false, serviceName: 'lead-radar', logDir: undefined });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      env: {
        LOOKBACK_DAYS: '14',
        SEARCH_MAX_CALLS_PER_RUN: '0',
        INCLUDE_PERSONAL_EMAILS: 'true',
        LOG_LEVEL: 'debug',
        NODE_ENV: 'production',
      },
    });

    expect(config.runtime.lookbackDays).toBe(14);
    expect(config.runtime.searchMaxCallsPerRun).toBe(0);
    expect(config.runtime.includePersonalEmails).toBe(true);
    expect(config.logging.level).toBe('debug');
    expect(config.logging.production).toBe(true);
  });

  it('keeps the minimum output at or below the maximum', () => {
    const config = loadConfig({ env: { MAX_OUTPUT_LEADS: '5', MIN_OUTPUT_LEADS: '8' } });
    expect(config.leads.max_output).toBe(5);
    expect(config.leads.min_output).toBe(5);
  });

  it('rejects malformed and out-of-range values', () => {
    expect(() => loadConfig({ env: { LOOKBACK_DAYS: 'abc' } })).toThrow('LOOKBACK_DAYS must be an integer');
    expect(() => loadConfig({ env: { HTTP_RETRIES: '20' } })).toThrow('HTTP_RETRIES must be <= 10');
    expect(() => loadConfig({ env: { LOG_LEVEL: 'loud' } })).toThrow(ConfigurationError);
  });

  it('rejects missing or invalid settings files', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lead-radar-config-'));
    const broken = path.join(dir, 'settings.yaml');
    fs.writeFileSync(broken, 'scoring: 1\n');

    expect(() => loadConfig({ env: {}, settingsPath: path.join(dir, 'missing.yaml') })).toThrow(/Cannot read settings file/);
    expect(() => loadConfig({ env: {}, settingsPath: broken })).toThrow(/Invalid settings file/);

    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns a frozen object', () => {
    const config = loadConfig({ env: {} });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.scoring.weights)).toBe(true);
    expect(Object.isFrozen(config.enrichment.deny_domains)).toBe(true);
  });
});
