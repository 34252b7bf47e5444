/**
 * Screen Config Tests
 *
 * Defaults, settings file, environment and explicit overrides.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ZodError } from 'zod';
import { clearSettingsCache, getSetting, loadSettings, resolveScreenConfig } from '../config.js';

let dir: string;

function writeSettings(contents: string): string {
  const file = join(dir, 'settings.json');
  writeFileSync(file, contents);
  return file;
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'low-float-config-'));
  clearSettingsCache();
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('loadSettings', () => {
  it('returns an empty object for a missing file', () => {
    expect(loadSettings(join(dir, 'missing.json'))).toEqual({});
  });

  it('returns an empty object for an unparsable file', () => {
    expect(loadSettings(writeSettings('{ not json'))).toEqual({});
  });

  it('reads a section by key', () => {
    const file = writeSettings(JSON.stringify({ screen: { cutoff: 1 } }));

    expect(getSetting('screen', file)).toEqual({ cutoff: 1 });
    expect(getSetting('other', file)).toBeUndefined();
  });
});

describe('resolveScreenConfig', () => {
  it('falls back to the built-in defaults', () => {
    const config = resolveScreenConfig({}, { settingsPath: join(dir, 'missing.json'), env: {} });

    expect(config).toEqual({
      cutoff: 10_000_000,
      eligibility: false,
      output: 'low_float.csv',
      workers: 8,
      eligibilityWorkers: 8,
      limit: 0,
      timeoutMs: 15000,
      eligibilityTimeoutMs: 6000,
      directoryTimeoutMs: 15000,
      directoryUrls: [
        'https://ftp.nasdaqtrader.com/dynamic/SymDir/nasdaqlisted.txt',
        'https://ftp.nasdaqtrader.com/dynamic/SymDir/otherlisted.txt',
      ],
      dataApiUrl: 'https://api.financialdatasets.ai',
      quoteEndpoint: '/company/facts/',
      brokerApiUrl: 'https://api.robinhood.com',
    });
  });

  it('uses at least four eligibility workers unless set explicitly', () => {
    const settingsPath = join(dir, 'missing.json');

    expect(resolveScreenConfig({ workers: 2 }, { settingsPath, env: {} }).eligibilityWorkers).toBe(4);
    expect(resolveScreenConfig({ workers: 12 }, { settingsPath, env: {} }).eligibilityWorkers).toBe(12);
    expect(resolveScreenConfig({ workers: 2, eligibilityWorkers: 1 }, { settingsPath, env: {} }).eligibilityWorkers).toBe(1);
  });

  it('layers settings, environment and overrides with overrides winning', () => {
    const settingsPath = writeSettings(
      JSON.stringify({
        screen: { cutoff: '2500000', workers: 2, dataApiUrl: 'https://settings.test', brokerApiUrl: 'https://broker-settings.test' },
      })
    );

    const config = resolveScreenConfig(
      { workers: 6, output: undefined },
      { settingsPath, env: { LOW_FLOAT_DATA_API_URL: 'https://env.test' } }
    );

    expect(config.cutoff).toBe(2_500_000);
    expect(config.workers).toBe(6);
    expect(config.output).toBe('low_float.csv');
    expect(config.dataApiUrl).toBe('https://env.test');
    expect(config.brokerApiUrl).toBe('https://broker-settings.test');
  });

  it('rejects invalid values', () => {
    const settingsPath = join(dir, 'missing.json');

    expect(() => resolveScreenConfig({ cutoff: -1 }, { settingsPath, env: {} })).toThrow(ZodError);
    expect(() => resolveScreenConfig({ workers: 0 }, { settingsPath, env: {} })).toThrow(ZodError);
    expect(() => resolveScreenConfig({ limit: 1.5 }, { settingsPath, env: {} })).toThrow(ZodError);
  });
});
