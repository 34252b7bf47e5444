/**
 * CLI Tests
 *
 * Exit codes and console output of the command line entry point.
 */

import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { main } from '../cli.js';
import type { ScreenDependencies } from '../tools/screening/low-float-screen.js';
import { SourceUnavailableError } from '../utils/errors.js';

let dir: string;
let logSpy: jest.SpyInstance;
let errorSpy: jest.SpyInstance;

function stubDependencies(): ScreenDependencies {
  return {
    loadSymbols: async () => ['AAA', 'BBB'],
    enrich: async (symbol) => ({
      symbol,
      float: symbol === 'AAA' ? 4_200_000 : null,
      shortName: 'Alpha Corp',
      exchange: 'NMS',
      marketCap: 50_000_000,
    }),
    checkEligibility: async () => true,
  };
}

function printed(spy: jest.SpyInstance): string[] {
  return spy.mock.calls.map((call) => String(call[0]));
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'low-float-cli-'));
  logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  logSpy.mockRestore();
  errorSpy.mockRestore();
  rmSync(dir, { recursive: true, force: true });
});

describe('main', () => {
  it('prints usage for --help', async () => {
    await expect(main(['--help'])).resolves.toBe(0);
    expect(printed(logSpy)[0]).toMatch(/^Usage: low-float-screen/);
  });

  it('writes the CSV and prints the summary', async () => {
    const output = join(dir, 'low_float.csv');
    const settings = join(dir, 'settings.json');

    const code = await main(['--quiet', '--settings', settings, '--output', output], stubDependencies);

    expect(code).toBe(0);
    expect(readFileSync(output, 'utf8')).toBe(
      'symbol,float,shortName,exchange,marketCap\r\nAAA,4200000,Alpha Corp,NMS,50000000\r\n'
    );
    const lines = printed(logSpy);
    expect(lines.slice(0, 2)).toEqual(['Downloading US symbol lists...', 'Symbols to check: 2']);
    expect(lines).toContain('Found 1 tickers with float <= 10,000,000');
    expect(lines).toContain('AAA        float=4,200,000  exchange=NMS  name=Alpha Corp');
    expect(lines[lines.length - 1]).toBe(`\nCSV saved to: ${output}`);
  });

  it('announces the brokerage stage with the candidate count', async () => {
    const output = join(dir, 'eligible.csv');

    const code = await main(
      ['--quiet', '--robinhood', '--settings', join(dir, 'settings.json'), '--output', output],
      stubDependencies
    );

    expect(code).toBe(0);
    expect(printed(logSpy).slice(0, 3)).toEqual([
      'Downloading US symbol lists...',
      'Symbols to check: 2',
      'Checking brokerage eligibility for 1 candidates...',
    ]);
  });

  it('exits with 2 on invalid flags', async () => {
    const code = await main(['--workers', '0', '--settings', join(dir, 'settings.json')], stubDependencies);

    expect(code).toBe(2);
    expect(printed(errorSpy)[0]).toMatch(/^error: workers: /);
  });

  it('exits with 1 when the symbol directories are unavailable', async () => {
    const output = join(dir, 'never.csv');
    const failing = (): ScreenDependencies => ({
      ...stubDependencies(),
      loadSymbols: async () => {
        throw new SourceUnavailableError({
          message: 'Symbol directory request failed: 503 Service Unavailable (https://dir.test/a.txt)',
          url: 'https://dir.test/a.txt',
          status: 503,
        });
      },
    });

    const code = await main(['--quiet', '--settings', join(dir, 'settings.json'), '--output', output], failing);

    expect(code).toBe(1);
    expect(printed(errorSpy)).toEqual([
      'error: Symbol directory request failed: 503 Service Unavailable (https://dir.test/a.txt)',
    ]);
    expect(existsSync(output)).toBe(false);
  });

  it('exits with 1 when the report cannot be written', async () => {
    const blocker = join(dir, 'not-a-dir');
    writeFileSync(blocker, 'plain file');
    const output = join(blocker, 'low_float.csv');

    const code = await main(['--quiet', '--settings', join(dir, 'settings.json'), '--output', output], stubDependencies);

    expect(code).toBe(1);
    const errors = printed(errorSpy);
    expect(errors).toHaveLength(1);
    expect(errors[0].startsWith(`error: Failed to write report to ${output}: `)).toBe(true);
  });
});
