import { parseArgs } from 'node:util';
import type { ScreenConfigInput } from './config.js';
import { ScreenArgsError, errorMessage } from './errors.js';

export interface ScreenArgs {
  overrides: Partial<ScreenConfigInput>;
  settingsPath?: string;
  quiet: boolean;
  help: boolean;
}

export const SCREEN_USAGE = `Usage: low-float-screen [options]

Options:
  --cutoff <n>                  Float cutoff, inclusive (default 10000000)
  --robinhood                   Keep only tickers the brokerage lists as instruments
  --output <path>               CSV output file (default low_float.csv)
  --workers <n>                 Parallel float lookups (default 8)
  --eligibility-workers <n>     Parallel brokerage checks (default max(4, workers))
  --limit <n>                   Only process the first n symbols (0 = all)
  --timeout-ms <n>              Per-request timeout for float lookups (default 15000)
  --eligibility-timeout-ms <n>  Per-request timeout for brokerage checks (default 6000)
  --settings <path>             Settings file (default .lowfloat/settings.json)
  --quiet                       Do not print progress
  -h, --help                    Show this help`;

function toNumber(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value.replace(/_/g, ''));
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new ScreenArgsError(`--${flag} expects a number, got "${value}"`);
  }
  return parsed;
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        cutoff: { type: 'string' },
        robinhood: { type: 'boolean' },
        output: { type: 'string' },
        workers: { type: 'string' },
        'eligibility-workers': { type: 'string' },
        limit: { type: 'string' },
        'timeout-ms': { type: 'string' },
        'eligibility-timeout-ms': { type: 'string' },
        settings: { type: 'string' },
        quiet: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    }).values;
  } catch (error) {
    throw new ScreenArgsError(errorMessage(error));
  }
}

export function parseScreenArgs(argv: string[]): ScreenArgs {
  const values = readFlags(argv);
  return {
    overrides: {
      cutoff: toNumber('cutoff', values.cutoff),
      eligibility: values.robinhood,
      output: values.output,
      workers: toNumber('workers', values.workers),
      eligibilityWorkers: toNumber('eligibility-workers', values['eligibility-workers']),
      limit: toNumber('limit', values.limit),
      timeoutMs: toNumber('timeout-ms', values['timeout-ms']),
      eligibilityTimeoutMs: toNumber('eligibility-timeout-ms', values['eligibility-timeout-ms']),
    },
    settingsPath: values.settings,
    quiet: values.quiet ?? false,
    help: values.help ?? false,
  };
}
