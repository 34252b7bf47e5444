/**
 * Low-float screener command line.
 *
 * Run:
 *   low-float-screen --cutoff 10000000 --robinhood --output low_float.csv --workers 10 --limit 0
 */

import { ZodError } from 'zod';
import { resolveScreenConfig } from './utils/config.js';
import type { ScreenConfig } from './utils/config.js';
import { parseScreenArgs, SCREEN_USAGE } from './utils/screen-args.js';
import { ScreenArgsError, errorMessage } from './utils/errors.js';
import { formatConsoleSummary, writeReportCsv } from './utils/low-float-report.js';
import { logToFile } from './utils/file-logger.js';
import { defaultScreenDependencies, runLowFloatScreen } from './tools/screening/low-float-screen.js';
import type { ScreenDependencies, ScreenStage } from './tools/screening/low-float-screen.js';
import type { BatchProgress } from './utils/batch-runner.js';

const STAGE_LABELS: Record<ScreenStage, string> = {
  enrich: 'Float lookups',
  eligibility: 'Brokerage checks',
};

function printProgress(stage: ScreenStage, progress: BatchProgress<string>): void {
  const done = progress.completed === progress.total;
  process.stderr.write(`\r${STAGE_LABELS[stage]} ${progress.completed}/${progress.total}${done ? '\n' : ''}`);
}

function printStageStart(stage: ScreenStage, total: number): void {
  console.log(stage === 'enrich' ? `Symbols to check: ${total}` : `Checking brokerage eligibility for ${total} candidates...`);
}

function formatZodError(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`).join('; ');
}

type PreparedRun = { config: ScreenConfig; quiet: boolean } | { exitCode: number };

function prepareRun(argv: string[]): PreparedRun {
  try {
    const args = parseScreenArgs(argv);
    if (args.help) {
      console.log(SCREEN_USAGE);
      return { exitCode: 0 };
    }
    return {
      config: resolveScreenConfig(args.overrides, { settingsPath: args.settingsPath }),
      quiet: args.quiet,
    };
  } catch (error) {
    if (error instanceof ScreenArgsError || error instanceof ZodError) {
      const message = error instanceof ZodError ? formatZodError(error) : error.message;
      console.error(`error: ${message}\n\n${SCREEN_USAGE}`);
      return { exitCode: 2 };
    }
    throw error;
  }
}

export async function main(
  argv: string[],
  createDependencies: (config: ScreenConfig) => ScreenDependencies = defaultScreenDependencies
): Promise<number> {
  const prepared = prepareRun(argv);
  if ('exitCode' in prepared) return prepared.exitCode;
  const { config, quiet } = prepared;

  const deps: ScreenDependencies = {
    ...createDependencies(config),
    onStageStart: printStageStart,
    onProgress: quiet ? undefined : printProgress,
  };

  try {
    console.log('Downloading US symbol lists...');
    const { rows } = await runLowFloatScreen(config, deps);
    const outputPath = await writeReportCsv(config.output, rows);
    console.log('');
    formatConsoleSummary(rows, config.cutoff).forEach((line) => console.log(line));
    console.log(`\nCSV saved to: ${outputPath}`);
    return 0;
  } catch (error) {
    logToFile('cli', 'screen_failed', { error: errorMessage(error) });
    console.error(`error: ${errorMessage(error)}`);
    return 1;
  }
}

