import { DynamicStructuredTool } from '@langchain/core/tools';
import { z } from 'zod';
import { loadSymbols } from '../finance/symbol-directory.js';
import { emptyRecord, enrichSymbol } from '../finance/float-lookup.js';
import type { EnrichmentRecord } from '../finance/float-lookup.js';
import { checkEligibility } from '../broker/instrument-lookup.js';
import { formatToolResult } from '../types.js';
import { LOW_FLOAT_SCREEN_DESCRIPTION } from '../descriptions/index.js';
import { runBatch } from '../../utils/batch-runner.js';
import type { BatchProgress } from '../../utils/batch-runner.js';
import { resolveScreenConfig } from '../../utils/config.js';
import type { ScreenConfig } from '../../utils/config.js';
import { logToFile } from '../../utils/file-logger.js';
import {
  buildReport,
  filterByFloat,
  formatConsoleSummary,
  writeReportCsv,
} from '../../utils/low-float-report.js';
import type { ReportRow } from '../../utils/low-float-report.js';

const TOOL_SUMMARY_ROWS = 25;

export type ScreenStage = 'enrich' | 'eligibility';

export interface ScreenDependencies {
  loadSymbols: () => Promise<string[]>;
  enrich: (symbol: string) => Promise<EnrichmentRecord>;
  checkEligibility: (symbol: string) => Promise<boolean>;
  onStageStart?: (stage: ScreenStage, total: number) => void;
  onProgress?: (stage: ScreenStage, progress: BatchProgress<string>) => void;
}

export interface ScreenSummary {
  symbols_loaded: number;
  symbols_processed: number;
  missing_float: number;
  float_candidates: number;
  eligibility_checked: number;
  reported: number;
}

export interface ScreenResult {
  rows: ReportRow[];
  summary: ScreenSummary;
}

export function defaultScreenDependencies(config: ScreenConfig): ScreenDependencies {
  return {
    loadSymbols: () => loadSymbols({ urls: config.directoryUrls, timeoutMs: config.directoryTimeoutMs }),
    enrich: (symbol) =>
      enrichSymbol(symbol, {
        baseUrl: config.dataApiUrl,
        endpoint: config.quoteEndpoint,
        timeoutMs: config.timeoutMs,
      }),
    checkEligibility: (symbol) =>
      checkEligibility(symbol, { baseUrl: config.brokerApiUrl, timeoutMs: config.eligibilityTimeoutMs }),
  };
}

/**
 * Symbols -> float lookups -> cutoff -> brokerage checks (optional) -> sort.
 * Only a symbol-directory failure can reject; lookup failures drop the symbol.
 */
export async function runLowFloatScreen(config: ScreenConfig, deps: ScreenDependencies): Promise<ScreenResult> {
  const loaded = await deps.loadSymbols();
  const symbols = config.limit > 0 ? loaded.slice(0, config.limit) : loaded;
  logToFile('low-float-screen', 'start', {
    symbols: symbols.length,
    cutoff: config.cutoff,
    eligibility: config.eligibility,
    workers: config.workers,
  });

  deps.onStageStart?.('enrich', symbols.length);
  const enrichOutcomes = await runBatch(symbols, deps.enrich, {
    concurrency: config.workers,
    onProgress: (progress) => deps.onProgress?.('enrich', progress),
  });
  const records: EnrichmentRecord[] = enrichOutcomes.map(({ item, result }) => {
    if (result.ok) return result.value;
    logToFile('low-float-screen', 'enrich_rejected', { symbol: item, error: result.error });
    return emptyRecord(item);
  });
  const missingFloat = records.filter((record) => record.float === null).length;
  const candidates = filterByFloat(records, config.cutoff);
  const floatCandidates = candidates.length;
  logToFile('low-float-screen', 'float_filtered', {
    processed: records.length,
    missing_float: missingFloat,
    candidates: floatCandidates,
  });

  let eligibility: Map<string, boolean> | null = null;
  if (config.eligibility) {
    deps.onStageStart?.('eligibility', floatCandidates);
    const eligibilityOutcomes = await runBatch(
      candidates.map((row) => row.symbol),
      deps.checkEligibility,
      {
        concurrency: config.eligibilityWorkers,
        onProgress: (progress) => deps.onProgress?.('eligibility', progress),
      }
    );
    eligibility = new Map<string, boolean>();
    for (const { item, result } of eligibilityOutcomes) {
      eligibility.set(item, result.ok && result.value);
    }
    logToFile('low-float-screen', 'eligibility_checked', {
      checked: eligibilityOutcomes.length,
      eligible: Array.from(eligibility.values()).filter(Boolean).length,
    });
  }

  const rows = buildReport(records, config.cutoff, eligibility);
  const summary: ScreenSummary = {
    symbols_loaded: loaded.length,
    symbols_processed: symbols.length,
    missing_float: missingFloat,
    float_candidates: floatCandidates,
    eligibility_checked: eligibility ? eligibility.size : 0,
    reported: rows.length,
  };
  logToFile('low-float-screen', 'screen_complete', summary);
  return { rows, summary };
}

interface LowFloatScreenInput {
  cutoff: number;
  eligibility: boolean;
  limit: number;
  workers: number;
  output?: string;
}

const LowFloatScreenInputSchema: z.ZodType<LowFloatScreenInput, z.ZodTypeDef, Partial<LowFloatScreenInput>> = z.object({
  cutoff: z.number().int().min(0).default(10_000_000),
  eligibility: z
    .boolean()
    .default(false)
    .describe('When true, keep only tickers the brokerage lists as tradable instruments.'),
  limit: z.number().int().min(0).default(0).describe('Process only the first N symbols (0 = all).'),
  workers: z.number().int().min(1).max(32).default(8),
  output: z.string().optional().describe('CSV path. Defaults to .lowfloat/outputs/low_float_<timestamp>.csv'),
});

export const lowFloatScreen = new DynamicStructuredTool({
  name: 'low_float_screen',
  description: LOW_FLOAT_SCREEN_DESCRIPTION,
  schema: LowFloatScreenInputSchema,
  func: async (input: LowFloatScreenInput) => {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const config = resolveScreenConfig({
      cutoff: input.cutoff,
      eligibility: input.eligibility,
      limit: input.limit,
      workers: input.workers,
      output: input.output ?? `.lowfloat/outputs/low_float_${timestamp}.csv`,
    });
    const { rows, summary } = await runLowFloatScreen(config, defaultScreenDependencies(config));
    const outputPath = await writeReportCsv(config.output, rows);
    return formatToolResult(
      {
        summary,
        output_path: outputPath,
        top: rows.slice(0, TOOL_SUMMARY_ROWS),
        summary_lines: formatConsoleSummary(rows, config.cutoff, TOOL_SUMMARY_ROWS),
      },
      [...config.directoryUrls]
    );
  },
});
