export { logToFile, getLogPath } from './file-logger.js';
export type { LogEntry } from './file-logger.js';
export { loadSettings, getSetting, clearSettingsCache, resolveScreenConfig, ScreenConfigSchema } from './config.js';
export type { ScreenConfig, ScreenConfigInput } from './config.js';
export { runBatch } from './batch-runner.js';
export type { BatchOutcome, BatchProgress, Result, RunBatchOptions } from './batch-runner.js';
export {
  buildReport,
  filterByFloat,
  filterByEligibility,
  sortByFloat,
  formatReportCsv,
  writeReportCsv,
  formatConsoleSummary,
  CSV_HEADERS,
} from './low-float-report.js';
export type { ReportRow } from './low-float-report.js';
export { parseScreenArgs, SCREEN_USAGE } from './screen-args.js';
export type { ScreenArgs } from './screen-args.js';
export {
  SourceUnavailableError,
  OutputWriteError,
  ApiRequestError,
  ScreenArgsError,
} from './errors.js';
