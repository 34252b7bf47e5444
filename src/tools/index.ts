export { lowFloatScreen, runLowFloatScreen, defaultScreenDependencies } from './screening/low-float-screen.js';
export type { ScreenDependencies, ScreenResult, ScreenStage, ScreenSummary } from './screening/low-float-screen.js';
export { loadSymbols, parseSymbolDirectory, DEFAULT_DIRECTORY_URLS } from './finance/symbol-directory.js';
export { enrichSymbol, lookupFloat, extractFloatRecord, extractFloatShares, emptyRecord } from './finance/float-lookup.js';
export type { EnrichmentRecord, FloatLookupOptions } from './finance/float-lookup.js';
export { checkEligibility } from './broker/instrument-lookup.js';
export type { InstrumentLookupOptions } from './broker/instrument-lookup.js';
export { callApi } from './finance/api.js';
export { formatToolResult } from './types.js';

// Tool descriptions
export { LOW_FLOAT_SCREEN_DESCRIPTION } from './descriptions/index.js';
