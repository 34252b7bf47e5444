import { buildApiUrl, parseJsonObject } from '../finance/api.js';
import { logToFile } from '../../utils/file-logger.js';
import { errorMessage } from '../../utils/errors.js';

export const DEFAULT_BROKER_API_URL = 'https://api.robinhood.com';
const INSTRUMENTS_ENDPOINT = '/instruments/';
const DEFAULT_TIMEOUT_MS = 6000;

export interface InstrumentLookupOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * True only when the brokerage answers 200 with a non-empty `results` list.
 * Every other outcome, including network errors, counts as unsupported.
 */
export async function checkEligibility(symbol: string, options: InstrumentLookupOptions = {}): Promise<boolean> {
  const url = buildApiUrl(options.baseUrl ?? DEFAULT_BROKER_API_URL, INSTRUMENTS_ENDPOINT, { symbol }).toString();
  try {
    const response = await fetch(url, {
      headers: { accept: 'application/json' },
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });
    if (response.status !== 200) {
      logToFile('instrument-lookup', 'eligibility_rejected', { symbol, status: response.status });
      return false;
    }
    const data = parseJsonObject(await response.text());
    const results = data?.results;
    return Array.isArray(results) && results.length > 0;
  } catch (error) {
    logToFile('instrument-lookup', 'eligibility_failed', { symbol, error: errorMessage(error) });
    return false;
  }
}
