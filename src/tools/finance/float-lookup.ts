import { callApi, DEFAULT_DATA_API_URL, isRecord } from './api.js';
import { logToFile } from '../../utils/file-logger.js';
import { errorMessage } from '../../utils/errors.js';
import type { Result } from '../../utils/batch-runner.js';

export const DEFAULT_QUOTE_ENDPOINT = '/company/facts/';
const DEFAULT_TIMEOUT_MS = 15000;

// Checked in order; the first positive number wins.
const FLOAT_KEYS = [
  'floatShares',
  'sharesFloat',
  'float',
  'sharesOutstanding',
  'float_shares',
  'shares_outstanding',
];
// Second pass for providers that send counts as "12,345,678".
const FLOAT_STRING_KEYS = ['floatShares', 'sharesOutstanding', 'float_shares', 'shares_outstanding'];
const PAYLOAD_KEYS = ['company_facts', 'quote', 'info', 'result'];

type GenericRow = Record<string, unknown>;

export interface EnrichmentRecord {
  symbol: string;
  float: number | null;
  shortName: string | null;
  exchange: string | null;
  marketCap: number | null;
}

export interface FloatLookupOptions {
  baseUrl?: string;
  endpoint?: string;
  timeoutMs?: number;
}

export function emptyRecord(symbol: string): EnrichmentRecord {
  return { symbol, float: null, shortName: null, exchange: null, marketCap: null };
}

function asString(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length > 0 ? value : null;
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string') {
    const trimmed = value.replace(/,/g, '').trim();
    if (!trimmed) return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function extractFloatShares(info: GenericRow): number | null {
  for (const key of FLOAT_KEYS) {
    const value = info[key];
    if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
      return Math.trunc(value);
    }
  }
  for (const key of FLOAT_STRING_KEYS) {
    const value = info[key];
    if (typeof value !== 'string') continue;
    const parsed = toNumber(value);
    if (parsed === null) continue;
    const shares = Math.trunc(parsed);
    if (shares > 0) return shares;
  }
  return null;
}

export function extractFloatRecord(symbol: string, info: GenericRow): EnrichmentRecord {
  return {
    symbol,
    float: extractFloatShares(info),
    shortName: asString(info.shortName) ?? asString(info.name),
    exchange: asString(info.exchange),
    marketCap: toNumber(info.marketCap) ?? toNumber(info.market_cap),
  };
}

function pickPayload(data: GenericRow): GenericRow {
  for (const key of PAYLOAD_KEYS) {
    const value = data[key];
    const entry: unknown = Array.isArray(value) ? value[0] : value;
    if (isRecord(entry)) return entry;
  }
  return data;
}

export async function lookupFloat(
  symbol: string,
  options: FloatLookupOptions = {}
): Promise<Result<EnrichmentRecord>> {
  try {
    const { data } = await callApi(
      options.endpoint ?? DEFAULT_QUOTE_ENDPOINT,
      { ticker: symbol },
      { baseUrl: options.baseUrl ?? DEFAULT_DATA_API_URL, timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS }
    );
    return { ok: true, value: extractFloatRecord(symbol, pickPayload(data)) };
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }
}

/** Never rejects: a failed lookup is an all-null record. */
export async function enrichSymbol(symbol: string, options: FloatLookupOptions = {}): Promise<EnrichmentRecord> {
  const result = await lookupFloat(symbol, options);
  if (result.ok) return result.value;
  logToFile('float-lookup', 'enrich_failed', { symbol, error: result.error });
  return emptyRecord(symbol);
}
