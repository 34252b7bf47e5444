import { logToFile } from '../../utils/file-logger.js';
import { ApiRequestError } from '../../utils/errors.js';

export const DEFAULT_DATA_API_URL = 'https://api.financialdatasets.ai';
const DEFAULT_TIMEOUT_MS = 15000;

function sanitizeJsonText(raw: string): string {
  return raw
    .replace(/-Infinity\b/g, 'null')
    .replace(/\bNaN\b/g, 'null')
    .replace(/\bInfinity\b/g, 'null');
}

export interface ApiResponse {
  data: Record<string, unknown>;
  url: string;
}

export interface CallApiOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

export function buildApiUrl(
  baseUrl: string,
  endpoint: string,
  params: Record<string, string | number | string[] | undefined>
): URL {
  const url = new URL(`${baseUrl.replace(/\/+$/, '')}${endpoint}`);

  // Add params to URL, handling arrays
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null) {
      if (Array.isArray(value)) {
        value.forEach((v) => url.searchParams.append(key, v));
      } else {
        url.searchParams.append(key, String(value));
      }
    }
  }
  return url;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJsonObject(rawText: string): Record<string, unknown> | null {
  for (const candidate of [rawText, sanitizeJsonText(rawText)]) {
    try {
      const parsed: unknown = JSON.parse(candidate);
      return isRecord(parsed) ? parsed : null;
    } catch {
      continue;
    }
  }
  return null;
}

export async function callApi(
  endpoint: string,
  params: Record<string, string | number | string[] | undefined>,
  options: CallApiOptions = {}
): Promise<ApiResponse> {
  // Read API key lazily at call time (after dotenv has loaded)
  const FINANCIAL_DATASETS_API_KEY = process.env.FINANCIAL_DATASETS_API_KEY;
  const url = buildApiUrl(options.baseUrl ?? DEFAULT_DATA_API_URL, endpoint, params).toString();

  const response = await fetch(url, {
    headers: {
      'x-api-key': FINANCIAL_DATASETS_API_KEY || '',
      accept: 'application/json',
    },
    signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
  });

  const rawText = await response.text();
  if (!response.ok) {
    throw new ApiRequestError({
      message: `API request failed: ${response.status} ${response.statusText}`,
      url,
      status: response.status,
      statusText: response.statusText,
      bodySnippet: rawText.slice(0, 500),
    });
  }

  const data = parseJsonObject(rawText);
  if (!data) {
    logToFile('finance-api', 'json_parse_error', {
      endpoint,
      status: response.status,
      bodySnippet: rawText.slice(0, 500),
    });
    throw new ApiRequestError({
      message: 'Failed to parse JSON',
      url,
      status: response.status,
      bodySnippet: rawText.slice(0, 500),
    });
  }
  return { data, url };
}
