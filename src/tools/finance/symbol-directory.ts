import { logToFile } from '../../utils/file-logger.js';
import { SourceUnavailableError, errorMessage } from '../../utils/errors.js';

export const NASDAQ_LISTED_URL = 'https://ftp.nasdaqtrader.com/dynamic/SymDir/nasdaqlisted.txt';
export const OTHER_LISTED_URL = 'https://ftp.nasdaqtrader.com/dynamic/SymDir/otherlisted.txt';
export const DEFAULT_DIRECTORY_URLS = [NASDAQ_LISTED_URL, OTHER_LISTED_URL];

const FOOTER_MARKER = 'File Creation';
const HEADER_SYMBOL = 'Symbol';
const FIELD_DELIMITER = '|';
const DEFAULT_TIMEOUT_MS = 15000;

export interface LoadSymbolsOptions {
  urls?: string[];
  timeoutMs?: number;
}

/**
 * Parses one pipe-delimited symbol directory file. The first line is the
 * header; parsing stops at the first blank line or the "File Creation" footer.
 */
export function parseSymbolDirectory(text: string): string[] {
  const lines = text.split('\n').map((line) => line.replace(/\r$/, ''));
  const symbols: string[] = [];
  for (const line of lines.slice(1)) {
    if (!line || line.startsWith(FOOTER_MARKER)) break;
    const symbol = line.split(FIELD_DELIMITER)[0].trim();
    if (symbol && symbol !== HEADER_SYMBOL) {
      symbols.push(symbol);
    }
  }
  return symbols;
}

async function fetchDirectory(url: string, timeoutMs: number): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    throw new SourceUnavailableError({
      message: `Symbol directory unreachable: ${url} (${errorMessage(error)})`,
      url,
    });
  }
  if (!response.ok) {
    throw new SourceUnavailableError({
      message: `Symbol directory request failed: ${response.status} ${response.statusText} (${url})`,
      url,
      status: response.status,
    });
  }
  try {
    return await response.text();
  } catch (error) {
    throw new SourceUnavailableError({
      message: `Symbol directory read failed: ${url} (${errorMessage(error)})`,
      url,
      status: response.status,
    });
  }
}

export async function loadSymbols(options: LoadSymbolsOptions = {}): Promise<string[]> {
  const urls = options.urls ?? DEFAULT_DIRECTORY_URLS;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const unique = new Set<string>();
  for (const url of urls) {
    const text = await fetchDirectory(url, timeoutMs);
    const parsed = parseSymbolDirectory(text);
    parsed.forEach((symbol) => unique.add(symbol));
    logToFile('symbol-directory', 'directory_parsed', { url, count: parsed.length });
  }
  const symbols = Array.from(unique).sort();
  logToFile('symbol-directory', 'symbols_loaded', { sources: urls.length, count: symbols.length });
  return symbols;
}
