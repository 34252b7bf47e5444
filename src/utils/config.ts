import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { DEFAULT_DATA_API_URL, isRecord } from '../tools/finance/api.js';
import { DEFAULT_QUOTE_ENDPOINT } from '../tools/finance/float-lookup.js';
import { DEFAULT_DIRECTORY_URLS } from '../tools/finance/symbol-directory.js';
import { DEFAULT_BROKER_API_URL } from '../tools/broker/instrument-lookup.js';
import { logToFile } from './file-logger.js';

export const DEFAULT_SETTINGS_PATH = '.lowfloat/settings.json';
export const MIN_ELIGIBILITY_WORKERS = 4;

const settingsCache = new Map<string, Record<string, unknown>>();

export const ScreenConfigSchema = z.object({
  cutoff: z.coerce.number().int().min(0).default(10_000_000),
  eligibility: z.boolean().default(false),
  output: z.string().min(1).default('low_float.csv'),
  workers: z.coerce.number().int().min(1).default(8),
  eligibilityWorkers: z.coerce.number().int().min(1).optional(),
  limit: z.coerce.number().int().min(0).default(0),
  timeoutMs: z.coerce.number().int().positive().default(15000),
  eligibilityTimeoutMs: z.coerce.number().int().positive().default(6000),
  directoryTimeoutMs: z.coerce.number().int().positive().default(15000),
  directoryUrls: z.array(z.string().url()).min(1).default(DEFAULT_DIRECTORY_URLS),
  dataApiUrl: z.string().url().default(DEFAULT_DATA_API_URL),
  quoteEndpoint: z.string().startsWith('/').default(DEFAULT_QUOTE_ENDPOINT),
  brokerApiUrl: z.string().url().default(DEFAULT_BROKER_API_URL),
});

export type ScreenConfigInput = z.input<typeof ScreenConfigSchema>;
export type ScreenConfig = Omit<z.output<typeof ScreenConfigSchema>, 'eligibilityWorkers'> & {
  eligibilityWorkers: number;
};

export function loadSettings(settingsPath: string = DEFAULT_SETTINGS_PATH): Record<string, unknown> {
  const fullPath = resolve(settingsPath);
  const cached = settingsCache.get(fullPath);
  if (cached) return cached;

  let settings: Record<string, unknown> = {};
  if (existsSync(fullPath)) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(fullPath, 'utf-8'));
      if (isRecord(parsed)) {
        settings = parsed;
      }
    } catch (error) {
      logToFile('config', 'settings_parse_error', {
        file: fullPath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
  settingsCache.set(fullPath, settings);
  return settings;
}

export function clearSettingsCache(): void {
  settingsCache.clear();
}

export function getSetting(key: string, settingsPath?: string): unknown {
  return loadSettings(settingsPath)[key];
}

function compact(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  return compact({
    dataApiUrl: env.LOW_FLOAT_DATA_API_URL,
    brokerApiUrl: env.LOW_FLOAT_BROKER_API_URL,
  });
}

export interface ResolveScreenConfigOptions {
  settingsPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Layers defaults, the `screen` settings section, environment overrides and
 * explicit overrides (highest wins), then validates the result.
 */
export function resolveScreenConfig(
  overrides: Partial<ScreenConfigInput> = {},
  options: ResolveScreenConfigOptions = {}
): ScreenConfig {
  const fromSettings = getSetting('screen', options.settingsPath);
  const settings = isRecord(fromSettings) ? compact(fromSettings) : {};
  const parsed = ScreenConfigSchema.parse({
    ...settings,
    ...envOverrides(options.env ?? process.env),
    ...compact(overrides),
  });
  return {
    ...parsed,
    eligibilityWorkers: parsed.eligibilityWorkers ?? Math.max(MIN_ELIGIBILITY_WORKERS, parsed.workers),
  };
}
