import { ConfigurationError } from './errors.js';
import { ONLINE_PLATFORMS, type OnlinePlatform, type RunConfig } from './types/index.js';

export const DEFAULT_LIMIT_PER_PLATFORM = 50;

export const EXPORT_FORMATS = ['csv', 'json'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export type Environment = Readonly<Record<string, string | undefined>>;

/** Command-line strings as commander hands them over. */
export interface RawRunOptions {
  query?: string;
  platforms?: string;
  limit?: string;
  transformer?: boolean;
}

export interface ModelSettings {
  apiKey?: string;
  model?: string;
}

export function resolveRunConfig(raw: RawRunOptions, env: Environment): RunConfig {
  const query = raw.query?.trim();
  if (!query) {
    throw new ConfigurationError('A search query is required (--query).');
  }

  const requested = parseCommaList(raw.platforms);
  const platforms = requested.length > 0 ? requested.map(parsePlatform) : ['reddit' as const];

  return {
    query,
    platforms: [...new Set(platforms)],
    limitPerPlatform: parsePositiveInteger(raw.limit, DEFAULT_LIMIT_PER_PLATFORM, 'limit'),
    useTransformer: raw.transformer ?? false,
    socialXCredential: readSecret(env, 'SOCIAL_X_BEARER_TOKEN') ?? readSecret(env, 'TWITTER_BEARER_TOKEN'),
  };
}

export function resolveModelSettings(env: Environment): ModelSettings {
  const apiKey = readSecret(env, 'OPENAI_API_KEY');
  const model = readSecret(env, 'SENTIMENT_MODEL');
  return {
    ...(apiKey ? { apiKey } : {}),
    ...(model ? { model } : {}),
  };
}

export function parsePlatform(value: string): OnlinePlatform {
  const normalized = value.trim().toLowerCase();
  const platform = ONLINE_PLATFORMS.find((candidate) => candidate === normalized);
  if (!platform) {
    throw new ConfigurationError(`Unknown platform "${value}". Expected one of: ${ONLINE_PLATFORMS.join(', ')}`);
  }
  return platform;
}

export function parseExportFormat(value: string | undefined): ExportFormat {
  if (value === undefined) {
    return 'csv';
  }
  const normalized = value.trim().toLowerCase();
  const format = EXPORT_FORMATS.find((candidate) => candidate === normalized);
  if (!format) {
    throw new ConfigurationError(`Unknown format "${value}". Expected one of: ${EXPORT_FORMATS.join(', ')}`);
  }
  return format;
}

export function parsePositiveInteger(value: string | undefined, fallback: number, flagName: string): number {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 1) {
    throw new ConfigurationError(`Option --${flagName} must be a positive number.`);
  }
  return Math.floor(parsed);
}

export function parseCommaList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  const seen = new Set<string>();
  const parts: string[] = [];
  for (const rawPart of value.split(',')) {
    const trimmed = rawPart.trim();
    if (!trimmed) {
      continue;
    }
    const key = trimmed.toLowerCase();
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    parts.push(trimmed);
  }
  return parts;
}

function readSecret(env: Environment, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}
