import path from 'node:path';
import { ConfigSchema, type AppConfig, type PublicConfig, getPublicConfig as getPublicConfigShared } from '../../shared/config';

export const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const stringFromEnv = (value: string | undefined, fallback: string): string => value?.trim() || fallback;

const parseEnvironment = (value: string | undefined): AppConfig['environment'] => {
  const environment = (value || 'development').trim().toLowerCase();
  return environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development';
};

const parseLogLevel = (value: string | undefined): AppConfig['observability']['logLevel'] => {
  const level = (value || 'info').trim().toLowerCase();
  return level === 'debug' || level === 'warn' || level === 'error' ? level : 'info';
};

export type { AppConfig, PublicConfig };

let cachedConfig: AppConfig | null = null;

export const buildConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const cacheDir = path.resolve(env.READER_CACHE_DIR || path.join(process.cwd(), '.cache', 'reader'));

  const rawConfig = {
    environment: parseEnvironment(env.NODE_ENV),
    server: {
      port: numberFromEnv(env.PORT, 3001),
    },
    discovery: {
      region: stringFromEnv(env.DISCOVERY_REGION, 'in-en'),
      maxResults: numberFromEnv(env.DISCOVERY_MAX_RESULTS, 20),
      snippetMaxChars: numberFromEnv(env.DISCOVERY_SNIPPET_MAX_CHARS, 2000),
      timeoutMs: numberFromEnv(env.DISCOVERY_TIMEOUT_MS, 10_000),
      retries: numberFromEnv(env.DISCOVERY_RETRIES, 2),
      retryDelayMs: numberFromEnv(env.DISCOVERY_RETRY_DELAY_MS, 200),
    },
    reader: {
      baseUrl: stringFromEnv(env.JINA_READER_BASE_URL, 'https://r.jina.ai'),
      apiKey: env.JINA_API_KEY?.trim() || undefined,
      timeoutMs: numberFromEnv(env.JINA_TIMEOUT_MS, 30_000),
      maxContentChars: numberFromEnv(env.JINA_MAX_CONTENT_CHARS, 20_000),
      retries: numberFromEnv(env.JINA_RETRIES, 2),
      // Per-query bound; each searchWeb call gets its own semaphore
      maxConcurrency: Math.max(1, numberFromEnv(env.JINA_MAX_CONCURRENCY, 3)),
      topK: numberFromEnv(env.JINA_TOP_K, 2),
    },
    cache: {
      dir: cacheDir,
      ttlMs: numberFromEnv(env.READER_CACHE_TTL_MS, 24 * 60 * 60 * 1000),
    },
    observability: {
      logLevel: parseLogLevel(env.LOG_LEVEL),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};

export const getPublicConfig = (config: AppConfig = loadConfig()): PublicConfig => getPublicConfigShared(config);

export const refreshConfig = (): AppConfig => {
  cachedConfig = null;
  return loadConfig();
};
