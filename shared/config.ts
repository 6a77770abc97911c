import { z } from 'zod';

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
  }),
  discovery: z.object({
    region: z.string().min(1),
    maxResults: z.number().int().positive(),
    snippetMaxChars: z.number().int().positive(),
    timeoutMs: z.number().int().positive(),
    retries: z.number().int().nonnegative(),
    retryDelayMs: z.number().int().nonnegative(),
  }),
  reader: z.object({
    baseUrl: z.string().url(),
    apiKey: z.string().optional(),
    timeoutMs: z.number().int().positive(),
    maxContentChars: z.number().int().positive(),
    retries: z.number().int().nonnegative(),
    maxConcurrency: z.number().int().positive(),
    topK: z.number().int().nonnegative(),
  }),
  cache: z.object({
    dir: z.string().min(1),
    ttlMs: z.number().int().nonnegative(),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type DiscoveryConfig = AppConfig['discovery'];
export type ReaderConfig = AppConfig['reader'];
export type CacheConfig = AppConfig['cache'];

export interface PublicConfig {
  discovery: {
    region: string;
    maxResults: number;
    snippetMaxChars: number;
  };
  reader: {
    baseUrl: string;
    hasApiKey: boolean;
    maxConcurrency: number;
    topK: number;
    maxContentChars: number;
  };
  cache: {
    ttlMs: number;
  };
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  discovery: {
    region: config.discovery.region,
    maxResults: config.discovery.maxResults,
    snippetMaxChars: config.discovery.snippetMaxChars,
  },
  reader: {
    baseUrl: config.reader.baseUrl,
    hasApiKey: Boolean(config.reader.apiKey),
    maxConcurrency: config.reader.maxConcurrency,
    topK: config.reader.topK,
    maxContentChars: config.reader.maxContentChars,
  },
  cache: {
    ttlMs: config.cache.ttlMs,
  },
});
