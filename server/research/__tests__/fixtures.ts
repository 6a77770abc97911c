import type { AppConfig } from '../../../shared/config';
import type { Candidate } from '../../../shared/types';
import { buildConfig } from '../../config/config';
import type { CacheEntry, ReaderCache } from '../../persistence/readerCache';

export const testConfig = (env: NodeJS.ProcessEnv = {}): AppConfig =>
  buildConfig({ NODE_ENV: 'test', READER_CACHE_DIR: '/tmp/reader-cache-unused', ...env });

export const candidate = (rank: number, overrides: Partial<Candidate> = {}): Candidate => ({
  rank,
  title: `Result ${rank}`,
  link: `https://example.com/${rank}`,
  snippet: '',
  ...overrides,
});

export interface MemoryCache extends ReaderCache {
  readonly entries: Map<string, CacheEntry>;
}

export const createMemoryCache = (now: () => number = Date.now): MemoryCache => {
  const entries = new Map<string, CacheEntry>();
  return {
    entries,
    get: async (url) => entries.get(url) ?? null,
    put: async (url, content) => {
      entries.set(url, { url, content, fetchedAt: now() });
    },
    evict: async (url) => {
      entries.delete(url);
    },
    prune: async () => 0,
  };
};

export const recordingSleep = () => {
  const delays: number[] = [];
  const sleep = async (ms: number) => {
    delays.push(ms);
  };
  return { delays, sleep };
};
