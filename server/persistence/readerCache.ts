import fs from 'node:fs/promises';
import path from 'node:path';
import JSON5 from 'json5';
import { z } from 'zod';
import type { CacheConfig } from '../../shared/config';
import { sha256Hex } from '../../shared/crypto';
import { describeError, type Logger } from '../obs/logger';

export interface CacheEntry {
  readonly url: string;
  readonly content: string;
  /** Epoch milliseconds. */
  readonly fetchedAt: number;
}

export interface ReaderCache {
  get: (url: string) => Promise<CacheEntry | null>;
  put: (url: string, content: string) => Promise<void>;
  evict: (url: string) => Promise<void>;
  /** Deletes every expired or unreadable entry; returns how many files were removed. */
  prune: () => Promise<number>;
}

export interface ReaderCacheOptions extends CacheConfig {
  logger: Logger;
  now?: () => number;
}

// On-disk record; `_fetched_at` is epoch seconds.
const CacheFileSchema = z.object({
  content: z.string(),
  _fetched_at: z.number().finite(),
});

export const normalizeCacheUrl = (rawUrl: string): string => {
  const trimmed = rawUrl.trim();
  try {
    const url = new URL(trimmed);
    const params = Array.from(url.searchParams.entries()).filter(([key]) => !key.toLowerCase().startsWith('utm_'));
    url.search = '';
    for (const [key, value] of params) {
      url.searchParams.append(key, value);
    }
    url.hash = '';
    return url.toString();
  } catch {
    return trimmed;
  }
};

export const cacheKeyFor = (url: string): string => sha256Hex(normalizeCacheUrl(url));

const isMissingFile = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

export const createFsReaderCache = (options: ReaderCacheOptions): ReaderCache => {
  const { dir, ttlMs, logger } = options;
  const now = options.now ?? Date.now;

  const fileFor = (url: string) => path.join(dir, `${cacheKeyFor(url)}.json`);

  const parseRecord = (raw: string): z.infer<typeof CacheFileSchema> | null => {
    try {
      const parsed = CacheFileSchema.safeParse(JSON5.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  };

  const isExpired = (fetchedAtMs: number) => now() - fetchedAtMs > ttlMs;

  const removeFile = async (target: string, reason: string) => {
    try {
      await fs.unlink(target);
    } catch (error) {
      if (!isMissingFile(error)) {
        logger.warn('Reader cache delete failed', { file: target, reason, error: describeError(error) });
      }
    }
  };

  const get = async (url: string): Promise<CacheEntry | null> => {
    const target = fileFor(url);
    let raw: string;
    try {
      raw = await fs.readFile(target, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        logger.warn('Reader cache read failed', { url, error: describeError(error) });
      }
      return null;
    }

    const record = parseRecord(raw);
    if (!record) {
      logger.warn('Reader cache entry unreadable', { url, file: target });
      return null;
    }

    const fetchedAt = record._fetched_at * 1000;
    if (isExpired(fetchedAt)) {
      logger.debug('Reader cache entry expired', { url });
      await removeFile(target, 'expired');
      return null;
    }

    return { url, content: record.content, fetchedAt };
  };

  const put = async (url: string, content: string): Promise<void> => {
    const target = fileFor(url);
    const record = { content, _fetched_at: now() / 1000 };
    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(target, JSON.stringify(record), 'utf-8');
    } catch (error) {
      logger.warn('Reader cache write failed', { url, error: describeError(error) });
    }
  };

  const evict = async (url: string): Promise<void> => {
    await removeFile(fileFor(url), 'evicted');
  };

  const prune = async (): Promise<number> => {
    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch (error) {
      if (!isMissingFile(error)) {
        logger.warn('Reader cache listing failed', { dir, error: describeError(error) });
      }
      return 0;
    }

    let removed = 0;
    for (const name of names) {
      if (!name.endsWith('.json')) continue;
      const target = path.join(dir, name);
      let record: z.infer<typeof CacheFileSchema> | null = null;
      try {
        record = parseRecord(await fs.readFile(target, 'utf-8'));
      } catch (error) {
        logger.debug('Reader cache entry vanished during prune', { file: target, error: describeError(error) });
        continue;
      }
      if (!record || isExpired(record._fetched_at * 1000)) {
        await removeFile(target, record ? 'expired' : 'unreadable');
        removed += 1;
      }
    }
    return removed;
  };

  return { get, put, evict, prune };
};
