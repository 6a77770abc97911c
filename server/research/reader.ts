import type { ReaderConfig } from '../../shared/config';
import type { FetchResult } from '../../shared/types';
import { describeError, type Logger } from '../obs/logger';
import type { ReaderCache } from '../persistence/readerCache';
import { withTimeout, type Sleep } from '../utils/async';
import { exponentialBackoffWithJitter, linearBackoff, retry, type RetryPolicy } from '../utils/retry';
import { truncate } from '../utils/text';

export const TRANSIENT_STATUSES: ReadonlySet<number> = new Set([429, 502, 503, 504]);

const ERROR_BODY_CHARS = 500;
const BACKOFF_CAP_MS = 10_000;
const STATUS_BACKOFF_BASE_MS = 1_000;
const STATUS_BACKOFF_JITTER_MS = 500;
const NETWORK_BACKOFF_STEP_MS = 500;

export class TransientStatusError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
  ) {
    super(body ? `HTTP ${status}: ${body}` : `HTTP ${status}`);
    this.name = 'TransientStatusError';
  }
}

export interface ReaderClient {
  /** Resolves to a FetchResult for every input; failures are reported in the result. */
  fetch: (url: string) => Promise<FetchResult>;
}

export interface ReaderClientOptions {
  config: ReaderConfig;
  cache: ReaderCache;
  logger: Logger;
  sleep?: Sleep;
  random?: () => number;
}

interface ReaderResponse {
  status: number;
  body: string;
}

export const buildReaderUrl = (baseUrl: string, target: string): string => `${baseUrl.replace(/\/+$/, '')}/${target}`;

const describeNetworkError = (error: unknown): string => {
  const message = describeError(error);
  if (error instanceof Error && error.cause instanceof Error && error.cause.message !== message) {
    return `${message}: ${error.cause.message}`;
  }
  return message;
};

const failure = (url: string, error: string, status: number | null = null): FetchResult => ({
  url,
  ok: false,
  status,
  content: null,
  error,
  cached: false,
});

export const createReaderClient = (options: ReaderClientOptions): ReaderClient => {
  const { config, cache, logger } = options;

  const statusBackoff = exponentialBackoffWithJitter({
    baseMs: STATUS_BACKOFF_BASE_MS,
    capMs: BACKOFF_CAP_MS,
    jitterMs: STATUS_BACKOFF_JITTER_MS,
    random: options.random,
  });
  const networkBackoff = linearBackoff(NETWORK_BACKOFF_STEP_MS, BACKOFF_CAP_MS);

  const policy: RetryPolicy = {
    retries: config.retries,
    backoffMs: (attempt, error) => (error instanceof TransientStatusError ? statusBackoff(attempt) : networkBackoff(attempt)),
  };

  const headers: Record<string, string> = { Accept: 'text/plain' };
  if (config.apiKey) {
    headers.Authorization = `Bearer ${config.apiKey}`;
  }

  const requestOnce = (readerUrl: string): Promise<ReaderResponse> =>
    withTimeout(config.timeoutMs, async (signal) => {
      const response = await fetch(readerUrl, { method: 'GET', headers, signal });
      const body = await response.text();
      if (TRANSIENT_STATUSES.has(response.status)) {
        throw new TransientStatusError(response.status, truncate(body, ERROR_BODY_CHARS));
      }
      return { status: response.status, body };
    });

  const fetchPage = async (url: string): Promise<FetchResult> => {
    const target = url.trim();
    if (!target) {
      return failure(url, 'empty url');
    }

    const cached = await cache.get(target).catch((error: unknown) => {
      logger.warn('Reader cache lookup failed', { url: target, error: describeError(error) });
      return null;
    });
    if (cached) {
      logger.debug('Reader cache hit', { url: target });
      return { url, ok: true, status: null, content: cached.content, error: null, cached: true };
    }

    const readerUrl = buildReaderUrl(config.baseUrl, target);
    const started = Date.now();
    try {
      const { status, body } = await retry(() => requestOnce(readerUrl), policy, {
        sleep: options.sleep,
        onRetry: ({ attempt, delayMs, error }) =>
          logger.warn('Reader attempt failed', { url: target, attempt, delayMs, error: describeNetworkError(error) }),
      });

      if (status !== 200) {
        logger.info('Reader returned non-retryable status', { url: target, status });
        return failure(url, truncate(body, ERROR_BODY_CHARS) || `HTTP ${status}`, status);
      }

      const content = truncate(body, config.maxContentChars);
      await cache.put(target, content).catch((error: unknown) => {
        logger.warn('Reader cache store failed', { url: target, error: describeError(error) });
      });
      logger.debug('Reader fetch completed', { url: target, chars: content.length, elapsedMs: Date.now() - started });
      return { url, ok: true, status, content, error: null, cached: false };
    } catch (error) {
      if (error instanceof TransientStatusError) {
        logger.warn('Reader retries exhausted', { url: target, status: error.status });
        return failure(url, error.message, error.status);
      }
      const description = describeNetworkError(error);
      logger.warn('Reader retries exhausted', { url: target, error: description });
      return failure(url, description);
    }
  };

  return { fetch: fetchPage };
};
