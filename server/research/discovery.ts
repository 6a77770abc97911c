import type { DiscoveryConfig } from '../../shared/config';
import type { Candidate } from '../../shared/types';
import { describeError, type Logger } from '../obs/logger';
import { withTimeout, type Sleep } from '../utils/async';
import { linearBackoff, retry, type RetryPolicy } from '../utils/retry';
import { truncate } from '../utils/text';

export interface RawHit {
  title?: string | null;
  link?: string | null;
  snippet?: string | null;
}

export interface DiscoverySearchOptions {
  region: string;
  maxResults: number;
  safeSearch: 'off';
  signal: AbortSignal;
}

export interface DiscoveryBackend {
  readonly name: string;
  search: (query: string, options: DiscoverySearchOptions) => Promise<RawHit[]>;
}

export interface DiscoveryClient {
  discover: (query: string, region?: string, maxResults?: number) => Promise<Candidate[]>;
}

export class DiscoveryError extends Error {
  constructor(
    message: string,
    readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DiscoveryError';
  }
}

export interface DiscoveryClientOptions {
  config: DiscoveryConfig;
  backend: DiscoveryBackend;
  logger: Logger;
  sleep?: Sleep;
}

export const toCandidates = (hits: RawHit[], maxResults: number, snippetMaxChars: number): Candidate[] =>
  hits.slice(0, Math.max(0, maxResults)).map((hit, index) => ({
    rank: index + 1,
    title: hit.title ?? '',
    link: hit.link ?? '',
    snippet: truncate(hit.snippet, snippetMaxChars),
  }));

export const createDiscoveryClient = (options: DiscoveryClientOptions): DiscoveryClient => {
  const { config, backend, logger } = options;
  const policy: RetryPolicy = {
    retries: config.retries,
    backoffMs: linearBackoff(config.retryDelayMs),
  };

  const discover = async (
    query: string,
    region: string = config.region,
    maxResults: number = config.maxResults,
  ): Promise<Candidate[]> => {
    let attempts = 0;
    try {
      const hits = await retry(
        (attempt) => {
          attempts = attempt;
          return withTimeout(config.timeoutMs, (signal) =>
            backend.search(query, { region, maxResults, safeSearch: 'off', signal }),
          );
        },
        policy,
        {
          sleep: options.sleep,
          onRetry: ({ attempt, delayMs, error }) =>
            logger.warn('Discovery attempt failed', {
              backend: backend.name,
              attempt,
              delayMs,
              error: describeError(error),
            }),
        },
      );
      const candidates = toCandidates(hits, maxResults, config.snippetMaxChars);
      logger.debug('Discovery completed', { backend: backend.name, query, count: candidates.length, attempts });
      return candidates;
    } catch (error) {
      const message = `${backend.name} search failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${describeError(error)}`;
      logger.error('Discovery failed', { backend: backend.name, query, attempts, error: describeError(error) });
      throw new DiscoveryError(message, attempts, { cause: error });
    }
  };

  return { discover };
};
