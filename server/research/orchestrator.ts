import type { Candidate, EnrichedResult, FetchResult, SearchResponse } from '../../shared/types';
import { describeError, type Logger } from '../obs/logger';
import { Semaphore } from '../utils/concurrency';
import type { DiscoveryClient } from './discovery';
import { selectTop } from './ranking';
import type { ReaderClient } from './reader';

export interface FetchOrchestratorOptions {
  reader: ReaderClient;
  logger: Logger;
  topK: number;
  maxConcurrency: number;
}

export interface WebResearcherOptions extends FetchOrchestratorOptions {
  discovery: DiscoveryClient;
}

export interface SearchWebOptions {
  region?: string;
}

export interface WebResearcher {
  searchWeb: (query: string, options?: SearchWebOptions) => Promise<SearchResponse>;
}

const rejectedFetch = (url: string, reason: unknown, logger: Logger): FetchResult => {
  logger.warn('Reader call rejected', { url, error: describeError(reason) });
  return { url, ok: false, status: null, content: null, error: describeError(reason), cached: false };
};

export const mergeResults = (
  candidates: ReadonlyArray<Candidate>,
  fetched: ReadonlyMap<string, FetchResult>,
): EnrichedResult[] => candidates.map((candidate) => ({ ...candidate, indepth: fetched.get(candidate.link) ?? null }));

/**
 * Deep-fetches the top candidates under a per-run semaphore and merges the
 * results back onto the full candidate list in discovery order.
 */
export const runDeepFetch = async (
  query: string,
  candidates: ReadonlyArray<Candidate>,
  options: FetchOrchestratorOptions,
): Promise<SearchResponse> => {
  const { reader, logger } = options;
  const errors: string[] = [];
  let fetched = new Map<string, FetchResult>();

  try {
    const top = selectTop(query, candidates, options.topK, logger);
    const links = Array.from(new Set(top.map((candidate) => candidate.link)));
    const semaphore = new Semaphore(options.maxConcurrency);

    const settled = await Promise.allSettled(links.map((link) => semaphore.use(() => reader.fetch(link))));
    const results = settled.map((outcome, index) =>
      outcome.status === 'fulfilled' ? outcome.value : rejectedFetch(links[index], outcome.reason, logger),
    );
    fetched = new Map(results.map((result, index) => [links[index], result]));

    logger.debug('Deep fetch completed', {
      query,
      selected: links.length,
      ok: results.filter((result) => result.ok).length,
      cached: results.filter((result) => result.cached).length,
    });
  } catch (error) {
    logger.error('Deep fetch phase failed', { query, error: describeError(error) });
    errors.push(`deep fetch failed: ${describeError(error)}`);
    fetched = new Map();
  }

  return {
    ok: true,
    query,
    results: mergeResults(candidates, fetched),
    errors,
  };
};

export const createWebResearcher = (options: WebResearcherOptions): WebResearcher => {
  const { discovery, logger } = options;

  const searchWeb = async (query: string, searchOptions: SearchWebOptions = {}): Promise<SearchResponse> => {
    const trimmed = query.trim();
    if (!trimmed) {
      return { ok: false, query, results: [], errors: ['empty query'] };
    }

    const started = Date.now();
    let candidates: Candidate[];
    try {
      candidates = await discovery.discover(trimmed, searchOptions.region);
    } catch (error) {
      return { ok: false, query: trimmed, results: [], errors: [describeError(error)] };
    }

    const response = await runDeepFetch(trimmed, candidates, options);
    logger.info('searchWeb completed', {
      query: trimmed,
      results: response.results.length,
      enriched: response.results.filter((result) => result.indepth !== null).length,
      errors: response.errors.length,
      elapsedMs: Date.now() - started,
    });
    return response;
  };

  return { searchWeb };
};
