import type { AppConfig } from '../../shared/config';
import { withContext, type Logger } from '../obs/logger';
import { createFsReaderCache, type ReaderCache } from '../persistence/readerCache';
import { createDuckDuckGoBackend } from './backends/duckduckgo';
import { createDiscoveryClient, type DiscoveryBackend } from './discovery';
import { createWebResearcher, type WebResearcher } from './orchestrator';
import { createReaderClient } from './reader';

export interface ResearchServices {
  researcher: WebResearcher;
  cache: ReaderCache;
}

export const createResearchServices = (
  config: AppConfig,
  logger: Logger,
  overrides: { backend?: DiscoveryBackend; cache?: ReaderCache } = {},
): ResearchServices => {
  const cache = overrides.cache ?? createFsReaderCache({ ...config.cache, logger: withContext(logger, { component: 'reader-cache' }) });
  const discovery = createDiscoveryClient({
    config: config.discovery,
    backend: overrides.backend ?? createDuckDuckGoBackend(),
    logger: withContext(logger, { component: 'discovery' }),
  });
  const reader = createReaderClient({ config: config.reader, cache, logger: withContext(logger, { component: 'reader' }) });
  const researcher = createWebResearcher({
    discovery,
    reader,
    logger: withContext(logger, { component: 'orchestrator' }),
    topK: config.reader.topK,
    maxConcurrency: config.reader.maxConcurrency,
  });
  return { researcher, cache };
};

export type { WebResearcher, SearchWebOptions } from './orchestrator';
export type { DiscoveryBackend, RawHit } from './discovery';
