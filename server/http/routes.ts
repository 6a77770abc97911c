import cors from 'cors';
import express from 'express';
import type { Express, Request, Response } from 'express';
import { z } from 'zod';
import { getPublicConfig, type AppConfig } from '../../shared/config';
import { describeError, type Logger } from '../obs/logger';
import type { ResearchServices } from '../research';

const SearchBodySchema = z.object({
  query: z.string(),
  region: z.string().trim().min(1).optional(),
});

const queryParam = (value: unknown): string => (typeof value === 'string' ? value.trim() : '');

export interface AppDependencies {
  config: AppConfig;
  logger: Logger;
  services: ResearchServices;
}

export const createApp = ({ config, logger, services }: AppDependencies): Express => {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '64kb' }));

  if (config.observability.logLevel === 'debug') {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      res.on('finish', () => {
        logger.debug('HTTP response', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  const respondWithSearch = async (res: Response, query: string, region: string | undefined) => {
    if (!query) {
      res.status(400).json({ ok: false, query, results: [], errors: ['Missing q query'] });
      return;
    }
    try {
      res.json(await services.researcher.searchWeb(query, { region }));
    } catch (error) {
      logger.error('searchWeb crashed', { query, error: describeError(error) });
      res.status(500).json({ ok: false, query, results: [], errors: [describeError(error)] });
    }
  };

  app.get('/api/healthz', (_req: Request, res: Response) => {
    res.json({ ok: true, ts: new Date().toISOString() });
  });

  app.get('/api/config', (_req: Request, res: Response) => {
    res.json(getPublicConfig(config));
  });

  app.get('/api/search-web', async (req: Request, res: Response) => {
    const region = queryParam(req.query.region) || undefined;
    await respondWithSearch(res, queryParam(req.query.q ?? req.query.query), region);
  });

  app.post('/api/search-web', async (req: Request, res: Response) => {
    const parsed = SearchBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ ok: false, query: '', results: [], errors: ['Body must be {"query": string, "region"?: string}'] });
      return;
    }
    await respondWithSearch(res, parsed.data.query.trim(), parsed.data.region);
  });

  app.delete('/api/cache/expired', async (_req: Request, res: Response) => {
    const removed = await services.cache.prune();
    logger.info('Reader cache pruned', { removed });
    res.json({ removed });
  });

  return app;
};
