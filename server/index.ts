import 'dotenv/config';
import { loadConfig } from './config/config';
import { createApp } from './http/routes';
import { createLogger } from './obs/logger';
import { createResearchServices } from './research';

const config = loadConfig();
const logger = createLogger(config, { bindings: { service: 'web-research' } });
logger.info('Config loaded', {
  environment: config.environment,
  discovery: { region: config.discovery.region, maxResults: config.discovery.maxResults },
  reader: {
    baseUrl: config.reader.baseUrl,
    hasApiKey: Boolean(config.reader.apiKey),
    maxConcurrency: config.reader.maxConcurrency,
    topK: config.reader.topK,
  },
  cache: { dir: config.cache.dir, ttlMs: config.cache.ttlMs },
});

const services = createResearchServices(config, logger);
const app = createApp({ config, logger, services });

app.listen(config.server.port, () => {
  logger.info('Server listening', { port: config.server.port });
});
