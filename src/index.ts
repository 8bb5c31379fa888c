import express from 'express';
import dotenv from 'dotenv';

import { loadConfig } from './config';
import { createQueryEngine } from './engine';
import { createQueryRouter } from './routes/query';
import { createLogger, setLogLevel } from './util/logger';

dotenv.config();

const config = loadConfig();
setLogLevel(config.logLevel);

const logger = createLogger('server');

if (!config.apiToken) {
  throw new Error('API token not configured. Set API_TOKEN to the bearer token clients must send.');
}

const engine = createQueryEngine(config);

const app = express();
app.use(express.json({ limit: '1mb' }));

app.get('/health', (_req, res) => {
  res.json({ status: 'ok' });
});

app.use(
  config.apiPrefix,
  createQueryRouter({ engine, apiToken: config.apiToken, requestTimeoutMs: config.requestTimeoutMs }),
);

app.listen(config.port, () => {
  logger.info(`Server listening on port ${config.port}`);
});

export default app;
