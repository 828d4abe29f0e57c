import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createServer } from 'http';
import path from 'path';
import { config } from './config';
import { errorHandler, notFoundHandler, requestLogger } from './middleware/index';
import { createSinkFactory, type AppServices } from './services';
import { API_PREFIX } from '@shared/constants';
import apiRouter from './routes/index';
import { loadCatalog } from '@core/catalog';

const app = express();
const server = createServer(app);

app.use(helmet());
app.use(cors({ origin: config.clientUrl, credentials: true }));
app.use(express.json({ limit: '1mb' }));
app.use(requestLogger);

app.use(API_PREFIX, apiRouter);

app.use(notFoundHandler);
app.use(errorHandler);

function shutdown(signal: string) {
  console.warn(`[SERVER] ${signal} received, shutting down`);
  server.close(() => process.exit(0));
  setTimeout(() => process.exit(1), 5000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

async function start() {
  const catalog = await loadCatalog(path.resolve(config.catalogPath));
  const services: AppServices = {
    catalog,
    createSink: await createSinkFactory(),
    fallbackTimeoutMs: config.fallbackTimeoutMs,
    analysisConcurrency: config.analysisConcurrency,
  };
  app.locals.services = services;
  console.warn(`[SERVER] Unsupported claims go to the ${config.unsupportedLog.sink} sink`);

  server.listen(config.port, () => {
    console.warn(`[SERVER] Claim Costing Lab API on port ${config.port}`);
    console.warn(`[SERVER] Health: http://localhost:${config.port}${API_PREFIX}/health`);
  });
}

start().catch((err) => {
  console.error('[SERVER] Failed to start:', err);
  process.exit(1);
});

export { app, server };
