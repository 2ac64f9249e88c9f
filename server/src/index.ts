import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { createApp } from './app.js';
import { loadConfig } from './lib/config.js';
import { RateLimitedInvoker } from './lib/invoker.js';
import { buildModelMap, createProvider } from './lib/llm.js';
import { SlidingWindowRateLimiter } from './lib/rate-limiter.js';
import logger from './lib/logger.js';

let server: ReturnType<typeof serve> | null = null;
let shuttingDown = false;

function shutdown(signal: string) {
  if (shuttingDown) return;
  if (!server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  // Close HTTP server (stop accepting new connections)
  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force exit after 10s if connections don't drain
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

export function startServer() {
  if (server) return server;

  const config = loadConfig();
  const provider = createProvider(config);
  const limiter = new SlidingWindowRateLimiter({
    defaultQuota: config.limiter.requestsPerMinute,
    quotas: config.limiter.quotas,
    windowMs: config.limiter.windowMs,
  });
  const invoker = new RateLimitedInvoker({
    provider,
    limiter,
    maxAttempts: config.retry.maxAttempts,
    baseDelayMs: config.retry.baseDelayMs,
    maxTokens: config.llm.maxTokens,
  });
  const models = buildModelMap(config.models);

  const app = createApp({
    providerName: config.provider,
    invoker,
    limiter,
    models,
    pipeline: config.pipeline,
    maxBodyBytes: config.http.maxBodyBytes,
  });

  const port = config.http.port;
  logger.info({ port, provider: provider.name, models: config.models }, 'Career match server starting');
  server = serve({ fetch: app.fetch, port });
  logger.info({ port }, `Server running at http://localhost:${port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'Uncaught exception');
    shutdown('UNCAUGHT_EXCEPTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}
