/**
 * @description: Boots the validation service: loads configuration, resolves the entity extractor once and starts listening.
 * @groundcheck-scope: core
 * @groundcheck-module: BackendEntrypoint
 * @groundcheck-risk: moderate - Startup failures leave the service down rather than scoring wrongly.
 */
// Loads .env from the working directory before the shared logger reads LOG_LEVEL and LOG_DIR.
import 'dotenv/config';
import {
  createConfidenceStoreFromEnv,
  loadValidationConfig,
  logger,
  type ConfidenceRecordStore
} from '@groundcheck/shared';
import { createConfidencePipeline, selectEntityExtractor } from 'validation-core';
import { loadRuntimeConfig } from './config.js';
import { createServer } from './server.js';
import { SimpleRateLimiter } from './services/rateLimiter.js';

const startupLogger = logger.child({ module: 'startup' });

const RATE_LIMITER_CLEANUP_INTERVAL_MS = 2 * 60 * 1000;

const main = async (): Promise<void> => {
  const runtimeConfig = loadRuntimeConfig();
  const validationConfig = loadValidationConfig();

  const extractor = await selectEntityExtractor({
    preferModel: runtimeConfig.entityModelEnabled,
    logger: logger.child({ module: 'entityExtraction' })
  });
  const pipeline = createConfidencePipeline({
    config: validationConfig,
    extractor,
    logger: logger.child({ module: 'confidencePipeline' })
  });

  // --- Confidence store ---
  // Scoring still works without storage; record lookups return 503.
  let store: ConfidenceRecordStore | null = null;
  try {
    store = createConfidenceStoreFromEnv();
  } catch (error) {
    startupLogger.error(`Failed to initialize confidence store: ${error instanceof Error ? error.message : String(error)}`);
  }

  const limiter = new SimpleRateLimiter({
    limit: runtimeConfig.validateApi.rateLimit,
    windowMs: runtimeConfig.validateApi.rateLimitWindowMs
  });
  // Background cleanup keeps the limiter map from growing forever.
  const cleanupTimer = setInterval(() => limiter.cleanup(), RATE_LIMITER_CLEANUP_INTERVAL_MS);
  cleanupTimer.unref();

  const server = createServer({
    pipeline,
    store,
    limiter,
    maxBodyBytes: runtimeConfig.validateApi.maxBodyBytes,
    trustProxy: runtimeConfig.server.trustProxy
  });

  const shutdown = (signal: string) => {
    startupLogger.info(`Received ${signal}; shutting down.`);
    clearInterval(cleanupTimer);
    server.close(() => {
      store?.close();
      process.exit(0);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  const { port, host } = runtimeConfig.server;
  server.listen(port, host, () => {
    startupLogger.info(`Validation service available on ${host}:${port} (entity extraction: ${extractor.strategy})`);
  });
};

main().catch((error: unknown) => {
  startupLogger.error(`Failed to start validation service: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
  process.exitCode = 1;
});
