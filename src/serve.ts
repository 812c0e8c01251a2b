import { existsSync } from 'fs';
import { loadConfig } from './config/env.js';
import { loadContractDocuments } from './contracts/loader.js';
import { RedisContractSource } from './contracts/redis-source.js';
import { DOCUMENT_SCHEMA_VERSION } from './contracts/version.js';
import { DecisionHistory } from './decisions/history.js';
import { createEngine } from './engine.js';
import { logger } from './observability/logger.js';
import {
  getRedisClient,
  getSubscriberClient,
  initializeRedis,
  isRedisHealthy,
  shutdownRedis,
} from './persistence/redis-client.js';
import { BUILTIN_PREDICATES } from './predicates/builtin.js';
import { createApp } from './server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);
  const { registry, gateway } = createEngine(BUILTIN_PREDICATES);

  if (existsSync(config.contractsDir)) {
    const { published, failures } = await loadContractDocuments(config.contractsDir, registry);
    logger.info('contracts_initialization', 'Contract documents loaded', {
      dir: config.contractsDir,
      published: published.length,
      failed: failures.length,
    });
  } else {
    logger.warn('contracts_initialization', 'Contracts directory not found, starting empty', {
      dir: config.contractsDir,
    });
  }

  initializeRedis(config.redisUrl);
  const redis = getRedisClient();

  let source: RedisContractSource | null = null;
  if (redis) {
    source = new RedisContractSource(registry, redis, config.watchRedis ? getSubscriberClient() : null);
    await source.loadAll();
    if (config.watchRedis) {
      await source.watch();
    }
  }

  const history = new DecisionHistory(redis, isRedisHealthy);
  const app = createApp({
    registry,
    gateway,
    history,
    defaultTenant: config.defaultTenant,
    unconfiguredPolicy: config.unconfiguredPolicy,
  });

  const server = app.listen(config.port, () => {
    logger.info('startup', 'Contract enforcement service listening', {
      port: config.port,
      mode: redis ? 'redis' : 'in-memory',
      documentSchema: DOCUMENT_SCHEMA_VERSION,
      contracts: registry.list().length,
      unconfiguredPolicy: config.unconfiguredPolicy,
    });
  });

  const shutdown = (signal: string) => {
    logger.info('shutdown', `${signal} received, graceful shutdown`);
    server.close(() => {
      const stopSource = source ? source.stop() : Promise.resolve();
      stopSource
        .then(() => shutdownRedis())
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('shutdown', 'Shutdown failed', {
            error: error instanceof Error ? error.message : 'Unknown error',
          });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('startup', 'Failed to start', {
    error: error instanceof Error ? error.message : 'Unknown error',
  });
  process.exit(1);
});
