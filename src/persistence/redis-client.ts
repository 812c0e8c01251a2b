import { Redis } from 'ioredis';
import { logger } from '../observability/logger.js';

const CONNECT_TIMEOUT_MS = 5000;
const COMMAND_TIMEOUT_MS = 2000;
const MAX_RETRIES = 3;

let redisClient: Redis | null = null;
let subscriberClient: Redis | null = null;
let isHealthy = false;

function watchLifecycle(client: Redis, role: 'command' | 'subscriber'): void {
  client.on('ready', () => {
    logger.info('redis_lifecycle', 'Redis ready', { role });
    if (role === 'command') isHealthy = true;
  });

  client.on('error', (error: Error) => {
    logger.error('redis_lifecycle', 'Redis error', { role, error: error.message });
    if (role === 'command') isHealthy = false;
  });

  client.on('close', () => {
    logger.warn('redis_lifecycle', 'Redis connection closed', { role });
    if (role === 'command') isHealthy = false;
  });

  client.on('reconnecting', () => {
    logger.info('redis_lifecycle', 'Redis reconnecting', { role });
  });
}

export function createRedisClient(url: string): Redis {
  const client = new Redis(url, {
    connectTimeout: CONNECT_TIMEOUT_MS,
    commandTimeout: COMMAND_TIMEOUT_MS,
    retryStrategy: (times: number) => {
      if (times > MAX_RETRIES) {
        logger.error('redis_connection', 'Max retries exceeded, giving up', { times });
        return null;
      }
      const delay = Math.min(times * 200, 2000);
      logger.warn('redis_connection', 'Retrying connection', { times, delay });
      return delay;
    },
    maxRetriesPerRequest: 2,
    enableReadyCheck: true,
    lazyConnect: false,
  });

  watchLifecycle(client, 'command');
  return client;
}

export function initializeRedis(url?: string): void {
  if (!url) {
    logger.info('redis_initialization', 'REDIS_URL not provided, contracts and decisions stay in memory');
    return;
  }

  try {
    redisClient = createRedisClient(url);
    logger.info('redis_initialization', 'Redis client initialized');
  } catch (error) {
    logger.error('redis_initialization', 'Failed to initialize Redis', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    redisClient = null;
  }
}

export function getRedisClient(): Redis | null {
  return redisClient;
}

/**
 * A connection in subscriber mode cannot issue regular commands, so pub/sub
 * gets its own duplicate of the command connection.
 */
export function getSubscriberClient(): Redis | null {
  if (!redisClient) return null;
  if (!subscriberClient) {
    subscriberClient = redisClient.duplicate();
    watchLifecycle(subscriberClient, 'subscriber');
  }
  return subscriberClient;
}

export function isRedisHealthy(): boolean {
  return redisClient !== null && isHealthy;
}

export async function shutdownRedis(): Promise<void> {
  if (subscriberClient) {
    await subscriberClient.quit();
    subscriberClient = null;
  }
  if (redisClient) {
    logger.info('redis_shutdown', 'Shutting down Redis connection');
    await redisClient.quit();
    redisClient = null;
    isHealthy = false;
  }
}
