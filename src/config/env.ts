import dotenv from 'dotenv';
import { LOG_LEVELS, type LogLevel } from '../observability/logger.js';

dotenv.config();

export type UnconfiguredPolicy = 'allow' | 'deny';

export interface EngineConfig {
  port: number;
  redisUrl?: string;
  defaultTenant: string;
  contractsDir: string;
  unconfiguredPolicy: UnconfiguredPolicy;
  watchRedis: boolean;
  logLevel: LogLevel;
}

function parsePort(value: string | undefined): number {
  const port = Number(value ?? 3000);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`PORT must be an integer between 1 and 65535, got ${value}`);
  }
  return port;
}

function parseUnconfiguredPolicy(value: string | undefined): UnconfiguredPolicy {
  if (value === undefined || value === '') return 'deny';
  if (value === 'allow' || value === 'deny') return value;
  throw new Error(`UNCONFIGURED_POLICY must be "allow" or "deny", got ${value}`);
}

function parseLogLevel(value: string | undefined): LogLevel {
  if (value === undefined || value === '') return 'info';
  const level = LOG_LEVELS.find(l => l === value);
  if (!level) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got ${value}`);
  }
  return level;
}

/**
 * Reads configuration from the environment (after `.env` has been applied).
 * Tenants without a published contract are denied unless
 * UNCONFIGURED_POLICY=allow.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return {
    port: parsePort(env.PORT),
    redisUrl: env.REDIS_URL || undefined,
    defaultTenant: env.DEFAULT_TENANT || 'default',
    contractsDir: env.CONTRACTS_DIR || './contracts',
    unconfiguredPolicy: parseUnconfiguredPolicy(env.UNCONFIGURED_POLICY),
    watchRedis: env.CONTRACTS_WATCH !== 'false',
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}
