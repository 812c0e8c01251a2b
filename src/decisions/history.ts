import { logger } from '../observability/logger.js';
import type { DecisionListClient } from '../persistence/types.js';
import type { DecisionHistoryStats, DecisionRecord, SanitizedDecisionRecord } from './types.js';

const MAX_IN_MEMORY_DECISIONS = 100;
const MAX_REDIS_DECISIONS = 500;
export const DECISIONS_KEY = 'decisions:history';

class InMemoryDecisionHistory {
  private decisions: DecisionRecord[] = [];

  append(record: DecisionRecord): void {
    this.decisions.push(record);

    if (this.decisions.length > MAX_IN_MEMORY_DECISIONS) {
      this.decisions.shift();
    }
  }

  getRecent(limit: number = 50): DecisionRecord[] {
    const actualLimit = Math.min(limit, this.decisions.length);
    return actualLimit > 0 ? this.decisions.slice(-actualLimit).reverse() : [];
  }

  getStats(): DecisionHistoryStats {
    return {
      count: this.decisions.length,
      maxSize: MAX_IN_MEMORY_DECISIONS,
      type: 'memory',
    };
  }
}

class RedisDecisionHistory {
  constructor(private readonly client: DecisionListClient) {}

  async append(record: DecisionRecord): Promise<void> {
    await this.client.lpush(DECISIONS_KEY, JSON.stringify(record));
    await this.client.ltrim(DECISIONS_KEY, 0, MAX_REDIS_DECISIONS - 1);
  }

  async getRecent(limit: number = 50): Promise<DecisionRecord[]> {
    const actualLimit = Math.min(limit, MAX_REDIS_DECISIONS);
    const serialized = await this.client.lrange(DECISIONS_KEY, 0, actualLimit - 1);
    return serialized.map(s => JSON.parse(s) as DecisionRecord);
  }

  async getStats(): Promise<DecisionHistoryStats> {
    const count = await this.client.llen(DECISIONS_KEY);
    return { count, maxSize: MAX_REDIS_DECISIONS, type: 'redis' };
  }
}

/**
 * Audit trail of decisions the host chose to record. Always keeps a local
 * ring buffer; mirrors to Redis while it is healthy.
 */
export class DecisionHistory {
  private readonly inMemory = new InMemoryDecisionHistory();
  private readonly redis: RedisDecisionHistory | null;

  constructor(
    client: DecisionListClient | null,
    private readonly isRedisHealthy: () => boolean = () => client !== null
  ) {
    this.redis = client ? new RedisDecisionHistory(client) : null;
  }

  private useRedis(): boolean {
    return this.redis !== null && this.isRedisHealthy();
  }

  async append(record: DecisionRecord): Promise<void> {
    this.inMemory.append(record);

    if (!this.redis) return;
    if (!this.isRedisHealthy()) {
      logger.warn('decision_history_degraded', 'Redis unavailable, decision kept in memory only', {
        requestId: record.requestId,
      });
      return;
    }

    try {
      await this.redis.append(record);
    } catch (error) {
      logger.error('decision_history_error', 'Failed to append decision to Redis', {
        error: error instanceof Error ? error.message : 'Unknown error',
        requestId: record.requestId,
      });
    }
  }

  async getRecent(limit: number = 50): Promise<DecisionRecord[]> {
    if (this.redis && this.useRedis()) {
      try {
        return await this.redis.getRecent(limit);
      } catch (error) {
        logger.error('decision_history_error', 'Failed to read decisions from Redis, using memory', {
          error: error instanceof Error ? error.message : 'Unknown error',
        });
      }
    }
    return this.inMemory.getRecent(limit);
  }

  async getStats(): Promise<DecisionHistoryStats> {
    if (this.redis && this.useRedis()) {
      try {
        return await this.redis.getStats();
      } catch (error) {
        logger.error('decision_history_error', 'Failed to read decision stats from Redis, using memory', {
          error: error instanceof Error ? error.message : 'Unknown error',
        });
      }
    }
    return this.inMemory.getStats();
  }
}

export function sanitizeDecision(record: DecisionRecord): SanitizedDecisionRecord {
  const { request, ...rest } = record;
  return {
    ...rest,
    request: {
      kind: request.kind,
      contract: request.contract,
    },
  };
}
