import { logger } from '../observability/logger.js';
import type { DocumentStoreClient, DocumentSubscriber } from '../persistence/types.js';
import { EnforcementError } from './errors.js';
import { parseContractJson } from './loader.js';
import type { ContractRegistry } from './registry.js';
import type { Contract } from './types.js';

export const DOCUMENTS_KEY = 'contracts:documents';
export const PUBLISHED_CHANNEL = 'contracts:published';

/**
 * Parses a `<tenant>:<name>` field. The name may itself contain colons.
 */
export function parseDocumentField(field: string): { tenant: string; name: string } | null {
  const separator = field.indexOf(':');
  if (separator <= 0 || separator === field.length - 1) return null;
  return { tenant: field.slice(0, separator), name: field.slice(separator + 1) };
}

/**
 * Administrative loading path backed by a Redis hash of contract documents,
 * with hot reload driven by a pub/sub channel. All Redis I/O happens here;
 * evaluations only ever read the registry.
 */
export class RedisContractSource {
  private watching: Promise<void> | null = null;

  constructor(
    private readonly registry: ContractRegistry,
    private readonly client: DocumentStoreClient,
    private readonly subscriber: DocumentSubscriber | null = null
  ) {}

  async loadAll(): Promise<Contract[]> {
    const documents = await this.client.hgetall(DOCUMENTS_KEY);
    const published: Contract[] = [];

    for (const field of Object.keys(documents).sort()) {
      const contract = this.publishField(field, documents[field]);
      if (contract) published.push(contract);
    }

    logger.info('redis_contracts_loaded', 'Contracts loaded from Redis', {
      documents: Object.keys(documents).length,
      published: published.length,
    });
    return published;
  }

  async reload(field: string): Promise<Contract | null> {
    const text = await this.client.hget(DOCUMENTS_KEY, field);
    if (text === null) {
      logger.warn('redis_contract_missing', 'Reload requested for a document that does not exist', { field });
      return null;
    }
    return this.publishField(field, text);
  }

  /** Concurrent callers share one subscription; the listener is registered once. */
  async watch(): Promise<void> {
    if (!this.subscriber) {
      throw new Error('RedisContractSource.watch() needs a subscriber connection');
    }
    this.watching ??= this.startWatching(this.subscriber);
    await this.watching;
  }

  async stop(): Promise<void> {
    if (!this.subscriber || !this.watching) return;

    this.watching = null;
    this.subscriber.off('message', this.onMessage);
    await this.subscriber.unsubscribe(PUBLISHED_CHANNEL);
  }

  private async startWatching(subscriber: DocumentSubscriber): Promise<void> {
    subscriber.on('message', this.onMessage);
    try {
      await subscriber.subscribe(PUBLISHED_CHANNEL);
    } catch (error) {
      subscriber.off('message', this.onMessage);
      this.watching = null;
      throw error;
    }

    logger.info('redis_contracts_watching', 'Subscribed to contract publications', { channel: PUBLISHED_CHANNEL });
  }

  private readonly onMessage = (channel: string, message: string): void => {
    if (channel !== PUBLISHED_CHANNEL) return;
    this.reload(message).catch((error: unknown) => {
      logger.error('redis_contract_reload_failed', 'Hot reload failed', {
        field: message,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    });
  };

  private publishField(field: string, text: string): Contract | null {
    const key = parseDocumentField(field);
    if (!key) {
      logger.warn('redis_contract_skipped', 'Document field is not <tenant>:<name>', { field });
      return null;
    }

    try {
      const input = parseContractJson(text, `redis:${field}`);
      if (input.name !== key.name) {
        logger.warn('redis_contract_skipped', 'Document name does not match its field', {
          field,
          documentName: input.name,
        });
        return null;
      }

      const contract = this.registry.publish(key.tenant, input);
      logger.info('redis_contract_published', 'Contract published from Redis', {
        contractId: contract.id,
        hash: contract.hash,
      });
      return contract;
    } catch (error) {
      if (!(error instanceof EnforcementError)) {
        throw error;
      }
      logger.error('redis_contract_rejected', 'Contract document rejected, previous version stays active', {
        field,
        code: error.code,
        error: error.message,
      });
      return null;
    }
  }
}
