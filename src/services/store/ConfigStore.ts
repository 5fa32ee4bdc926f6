// src/services/store/ConfigStore.ts

import { CollectionDefinition } from '../../models/collection.model';
import { CollectionConfig } from '../collector/CollectionConfig';
import { createLogger } from '../../utils/logger';
import { KeyValueStore } from './KeyValueStore';
import { DEFAULT_SESSION_TTL_SECONDS } from './SessionStore';

const logger = createLogger('config-store');

/** Durable copy of registered collector definitions, shared across processes. */
export class ConfigStore {
  private readonly KEY_PREFIX = 'collector:config:';

  constructor(
    private store: KeyValueStore,
    private ttlSeconds: number = DEFAULT_SESSION_TTL_SECONDS,
  ) {}

  async save(definition: CollectionDefinition): Promise<void> {
    await this.store.put(this.key(definition.name), JSON.stringify(definition), this.ttlSeconds);
  }

  /** A record that no longer parses is treated as absent. */
  async load(name: string): Promise<CollectionConfig | null> {
    const raw = await this.store.get(this.key(name));
    if (raw === null) return null;

    try {
      return CollectionConfig.fromDefinition(JSON.parse(raw));
    } catch (error) {
      logger.warn('[ConfigStore] Ignoring unreadable collector record', {
        name,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return null;
    }
  }

  async delete(name: string): Promise<void> {
    await this.store.delete(this.key(name));
  }

  private key(name: string): string {
    return `${this.KEY_PREFIX}${name}`;
  }
}
