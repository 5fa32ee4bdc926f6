// src/services/collector/ConfigRegistry.ts

import { CollectedData } from '../../models/collection.model';
import { SessionState } from '../../models/session.model';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { ConfigStore } from '../store/ConfigStore';
import { CollectionConfig } from './CollectionConfig';
import { GeneratedOutput } from './StructuredOutputGenerator';

export type CompletionHandler = (
    data: CollectedData,
    generatedOutput: GeneratedOutput | null,
) => unknown | Promise<unknown>;

export interface ConfigRegistryConfig extends ServiceConfig {
    store: ConfigStore;
}

/**
 * Collector lookup: this process's cache first, then the durable store.
 * Completion handlers are code and only live in the registering process.
 */
export class ConfigRegistry extends BaseService {
    private configs = new Map<string, CollectionConfig>();
    private handlers = new Map<string, CompletionHandler>();
    private store: ConfigStore;

    constructor(config: ConfigRegistryConfig) {
        super(config);
        this.store = config.store;
    }

    public async register(config: CollectionConfig, onComplete?: CompletionHandler): Promise<void> {
        this.configs.set(config.name, config);
        if (onComplete) {
            this.handlers.set(config.name, onComplete);
        } else {
            this.handlers.delete(config.name);
        }
        await this.store.save(config.definition);
        this.logger.info('Collector registered', { collector: config.name, fields: config.fields.length });
    }

    public async get(name: string): Promise<CollectionConfig | null> {
        const cached = this.configs.get(name);
        if (cached) return cached;

        const stored = await this.store.load(name);
        if (stored) this.configs.set(name, stored);
        return stored;
    }

    /** Registry lookup, falling back to the definition embedded in the session. */
    public async resolveForSession(state: SessionState): Promise<CollectionConfig | null> {
        const registered = await this.get(state.configName);
        if (registered) return registered;
        if (!state.embeddedConfig) return null;

        try {
            const embedded = CollectionConfig.fromDefinition(state.embeddedConfig);
            this.logger.info('Using collector embedded in session', {
                collector: state.configName,
                sessionId: state.sessionId,
            });
            return embedded;
        } catch (error) {
            this.logger.error('Embedded collector is invalid', {
                collector: state.configName,
                sessionId: state.sessionId,
                error: this.errorMessage(error),
            });
            return null;
        }
    }

    public handlerFor(name: string): CompletionHandler | undefined {
        return this.handlers.get(name);
    }

    /** Drops this process's cache; durable records and handlers are kept. */
    public clearCache(): void {
        this.configs.clear();
    }
}
