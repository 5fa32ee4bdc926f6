// src/bootstrap.ts

import { readFile } from 'fs/promises';
import Redis from 'ioredis';
import { CONFIG } from './config';
import { CollectionConfig } from './services/collector/CollectionConfig';
import { CollectorService } from './services/collector/CollectorService';
import { ConfigRegistry } from './services/collector/ConfigRegistry';
import { GroqTextGenerator, OfflineTextGenerator } from './services/llm/groq.service';
import { TextGenerator } from './services/llm/types';
import { ConfigStore } from './services/store/ConfigStore';
import { KeyValueStore } from './services/store/KeyValueStore';
import { MemoryKeyValueStore } from './services/store/MemoryKeyValueStore';
import { RedisKeyValueStore } from './services/store/RedisKeyValueStore';
import { SessionStore } from './services/store/SessionStore';
import { createLogger } from './utils/logger';

const logger = createLogger('bootstrap');

export interface Runtime {
  collector: CollectorService;
  registry: ConfigRegistry;
  defaultCollector: CollectionConfig;
  close(): Promise<void>;
}

export interface RuntimeOptions {
  /** Allow running without GROQ_API_KEY; every model call then falls back. */
  allowOffline?: boolean;
}

/** Wires stores, text generation and the collector service from CONFIG. */
export async function createRuntime(options: RuntimeOptions = {}): Promise<Runtime> {
  let redis: Redis | null = null;
  let store: KeyValueStore;
  if (CONFIG.REDIS_URL) {
    redis = new Redis(CONFIG.REDIS_URL);
    store = new RedisKeyValueStore(redis);
    logger.info('Using Redis session store');
  } else {
    store = new MemoryKeyValueStore();
    logger.warn('REDIS_URL is not set; sessions are kept in memory');
  }

  let generator: TextGenerator;
  if (CONFIG.GROQ_API_KEY) {
    generator = new GroqTextGenerator({
      logger: createLogger('groq'),
      apiKey: CONFIG.GROQ_API_KEY,
      model: CONFIG.MODEL_NAME,
      maxTokens: CONFIG.MAX_TOKENS,
    });
  } else if (options.allowOffline) {
    generator = new OfflineTextGenerator();
    logger.warn('GROQ_API_KEY is not set; running without text generation');
  } else {
    throw new Error('GROQ_API_KEY environment variable is required');
  }

  const registry = new ConfigRegistry({
    logger: createLogger('config-registry'),
    store: new ConfigStore(store, CONFIG.SESSION_TTL_SECONDS),
  });
  const collector = new CollectorService({
    logger: createLogger('collector'),
    generator,
    sessionStore: new SessionStore(store, CONFIG.SESSION_TTL_SECONDS),
    registry,
    intentModel: CONFIG.INTENT_MODEL_NAME,
    outputMaxTokens: CONFIG.OUTPUT_MAX_TOKENS,
  });

  const raw: unknown = JSON.parse(await readFile(CONFIG.COLLECTOR_CONFIG_PATH, 'utf8'));
  const defaultCollector = CollectionConfig.create(raw);
  await collector.registerCollector(defaultCollector, (data, generatedOutput) => {
    logger.info('Collection completed', { collector: defaultCollector.name, data, hasOutput: generatedOutput !== null });
    return { data, output: generatedOutput };
  });

  return {
    collector,
    registry,
    defaultCollector,
    close: async () => {
      if (redis) await redis.quit();
    },
  };
}
