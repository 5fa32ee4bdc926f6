// src/services/store/KeyValueStore.ts

/** Minimal string store with per-key expiry. */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  put(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  exists(key: string): Promise<boolean>;
}
