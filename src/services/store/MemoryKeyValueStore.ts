// src/services/store/MemoryKeyValueStore.ts

import { KeyValueStore } from './KeyValueStore';

interface Entry {
  value: string;
  expiresAt: number;
}

/** Process-local store for tests and single-process runs. Expiry is checked on read. */
export class MemoryKeyValueStore implements KeyValueStore {
  private entries = new Map<string, Entry>();

  constructor(private now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async put(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return (await this.get(key)) !== null;
  }

  get size(): number {
    return this.entries.size;
  }
}
