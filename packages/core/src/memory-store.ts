import type { PersistenceStore } from '@occupancy-meter/types';

/**
 * In-process PersistenceStore. Survives tracker restarts within one process,
 * which is enough for tests and for embedding without a database.
 */
export class MemoryStore implements PersistenceStore {
  private entries = new Map<string, string>();

  constructor(initial?: Iterable<readonly [string, string]>) {
    if (initial) {
      for (const [key, value] of initial) {
        this.entries.set(key, value);
      }
    }
  }

  async get(key: string): Promise<string | null> {
    return this.entries.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.entries.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  /** Number of stored keys. */
  get size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }
}
