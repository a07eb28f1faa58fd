import { describe, it, expect } from 'vitest';
import { MemoryStore } from './memory-store';

describe('MemoryStore', () => {
  it('should return null for a missing key', async () => {
    const store = new MemoryStore();
    expect(await store.get('occupancy:hall')).toBeNull();
  });

  it('should overwrite and delete values', async () => {
    const store = new MemoryStore([['occupancy:hall', 'a']]);

    await store.set('occupancy:hall', 'b');
    await store.set('occupancy:porch', 'c');
    expect(await store.get('occupancy:hall')).toBe('b');
    expect(store.keys()).toEqual(['occupancy:hall', 'occupancy:porch']);

    await store.delete('occupancy:hall');
    expect(await store.get('occupancy:hall')).toBeNull();
    expect(store.size).toBe(1);
  });
});
