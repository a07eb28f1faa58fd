import { describe, it, expect, vi, beforeEach } from 'vitest';
import { MongoStore } from './provider';

// ─── Mock Mongoose Model ─────────────────────────────────────────────────────

const mockModel = {
  updateOne: vi.fn().mockResolvedValue({ modifiedCount: 1 }),
  findOne: vi.fn().mockReturnValue({
    select: vi.fn().mockReturnValue({
      lean: vi.fn().mockResolvedValue(null),
    }),
  }),
  deleteOne: vi.fn().mockResolvedValue({ deletedCount: 1 }),
  ensureIndexes: vi.fn().mockResolvedValue(undefined),
};

vi.mock('./schema', () => ({
  getRecordModel: vi.fn(() => mockModel),
}));

describe('MongoStore', () => {
  let store: MongoStore;

  beforeEach(() => {
    vi.clearAllMocks();
    store = new MongoStore();
  });

  describe('get', () => {
    it('should return null when the key does not exist', async () => {
      const value = await store.get('occupancy:missing');
      expect(value).toBeNull();
      expect(mockModel.findOne).toHaveBeenCalledWith({ key: 'occupancy:missing' });
    });

    it('should return the stored value', async () => {
      mockModel.findOne.mockReturnValueOnce({
        select: vi.fn().mockReturnValue({
          lean: vi.fn().mockResolvedValue({ key: 'occupancy:hall', value: '{"totalDuration":3}' }),
        }),
      });

      const value = await store.get('occupancy:hall');
      expect(value).toBe('{"totalDuration":3}');
    });
  });

  describe('set', () => {
    it('should upsert the value by key', async () => {
      await store.set('occupancy:hall', '{"activationCount":1}');

      expect(mockModel.updateOne).toHaveBeenCalledOnce();
      const [filter, update, options] = mockModel.updateOne.mock.calls[0];
      expect(filter).toEqual({ key: 'occupancy:hall' });
      expect(update).toEqual({
        $set: { value: '{"activationCount":1}' },
        $setOnInsert: { key: 'occupancy:hall' },
      });
      expect(options).toEqual({ upsert: true });
    });

    it('should not include manual $set updatedAt (uses schema timestamps)', async () => {
      await store.set('occupancy:hall', '{}');

      const [, update] = mockModel.updateOne.mock.calls[0];
      expect(update.$set.updatedAt).toBeUndefined();
    });

    it('should propagate write errors', async () => {
      mockModel.updateOne.mockRejectedValueOnce(new Error('Write failed'));
      await expect(store.set('x', '{}')).rejects.toThrow('Write failed');
    });
  });

  describe('delete', () => {
    it('should delete a key', async () => {
      await store.delete('occupancy:hall');
      expect(mockModel.deleteOne).toHaveBeenCalledWith({ key: 'occupancy:hall' });
    });
  });

  describe('initialize', () => {
    it('should call ensureIndexes', async () => {
      await store.initialize();
      expect(mockModel.ensureIndexes).toHaveBeenCalledOnce();
    });
  });
});
