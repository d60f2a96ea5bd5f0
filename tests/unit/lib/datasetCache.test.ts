import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { DatasetCache, getDatasetCache } from '@/lib/datasetCache';

describe('DatasetCache', () => {
  let cache: DatasetCache;

  beforeEach(() => {
    cache = new DatasetCache();
  });

  describe('get', () => {
    it('should return stored values', () => {
      cache.getOrSet('orders.csv:10:1', () => ({ rows: 3 }));
      expect(cache.get('orders.csv:10:1')).toEqual({ rows: 3 });
      expect(cache.has('orders.csv:10:1')).toBe(true);
    });

    it('should return null for non-existent keys', () => {
      expect(cache.get('nonexistent')).toBeNull();
      expect(cache.has('nonexistent')).toBe(false);
    });
  });

  describe('deleteByPrefix', () => {
    it('should evict every entry of one file and report how many', () => {
      cache.getOrSet('/data/sku_summary.csv:100:1', () => 'old');
      cache.getOrSet('/data/sku_summary.csv:120:2', () => 'new');
      cache.getOrSet('/data/rfm_customer_table.csv:50:1', () => 'rfm');

      expect(cache.deleteByPrefix('/data/sku_summary.csv:')).toBe(2);
      expect(cache.stats().entries).toBe(1);
      expect(cache.get('/data/rfm_customer_table.csv:50:1')).toBe('rfm');
    });
  });

  describe('getOrSet', () => {
    it('should call the factory once and serve later reads from memory', () => {
      const factory = jest.fn(() => 'parsed');

      expect(cache.getOrSet('k', factory)).toBe('parsed');
      expect(cache.getOrSet('k', factory)).toBe('parsed');
      expect(factory).toHaveBeenCalledTimes(1);
      expect(cache.stats()).toEqual({ hits: 1, misses: 1, entries: 1 });
    });

    it('should treat distinct keys independently', () => {
      cache.getOrSet('file:1', () => 'first');
      expect(cache.getOrSet('file:2', () => 'second')).toBe('second');
      expect(cache.stats().misses).toBe(2);
    });
  });

  describe('clear', () => {
    it('should drop entries and reset counters', () => {
      cache.getOrSet('k', () => 1);
      cache.getOrSet('k', () => 1);
      cache.clear();
      expect(cache.stats()).toEqual({ hits: 0, misses: 0, entries: 0 });
    });
  });

  it('should share one instance per process', () => {
    expect(getDatasetCache()).toBe(getDatasetCache());
  });
});
