import { describe, expect, it } from 'vitest';
import { TtlCache } from '../../../src/core/cache.js';

describe('TtlCache', () => {
  it('should expire entries once their ttl has elapsed', () => {
    let now = 1000;
    const cache = new TtlCache<string>(500, () => now);

    cache.set('tank/data', 'value');
    now = 1499;
    expect(cache.get('tank/data')).toBe('value');
    now = 1500;
    expect(cache.get('tank/data')).toBeUndefined();
    expect(cache.size()).toBe(0);
    expect(cache.getStats()).toEqual({ size: 0, hitRate: 0.5, totalHits: 1, totalMisses: 1 });

    cache.dispose();
  });

  it('should store nothing when the ttl is zero', () => {
    const cache = new TtlCache<string>(0);

    cache.set('tank/data', 'value');

    expect(cache.enabled).toBe(false);
    expect(cache.get('tank/data')).toBeUndefined();
  });

  it('should drop entries on invalidation', () => {
    const cache = new TtlCache<number>(60000);
    cache.set('a', 1);
    cache.set('b', 2);

    expect(cache.invalidate('a')).toBe(true);
    expect(cache.invalidate('a')).toBe(false);
    expect(cache.get('b')).toBe(2);

    cache.clear();
    expect(cache.size()).toBe(0);
    cache.dispose();
  });
});
