import { describe, expect, it } from 'vitest';
import { MessageIdCache } from '../../src/services/webhook/MessageIdCache';

const HOUR = 60 * 60 * 1000;

describe('MessageIdCache', () => {
  function cacheWithClock(ttl = 48 * HOUR) {
    let current = 0;
    const cache = new MessageIdCache(ttl, () => current);
    return { cache, advance: (ms: number) => { current += ms; } };
  }

  it('reports each id as new only once', () => {
    const { cache } = cacheWithClock();

    expect(cache.markIfNew('wamid.1')).toBe(true);
    expect(cache.markIfNew('wamid.1')).toBe(false);
    expect(cache.has('wamid.1')).toBe(true);
    expect(cache.has('wamid.2')).toBe(false);
  });

  it('forgets ids older than the ttl', () => {
    const { cache, advance } = cacheWithClock(HOUR);
    cache.add('wamid.1');

    advance(HOUR);
    expect(cache.has('wamid.1')).toBe(true);

    advance(1);
    expect(cache.has('wamid.1')).toBe(false);
    expect(cache.markIfNew('wamid.1')).toBe(true);
  });

  it('cleans up only expired entries', () => {
    const { cache, advance } = cacheWithClock(HOUR);
    cache.add('old');
    advance(30 * 60 * 1000);
    cache.add('recent');
    advance(31 * 60 * 1000);

    expect(cache.cleanup()).toBe(1);
    expect(cache.getStats()).toEqual({ size: 1, ttl: HOUR });
  });
});
