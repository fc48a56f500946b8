import { ConfigService } from '@nestjs/config';
import { CacheService } from './cache.service';

describe('CacheService', () => {
  let cacheService: CacheService;

  beforeEach(() => {
    cacheService = new CacheService(new ConfigService({ CACHE_TTL: 60 }));
  });

  it('returns what was stored', () => {
    cacheService.set('menu', [1, 2, 3]);

    expect(cacheService.get<number[]>('menu')).toEqual([1, 2, 3]);
  });

  it('returns undefined for unknown keys', () => {
    expect(cacheService.get('missing')).toBeUndefined();
  });

  it('deletes every key sharing a prefix', () => {
    cacheService.set('recommendation:popular:3', ['a']);
    cacheService.set('recommendation:popular:5', ['b']);
    cacheService.set('other', 'kept');

    cacheService.delByPrefix('recommendation:popular');

    expect(cacheService.get('recommendation:popular:3')).toBeUndefined();
    expect(cacheService.get('recommendation:popular:5')).toBeUndefined();
    expect(cacheService.get('other')).toBe('kept');
  });

  it('expires entries after the configured ttl', () => {
    jest.useFakeTimers();
    try {
      cacheService.set('menu', 'cached');
      jest.setSystemTime(Date.now() + 61_000);

      expect(cacheService.get('menu')).toBeUndefined();
    } finally {
      jest.useRealTimers();
    }
  });
});
