import { ConfigService } from '@nestjs/config';
import { buildRedisUrl, createCacheKeyv } from '../cache.module';

describe('CacheConfigModule helpers', () => {
  describe('buildRedisUrl', () => {
    it('prefers an explicit REDIS_URL', () => {
      const configService = new ConfigService({
        REDIS_URL: 'redis://cache.internal:6380/2',
        REDIS_HOST: 'ignored',
      });

      expect(buildRedisUrl(configService)).toBe('redis://cache.internal:6380/2');
    });

    it('builds the url from host, port and db', () => {
      const configService = new ConfigService({
        REDIS_HOST: 'redis.test',
        REDIS_PORT: 6390,
        REDIS_DB: 3,
      });

      expect(buildRedisUrl(configService)).toBe('redis://redis.test:6390/3');
    });

    it('encodes the password', () => {
      const configService = new ConfigService({
        REDIS_HOST: 'redis.test',
        REDIS_PASSWORD: 'test secret@1',
      });

      expect(buildRedisUrl(configService)).toBe(
        'redis://:test%20secret%401@redis.test:6379/0',
      );
    });
  });

  describe('createCacheKeyv', () => {
    it('creates an in-process store in the cache namespace', async () => {
      const keyv = createCacheKeyv(new ConfigService({ CACHE_STORE: 'memory' }));

      expect(keyv.namespace).toBe('response-cache');
      await keyv.set('intent:abc', 'value');
      await expect(keyv.get('intent:abc')).resolves.toBe('value');
    });

    it('rejects an unknown backend', () => {
      expect(() =>
        createCacheKeyv(new ConfigService({ CACHE_STORE: 'memcached' })),
      ).toThrow('Invalid CACHE_STORE: memcached (expected redis or memory)');
    });
  });
});
