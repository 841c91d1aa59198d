/**
 * Cache Configuration Module
 * Global engine configuration, clock and backing store (Keyv)
 *
 * CACHE_STORE=redis (default) uses @keyv/redis; CACHE_STORE=memory keeps
 * entries in the process for local runs.
 */

import { Module, Global, Logger } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import Keyv from 'keyv';
import KeyvRedis from '@keyv/redis';
import {
  buildCacheEngineConfig,
  CacheEngineConfig,
} from '../../response-cache/config/cache-engine.config';
import { KeyvCacheStore } from '../../response-cache/services/keyv-cache-store';
import {
  CACHE_CLOCK,
  CACHE_CONSTANTS,
  CACHE_ENGINE_CONFIG,
  CACHE_STORE,
  systemClock,
} from '../../response-cache/types/cache.types';

export function buildRedisUrl(configService: ConfigService): string {
  const redisHost = configService.get<string>('REDIS_HOST', 'localhost');
  const redisPort = configService.get<number>('REDIS_PORT', 6379);
  const redisPassword = configService.get<string>('REDIS_PASSWORD');
  const redisDb = configService.get<number>('REDIS_DB', 0);

  return (
    configService.get<string>('REDIS_URL') ||
    (redisPassword
      ? `redis://:${encodeURIComponent(redisPassword)}@${redisHost}:${redisPort}/${redisDb}`
      : `redis://${redisHost}:${redisPort}/${redisDb}`)
  );
}

export function createCacheKeyv(configService: ConfigService): Keyv<string> {
  const backend = configService.get<string>('CACHE_STORE', 'redis');
  const logger = new Logger('CacheConfigModule');

  if (backend === 'memory') {
    logger.warn('Backing store: in-process memory (entries are not shared)');
    return new Keyv<string>({ namespace: CACHE_CONSTANTS.STORE_NAMESPACE });
  }

  if (backend !== 'redis') {
    throw new Error(`Invalid CACHE_STORE: ${backend} (expected redis or memory)`);
  }

  return new Keyv<string>({
    store: new KeyvRedis(buildRedisUrl(configService)),
    namespace: CACHE_CONSTANTS.STORE_NAMESPACE,
  });
}

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: CACHE_ENGINE_CONFIG,
      inject: [ConfigService],
      useFactory: buildCacheEngineConfig,
    },
    {
      provide: CACHE_CLOCK,
      useValue: systemClock,
    },
    {
      provide: CACHE_STORE,
      inject: [ConfigService, CACHE_ENGINE_CONFIG],
      useFactory: (
        configService: ConfigService,
        engineConfig: CacheEngineConfig,
      ) =>
        new KeyvCacheStore(createCacheKeyv(configService), {
          timeoutMs: engineConfig.storeTimeoutMs,
        }),
    },
  ],
  exports: [CACHE_ENGINE_CONFIG, CACHE_CLOCK, CACHE_STORE],
})
export class CacheConfigModule {}
