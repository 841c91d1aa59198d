import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { QdrantClient } from '@qdrant/js-client-rest';
import { ResponseCacheController } from './response-cache.controller';
import { ResponseCacheTcpController } from './response-cache-tcp.controller';
import { AdminController } from './admin.controller';
import { EmbeddingProviderFactory } from './providers/embedding-provider.factory';
import { KeyDeriverService } from './services/key-deriver.service';
import { CacheMetricsService } from './services/cache-metrics.service';
import { LevelCoordinatorService } from './services/level-coordinator.service';
import { CacheInvalidationService } from './services/cache-invalidation.service';
import { QdrantSemanticIndex } from './services/qdrant-semantic-index';
import { InMemorySemanticIndex } from './services/in-memory-semantic-index';
import {
  CACHE_CLOCK,
  CACHE_CONSTANTS,
  SEMANTIC_INDEX,
  CacheClock,
} from './types/cache.types';
import type { SemanticIndex } from './types/store.types';

@Module({
  imports: [ConfigModule, ScheduleModule.forRoot()],
  controllers: [ResponseCacheController, ResponseCacheTcpController, AdminController],
  providers: [
    EmbeddingProviderFactory,
    KeyDeriverService,
    CacheMetricsService,
    {
      provide: SEMANTIC_INDEX,
      inject: [ConfigService, EmbeddingProviderFactory, CACHE_CLOCK],
      useFactory: (
        configService: ConfigService,
        embeddingProviderFactory: EmbeddingProviderFactory,
        clock: CacheClock,
      ): SemanticIndex => {
        const backend = configService.get<string>(
          'SEMANTIC_INDEX_BACKEND',
          'qdrant',
        );
        if (backend === 'memory') {
          return new InMemorySemanticIndex(clock);
        }
        if (backend !== 'qdrant') {
          throw new Error(
            `Invalid SEMANTIC_INDEX_BACKEND: ${backend} (expected qdrant or memory)`,
          );
        }

        const url = configService.get<string>(
          'QDRANT_URL',
          'http://localhost:6333',
        );
        return new QdrantSemanticIndex(
          new QdrantClient({ url }),
          {
            collectionName: configService.get<string>(
              'CACHE_COLLECTION_NAME',
              CACHE_CONSTANTS.SEMANTIC_COLLECTION,
            ),
            vectorSize: embeddingProviderFactory.getEmbeddingDimensions(),
          },
          clock,
        );
      },
    },
    LevelCoordinatorService,
    CacheInvalidationService,
  ],
  exports: [LevelCoordinatorService],
})
export class ResponseCacheModule {}
