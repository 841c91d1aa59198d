import { Test, TestingModule } from '@nestjs/testing';
import { ResponseCacheTcpController } from '../response-cache-tcp.controller';
import { LevelCoordinatorService } from '../services/level-coordinator.service';
import {
  CacheInvalidationEvent,
  CacheInvalidationService,
} from '../services/cache-invalidation.service';
import type { CacheGetMessage, CachePutMessage } from '../dto/cache-response.dto';

describe('ResponseCacheTcpController', () => {
  let controller: ResponseCacheTcpController;
  let coordinator: {
    get: jest.Mock;
    put: jest.Mock;
    metricsSnapshot: jest.Mock;
    health: jest.Mock;
  };
  let cacheInvalidationService: { handleInvalidationEvent: jest.Mock };

  beforeEach(async () => {
    coordinator = {
      get: jest.fn(),
      put: jest.fn(),
      metricsSnapshot: jest.fn(),
      health: jest.fn(),
    };
    cacheInvalidationService = {
      handleInvalidationEvent: jest
        .fn()
        .mockResolvedValue({ removedCount: 0, rejectedPatterns: [] }),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [ResponseCacheTcpController],
      providers: [
        { provide: LevelCoordinatorService, useValue: coordinator },
        { provide: CacheInvalidationService, useValue: cacheInvalidationService },
      ],
    }).compile();

    controller = module.get<ResponseCacheTcpController>(
      ResponseCacheTcpController,
    );
  });

  describe('cache_get', () => {
    it('wraps the lookup result', async () => {
      const miss = { hit: false, latencyMs: 3, skippedLevels: ['full_response'] };
      coordinator.get.mockResolvedValue(miss);

      await expect(
        controller.cacheGet({ query: 'refund policy' }),
      ).resolves.toEqual({ success: true, data: miss });
      expect(coordinator.get).toHaveBeenCalledWith('refund policy', []);
    });

    it('requires a query', async () => {
      const payload: CacheGetMessage = JSON.parse('{"context":[]}');

      await expect(controller.cacheGet(payload)).resolves.toEqual({
        success: false,
        error: 'query is required',
      });
      expect(coordinator.get).not.toHaveBeenCalled();
    });

    it('rejects a context turn without content', async () => {
      const payload: CacheGetMessage = JSON.parse(
        '{"query":"hello","context":[{"role":"user"}]}',
      );

      await expect(controller.cacheGet(payload)).resolves.toEqual({
        success: false,
        error: 'context must be an array of { role, content } strings',
      });
      expect(coordinator.get).not.toHaveBeenCalled();
    });

    it('rejects a context that is not an array', async () => {
      const payload: CacheGetMessage = JSON.parse(
        '{"query":"hello","context":{"role":"user","content":"hi"}}',
      );

      await expect(controller.cacheGet(payload)).resolves.toEqual({
        success: false,
        error: 'context must be an array of { role, content } strings',
      });
    });

    it('passes well-formed context through', async () => {
      coordinator.get.mockResolvedValue({ hit: false, latencyMs: 1, skippedLevels: [] });
      const context = [{ role: 'user', content: 'hi' }];

      await controller.cacheGet({ query: 'hello', context });

      expect(coordinator.get).toHaveBeenCalledWith('hello', context);
    });

    it('reports unexpected failures', async () => {
      coordinator.get.mockRejectedValue(new Error('boom'));

      await expect(controller.cacheGet({ query: 'q' })).resolves.toEqual({
        success: false,
        error: 'boom',
      });
    });
  });

  describe('cache_put', () => {
    it('stores a response', async () => {
      coordinator.put.mockResolvedValue({ ok: true, levelsWritten: ['intent'] });

      await expect(
        controller.cachePut({
          query: 'opening hours',
          value: { text: '9 to 5' },
          levels: ['intent'],
        }),
      ).resolves.toEqual({
        success: true,
        data: { ok: true, levelsWritten: ['intent'] },
      });
    });

    it('rejects unknown levels', async () => {
      const payload: CachePutMessage = JSON.parse(
        '{"query":"q","value":{"text":"x"},"levels":["session"]}',
      );

      await expect(controller.cachePut(payload)).resolves.toEqual({
        success: false,
        error: 'levels must be known cache levels',
      });
    });

    it('rejects a context turn whose role is not a string', async () => {
      const payload: CachePutMessage = JSON.parse(
        '{"query":"q","context":[{"role":7,"content":"hi"}],"value":{"text":"x"},"levels":["conversation"]}',
      );

      await expect(controller.cachePut(payload)).resolves.toEqual({
        success: false,
        error: 'context must be an array of { role, content } strings',
      });
      expect(coordinator.put).not.toHaveBeenCalled();
    });

    it('rejects a value that is not an object', async () => {
      const payload: CachePutMessage = JSON.parse(
        '{"query":"q","value":null,"levels":["intent"]}',
      );

      await expect(controller.cachePut(payload)).resolves.toEqual({
        success: false,
        error: 'value must be a JSON object',
      });
      expect(coordinator.put).not.toHaveBeenCalled();
    });
  });

  it('returns metrics and health', async () => {
    coordinator.metricsSnapshot.mockReturnValue({ lookups: 0 });
    coordinator.health.mockResolvedValue({
      status: 'degraded',
      store: 'unhealthy',
      semanticIndex: 'healthy',
    });

    expect(controller.cacheMetrics()).toEqual({
      success: true,
      data: { lookups: 0 },
    });
    await expect(controller.getHealth()).resolves.toEqual({
      success: true,
      data: { status: 'degraded', store: 'unhealthy', semanticIndex: 'healthy' },
    });
  });

  describe('cache.invalidate', () => {
    it('forwards string patterns', async () => {
      const payload: CacheInvalidationEvent = JSON.parse(
        '{"patterns":["knowledge:*",42],"reason":"document.updated"}',
      );

      await controller.handleInvalidate(payload);

      expect(cacheInvalidationService.handleInvalidationEvent).toHaveBeenCalledWith({
        patterns: ['knowledge:*'],
        reason: 'document.updated',
      });
    });

    it('ignores events without patterns', async () => {
      const payload: CacheInvalidationEvent = JSON.parse('{"reason":"noop"}');

      await controller.handleInvalidate(payload);

      expect(cacheInvalidationService.handleInvalidationEvent).not.toHaveBeenCalled();
    });
  });
});
