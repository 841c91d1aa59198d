import { Test, TestingModule } from '@nestjs/testing';
import { KeyDeriverService, normalizeText } from '../key-deriver.service';
import { EmbeddingProviderFactory } from '../../providers/embedding-provider.factory';
import {
  CacheEngineConfig,
  createCacheEngineConfig,
} from '../../config/cache-engine.config';
import { CACHE_ENGINE_CONFIG, ConversationTurn } from '../../types/cache.types';
import { TableEmbeddings } from '../../testing/table-embeddings';

describe('KeyDeriverService', () => {
  let service: KeyDeriverService;
  let config: CacheEngineConfig;
  let embeddings: TableEmbeddings;
  let createEmbeddingModel: jest.Mock;

  const history: ConversationTurn[] = [
    { role: 'user', content: 'Hi there' },
    { role: 'assistant', content: 'Hello! How can I help?' },
    { role: 'user', content: 'I ordered shoes last week' },
    { role: 'assistant', content: 'Let me check that for you.' },
  ];

  beforeEach(async () => {
    config = createCacheEngineConfig({ embeddingTimeoutMs: 20 });
    embeddings = new TableEmbeddings({
      'where is my package?': [0.96, 0.28, 0],
      'broken vector': [],
    });
    createEmbeddingModel = jest.fn().mockReturnValue(embeddings);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        KeyDeriverService,
        { provide: CACHE_ENGINE_CONFIG, useValue: config },
        {
          provide: EmbeddingProviderFactory,
          useValue: { createEmbeddingModel },
        },
      ],
    }).compile();

    service = module.get<KeyDeriverService>(KeyDeriverService);
  });

  describe('normalizeText', () => {
    it('lowercases, trims and collapses whitespace but keeps punctuation', () => {
      expect(normalizeText('  Where   IS my\tOrder? ')).toBe('where is my order?');
    });
  });

  describe('exactKey', () => {
    it('prefixes the level and hashes with sha256', () => {
      const key = service.exactKey('Where is my order?', [], config.levels.intent);

      expect(key).toMatch(/^intent:[0-9a-f]{64}$/);
    });

    it('is stable under case and whitespace changes', () => {
      const policy = config.levels.intent;

      expect(service.exactKey('  where IS my   order? ', [], policy)).toBe(
        service.exactKey('Where is my order?', [], policy),
      );
    });

    it('distinguishes punctuation', () => {
      const policy = config.levels.intent;

      expect(service.exactKey('where is my order', [], policy)).not.toBe(
        service.exactKey('where is my order?', [], policy),
      );
    });

    it('differs across levels for the same query', () => {
      expect(service.exactKey('q', [], config.levels.intent)).not.toBe(
        service.exactKey('q', [], config.levels.knowledge),
      );
    });

    it('folds only the last keyWindow turns into conversation keys', () => {
      const policy = config.levels.conversation;
      const olderTurnChanged = [
        { role: 'user', content: 'Good morning' },
        ...history.slice(1),
      ];
      const lastTurnChanged = [
        ...history.slice(0, 3),
        { role: 'assistant', content: 'Which order number?' },
      ];

      const base = service.exactKey('Yes please', history, policy);
      expect(service.exactKey('Yes please', olderTurnChanged, policy)).toBe(base);
      expect(service.exactKey('Yes please', lastTurnChanged, policy)).not.toBe(base);
    });

    it('includes the turn role in the key material', () => {
      const policy = config.levels.conversation;

      expect(
        service.exactKey('ok', [{ role: 'user', content: 'refund' }], policy),
      ).not.toBe(
        service.exactKey('ok', [{ role: 'assistant', content: 'refund' }], policy),
      );
    });

    it('ignores context on levels without a key window', () => {
      const policy = config.levels.intent;

      expect(service.exactKey('track order', history, policy)).toBe(
        service.exactKey('track order', [], policy),
      );
    });
  });

  describe('derive', () => {
    it('returns an embedding of the normalized query for semantic levels', async () => {
      const derived = await service.derive(
        'Where is my PACKAGE?',
        [],
        config.levels.full_response,
      );

      expect(derived.exactKey).toMatch(/^full_response:/);
      expect(derived.embedding).toEqual([0.96, 0.28, 0]);
      expect(embeddings.calls).toEqual(['where is my package?']);
    });

    it('does not embed for exact levels', async () => {
      const derived = await service.derive('Where is my package?', [], config.levels.intent);

      expect(derived.embedding).toBeUndefined();
      expect(createEmbeddingModel).not.toHaveBeenCalled();
    });

    it('creates the embedding model once', async () => {
      await service.embed('Where is my package?');
      await service.embed('Where is my package?');

      expect(createEmbeddingModel).toHaveBeenCalledTimes(1);
    });
  });

  describe('embed', () => {
    it('returns undefined when the provider fails', async () => {
      embeddings.failing = true;

      await expect(service.embed('Where is my package?')).resolves.toBeUndefined();
    });

    it('returns undefined when the provider exceeds the timeout', async () => {
      embeddings.delayMs = 100;

      await expect(service.embed('Where is my package?')).resolves.toBeUndefined();
    });

    it('returns undefined for an empty vector', async () => {
      await expect(service.embed('broken vector')).resolves.toBeUndefined();
    });

    it('returns undefined when the model cannot be created', async () => {
      createEmbeddingModel.mockImplementation(() => {
        throw new Error('OPENAI_API_KEY is required for OpenAI embeddings');
      });

      await expect(service.embed('Where is my package?')).resolves.toBeUndefined();
    });
  });
});
