import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import { EmbeddingProviderFactory } from '../embedding-provider.factory';

describe('EmbeddingProviderFactory', () => {
  const savedGoogleKey = process.env.GOOGLE_API_KEY;

  const factoryWith = (config: Record<string, string>) =>
    new EmbeddingProviderFactory(new ConfigService(config));

  beforeEach(() => {
    delete process.env.GOOGLE_API_KEY;
  });

  afterAll(() => {
    if (savedGoogleKey !== undefined) {
      process.env.GOOGLE_API_KEY = savedGoogleKey;
    }
  });

  it('defaults to the local Ollama model', () => {
    const factory = factoryWith({});

    expect(factory.describe()).toEqual({
      provider: 'ollama',
      model: 'bge-m3:567m',
      dimensions: 1024,
    });
    expect(factory.createEmbeddingModel()).toBeInstanceOf(OllamaEmbeddings);
  });

  it('falls back to Ollama for an unknown provider', () => {
    expect(factoryWith({ EMBEDDING_PROVIDER: 'cohere' }).describe().provider).toBe(
      'ollama',
    );
  });

  it('sizes the index from the selected model', () => {
    const factory = factoryWith({
      EMBEDDING_PROVIDER: 'openai',
      OPENAI_API_KEY: 'test-key',
      OPENAI_EMBEDDING_MODEL: 'text-embedding-3-large',
    });

    expect(factory.getEmbeddingDimensions()).toBe(3072);
    expect(factory.createEmbeddingModel()).toBeInstanceOf(OpenAIEmbeddings);
  });

  it('lets EMBEDDING_DIMENSIONS override the model table', () => {
    const factory = factoryWith({ EMBEDDING_DIMENSIONS: '384' });

    expect(factory.getEmbeddingDimensions()).toBe(384);
  });

  it('requires an API key for hosted providers', () => {
    const factory = factoryWith({ EMBEDDING_PROVIDER: 'google' });

    expect(() => factory.createEmbeddingModel()).toThrow(
      'GOOGLE_API_KEY is required for Google embeddings',
    );
  });
});
