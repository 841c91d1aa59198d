/**
 * Embedding Provider Factory
 * Query embeddings for semantic cache levels: Ollama, OpenAI or Google via LangChain
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import { GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import type { Embeddings } from '@langchain/core/embeddings';
import type { EmbeddingProvider, EmbeddingProviderConfig } from './types';

const DEFAULT_MODELS: Record<EmbeddingProvider, string> = {
  ollama: 'bge-m3:567m',
  openai: 'text-embedding-3-small',
  google: 'text-embedding-004',
};

const MODEL_ENV_VARS: Record<EmbeddingProvider, string> = {
  ollama: 'OLLAMA_EMBEDDING_MODEL',
  openai: 'OPENAI_EMBEDDING_MODEL',
  google: 'GOOGLE_EMBEDDING_MODEL',
};

const MODEL_DIMENSIONS: Record<string, number> = {
  'bge-m3:567m': 1024,
  'bge-m3': 1024,
  'nomic-embed-text': 768,
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
  'text-embedding-004': 768,
  'embedding-001': 768,
};

@Injectable()
export class EmbeddingProviderFactory {
  private readonly logger = new Logger(EmbeddingProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Create embedding model based on configuration.
   * Throws when the selected provider is missing its API key.
   */
  createEmbeddingModel(): Embeddings {
    const { provider, model, dimensions } = this.describe();

    this.logger.log(
      `Creating embedding model: ${provider}/${model} (${dimensions}D)`,
    );

    switch (provider) {
      case 'ollama':
        return this.createOllamaEmbeddings(model);
      case 'openai':
        return this.createOpenAIEmbeddings(model);
      case 'google':
        return this.createGoogleEmbeddings(model);
    }
  }

  /**
   * Vector size of the semantic index collection
   */
  getEmbeddingDimensions(): number {
    return this.describe().dimensions;
  }

  describe(): EmbeddingProviderConfig {
    const provider = this.getProvider();
    const model = this.configService.get<string>(
      MODEL_ENV_VARS[provider],
      DEFAULT_MODELS[provider],
    );

    const configured = Number(
      this.configService.get<string | number>('EMBEDDING_DIMENSIONS', ''),
    );
    const dimensions =
      Number.isInteger(configured) && configured > 0
        ? configured
        : (MODEL_DIMENSIONS[model] ?? 1024);

    return { provider, model, dimensions };
  }

  private getProvider(): EmbeddingProvider {
    const provider = this.configService.get<string>(
      'EMBEDDING_PROVIDER',
      'ollama',
    );

    if (
      provider !== 'ollama' &&
      provider !== 'openai' &&
      provider !== 'google'
    ) {
      this.logger.warn(
        `Invalid embedding provider: ${provider}, defaulting to ollama`,
      );
      return 'ollama';
    }

    return provider;
  }

  private createOllamaEmbeddings(model: string): OllamaEmbeddings {
    const baseUrl = this.configService.get<string>(
      'OLLAMA_BASE_URL',
      'http://localhost:11434',
    );

    return new OllamaEmbeddings({ model, baseUrl });
  }

  private createOpenAIEmbeddings(model: string): OpenAIEmbeddings {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');

    if (!apiKey) {
      throw new Error('OPENAI_API_KEY is required for OpenAI embeddings');
    }

    return new OpenAIEmbeddings({ model, apiKey });
  }

  private createGoogleEmbeddings(model: string): GoogleGenerativeAIEmbeddings {
    const apiKey = this.configService.get<string>('GOOGLE_API_KEY');

    if (!apiKey) {
      throw new Error('GOOGLE_API_KEY is required for Google embeddings');
    }

    return new GoogleGenerativeAIEmbeddings({ model, apiKey });
  }
}
