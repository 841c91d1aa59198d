/**
 * Provider Types
 */

export type EmbeddingProvider = 'ollama' | 'openai' | 'google';

export interface EmbeddingProviderConfig {
  provider: EmbeddingProvider;
  model: string;
  dimensions: number;
}
