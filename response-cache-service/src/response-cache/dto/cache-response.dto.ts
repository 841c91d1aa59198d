/**
 * Cache Response DTOs
 * Output shapes shared by the HTTP and TCP transports
 */

import type {
  CacheHealth,
  CacheMetricsSnapshot,
  CacheResult,
  ConversationTurn,
  CacheLevelName,
  CachePayload,
  InvalidateResult,
  PutResult,
} from '../types/cache.types';

export type CacheLookupResponseDto = CacheResult;

export type CacheStoreResponseDto = PutResult;

export type CacheInvalidateResponseDto = InvalidateResult;

export interface CacheWarmResponseDto {
  warmed: number;
  total: number;
  results: PutResult[];
}

export type CacheMetricsResponseDto = CacheMetricsSnapshot;

export type CacheHealthResponseDto = CacheHealth;

/**
 * TCP payloads (conversation orchestrator)
 */
export interface CacheGetMessage {
  query: string;
  context?: ConversationTurn[];
}

export interface CachePutMessage {
  query: string;
  context?: ConversationTurn[];
  value: CachePayload;
  levels: CacheLevelName[];
}

export interface TcpResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
}
