// src/core/http/types.ts

export type ProviderName = 'github' | 'openai' | 'discord';

export interface HttpRequestConfig {
  provider: ProviderName;
  url: string;
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  body?: unknown;
  timeout?: number;
  etagKey?: ETagKey;
}

export interface ETagKey {
  provider: ProviderName;
  resource: string;
}

export interface HttpResponse {
  data: unknown;
  status: number;
  headers: Record<string, string>;
  cached?: boolean; // True if returned from ETag cache
}

export interface RateLimitConfig {
  qps: number; // Queries per second
  concurrency: number; // Max concurrent requests
}

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number; // milliseconds
  maxDelay: number;
  retryableStatusCodes: number[];
}

export interface CircuitBreakerConfig {
  threshold: number; // consecutive failures before opening
  resetTimeoutMs: number;
}

export interface HttpConfig {
  timeout: number;
  retry: RetryConfig;
  rateLimits?: Partial<Record<ProviderName, RateLimitConfig>>;
  circuitBreaker?: CircuitBreakerConfig;
}
