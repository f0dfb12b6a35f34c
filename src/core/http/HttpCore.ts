// src/core/http/HttpCore.ts

import axios, { AxiosInstance, isAxiosError } from 'axios';
import * as http from 'http';
import * as https from 'https';
import PQueue from 'p-queue';
import type { HttpConfig, HttpRequestConfig, HttpResponse, ProviderName } from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import { RetryHandler } from './RetryHandler';
import { CircuitBreaker } from './CircuitBreaker';
import { ETagCache } from './ETagCache';
import {
  ApiClientError,
  ApiServerError,
  RateLimitError,
  NetworkTimeoutError,
  NetworkError,
  CircuitBreakerOpenError,
} from '../../utils/errors';
import { withHttpSpan } from '../../observability/tracing';

const USER_AGENT = 'merge-herald/0.1';

export class HttpCore {
  private axiosInstance: AxiosInstance;
  private rateLimiters: Map<ProviderName, PQueue> = new Map();
  private retryHandler: RetryHandler;
  private circuitBreaker: CircuitBreaker;
  private etagCache: ETagCache;

  constructor(
    private config: HttpConfig,
    private metrics: MetricsCollector,
    private logger: Logger
  ) {
    this.circuitBreaker = new CircuitBreaker(logger, config.circuitBreaker);
    this.retryHandler = new RetryHandler(config.retry, logger, this.circuitBreaker);
    this.etagCache = new ETagCache();

    this.axiosInstance = axios.create({
      timeout: config.timeout,
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true }),
    });

    this.initializeRateLimiters();
  }

  async get(
    url: string,
    config: Omit<HttpRequestConfig, 'url' | 'method' | 'body'>
  ): Promise<HttpResponse> {
    return this.request({ ...config, url, method: 'GET' });
  }

  async post(
    url: string,
    body: unknown,
    config: Omit<HttpRequestConfig, 'url' | 'method' | 'body'>
  ): Promise<HttpResponse> {
    return this.request({ ...config, url, method: 'POST', body });
  }

  /**
   * Rate-limited, retried request with conditional GET support. Failures are
   * mapped onto the ApiError / NetworkError hierarchy.
   */
  async request(config: HttpRequestConfig): Promise<HttpResponse> {
    const { provider } = config;
    const requestId = this.generateRequestId();
    const method = config.method ?? 'GET';

    this.metrics.incrementCounter('http_requests_total', {
      provider,
      method,
      status: 'initiated',
    });

    this.logger.debug('HTTP request', {
      requestId,
      provider,
      url: config.url,
      method,
      query: config.query,
      headerKeys: Object.keys(config.headers ?? {}),
    });

    if (!this.circuitBreaker.canExecute(provider)) {
      throw new CircuitBreakerOpenError(`Circuit breaker open for ${provider}`, { provider });
    }

    const headers: Record<string, string> = {
      'X-Request-ID': requestId,
      'User-Agent': USER_AGENT,
      ...config.headers,
    };

    const cached =
      config.etagKey && method === 'GET' ? this.etagCache.get(config.etagKey) : undefined;
    if (cached) {
      headers['If-None-Match'] = cached.etag;
      this.logger.debug('Conditional request', { requestId, etag: cached.etag });
    }

    const execute = async (): Promise<HttpResponse> => {
      return withHttpSpan(method, config.url, async () => {
        const startTime = Date.now();

        try {
          const axiosResponse = await this.retryHandler.execute(async () => {
            return this.axiosInstance.request<unknown>({
              url: config.url,
              method,
              headers,
              params: config.query,
              data: config.body,
              timeout: config.timeout ?? this.config.timeout,
              validateStatus: (status) => status < 400 || status === 304,
            });
          }, provider);

          this.circuitBreaker.recordSuccess(provider);

          this.metrics.incrementCounter('http_requests_total', {
            provider,
            method,
            status: axiosResponse.status.toString(),
          });
          this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
            provider,
            status: axiosResponse.status,
          });

          if (axiosResponse.status === 304 && cached) {
            this.logger.debug('304 Not Modified, using cache', { requestId });
            this.metrics.incrementCounter('http_cache_hits', { provider });
            return {
              ...cached.payload,
              status: 304,
              cached: true,
            };
          }

          const result: HttpResponse = {
            data: axiosResponse.data,
            status: axiosResponse.status,
            headers: this.toHeaderRecord(axiosResponse.headers),
          };

          const etag = result.headers['etag'];
          if (config.etagKey && etag) {
            this.etagCache.set(config.etagKey, result, etag);
            this.logger.debug('Cached with ETag', { requestId, etag });
          }

          return result;
        } catch (error: unknown) {
          this.circuitBreaker.recordFailure(provider);

          const errorStatus = isAxiosError(error) ? error.response?.status ?? 'error' : 'error';
          this.metrics.incrementCounter('http_requests_total', {
            provider,
            method,
            status: errorStatus.toString(),
          });
          this.metrics.incrementCounter('http_errors', {
            provider,
            status: errorStatus,
          });

          throw this.transformError(error, provider, config.url);
        }
      });
    };

    return this.runThroughRateLimiter(provider, execute);
  }

  private async runThroughRateLimiter<T>(
    provider: ProviderName,
    task: () => Promise<T>
  ): Promise<T> {
    const queue = this.rateLimiters.get(provider);

    if (!queue) {
      return task();
    }

    const wrappedTask = async (): Promise<T> => {
      try {
        return await task();
      } finally {
        this.metrics.recordGauge('rate_limit_queue_size', queue.size, { provider });
      }
    };

    this.metrics.recordGauge('rate_limit_queue_size', queue.size + 1, { provider });

    return queue.add(wrappedTask);
  }

  private initializeRateLimiters(): void {
    for (const [provider, limit] of Object.entries(this.config.rateLimits ?? {})) {
      if (!limit || !isProviderName(provider)) continue;

      // Fractional QPS becomes one request per (1000 / qps) ms
      const intervalCap = limit.qps >= 1 ? Math.floor(limit.qps) : 1;
      const interval = limit.qps >= 1 ? 1000 : Math.floor(1000 / limit.qps);

      this.rateLimiters.set(
        provider,
        new PQueue({
          intervalCap,
          interval,
          concurrency: limit.concurrency,
        })
      );

      this.logger.debug('Rate limiter initialized', {
        provider,
        originalQps: limit.qps,
        intervalCap,
        interval,
        concurrency: limit.concurrency,
      });
    }
  }

  private generateRequestId(): string {
    return `req_${Date.now()}_${Math.random().toString(36).substring(7)}`;
  }

  private toHeaderRecord(headers: object): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  private transformError(error: unknown, provider: ProviderName, url: string): Error {
    if (!isAxiosError(error)) {
      return new NetworkError('Network error', {
        provider,
        url,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    if (error.response) {
      const status = error.response.status;

      this.logger.debug('HTTP error response', {
        provider,
        status,
        statusText: error.response.statusText,
        data: error.response.data,
      });

      if (status === 429) {
        const retryAfter = Number(this.toHeaderRecord(error.response.headers)['retry-after']);
        return new RateLimitError(
          `Rate limited by ${provider}`,
          Number.isFinite(retryAfter) ? retryAfter : undefined,
          { provider, url }
        );
      }
      if (status >= 400 && status < 500) {
        return new ApiClientError(`Client error: ${status}`, status, {
          provider,
          url,
          response: error.response.data,
        });
      }
      if (status >= 500) {
        return new ApiServerError(`Server error: ${status}`, status, { provider, url });
      }
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkTimeoutError('Request timeout', { provider, url });
    }
    return new NetworkError(`Network error: ${error.message}`, { provider, url, code: error.code });
  }
}

function isProviderName(value: string): value is ProviderName {
  return value === 'github' || value === 'openai' || value === 'discord';
}
