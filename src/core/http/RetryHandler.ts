// src/core/http/RetryHandler.ts

import { isAxiosError } from 'axios';
import type { RetryConfig, ProviderName } from './types';
import type { Logger } from '../../observability/Logger';
import type { CircuitBreaker } from './CircuitBreaker';

export class RetryHandler {
  constructor(
    private config: RetryConfig,
    private logger: Logger,
    private circuitBreaker?: CircuitBreaker
  ) {}

  async execute<T>(task: () => Promise<T>, provider: ProviderName): Promise<T> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      // Re-check before every retry, a failing provider may have tripped it meanwhile
      if (attempt > 0 && this.circuitBreaker && !this.circuitBreaker.canExecute(provider)) {
        this.logger.warn('Circuit breaker open, skipping retry', { provider, attempt });
        throw lastError;
      }

      try {
        return await task();
      } catch (error: unknown) {
        lastError = error;

        const status = isAxiosError(error) ? error.response?.status : undefined;
        const isRetryable =
          status !== undefined && this.config.retryableStatusCodes.includes(status);

        if (!isRetryable || attempt === this.config.maxRetries) {
          throw error;
        }

        const retryAfter = isAxiosError(error)
          ? readHeader(error.response?.headers, 'retry-after')
          : undefined;

        let delay: number;
        if (retryAfter) {
          const seconds = parseInt(retryAfter, 10);
          delay = !isNaN(seconds)
            ? seconds * 1000
            : Math.max(0, new Date(retryAfter).getTime() - Date.now());
          delay = Math.min(delay, this.config.maxDelay);

          this.logger.warn('Retrying with Retry-After', {
            provider,
            attempt: attempt + 1,
            delay,
            status,
            retryAfter,
          });
        } else {
          // Exponential backoff with jitter
          delay = Math.min(
            this.config.baseDelay * Math.pow(2, attempt) + Math.random() * this.config.baseDelay,
            this.config.maxDelay
          );

          this.logger.warn('Retrying request', {
            provider,
            attempt: attempt + 1,
            delay,
            status,
          });
        }

        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }

    throw lastError;
  }
}

function readHeader(headers: unknown, name: string): string | undefined {
  if (!headers || typeof headers !== 'object') return undefined;
  const value: unknown = Reflect.get(headers, name);
  return typeof value === 'string' ? value : undefined;
}
