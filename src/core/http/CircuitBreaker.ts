// src/core/http/CircuitBreaker.ts

import type { Logger } from '../../observability/Logger';
import type { CircuitBreakerConfig, ProviderName } from './types';

const DEFAULTS: CircuitBreakerConfig = {
  threshold: 5,
  resetTimeoutMs: 60000, // 1 minute
};

export class CircuitBreaker {
  private failures: Map<ProviderName, number> = new Map();
  private lastFailureTime: Map<ProviderName, number> = new Map();
  private config: CircuitBreakerConfig;

  constructor(
    private logger: Logger,
    config: Partial<CircuitBreakerConfig> = {}
  ) {
    this.config = { ...DEFAULTS, ...config };
  }

  canExecute(provider: ProviderName): boolean {
    const failures = this.failures.get(provider) ?? 0;
    const lastFailure = this.lastFailureTime.get(provider) ?? 0;

    if (failures >= this.config.threshold) {
      if (Date.now() - lastFailure < this.config.resetTimeoutMs) {
        this.logger.warn('Circuit breaker open', { provider, failures });
        return false;
      }

      // Half-open: let one call through
      this.failures.set(provider, 0);
    }

    return true;
  }

  recordSuccess(provider: ProviderName): void {
    this.failures.set(provider, 0);
  }

  recordFailure(provider: ProviderName): void {
    this.failures.set(provider, (this.failures.get(provider) ?? 0) + 1);
    this.lastFailureTime.set(provider, Date.now());
  }
}
