/**
 * Tracing Unit Tests
 *
 * No SDK is registered here, so an enabled tracer is the API's no-op tracer:
 * the tests cover the wrapping, not exported spans.
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as tracing from '../../src/observability/tracing';

describe('Tracing', () => {
  afterEach(() => {
    delete process.env.OTEL_ENABLED;
  });

  describe('isOTelEnabled', () => {
    it('should be off by default', () => {
      expect(tracing.isOTelEnabled()).toBe(false);
      expect(tracing.getTracer()).toBeNull();
    });

    it.each(['1', 'true'])('should be on for OTEL_ENABLED=%s', (value) => {
      process.env.OTEL_ENABLED = value;
      expect(tracing.isOTelEnabled()).toBe(true);
      expect(tracing.getTracer()).not.toBeNull();
    });
  });

  describe('withSpan', () => {
    it('should run the function without a span when disabled', async () => {
      const result = await tracing.withSpan('Pipeline run', async (span) => {
        expect(span).toBeNull();
        return 'done';
      });

      expect(result).toBe('done');
    });

    it('should pass a span when enabled', async () => {
      process.env.OTEL_ENABLED = '1';

      const hasSpan = await tracing.withDeliverySpan('releases', 7, async (span) => span !== null);

      expect(hasSpan).toBe(true);
    });

    it('should rethrow errors from the wrapped function', async () => {
      process.env.OTEL_ENABLED = '1';

      await expect(
        tracing.withHttpSpan('GET', 'https://api.github.com/repos/acme/widgets/pulls', async () => {
          throw new Error('socket hang up');
        })
      ).rejects.toThrow('socket hang up');
    });
  });

  describe('addSpanEvent', () => {
    it('should be a no-op outside a span', () => {
      process.env.OTEL_ENABLED = '1';
      expect(() => tracing.addSpanEvent('summary.fallback', { lane: 'releases' })).not.toThrow();
    });
  });

  describe('generateCorrelationId', () => {
    it('should return distinct UUIDs', () => {
      const first = tracing.generateCorrelationId();
      const second = tracing.generateCorrelationId();

      expect(first).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(first).not.toBe(second);
    });
  });
});
