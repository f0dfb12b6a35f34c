// tests/unit/BootstrapPolicy.test.ts

import { describe, it, expect } from 'vitest';
import { bootstrapLane, isBootstrapPending } from '../../src/core/checkpoint/BootstrapPolicy';
import { emptyLane } from '../../src/core/checkpoint/types';
import { pullRequest } from '../support/fakes';

describe('BootstrapPolicy', () => {
  it('is pending only while the watermark is unset', () => {
    expect(isBootstrapPending(emptyLane())).toBe(true);
    expect(
      isBootstrapPending({ watermark: new Date('2026-02-17T09:00:00Z'), seenIds: new Set() })
    ).toBe(false);
  });

  it('marks the whole batch as delivered', () => {
    const next = bootstrapLane(emptyLane(), [
      pullRequest(500, '2026-02-17T09:00:00Z'),
      pullRequest(501, '2026-02-17T09:05:00Z'),
      pullRequest(502, '2026-02-17T09:05:00Z'),
    ]);

    expect(next?.watermark?.toISOString()).toBe('2026-02-17T09:05:00.000Z');
    expect(Array.from(next?.seenIds ?? new Set<number>()).sort()).toEqual([501, 502]);
  });

  it('leaves the lane pending for an empty batch', () => {
    expect(bootstrapLane(emptyLane(), [])).toBeNull();
  });
});
