/**
 * Property-based tests for the correlation cache.
 *
 * - A stored entry reads back until it is removed or evicted.
 * - Removal is idempotent.
 * - The entry count never exceeds capacity.
 */
import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { LruCorrelationCache } from './correlationCache.js';

// ─── Generators ──────────────────────────────────────────────────────────────

const traceIdArb = fc.hexaString({ minLength: 32, maxLength: 32 });

type CacheOp =
  | { op: 'store'; key: string; value: number }
  | { op: 'get'; key: string }
  | { op: 'remove'; key: string };

const keyArb = fc.constantFrom('a', 'b', 'c', 'd', 'e', 'f');

const opArb: fc.Arbitrary<CacheOp> = fc.oneof(
  fc.record({ op: fc.constant('store' as const), key: keyArb, value: fc.integer() }),
  fc.record({ op: fc.constant('get' as const), key: keyArb }),
  fc.record({ op: fc.constant('remove' as const), key: keyArb }),
);

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('Correlation cache properties', () => {
  it('store then get returns the stored value', () => {
    fc.assert(
      fc.property(traceIdArb, fc.string(), (key, value) => {
        const cache = new LruCorrelationCache<string>();
        cache.store(key, value);
        expect(cache.get(key)).toBe(value);
      }),
    );
  });

  it('remove is idempotent', () => {
    fc.assert(
      fc.property(traceIdArb, fc.string(), (key, value) => {
        const cache = new LruCorrelationCache<string>();
        cache.store(key, value);
        expect(cache.remove(key)).toBe(value);
        expect(cache.remove(key)).toBeUndefined();
        expect(cache.get(key)).toBeUndefined();
      }),
    );
  });

  it('never holds more entries than its capacity', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 4 }), fc.array(opArb, { maxLength: 60 }), (capacity, ops) => {
        const cache = new LruCorrelationCache<number>({ capacity });
        for (const step of ops) {
          switch (step.op) {
            case 'store':
              cache.store(step.key, step.value);
              break;
            case 'get':
              cache.get(step.key);
              break;
            case 'remove':
              cache.remove(step.key);
              break;
          }
          expect(cache.size).toBeLessThanOrEqual(capacity);
        }
      }),
    );
  });

  it('the most recently stored key is always present', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 4 }), fc.array(opArb, { maxLength: 60 }), (capacity, ops) => {
        const cache = new LruCorrelationCache<number>({ capacity });
        for (const step of ops) {
          if (step.op !== 'store') continue;
          cache.store(step.key, step.value);
          expect(cache.get(step.key)).toBe(step.value);
        }
      }),
    );
  });
});
