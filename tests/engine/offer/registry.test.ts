/**
 * Tests for the offer registry.
 */

import { describe, it, expect } from 'vitest';
import { OfferRegistry } from '../../../src/engine/offer/registry.js';
import { IndexOutOfRangeError, type OfferDescriptor } from '../../../src/engine/types.js';

function descriptor(fileName: string, sizeBytes = 1): OfferDescriptor {
  return { displayName: 'alice', hostLabel: 'laptop', fileName, sizeBytes };
}

describe('OfferRegistry', () => {
  it('starts empty', () => {
    const registry = new OfferRegistry();
    expect(registry.length()).toBe(0);
    expect(registry.entries()).toEqual([]);
  });

  it('assigns indices in insertion order', () => {
    const registry = new OfferRegistry();
    expect(registry.append(descriptor('a'), 'peer-1')).toBe(0);
    expect(registry.append(descriptor('b'), 'peer-2')).toBe(1);
    expect(registry.append(descriptor('c'), 'peer-1')).toBe(2);
    expect(registry.entries().map((entry) => entry.descriptor.fileName)).toEqual(['a', 'b', 'c']);
  });

  it('keeps duplicates as separate entries', () => {
    const registry = new OfferRegistry();
    registry.append(descriptor('same'), 'peer-1');
    registry.append(descriptor('same'), 'peer-1');
    expect(registry.length()).toBe(2);
  });

  it('returns the stored entry with its origin', () => {
    const registry = new OfferRegistry();
    registry.append(descriptor('report.pdf', 4096), 'peer-9');

    const lookup = registry.get(0);
    expect(lookup).toEqual({
      ok: true,
      entry: { index: 0, descriptor: descriptor('report.pdf', 4096), originPeer: 'peer-9' },
    });
  });

  it('does not let callers mutate stored descriptors', () => {
    const registry = new OfferRegistry();
    const original = descriptor('a');
    registry.append(original, 'peer-1');
    original.fileName = 'changed';

    const lookup = registry.get(0);
    expect(lookup.ok && lookup.entry.descriptor.fileName).toBe('a');
  });

  describe('bounds', () => {
    for (const length of [0, 1, 3]) {
      it(`rejects index ${length} when ${length} entries exist`, () => {
        const registry = new OfferRegistry();
        for (let i = 0; i < length; i++) {
          registry.append(descriptor(`f${i}`), 'peer');
        }

        const lookup = registry.get(length);
        expect(lookup.ok).toBe(false);
        if (!lookup.ok) {
          expect(lookup.error).toBeInstanceOf(IndexOutOfRangeError);
          expect(lookup.error.message).toBe(
            `no offer with index ${length} (${length} available)`
          );
        }
      });
    }

    it('rejects negative indices', () => {
      const registry = new OfferRegistry();
      registry.append(descriptor('a'), 'peer');
      const lookup = registry.get(-1);
      expect(lookup.ok).toBe(false);
      if (!lookup.ok) {
        expect(lookup.error.message).toBe('no offer with index -1 (1 available)');
      }
    });

    it('rejects non-integer indices', () => {
      const registry = new OfferRegistry();
      registry.append(descriptor('a'), 'peer');
      registry.append(descriptor('b'), 'peer');
      expect(registry.get(1.5).ok).toBe(false);
      expect(registry.get(Number.NaN).ok).toBe(false);
    });

    it('accepts the last index', () => {
      const registry = new OfferRegistry();
      registry.append(descriptor('a'), 'peer');
      registry.append(descriptor('b'), 'peer');
      expect(registry.get(1).ok).toBe(true);
    });
  });

  it('hands out distinct, contiguous indices to concurrent appenders', async () => {
    const registry = new OfferRegistry();
    const count = 50;

    const indices = await Promise.all(
      Array.from({ length: count }, async (_, i) => {
        await new Promise((resolve) => setTimeout(resolve, i % 7));
        return registry.append(descriptor(`file-${i}`), `peer-${i}`);
      })
    );

    expect([...indices].sort((a, b) => a - b)).toEqual(Array.from({ length: count }, (_, i) => i));
    for (const entry of registry.entries()) {
      const lookup = registry.get(entry.index);
      expect(lookup.ok && lookup.entry).toBe(entry);
    }
  });
});
