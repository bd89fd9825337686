import React from 'react';
import { describe, it, expect } from 'vitest';
import { render } from 'ink-testing-library';
import { OfferList } from '../../../src/ui/components/OfferList.js';
import type { RegistryEntry } from '../../../src/engine/types.js';
import { plain } from '../../helpers.js';

function createEntry(index: number, overrides: Partial<RegistryEntry['descriptor']> = {}): RegistryEntry {
  return {
    index,
    descriptor: {
      displayName: 'alice',
      hostLabel: 'laptop',
      fileName: 'report.pdf',
      sizeBytes: 4096,
      ...overrides,
    },
    originPeer: `peer-${index}`,
  };
}

describe('OfferList', () => {
  it('says it is waiting when nothing has been heard', () => {
    const { lastFrame } = render(<OfferList offers={[]} />);
    expect(lastFrame()).toContain('Waiting for offers on the local network...');
    expect(lastFrame()).toContain('Select file by number:');
  });

  it('lists each offer with its index, origin, file and size', () => {
    const offers = [
      createEntry(0),
      createEntry(1, { displayName: 'carol', hostLabel: 'tower', fileName: 'notes.txt', sizeBytes: 12 }),
    ];
    const frame = plain(render(<OfferList offers={offers} />).lastFrame());

    expect(frame).toMatch(/0\s+alice@laptop\s+report\.pdf\s+4\.0 KB/);
    expect(frame).toMatch(/1\s+carol@tower\s+notes\.txt\s+12 B/);
    expect(frame).not.toContain('Waiting for offers');
  });

  it('truncates long file names', () => {
    const longName = `${'x'.repeat(40)}.bin`;
    const frame = plain(render(<OfferList offers={[createEntry(0, { fileName: longName })]} />).lastFrame());

    expect(frame).toContain(`${'x'.repeat(30)}…`);
    expect(frame).not.toContain(longName);
  });
});
