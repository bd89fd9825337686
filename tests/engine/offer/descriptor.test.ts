/**
 * Tests for the announcement codec.
 */

import { describe, it, expect } from 'vitest';
import {
  decodeAnnouncement,
  describeOffer,
  emptyDescriptor,
  encodeAnnouncement,
  isEmptyOffer,
} from '../../../src/engine/offer/descriptor.js';
import { SerializationError, type OfferDescriptor } from '../../../src/engine/types.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const REPORT: OfferDescriptor = {
  displayName: 'alice',
  hostLabel: 'laptop',
  fileName: 'report.pdf',
  sizeBytes: 4096,
};

function decodeText(text: string): OfferDescriptor {
  return decodeAnnouncement(encoder.encode(text));
}

describe('encodeAnnouncement', () => {
  it('writes one JSON object terminated by a newline', () => {
    expect(decoder.decode(encodeAnnouncement(REPORT))).toBe(
      '{"Name":"alice","Hostname":"laptop","File":"report.pdf","Size":4096}\n'
    );
  });

  it('encodes an empty offer with blank file and zero size', () => {
    const empty = emptyDescriptor({ displayName: 'bob', hostLabel: 'desk' });
    expect(decoder.decode(encodeAnnouncement(empty))).toBe(
      '{"Name":"bob","Hostname":"desk","File":"","Size":0}\n'
    );
  });

  it('rejects negative sizes', () => {
    expect(() => encodeAnnouncement({ ...REPORT, sizeBytes: -1 })).toThrow(
      'invalid offer size: -1'
    );
  });

  it('rejects fractional sizes', () => {
    expect(() => encodeAnnouncement({ ...REPORT, sizeBytes: 1.5 })).toThrow(SerializationError);
  });
});

describe('decodeAnnouncement', () => {
  it('decodes what encodeAnnouncement produced', () => {
    expect(decodeAnnouncement(encodeAnnouncement(REPORT))).toEqual(REPORT);
  });

  it('defaults missing fields', () => {
    expect(decodeText('{"Name":"bob"}\n')).toEqual({
      displayName: 'bob',
      hostLabel: '',
      fileName: '',
      sizeBytes: 0,
    });
  });

  it('ignores unknown fields', () => {
    expect(decodeText('{"Name":"a","Hostname":"b","File":"c","Size":1,"Extra":true}').fileName).toBe(
      'c'
    );
  });

  it('reads only the first line', () => {
    expect(decodeText('{"Name":"first"}\n{"Name":"second"}\n').displayName).toBe('first');
  });

  it('accepts a payload without a trailing newline', () => {
    expect(decodeText('{"File":"x.bin","Size":3}').sizeBytes).toBe(3);
  });

  it('rejects an empty payload', () => {
    expect(() => decodeText('')).toThrow('empty announcement');
    expect(() => decodeText('   \n')).toThrow('empty announcement');
  });

  it('rejects malformed JSON', () => {
    expect(() => decodeText('not json\n')).toThrow(/^invalid JSON: /);
  });

  it('rejects JSON that is not an object', () => {
    expect(() => decodeText('[1,2]\n')).toThrow('announcement must be a JSON object');
    expect(() => decodeText('null\n')).toThrow('announcement must be a JSON object');
  });

  it('rejects fields of the wrong type', () => {
    expect(() => decodeText('{"Name":5}')).toThrow('field "Name" must be a string');
    expect(() => decodeText('{"File":null}')).toThrow('field "File" must be a string');
    expect(() => decodeText('{"Size":"4096"}')).toThrow(
      'field "Size" must be a non-negative integer'
    );
    expect(() => decodeText('{"Size":-1}')).toThrow('field "Size" must be a non-negative integer');
  });

  it('rejects bytes that are not UTF-8', () => {
    expect(() => decodeAnnouncement(new Uint8Array([0xff, 0xfe, 0x0a]))).toThrow(
      'announcement is not valid UTF-8'
    );
  });

  it('throws SerializationError for every failure', () => {
    expect(() => decodeText('{')).toThrow(SerializationError);
  });
});

describe('isEmptyOffer', () => {
  it('is true only for a blank file name', () => {
    expect(isEmptyOffer(emptyDescriptor({ displayName: 'bob', hostLabel: 'desk' }))).toBe(true);
    expect(isEmptyOffer(REPORT)).toBe(false);
    expect(isEmptyOffer({ ...REPORT, sizeBytes: 0 })).toBe(false);
  });
});

describe('describeOffer', () => {
  it('names the user, host, file and size', () => {
    expect(describeOffer(REPORT)).toBe('alice@laptop - report.pdf (4.0 KB)');
  });

  it('shows small sizes in bytes', () => {
    expect(describeOffer({ ...REPORT, fileName: 'a.txt', sizeBytes: 12 })).toBe(
      'alice@laptop - a.txt (12 B)'
    );
  });
});
