import { describe, it, expect } from 'vitest';
import {
  ANNOUNCE_PROTOCOL,
  APP_NAME,
  TRANSFER_PROTOCOL,
  VERSION,
} from '../../src/shared/constants.js';

describe('Constants', () => {
  it('should have correct version', () => {
    expect(VERSION).toBe('0.1.0');
  });

  it('should have correct app name', () => {
    expect(APP_NAME).toBe('p2pdrop');
  });

  it('should namespace both sub-protocols under the same prefix', () => {
    expect(ANNOUNCE_PROTOCOL).toBe('/p2pdrop/1.0.0/hello');
    expect(TRANSFER_PROTOCOL).toBe('/p2pdrop/1.0.0/get');
  });
});
