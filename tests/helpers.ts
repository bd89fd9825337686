/**
 * Shared helpers for the test suites.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { tmpdir } from 'os';

/**
 * Creates a fresh temporary directory
 */
export async function createTestDir(prefix = 'p2pdrop-test'): Promise<string> {
  return fs.mkdtemp(path.join(tmpdir(), `${prefix}-`));
}

/**
 * Removes a temporary directory and everything in it
 */
export async function cleanupTestDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Drains an async iterable into an array
 */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

/**
 * Concatenates byte chunks
 */
export function concatBytes(chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return result;
}

/**
 * Polls `predicate` until it holds or `timeoutMs` passes
 */
export async function waitUntil(
  predicate: () => boolean,
  timeoutMs = 2000,
  intervalMs = 5
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error('condition not met in time');
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}

/**
 * Deterministic file contents of a given size
 */
export function patternBytes(size: number): Buffer {
  const data = Buffer.alloc(size);
  for (let i = 0; i < size; i++) {
    data[i] = (i * 31 + 7) % 256;
  }
  return data;
}

/**
 * A rendered Ink frame with color codes removed
 */
export function plain(frame: string | undefined): string {
  return (frame ?? '').replace(/\u001b\[[0-9;]*m/g, '');
}
