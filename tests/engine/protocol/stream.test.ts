/**
 * Tests for stream deadlines and delimited reads.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  IdleWatchdog,
  openStreamWithDeadline,
  readUntil,
  tap,
} from '../../../src/engine/protocol/stream.js';
import { createStreamPair } from '../../../src/engine/transport/memory.js';
import type { PeerStream, PeerTransport } from '../../../src/engine/transport/types.js';
import { ConnectionError, StreamTimeoutError } from '../../../src/engine/types.js';
import { collect } from '../../helpers.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

async function* chunks(...parts: string[]): AsyncGenerator<Uint8Array> {
  for (const part of parts) {
    yield encoder.encode(part);
  }
}

function stubTransport(openStream: PeerTransport['openStream']): PeerTransport {
  return {
    peerId: 'peer-local',
    start: async () => undefined,
    stop: async () => undefined,
    onConnectionEstablished: () => () => undefined,
    registerStreamHandler: async () => undefined,
    openStream,
  };
}

describe('IdleWatchdog', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('aborts the stream once the deadline passes without progress', () => {
    vi.useFakeTimers();
    const [stream] = createStreamPair();
    const abort = vi.spyOn(stream, 'abort');

    const watchdog = new IdleWatchdog(stream, 'peer-a', 100, 'transfer');
    vi.advanceTimersByTime(99);
    expect(abort).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(watchdog.expired).toBe(true);
    expect(abort).toHaveBeenCalledTimes(1);

    const error = abort.mock.calls[0][0];
    expect(error).toBeInstanceOf(StreamTimeoutError);
    expect(error.message).toBe('transfer stalled for 100 ms');
  });

  it('restarts the deadline on every touch', () => {
    vi.useFakeTimers();
    const [stream] = createStreamPair();
    const abort = vi.spyOn(stream, 'abort');

    const watchdog = new IdleWatchdog(stream, 'peer-a', 100, 'transfer');
    for (let i = 0; i < 5; i++) {
      vi.advanceTimersByTime(80);
      watchdog.touch();
    }

    expect(abort).not.toHaveBeenCalled();
    expect(watchdog.expired).toBe(false);
  });

  it('never fires after stop', () => {
    vi.useFakeTimers();
    const [stream] = createStreamPair();
    const abort = vi.spyOn(stream, 'abort');

    const watchdog = new IdleWatchdog(stream, 'peer-a', 100, 'transfer');
    watchdog.stop();
    vi.advanceTimersByTime(500);

    expect(abort).not.toHaveBeenCalled();
  });
});

describe('tap', () => {
  it('passes chunks through and reports each one', async () => {
    const seen: number[] = [];
    const output = await collect(tap(chunks('ab', 'cde'), (chunk) => seen.push(chunk.byteLength)));

    expect(output.map((chunk) => decoder.decode(chunk))).toEqual(['ab', 'cde']);
    expect(seen).toEqual([2, 3]);
  });
});

describe('readUntil', () => {
  it('stops at the delimiter and keeps it', async () => {
    const bytes = await readUntil(chunks('hel', 'lo\nrest'), 0x0a, 100);
    expect(decoder.decode(bytes)).toBe('hello\n');
  });

  it('returns everything when the stream ends first', async () => {
    const bytes = await readUntil(chunks('no', ' newline'), 0x0a, 100);
    expect(decoder.decode(bytes)).toBe('no newline');
  });

  it('returns nothing for an empty stream', async () => {
    const bytes = await readUntil(chunks(), 0x0a, 100);
    expect(bytes.byteLength).toBe(0);
  });

  it('accepts exactly the limit', async () => {
    const bytes = await readUntil(chunks('abcd\n'), 0x0a, 5);
    expect(bytes.byteLength).toBe(5);
  });

  it('fails once the limit is exceeded', async () => {
    await expect(readUntil(chunks('abc', 'def'), 0x0a, 5)).rejects.toThrow(
      'message exceeds 5 bytes'
    );
  });
});

describe('openStreamWithDeadline', () => {
  it('returns the stream the transport opened', async () => {
    const [stream] = createStreamPair();
    const transport = stubTransport(async () => stream);

    await expect(openStreamWithDeadline(transport, 'peer-b', '/test/1', 100)).resolves.toBe(stream);
  });

  it('times out when the transport never answers', async () => {
    const transport = stubTransport(
      (_peerId, _protocol, options) =>
        new Promise<PeerStream>((_resolve, reject) => {
          options?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );

    const opening = openStreamWithDeadline(transport, 'peer-b', '/test/1', 30);
    await expect(opening).rejects.toBeInstanceOf(StreamTimeoutError);
    await expect(opening).rejects.toThrow('opening /test/1 timed out after 30 ms');
  });

  it('passes connection errors through', async () => {
    const failure = new ConnectionError('not connected to peer-b', 'peer-b');
    const transport = stubTransport(async () => {
      throw failure;
    });

    await expect(openStreamWithDeadline(transport, 'peer-b', '/test/1', 100)).rejects.toBe(failure);
  });

  it('wraps other failures in a ConnectionError', async () => {
    const transport = stubTransport(async () => {
      throw new Error('protocol negotiation failed');
    });

    const opening = openStreamWithDeadline(transport, 'peer-b', '/test/1', 100);
    await expect(opening).rejects.toBeInstanceOf(ConnectionError);
    await expect(opening).rejects.toThrow('protocol negotiation failed');
  });
});
