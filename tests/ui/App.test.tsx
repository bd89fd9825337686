import React from 'react';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { render } from 'ink-testing-library';
import { App } from '../../src/ui/App.js';
import { DropNode } from '../../src/engine/DropNode.js';
import { MemoryNetwork } from '../../src/engine/transport/memory.js';
import { plain, waitUntil } from '../helpers.js';

const tick = () => new Promise((resolve) => setTimeout(resolve, 20));

describe('App', () => {
  const nodes: DropNode[] = [];

  afterEach(async () => {
    await Promise.all(nodes.splice(0).map((node) => node.stop()));
  });

  function createNode(offering = false): DropNode {
    const network = new MemoryNetwork();
    const node = new DropNode({
      transport: network.createTransport('peer-bob'),
      identity: { displayName: 'bob', hostLabel: 'desk' },
      offer: offering ? { path: '/tmp/unused.bin', fileName: 'notes.txt', sizeBytes: 12 } : undefined,
    });
    nodes.push(node);
    return node;
  }

  it('renders the initial status before the node starts', () => {
    const { lastFrame, unmount } = render(<App node={createNode()} statusIntervalMs={20} />);
    const frame = plain(lastFrame());

    expect(frame).toContain('starting...');
    expect(frame).toContain('Waiting for offers on the local network...');
    expect(frame).toContain('No activity yet');
    unmount();
  });

  it('picks up node changes on the next refresh', async () => {
    const node = createNode();
    const { lastFrame, unmount } = render(<App node={node} statusIntervalMs={20} />);

    await node.start();
    await waitUntil(() => plain(lastFrame()).includes('listening as peer-bob'));

    expect(plain(lastFrame())).toContain('peer-bob');
    unmount();
  });

  it('shows the offered file on an offering node and no prompt', () => {
    const onLine = vi.fn();
    const { lastFrame, unmount } = render(
      <App node={createNode(true)} statusIntervalMs={20} onLine={onLine} />
    );
    const frame = plain(lastFrame());

    expect(frame).toContain('Offering notes.txt (12 B)');
    expect(frame).not.toContain('▌');
    unmount();
  });

  it('passes submitted lines on and clears the prompt', async () => {
    const onLine = vi.fn();
    const { lastFrame, stdin, unmount } = render(
      <App node={createNode()} statusIntervalMs={20} onLine={onLine} />
    );
    await tick();

    stdin.write('0');
    await tick();
    stdin.write('\r');
    await tick();

    expect(onLine).toHaveBeenCalledWith('0');
    expect(plain(lastFrame())).toContain('> ▌');
    unmount();
  });
});
