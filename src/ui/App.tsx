/**
 * App - Root component for the p2pdrop TUI.
 *
 * Polls the node for the status display and, on a discovering node with a
 * terminal attached, collects selections through an inline prompt.
 *
 * @module ui/App
 */

import React, { useCallback, useState } from 'react';
import { useNodeStatus } from './hooks/index.js';
import { StatusDisplay, TextInput } from './components/index.js';
import type { DropNode } from '../engine/DropNode.js';

export interface AppProps {
  node: DropNode;
  /** Refresh interval of the status display in ms */
  statusIntervalMs: number;
  /** Number of log lines shown */
  maxLogEntries?: number;
  /** Receives every line typed at the prompt; no prompt is shown without it */
  onLine?: (line: string) => void;
}

/**
 * App component - Root of the p2pdrop TUI
 */
export const App: React.FC<AppProps> = ({ node, statusIntervalMs, maxLogEntries, onLine }) => {
  const { status, logs } = useNodeStatus(node, statusIntervalMs);
  const [value, setValue] = useState('');

  const handleSubmit = useCallback(
    (line: string) => {
      setValue('');
      onLine?.(line);
    },
    [onLine]
  );

  const input =
    onLine && !node.isOffering ? (
      <TextInput value={value} onChange={setValue} onSubmit={handleSubmit} focused />
    ) : undefined;

  return (
    <StatusDisplay
      status={status}
      logs={logs}
      offer={node.isOffering ? node.localDescriptor : undefined}
      maxLogEntries={maxLogEntries}
      input={input}
    />
  );
};

export default App;
