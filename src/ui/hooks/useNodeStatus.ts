/**
 * useNodeStatus Hook - Polls a node for the status display.
 *
 * Protocol handlers write to the activity log and the registry from many
 * tasks at once; the display reads snapshots of both on a fixed interval
 * rather than re-rendering on every line.
 *
 * @module ui/hooks/useNodeStatus
 */

import { useEffect, useState } from 'react';
import type { DropNode, NodeStatus } from '../../engine/DropNode.js';
import type { LogEntry } from '../../engine/log.js';

// =============================================================================
// Types
// =============================================================================

export interface NodeSnapshot {
  status: NodeStatus;
  logs: LogEntry[];
}

// =============================================================================
// useNodeStatus Hook
// =============================================================================

function takeSnapshot(node: DropNode): NodeSnapshot {
  return { status: node.getStatus(), logs: node.log.recent() };
}

/**
 * React hook returning the latest snapshot of `node`, refreshed every
 * `intervalMs` milliseconds.
 *
 * @example
 * ```tsx
 * function Status({ node }) {
 *   const { status, logs } = useNodeStatus(node, 1000);
 *   return <LogView logs={logs} />;
 * }
 * ```
 */
export function useNodeStatus(node: DropNode, intervalMs: number): NodeSnapshot {
  const [snapshot, setSnapshot] = useState<NodeSnapshot>(() => takeSnapshot(node));

  useEffect(() => {
    setSnapshot(takeSnapshot(node));

    const timer = setInterval(() => {
      setSnapshot(takeSnapshot(node));
    }, intervalMs);

    // Cleanup: stop polling on unmount
    return () => {
      clearInterval(timer);
    };
  }, [node, intervalMs]);

  return snapshot;
}

export default useNodeStatus;
