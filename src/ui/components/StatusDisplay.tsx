import React from 'react';
import { Box, Text } from 'ink';
import type { NodeStatus } from '../../engine/DropNode.js';
import type { LogEntry } from '../../engine/log.js';
import type { OfferDescriptor } from '../../engine/types.js';
import { colors, getTransferStateColor } from '../theme/index.js';
import { formatBytes } from '../utils/format.js';
import { Header } from './Header.js';
import { LogView } from './LogView.js';
import { OfferList } from './OfferList.js';

export interface StatusDisplayProps {
  status: NodeStatus;
  logs: readonly LogEntry[];
  /** The local offer, shown on an offering node */
  offer?: OfferDescriptor;
  /** Number of log lines shown */
  maxLogEntries?: number;
  /** Rendered under the selection prompt of a discovering node */
  input?: React.ReactNode;
}

const TransferLine: React.FC<{ transfer: NonNullable<NodeStatus['transfer']> }> = ({
  transfer,
}) => (
  <Box paddingX={1} marginTop={1}>
    <Text>
      {transfer.entry.descriptor.fileName}:{' '}
      <Text color={getTransferStateColor(transfer.state)}>{transfer.state}</Text>
    </Text>
  </Box>
);

/**
 * Status display
 *
 * The header, then either the offered file (offering node) or the numbered
 * offers and the selection prompt (discovering node), then the most
 * recent log lines.
 */
export const StatusDisplay: React.FC<StatusDisplayProps> = ({
  status,
  logs,
  offer,
  maxLogEntries,
  input,
}) => {
  return (
    <Box flexDirection="column">
      <Header role={status.role} peerId={status.peerId} connections={status.connections} />

      {status.role === 'offering' && offer ? (
        <Box paddingX={1}>
          <Text>
            Offering <Text bold>{offer.fileName}</Text>{' '}
            <Text color={colors.muted}>({formatBytes(offer.sizeBytes)})</Text>
          </Text>
        </Box>
      ) : (
        <Box flexDirection="column">
          <OfferList offers={status.offers} />
          {input && <Box paddingX={1}>{input}</Box>}
        </Box>
      )}

      {status.transfer && <TransferLine transfer={status.transfer} />}

      <Box marginTop={1}>
        <LogView logs={logs} maxEntries={maxLogEntries} />
      </Box>
    </Box>
  );
};

export default StatusDisplay;
