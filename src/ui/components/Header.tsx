import React from 'react';
import { Box, Text } from 'ink';
import { APP_NAME, VERSION } from '../../shared/constants.js';
import { colors, symbols } from '../theme/index.js';
import { formatPeerId } from '../utils/format.js';

export interface HeaderProps {
  /** Whether this node offers a file or looks for one */
  role: 'offering' | 'discovering';
  /** Local peer id, empty until the transport has started */
  peerId: string;
  /** Connections opened so far */
  connections: number;
}

/**
 * Header component for the p2pdrop TUI
 *
 * One line: name and version, role, local peer id and connection count.
 */
export const Header: React.FC<HeaderProps> = ({ role, peerId, connections }) => {
  const arrow = role === 'offering' ? symbols.transfer.upload : symbols.transfer.download;

  return (
    <Box flexDirection="row" gap={2} paddingX={1} marginBottom={1}>
      <Text color={colors.primary} bold>
        {APP_NAME} v{VERSION}
      </Text>
      <Text color={colors.secondary}>
        {arrow} {role}
      </Text>
      <Text color={colors.muted}>{peerId ? formatPeerId(peerId) : 'starting...'}</Text>
      <Text color={colors.muted}>
        {connections} {connections === 1 ? 'connection' : 'connections'}
      </Text>
    </Box>
  );
};

export default Header;
