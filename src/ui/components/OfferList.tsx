import React from 'react';
import { Box, Text } from 'ink';
import type { RegistryEntry } from '../../engine/types.js';
import { colors } from '../theme/index.js';
import { formatBytes, truncateText } from '../utils/format.js';

export interface OfferListProps {
  /** Registry entries in index order */
  offers: readonly RegistryEntry[];
}

const COLUMN_WIDTHS = {
  index: 5,
  from: 24,
  file: 32,
} as const;

/**
 * Numbered list of discovered offers with the selection prompt below it.
 *
 * @example
 * <OfferList offers={registry.entries()} />
 *
 * // Output:
 * //  0   alice@laptop            report.pdf                      4.0 KB
 * // Select file by number:
 */
export const OfferList: React.FC<OfferListProps> = ({ offers }) => {
  return (
    <Box flexDirection="column" paddingX={1}>
      {offers.length === 0 ? (
        <Text color={colors.muted}>Waiting for offers on the local network...</Text>
      ) : (
        offers.map(({ index, descriptor }) => (
          <Box key={index} flexDirection="row">
            <Box width={COLUMN_WIDTHS.index}>
              <Text color={colors.secondary}>{index}</Text>
            </Box>
            <Box width={COLUMN_WIDTHS.from}>
              <Text>
                {truncateText(`${descriptor.displayName}@${descriptor.hostLabel}`, COLUMN_WIDTHS.from - 1)}
              </Text>
            </Box>
            <Box width={COLUMN_WIDTHS.file}>
              <Text bold>{truncateText(descriptor.fileName, COLUMN_WIDTHS.file - 1)}</Text>
            </Box>
            <Text color={colors.muted}>{formatBytes(descriptor.sizeBytes)}</Text>
          </Box>
        ))
      )}
      <Box marginTop={1}>
        <Text color={colors.primary}>Select file by number:</Text>
      </Box>
    </Box>
  );
};

export default OfferList;
