import React from 'react';
import { Box, Text } from 'ink';
import type { LogEntry, LogLevel } from '../../engine/log.js';
import { colors, createHorizontalLine } from '../theme/index.js';
import { formatTimestamp } from '../utils/format.js';

export interface LogViewProps {
  /** Log entries to display, oldest first */
  logs: readonly LogEntry[];
  /** Maximum number of entries to show (default: 10) */
  maxEntries?: number;
}

/**
 * Log level display configuration
 */
const LEVEL_DISPLAY: Record<LogLevel, { color: string; prefix: string }> = {
  info: { color: colors.primary, prefix: 'INF' },
  warn: { color: colors.warning, prefix: 'WRN' },
  error: { color: colors.error, prefix: 'ERR' },
};

/**
 * Column widths for log display
 */
const COLUMN_WIDTHS = {
  timestamp: 10,
  level: 5,
  message: 60,
} as const;

const LogViewHeader: React.FC = () => {
  return (
    <Box flexDirection="column">
      <Box flexDirection="row" paddingX={1}>
        <Box width={COLUMN_WIDTHS.timestamp}>
          <Text color={colors.primary} bold>
            Time
          </Text>
        </Box>
        <Box width={COLUMN_WIDTHS.level}>
          <Text color={colors.primary} bold>
            Level
          </Text>
        </Box>
        <Box>
          <Text color={colors.primary} bold>
            Message
          </Text>
        </Box>
      </Box>
      <Box paddingX={1}>
        <Text color={colors.muted}>
          {createHorizontalLine(
            COLUMN_WIDTHS.timestamp + COLUMN_WIDTHS.level + COLUMN_WIDTHS.message
          )}
        </Text>
      </Box>
    </Box>
  );
};

const LogEntryRow: React.FC<{ entry: LogEntry }> = ({ entry }) => {
  const levelInfo = LEVEL_DISPLAY[entry.level];

  return (
    <Box flexDirection="row" paddingX={1}>
      <Box width={COLUMN_WIDTHS.timestamp}>
        <Text color={colors.muted}>{formatTimestamp(entry.timestamp)}</Text>
      </Box>
      <Box width={COLUMN_WIDTHS.level}>
        <Text color={levelInfo.color}>{levelInfo.prefix}</Text>
      </Box>
      <Box flexGrow={1}>
        <Text color={entry.level === 'error' ? colors.error : undefined}>
          {entry.message}
        </Text>
      </Box>
    </Box>
  );
};

/**
 * LogView component for the node's recent activity
 *
 * Entries are shown oldest first, so the newest line sits just above the
 * input prompt. Entries are color-coded by level.
 *
 * @example
 * <LogView logs={node.log.recent()} />
 *
 * // Output:
 * // Time       Level Message
 * // ─────────────────────────────────────────────────────────────────────
 * // 14:32:15   INF   0: alice@laptop - report.pdf (4.0 KB)
 * // 14:32:45   WRN   input error: "x" is not a number
 */
export const LogView: React.FC<LogViewProps> = ({ logs, maxEntries = 10 }) => {
  if (logs.length === 0) {
    return (
      <Box paddingX={1} paddingY={1}>
        <Text color={colors.muted}>No activity yet</Text>
      </Box>
    );
  }

  const displayLogs = logs.slice(-maxEntries);

  return (
    <Box flexDirection="column">
      <LogViewHeader />
      {displayLogs.map((entry, index) => (
        <LogEntryRow key={`${entry.timestamp.getTime()}-${index}`} entry={entry} />
      ))}
    </Box>
  );
};

export default LogView;
