/**
 * CLI output utilities for p2pdrop commands.
 *
 * Plain-text helpers for what is printed outside the TUI: the final
 * outcome after the display is torn down, and startup errors.
 *
 * @module cli/utils/output
 */

import type { TransferResult } from '../../engine/types.js';
import { formatBytes } from '../../ui/utils/format.js';

// Re-export formatting utilities for convenience
export { formatBytes };

// =============================================================================
// Colors
// =============================================================================

/**
 * ANSI color codes for terminal output
 */
export const ansiColors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

/**
 * Apply ANSI color to text
 */
export function colorize(text: string, color: string): string {
  return `${color}${text}${ansiColors.reset}`;
}

// =============================================================================
// Message Formatting
// =============================================================================

/**
 * Format a success message
 */
export function successMessage(message: string): string {
  return colorize(`[OK] ${message}`, ansiColors.green);
}

/**
 * Format an error message
 */
export function errorMessage(message: string): string {
  return colorize(`[ERROR] ${message}`, ansiColors.red);
}

/**
 * One-line summary of a finished transfer.
 *
 * @example
 * ```ts
 * formatTransferSummary(result); // 'saved report.pdf (4.0 KB) to /home/bob/report.pdf'
 * ```
 */
export function formatTransferSummary(result: TransferResult): string {
  return `saved ${result.entry.descriptor.fileName} (${formatBytes(result.bytes)}) to ${result.path}`;
}
