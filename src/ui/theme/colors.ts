/**
 * Color palette and theme definitions for the p2pdrop TUI.
 *
 * This module provides color constants for use with Ink components.
 *
 * @module ui/theme/colors
 */

import { TransferState } from '../../engine/types.js';

// =============================================================================
// Base Color Palette
// =============================================================================

/**
 * Primary color palette for the application.
 */
export const colors = {
  /** Primary accent color */
  primary: 'green',

  /** Secondary accent color - for highlights */
  secondary: 'cyan',

  /** Success state color for completed operations */
  success: 'greenBright',

  /** Warning state color for attention-needed items */
  warning: 'yellow',

  /** Error state color for failures and critical issues */
  error: 'red',

  /** Muted color for secondary/disabled content */
  muted: 'gray',

  /** Text color for normal content */
  text: 'white',

  /** Border color for UI containers */
  border: 'green',
} as const;

/**
 * Type representing valid color values from the palette.
 */
export type Color = (typeof colors)[keyof typeof colors];

// =============================================================================
// Transfer State Colors
// =============================================================================

/**
 * Colors mapped to transfer states.
 */
export const transferStateColors: Record<TransferState, Color> = {
  [TransferState.REQUESTED]: colors.secondary,
  [TransferState.TRANSFERRING]: colors.primary,
  [TransferState.COMPLETE]: colors.success,
  [TransferState.FAILED]: colors.error,
};

/**
 * Get the color for a transfer state.
 *
 * @example
 * ```ts
 * getTransferStateColor(TransferState.COMPLETE); // 'greenBright'
 * ```
 */
export function getTransferStateColor(state: TransferState): Color {
  return transferStateColors[state];
}
