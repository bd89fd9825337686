/**
 * Shared style constants for the p2pdrop TUI.
 *
 * @module ui/theme/styles
 */

// =============================================================================
// Border Characters
// =============================================================================

/**
 * Box-drawing characters for rules and frames.
 */
export const borders = {
  /** Horizontal line character */
  horizontal: '─',
} as const;

// =============================================================================
// Text Symbols
// =============================================================================

/**
 * Common symbols used throughout the UI.
 */
export const symbols = {
  /** Transfer direction indicators */
  transfer: {
    download: '↓',
    upload: '↑',
  },
} as const;

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Create a horizontal line of specified width.
 *
 * @example
 * ```ts
 * createHorizontalLine(5); // '─────'
 * ```
 */
export function createHorizontalLine(
  width: number,
  char: string = borders.horizontal
): string {
  return char.repeat(Math.max(0, width));
}
