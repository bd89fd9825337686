/**
 * Theme system for the p2pdrop TUI.
 *
 * This module re-exports all theme-related constants and utilities
 * for use throughout the UI components.
 *
 * @module ui/theme
 *
 * @example
 * ```ts
 * import { colors, borders } from '../theme/index.js';
 *
 * <Text color={colors.primary}>Hello</Text>
 * ```
 */

// Color palette and transfer state colors
export {
  colors,
  transferStateColors,
  getTransferStateColor,
  type Color,
} from './colors.js';

// Border characters and text helpers
export { borders, symbols, createHorizontalLine } from './styles.js';
