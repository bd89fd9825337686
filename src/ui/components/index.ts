/**
 * UI Components index
 *
 * Re-exports all UI components for the p2pdrop TUI.
 *
 * @module ui/components
 */

export { Header, type HeaderProps } from './Header.js';
export { LogView, type LogViewProps } from './LogView.js';
export { OfferList, type OfferListProps } from './OfferList.js';
export { StatusDisplay, type StatusDisplayProps } from './StatusDisplay.js';
export { TextInput, type TextInputProps } from './TextInput.js';
