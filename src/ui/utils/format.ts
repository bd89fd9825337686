/**
 * Shared formatting utilities for the p2pdrop UI
 *
 * These functions provide consistent formatting across the status display
 * and the activity log for sizes, timestamps and peer identifiers.
 */

/**
 * Formats bytes into a human-readable string with appropriate units.
 *
 * @param bytes - The number of bytes to format
 * @returns Formatted string (e.g., "3.1 GB", "4.0 KB", "0 B")
 */
export function formatBytes(bytes: number): string {
  if (bytes <= 0 || !Number.isFinite(bytes)) return '0 B';

  const units = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];
  const base = 1024;

  const exponent = Math.floor(Math.log(bytes) / Math.log(base));
  const unitIndex = Math.min(exponent, units.length - 1);

  const value = bytes / Math.pow(base, unitIndex);

  if (unitIndex === 0) {
    return `${Math.round(value)} ${units[unitIndex]}`;
  }

  return `${value.toFixed(1)} ${units[unitIndex]}`;
}

/**
 * Formats a timestamp for log display.
 *
 * @param date - The date to format
 * @returns Formatted timestamp string (HH:MM:SS)
 */
export function formatTimestamp(date: Date): string {
  const hours = date.getHours().toString().padStart(2, '0');
  const minutes = date.getMinutes().toString().padStart(2, '0');
  const seconds = date.getSeconds().toString().padStart(2, '0');
  return `${hours}:${minutes}:${seconds}`;
}

/**
 * Truncates a string to a maximum length, adding ellipsis if needed.
 *
 * @param text - The string to truncate
 * @param maxLength - Maximum length including ellipsis
 * @returns Truncated string
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength - 1) + '…'; // ellipsis
}

/**
 * Shortens a peer id to its last characters, which is where libp2p ids differ.
 *
 * @returns e.g. "…k3fQx9Zp" for a long id, the id itself when short
 */
export function formatPeerId(peerId: string, visible = 8): string {
  if (peerId.length <= visible + 1) {
    return peerId;
  }
  return '…' + peerId.slice(-visible);
}
