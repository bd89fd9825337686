/**
 * UI Hooks index
 *
 * @module ui/hooks
 */

export { useNodeStatus, type NodeSnapshot } from './useNodeStatus.js';
