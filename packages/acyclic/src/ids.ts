import type { NodeId } from './types.js';

export const compareIds = (a: NodeId, b: NodeId): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Sorted copy, ascending. Ties at every branching point are broken with this.
 */
export const sortIds = (ids: Iterable<NodeId>): NodeId[] => Array.from(ids).sort(compareIds);
