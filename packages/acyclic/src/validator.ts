/**
 * Cycle detection over the forward edges.
 *
 * Every id is tried as a starting point, in ascending order. From each
 * start a depth-first search carries the current branch; a cycle is found
 * as soon as a branch member shows up among the children being explored.
 * Children are explored in ascending order and the first hit wins.
 *
 * The search runs on an explicit stack, so chain length is not limited by
 * the call stack. An id whose descendants were all explored without a hit
 * cannot reach a cycle, so it is not walked again; each id and edge is
 * visited once per validation.
 */

import { sortIds } from './ids.js';
import type { Adjacency, NodeId, Trace } from './types.js';

export type CycleSearch =
  | { found: false }
  | {
      found: true;
      /** Ids along the traversal, closing id last */
      path: NodeId[];
      /** Ids flagged as taking part in the cycle */
      members: Set<NodeId>;
    };

interface Frame {
  id: NodeId;
  children: NodeId[];
  next: number;
}

/**
 * Search the graph for the first cycle, in deterministic order.
 * `trace` is left out when nobody listens.
 */
export const detectCycle = (adjacency: Adjacency, trace?: Trace): CycleSearch => {
  const explored = new Set<NodeId>();

  for (const id of sortIds(adjacency.keys())) {
    if (explored.has(id)) {
      continue;
    }

    trace?.('validate', 'Validate node', { id });

    const path = searchFrom(adjacency, id, explored, trace);
    if (path) {
      const members = cycleMembers(path);
      members.add(id);
      return { found: true, path, members };
    }
  }

  return { found: false };
};

const searchFrom = (
  adjacency: Adjacency,
  start: NodeId,
  explored: Set<NodeId>,
  trace: Trace | undefined
): NodeId[] | undefined => {
  const branch: NodeId[] = [];
  const position = new Map<NodeId, number>();
  const stack: Frame[] = [];

  // Push `id` on the branch; returns the earliest branch member among its children, if any
  const enter = (id: NodeId): NodeId | undefined => {
    const children = adjacency.get(id) ?? [];
    position.set(id, branch.length);
    branch.push(id);

    let closing: NodeId | undefined;
    let earliest = branch.length;
    for (const child of children) {
      const at = position.get(child);
      if (at !== undefined && at < earliest) {
        earliest = at;
        closing = child;
      }
    }

    if (closing === undefined) {
      stack.push({ id, children: sortIds(children), next: 0 });
    }
    return closing;
  };

  let closing = enter(start);

  while (closing === undefined && stack.length > 0) {
    const frame = stack[stack.length - 1];

    if (frame.next < frame.children.length) {
      const child = frame.children[frame.next];
      frame.next += 1;

      if (!explored.has(child)) {
        trace?.('validate', 'Check if child has cycle', { id: child });
        closing = enter(child);
      }
      continue;
    }

    stack.pop();
    branch.pop();
    position.delete(frame.id);
    explored.add(frame.id);
  }

  if (closing === undefined) {
    return undefined;
  }

  trace?.('validate', 'Cycle found', { id: closing, branch: [...branch] });
  return [...branch, closing];
};

/**
 * The closing id and everything after its first position in the branch
 */
const cycleMembers = (path: readonly NodeId[]): Set<NodeId> => {
  const closing = path[path.length - 1];
  const start = path.indexOf(closing);
  return new Set(path.slice(start, -1));
};
