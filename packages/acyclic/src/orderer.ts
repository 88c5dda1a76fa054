/**
 * Deterministic depth-first ordering.
 *
 * An id is emitted only after everything reachable from it has been
 * emitted, so the result is reverse-topological with respect to the
 * forward edges. Roots and children are walked in ascending id order.
 * The walk runs on an explicit stack; depth is not limited by the call stack.
 */

import { CycleDetectedError } from './errors.js';
import { sortIds } from './ids.js';
import type { Adjacency, NodeId, Trace } from './types.js';

interface Frame {
  id: NodeId;
  children: NodeId[];
  next: number;
}

/**
 * Order every known id. Acyclicity is a precondition: a walk that runs
 * into its own path throws CycleDetectedError.
 * `trace` is left out when nobody listens.
 */
export const walkOrder = (adjacency: Adjacency, trace?: Trace): NodeId[] => {
  const order: NodeId[] = [];
  const visited = new Set<NodeId>();

  for (const root of sortIds(adjacency.keys())) {
    if (visited.has(root)) {
      continue;
    }

    trace?.('order', 'Walk from current id', { id: root });

    const stack: Frame[] = [frameFor(adjacency, root)];
    const onPath = new Set<NodeId>([root]);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];

      if (frame.next < frame.children.length) {
        const child = frame.children[frame.next];
        frame.next += 1;

        if (visited.has(child)) {
          continue;
        }
        if (onPath.has(child)) {
          throw new CycleDetectedError([...stack.map(f => f.id), child]);
        }

        onPath.add(child);
        stack.push(frameFor(adjacency, child));
        continue;
      }

      stack.pop();
      onPath.delete(frame.id);
      visited.add(frame.id);
      order.push(frame.id);
      trace?.('order', 'Append to ordered list', { id: frame.id });
    }
  }

  return order;
};

const frameFor = (adjacency: Adjacency, id: NodeId): Frame => ({
  id,
  children: sortIds(adjacency.get(id) ?? []),
  next: 0,
});
