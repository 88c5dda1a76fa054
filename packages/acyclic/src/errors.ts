import type { NodeId } from './types.js';

/**
 * Error thrown when a value is added twice under the same node id
 */
export class DuplicateNodeError extends Error {
  constructor(
    public readonly id: NodeId
  ) {
    super(`Duplicate node: node id "${id}" already has a value`);
    this.name = 'DuplicateNodeError';
  }
}

/**
 * Error thrown when looking up a node that has no value
 * (it may still exist as an edge endpoint)
 */
export class NodeNotFoundError extends Error {
  constructor(
    public readonly id: NodeId
  ) {
    super(`Node not found: node id "${id}" has no value`);
    this.name = 'NodeNotFoundError';
  }
}

/**
 * Error describing a cycle. `path` lists the ids along the traversal,
 * ending with the id that closed the cycle.
 */
export class CycleDetectedError extends Error {
  public readonly reason: string;

  constructor(
    public readonly path: readonly NodeId[]
  ) {
    const reason = path.join(' -> ');
    super(`Cycle detected: ${reason}`);
    this.name = 'CycleDetectedError';
    this.reason = reason;
  }
}

/**
 * Raised on broken internal state. Points at a bug in the graph, never at bad input.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(`internal error: ${message}`);
    this.name = 'InvariantViolationError';
  }
}

export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolationError(message);
  }
}
