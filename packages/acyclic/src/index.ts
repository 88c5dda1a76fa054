/**
 * acyclic - Directed acyclic graph engine
 *
 * - Nodes with arbitrary attached values
 * - Edges declared through predecessor/successor hints
 * - Cycle detection with a readable cycle path
 * - Deterministic ordering
 * - Zero runtime dependencies
 */

export const VERSION = '1.0.0';

// Core exports
export { Dag, createDag } from './dag.js';
export { toposort, type TopoNode } from './toposort.js';

// Export all types and interfaces
export type {
  NodeId,
  Adjacency,
  DagOptions,
  IDag,
  TraceAction,
  TraceEvent,
  TraceHandler,
  ValidationResult,
} from './types.js';

// Export error classes
export {
  CycleDetectedError,
  DuplicateNodeError,
  NodeNotFoundError,
} from './errors.js';
