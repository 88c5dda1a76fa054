/**
 * Type definitions for the acyclic graph engine
 */

import type { CycleDetectedError } from './errors.js';

// ============================================================================
// Core Types
// ============================================================================

/**
 * Node identifier. Ordered by plain string comparison.
 */
export type NodeId = string;

/**
 * Read-only view of the forward edges (id -> children)
 */
export type Adjacency = ReadonlyMap<NodeId, readonly NodeId[]>;

// ============================================================================
// Tracing
// ============================================================================

export type TraceAction = 'addNode' | 'addEdge' | 'ids' | 'validate' | 'hasCycle' | 'order';

/**
 * Diagnostic event emitted for internal steps
 */
export interface TraceEvent {
  action: TraceAction;
  message: string;
  data: Record<string, unknown>;
}

export type TraceHandler = (event: TraceEvent) => void;

/**
 * Trace sink handed to the validator and the orderer
 */
export type Trace = (action: TraceAction, message: string, data?: Record<string, unknown>) => void;

// ============================================================================
// Graph Options
// ============================================================================

/**
 * Options for creating a graph instance
 */
export interface DagOptions {
  /** Debug mode - logs every trace event with console.debug (default: false) */
  debug?: boolean;

  /** Receives every trace event, whatever the debug mode */
  onTrace?: TraceHandler;
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Outcome of a validation pass. `reason` names the cycle path when invalid.
 */
export type ValidationResult =
  | { valid: true; reason: '' }
  | { valid: false; reason: string; error: CycleDetectedError };

// ============================================================================
// Graph Interface
// ============================================================================

/**
 * Public graph interface
 */
export interface IDag<T = unknown> {
  addNode(
    id: NodeId,
    value: T,
    predecessors?: readonly NodeId[],
    successors?: readonly NodeId[]
  ): void;
  get(id: NodeId): T;
  has(id: NodeId): boolean;
  childrenOf(id: NodeId): NodeId[];
  ids(): NodeId[];
  validate(): ValidationResult;
  assertAcyclic(): void;
  hasCycle(id: NodeId): boolean;
  order(): NodeId[];
  debug(enabled: boolean): void;
  readonly size: number;
}
