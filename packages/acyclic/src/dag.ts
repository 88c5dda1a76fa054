/**
 * Dag Core Implementation
 *
 * A directed acyclic graph with:
 * - Arbitrary values attached to node ids
 * - Edges declared through predecessor/successor hints
 * - Cached cycle detection with a readable cycle path
 * - Deterministic ordering (ties broken by ascending id)
 */

import { CycleDetectedError, DuplicateNodeError, NodeNotFoundError, invariant } from './errors.js';
import { sortIds } from './ids.js';
import { walkOrder } from './orderer.js';
import { detectCycle } from './validator.js';
import type {
  DagOptions,
  IDag,
  NodeId,
  Trace,
  TraceHandler,
  ValidationResult,
} from './types.js';

interface NodeEntry<T> {
  value: T;
}

interface ResolvedDagOptions {
  debug: boolean;
  onTrace: TraceHandler | undefined;
}

/**
 * Core Dag class
 * Owns the node storage and the validation cache. Not safe for concurrent mutation.
 */
export class Dag<T = unknown> implements IDag<T> {
  private readonly adjacency = new Map<NodeId, NodeId[]>();
  private readonly values = new Map<NodeId, NodeEntry<T>>();
  private cycles = new Set<NodeId>();
  private validated = false;
  private options: ResolvedDagOptions;

  constructor(options: DagOptions = {}) {
    this.options = {
      debug: options.debug ?? false,
      onTrace: options.onTrace,
    };
  }

  /**
   * Number of known ids, including edge endpoints without a value
   */
  get size(): number {
    return this.adjacency.size;
  }

  /**
   * Add a node with its value.
   * Each predecessor gets an edge to `id`; `id` gets an edge to each successor.
   * Throws DuplicateNodeError, without touching the graph, if `id` already has a value.
   */
  addNode(
    id: NodeId,
    value: T,
    predecessors: readonly NodeId[] = [],
    successors: readonly NodeId[] = []
  ): void {
    if (this.values.has(id)) {
      throw new DuplicateNodeError(id);
    }

    for (const from of predecessors) {
      this.ensureNode(from);
      this.addEdge(from, id);
    }

    this.ensureNode(id);

    for (const to of successors) {
      this.ensureNode(to);
      this.addEdge(id, to);
    }

    this.values.set(id, { value });
    this.validated = false;

    this.tracer?.('addNode', 'Node added', {
      id,
      predecessors: [...predecessors],
      successors: [...successors],
    });
  }

  /**
   * Get the value attached to a node
   */
  get(id: NodeId): T {
    const entry = this.values.get(id);
    if (!entry) {
      throw new NodeNotFoundError(id);
    }
    return entry.value;
  }

  has(id: NodeId): boolean {
    return this.values.has(id);
  }

  /**
   * Forward edges of a node, in declaration order. Empty for unknown ids.
   */
  childrenOf(id: NodeId): NodeId[] {
    return [...(this.adjacency.get(id) ?? [])];
  }

  /**
   * All known ids, sorted ascending
   */
  ids(): NodeId[] {
    this.tracer?.('ids', 'Sort node ids', { count: this.adjacency.size });
    return sortIds(this.adjacency.keys());
  }

  /**
   * Look for a cycle. Refreshes the cycle cache and marks the graph validated.
   */
  validate(): ValidationResult {
    const search = detectCycle(this.adjacency, this.tracer);

    this.validated = true;

    if (!search.found) {
      this.cycles = new Set();
      return { valid: true, reason: '' };
    }

    this.cycles = search.members;
    const error = new CycleDetectedError(search.path);
    return { valid: false, reason: error.reason, error };
  }

  /**
   * Throw the CycleDetectedError found by validate(), if any
   */
  assertAcyclic(): void {
    const result = this.validate();
    if (!result.valid) {
      throw result.error;
    }
  }

  /**
   * Whether `id` takes part in a detected cycle.
   * Runs a full validation first when the graph changed since the last one.
   */
  hasCycle(id: NodeId): boolean {
    if (!this.validated) {
      this.tracer?.('hasCycle', 'Validate', { id });
      const result = this.validate();
      if (result.valid) {
        return false;
      }
    }

    return this.cycles.has(id);
  }

  /**
   * Every known id, each listed after all ids reachable from it.
   * Call validate() first: a cyclic graph makes this throw CycleDetectedError.
   */
  order(): NodeId[] {
    return walkOrder(this.adjacency, this.tracer);
  }

  /**
   * Enable/disable debug mode
   */
  debug(enabled: boolean): void {
    this.options.debug = enabled;
    if (enabled) {
      console.debug('[Acyclic] Debug mode enabled');
    } else {
      console.debug('[Acyclic] Debug mode disabled');
    }
  }

  private ensureNode(id: NodeId): void {
    if (!this.adjacency.has(id)) {
      this.adjacency.set(id, []);
    }
  }

  private addEdge(from: NodeId, to: NodeId): void {
    const edges = this.adjacency.get(from);
    invariant(edges, `edge list of "${from}" must exist before adding an edge`);

    if (!edges.includes(to)) {
      edges.push(to);
      this.tracer?.('addEdge', 'Append edge', { from, to });
    }
  }

  /**
   * Trace sink, or undefined when neither onTrace nor debug mode listens,
   * so that callers skip building event data
   */
  private get tracer(): Trace | undefined {
    if (!this.options.debug && !this.options.onTrace) {
      return undefined;
    }
    return this.emitTrace;
  }

  private readonly emitTrace: Trace = (action, message, data = {}) => {
    this.options.onTrace?.({ action, message, data });

    if (this.options.debug) {
      console.debug(`[Acyclic] ${message}`, { action, ...data });
    }
  };
}

/**
 * Create a new graph instance
 */
export const createDag = <T = unknown>(options?: DagOptions): Dag<T> => {
  return new Dag<T>(options);
};
