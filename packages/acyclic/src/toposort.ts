/**
 * Dependency-first sort built on the graph
 */

import { Dag } from './dag.js';
import type { DagOptions, NodeId } from './types.js';

export interface TopoNode {
  id: NodeId;
  /** Ids that must come before this node */
  after: NodeId[];
}

/**
 * Topologically sort nodes by their dependencies
 * @param nodes - Array of nodes with id and after (dependencies) fields
 * @returns Node ids, every dependency before its dependants, ties in ascending id order
 * @throws CycleDetectedError if circular dependencies exist
 * @throws DuplicateNodeError if two nodes share an id
 */
export const toposort = (nodes: TopoNode[], options?: DagOptions): NodeId[] => {
  const dag = new Dag<TopoNode>(options);

  // Edge node -> dependency: the walk emits a dependency before the node
  nodes.forEach(node => {
    dag.addNode(node.id, node, [], node.after);
  });

  dag.assertAcyclic();

  // Dependencies that were never declared as nodes are left out
  const declared = new Set(nodes.map(node => node.id));
  return dag.order().filter(id => declared.has(id));
};
