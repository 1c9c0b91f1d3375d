// src/traversal.ts
// Depth-first walks over the upstream subgraph of a node

import type { Connection } from './connection.js';
import type { Node } from './node.js';

export interface CollectedGraph {
  /** Reachable nodes in depth-first pre-order, each once. */
  nodes: Node[];
  /** Connections feeding the collected nodes. */
  connections: Connection[];
}

/**
 * Collect `root` and every node upstream of it by following input-socket
 * connections back to their sources. Shared sub-expressions are visited once.
 */
export function collectGraph(root: Node): CollectedGraph {
  const visited = new Set<string>();
  const nodes: Node[] = [];
  const connections: Connection[] = [];

  const visit = (node: Node): void => {
    if (visited.has(node.nodeId)) return;
    visited.add(node.nodeId);
    nodes.push(node);

    for (const socket of node.inputSockets.values()) {
      for (const connection of socket.connections) {
        connections.push(connection);
        visit(connection.sourceNode);
      }
    }
  };

  visit(root);
  return { nodes, connections };
}

/**
 * Nodes with no outbound connections on any output socket.
 */
export function findRoots(nodes: Iterable<Node>): Node[] {
  const roots: Node[] = [];
  for (const node of nodes) {
    if (node.outboundConnectionCount === 0) roots.push(node);
  }
  return roots;
}
