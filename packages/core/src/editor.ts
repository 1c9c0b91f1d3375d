// src/editor.ts
// Mirror a node graph into a headless Rete NodeEditor

import { NodeEditor } from 'rete';

import type { Connection } from './connection.js';
import type { Node } from './node.js';
import { collectGraph } from './traversal.js';

// ============ Rete Scheme Types ============

export type Schemes = {
  Node: Node;
  Connection: Connection;
};

/**
 * Register `root`, everything upstream of it, and the connections between
 * them in a fresh editor. The editor holds references; evaluation still goes
 * through the nodes themselves.
 */
export async function toEditor(root: Node): Promise<NodeEditor<Schemes>> {
  const editor = new NodeEditor<Schemes>();
  const { nodes, connections } = collectGraph(root);

  for (const node of nodes) {
    await editor.addNode(node);
  }
  for (const connection of connections) {
    await editor.addConnection(connection);
  }

  return editor;
}
