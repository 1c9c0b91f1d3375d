// src/inspect.ts
// Human-readable dump of a node and its upstream graph, for debugging

import { BinaryArray, BinaryTensor, isTypedArray } from './binary.js';
import type { Node } from './node.js';

/**
 * Render a socket value compactly. Binary buffers show dtype and shape only.
 */
export function formatValue(value: unknown): string {
  if (value instanceof BinaryTensor) {
    return `BinaryTensor<${value.dtype}>[${value.shape.join(', ')}]@${value.device}`;
  }
  if (value instanceof BinaryArray) {
    return `BinaryArray<${value.dtype}>[${value.shape.join(', ')}]`;
  }
  if (isTypedArray(value)) {
    return `${value.constructor.name}(${value.length})`;
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `(${value.map((v: unknown) => formatValue(v)).join(', ')})`;
  }
  return String(value);
}

/**
 * One line per node (`Node: <id> (<type>)`) followed by one line per input
 * socket describing its connection or value. Each upstream node is expanded
 * once, under the first socket that reaches it.
 */
export function inspectGraph(root: Node): string {
  const lines: string[] = [];
  const visited = new Set<string>();

  const visit = (node: Node, indent: number): void => {
    if (visited.has(node.nodeId)) return;
    visited.add(node.nodeId);

    const pad = '  '.repeat(indent);
    lines.push(`${pad}Node: ${node.nodeId} (${node.typeName})`);

    for (const [name, socket] of node.inputSockets) {
      const state = socket.state;
      switch (state.kind) {
        case 'connected':
          for (const connection of state.connections) {
            lines.push(
              `${pad}  Input [${name}] connected to Node ${connection.sourceNode.nodeId}` +
                ` (${connection.sourceOutput})`
            );
            visit(connection.sourceNode, indent + 2);
          }
          break;
        case 'value':
          lines.push(`${pad}  Input [${name}] has value: ${formatValue(state.value)}`);
          break;
        case 'empty':
          lines.push(`${pad}  Input [${name}] is unconnected`);
          break;
      }
    }
  };

  visit(root, 0);
  return lines.join('\n');
}
