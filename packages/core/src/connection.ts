// src/connection.ts
// Directed edge from an output socket to an input socket

import { ClassicPreset } from 'rete';

import { SocketReferenceError } from './errors.js';
import type { Node } from './node.js';
import type { InputSocket, OutputSocket } from './sockets.js';

/**
 * A validated edge `source.sourceOutput -> target.targetInput`.
 *
 * Construction registers the connection on both sockets; `delete()` removes it
 * from both. There is no reference counting, so call `delete()` before
 * dropping a connection.
 */
export class Connection extends ClassicPreset.Connection<Node, Node> {
  declare sourceOutput: string;
  declare targetInput: string;

  readonly sourceNode: Node;
  readonly targetNode: Node;

  /**
   * @throws SocketReferenceError if either socket is missing; neither socket
   *   is modified in that case
   */
  constructor(source: Node, sourceOutput: string, target: Node, targetInput: string) {
    const output = source.outputSockets.get(sourceOutput);
    if (!output) {
      throw new SocketReferenceError(source.typeName, source.nodeId, 'output', sourceOutput);
    }
    const input = target.inputSockets.get(targetInput);
    if (!input) {
      throw new SocketReferenceError(target.typeName, target.nodeId, 'input', targetInput);
    }

    super(source, sourceOutput, target, targetInput);
    this.sourceNode = source;
    this.targetNode = target;

    output.connect(this);
    input.connect(this);
  }

  get sourceSocket(): OutputSocket {
    return this.sourceNode.outputSocket(this.sourceOutput);
  }

  get targetSocket(): InputSocket {
    return this.targetNode.inputSocket(this.targetInput);
  }

  /**
   * Evaluate the source node and return the connected output.
   */
  resolve(): unknown {
    return this.sourceNode.evaluate()[this.sourceOutput];
  }

  /** Remove this connection from both sockets. Safe to call twice. */
  delete(): void {
    this.sourceSocket.disconnect(this);
    this.targetSocket.disconnect(this);
  }

  toString(): string {
    return `${this.sourceNode.typeName}:${this.sourceOutput} -> ${this.targetNode.typeName}:${this.targetInput}`;
  }
}
