// src/expression-node.ts
// Nodes that wrap an external expression constructor behind an `expr` output

import { ConstructionError } from './errors.js';
import { Node, type NodeClassInfo, type NodeDefinition, type NodeOptions } from './node.js';
import type { NodeInputs, NodeOutputValues, ResolvedInputs } from './ports.js';
import { OutputSocket } from './sockets.js';

/** External expression constructor, called with positional arguments. */
export type ExpressionBuilder = (...args: unknown[]) => unknown;

export interface ExpressionNodeOptions extends NodeOptions {
  /**
   * Positional feeds mapped onto inputs in declaration order, or all onto the
   * collector input when the node has one.
   */
  args?: unknown[];
}

export type ExpressionNodeConstructor = (new (options?: ExpressionNodeOptions) => ExpressionNode) &
  NodeClassInfo;

function isWiring(value: unknown): boolean {
  return value instanceof Node || value instanceof OutputSocket;
}

function isMissing(value: unknown): boolean {
  return value === undefined || value === null;
}

/** Numbers and booleans travel as 1-tuples, like they do on the wire. */
export function toArgument(value: unknown): unknown {
  return typeof value === 'number' || typeof value === 'boolean' ? [value] : value;
}

/**
 * Base for nodes whose builder hands positional arguments to an expression
 * constructor and exposes the result on `expr`.
 *
 * Arguments are gathered in input declaration order and stop at the first
 * missing input. A collector (variadic) input contributes its resolved
 * elements up to, not including, the first missing one.
 */
export abstract class ExpressionNode extends Node {
  static override definition: NodeDefinition = {
    outputs: { expr: { type: 'expr' } },
  };

  constructor(options: ExpressionNodeOptions = {}) {
    super(options);
    this.applyArguments(options.args ?? []);
  }

  protected abstract construct(args: unknown[]): unknown;

  private get collector(): string | undefined {
    for (const socket of this.inputSockets.values()) {
      if (socket.isVariadic) return socket.name;
    }
    return undefined;
  }

  private applyArguments(args: unknown[]): void {
    if (args.length === 0) return;

    const collector = this.collector;
    if (collector !== undefined) {
      const wired = args.filter(isWiring);
      if (wired.length === args.length) {
        for (const arg of args) this.setInput(collector, arg);
      } else if (wired.length === 0) {
        this.setInput(collector, args);
      } else {
        throw new ConstructionError('collector arguments must be all nodes or all values', {
          nodeType: this.typeName,
          socket: collector,
        });
      }
      return;
    }

    const names = [...this.inputSockets.keys()];
    if (args.length > names.length) {
      throw new ConstructionError(
        `takes ${names.length} positional arguments, got ${args.length}`,
        { nodeType: this.typeName }
      );
    }
    args.forEach((arg, i) => {
      const name = names[i];
      if (name !== undefined) this.setInput(name, arg);
    });
  }

  /**
   * Positional arguments for the expression constructor.
   */
  protected gatherArguments(inputs: ResolvedInputs): unknown[] {
    const args: unknown[] = [];
    for (const socket of this.inputSockets.values()) {
      const value = inputs[socket.name];
      if (isMissing(value)) break;

      if (!socket.isVariadic) {
        args.push(toArgument(value));
        continue;
      }

      const elements =
        Array.isArray(value) && socket.connections.length !== 1 ? value : [value];
      for (const element of elements) {
        if (isMissing(element)) break;
        args.push(toArgument(element));
      }
    }
    return args;
  }

  protected build(inputs: ResolvedInputs): NodeOutputValues {
    return { expr: this.construct(this.gatherArguments(inputs)) };
  }
}

/**
 * Declare an expression node type around an expression constructor.
 *
 * ```ts
 * const Union = defineExpressionNode('Union', { shapes: socket('expr', { variadic: true }) },
 *   (...shapes) => new UnionExpr(shapes));
 * registerNode(Union);
 * ```
 */
export function defineExpressionNode(
  typeName: string,
  inputs: NodeInputs,
  expression: ExpressionBuilder,
  description?: string
): ExpressionNodeConstructor {
  return class extends ExpressionNode {
    static override definition: NodeDefinition = {
      typeName,
      inputs,
      outputs: { expr: { type: 'expr' } },
      description,
    };

    protected construct(args: unknown[]): unknown {
      return expression(...args);
    }
  };
}
