// tests/fixtures/nodes.ts
// Small node types shared by the unit suites

import { ArgumentError } from '../../src/errors.js';
import { defineExpressionNode } from '../../src/expression-node.js';
import { Node, type NodeDefinition } from '../../src/node.js';
import type { NodeOutputValues, ResolvedInputs } from '../../src/ports.js';
import { socket } from '../../src/type-registry.js';

/** Unwraps 1-tuples, the wire shape of a number. */
export function scalar(value: unknown): number {
  return Number(Array.isArray(value) ? value[0] : value);
}

export class Const extends Node {
  static override definition: NodeDefinition = {
    inputs: { value: socket('any') },
    outputs: { out: socket('any') },
  };

  builds = 0;

  protected build(inputs: ResolvedInputs): NodeOutputValues {
    this.builds += 1;
    return { out: inputs.value };
  }
}

export class Add extends Node {
  static override definition: NodeDefinition = {
    inputs: { a: socket('number'), b: socket('number') },
    outputs: { out: socket('number') },
    description: 'Sum of two numbers',
  };

  builds = 0;

  protected build(inputs: ResolvedInputs): NodeOutputValues {
    this.builds += 1;
    return { out: scalar(inputs.a) + scalar(inputs.b) };
  }
}

export class Fail extends Node {
  static override definition: NodeDefinition = {
    inputs: { x: socket('number') },
    outputs: { out: socket('number') },
  };

  protected build(): NodeOutputValues {
    throw new ArgumentError('x', 'must be positive');
  }
}

export interface Expr {
  op: string;
  args: unknown[];
}

export const Sphere = defineExpressionNode(
  'Sphere',
  { radius: socket('number', { default: 1 }), center: socket('vec3') },
  (...args): Expr => ({ op: 'sphere', args })
);

export const Union = defineExpressionNode(
  'Union',
  { shapes: socket('expr', { variadic: true }) },
  (...args): Expr => ({ op: 'union', args }),
  'Union of shapes'
);
