import { beforeEach, describe, expect, test } from 'vitest';

import { toWire } from '../../src/graph-codec.js';
import type { GraphRecord } from '../../src/graph.js';
import { getNodeRegistry, registerNodes, resetNodeRegistry } from '../../src/registry.js';
import { hasCycles, validateGraph } from '../../src/validator.js';
import { Add, Const } from '../fixtures/nodes.js';

function record(overrides: Partial<GraphRecord> = {}): GraphRecord {
  return {
    nodes: [
      { id: 'a', name: 'Const', data: {} },
      { id: 's', name: 'Add', data: {} },
    ],
    connections: [{ source: 'a', sourceOutput: 'out', target: 's', targetInput: 'a' }],
    ...overrides,
  };
}

describe('validateGraph', () => {
  beforeEach(() => {
    resetNodeRegistry();
    registerNodes([Const, Add]);
  });

  test('serialized graphs are valid', () => {
    const a = new Const({ values: { value: 2 } });
    const sum = new Add({ values: { a, b: 3 } });
    expect(validateGraph(toWire(sum), getNodeRegistry())).toEqual({ valid: true, errors: [] });
  });

  test('shape errors carry their path', () => {
    const result = validateGraph({ nodes: [{ id: '', name: 'Const' }] });
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.path)).toEqual(['nodes.0.id']);
  });

  test('unknown node types are reported against the registry', () => {
    const result = validateGraph(
      record({ nodes: [{ id: 'a', name: 'Ghost', data: {} }], connections: [] }),
      getNodeRegistry()
    );
    expect(result.errors).toEqual([{ path: 'nodes.0.name', message: 'Unknown node type: "Ghost"' }]);
  });

  test('node types are not checked without a registry', () => {
    const result = validateGraph(record({ nodes: [{ id: 'a', name: 'Ghost', data: {} }], connections: [] }));
    expect(result.valid).toBe(true);
  });

  test('values for unknown sockets are reported', () => {
    const result = validateGraph(
      record({ nodes: [{ id: 'a', name: 'Const', data: { zzz: { type: 'bool', data: true } } }], connections: [] }),
      getNodeRegistry()
    );
    expect(result.errors).toEqual([{ path: 'nodes.0.data.zzz', message: 'Unknown input socket on Const' }]);
  });

  test('duplicate node ids are reported', () => {
    const result = validateGraph(
      record({
        nodes: [
          { id: 'a', name: 'Const', data: {} },
          { id: 'a', name: 'Const', data: {} },
        ],
        connections: [],
      })
    );
    expect(result.errors).toEqual([{ path: 'nodes.1.id', message: 'Duplicate node id: "a"' }]);
  });

  test('edges to missing nodes are reported', () => {
    const result = validateGraph(
      record({ connections: [{ source: 'a', sourceOutput: 'out', target: 'ghost', targetInput: 'a' }] })
    );
    expect(result.errors).toEqual([
      { path: 'connections.0.target', message: 'References non-existent node: "ghost"' },
    ]);
  });

  test('edges to unknown sockets are reported', () => {
    const result = validateGraph(
      record({ connections: [{ source: 'a', sourceOutput: 'out', target: 's', targetInput: 'c' }] }),
      getNodeRegistry()
    );
    expect(result.errors).toEqual([
      { path: 'connections.0.targetInput', message: 'Unknown input socket "c" on Add' },
    ]);
  });

  test('duplicate edges are reported', () => {
    const edge = { source: 'a', sourceOutput: 'out', target: 's', targetInput: 'a' };
    const result = validateGraph(record({ connections: [edge, { ...edge }] }));
    expect(result.errors).toEqual([{ path: 'connections.1', message: 'Duplicate connection: a.out->s.a' }]);
  });

  test('cycles are reported', () => {
    const result = validateGraph(
      record({
        nodes: [
          { id: 'x', name: 'Add', data: {} },
          { id: 'y', name: 'Add', data: {} },
        ],
        connections: [
          { source: 'x', sourceOutput: 'out', target: 'y', targetInput: 'a' },
          { source: 'y', sourceOutput: 'out', target: 'x', targetInput: 'a' },
        ],
      }),
      getNodeRegistry()
    );
    expect(result.errors).toEqual([{ path: 'connections', message: 'Graph contains a cycle' }]);
  });
});

describe('hasCycles', () => {
  test('acyclic graphs have none', () => {
    expect(hasCycles(record())).toBe(false);
  });

  test('self loops count', () => {
    expect(
      hasCycles(record({ connections: [{ source: 's', sourceOutput: 'out', target: 's', targetInput: 'b' }] }))
    ).toBe(true);
  });
});
