import { describe, expect, test } from 'vitest';

import { BinaryArray, BinaryTensor } from '../../src/binary.js';
import { formatValue, inspectGraph } from '../../src/inspect.js';
import { Add, Const } from '../fixtures/nodes.js';

describe('formatValue', () => {
  test('scalars and lists', () => {
    expect(formatValue('hi')).toBe('"hi"');
    expect(formatValue(3)).toBe('3');
    expect(formatValue([1, 'a', [true]])).toBe('(1, "a", (true))');
  });

  test('binary values show metadata only', () => {
    expect(formatValue(new BinaryTensor(new Float32Array(4), [2, 2]))).toBe('BinaryTensor<float32>[2, 2]@cpu');
    expect(formatValue(new BinaryArray(new Uint8Array(3), [3], 'bool'))).toBe('BinaryArray<bool>[3]');
    expect(formatValue(new Float64Array(3))).toBe('Float64Array(3)');
  });
});

describe('inspectGraph', () => {
  test('walks connections and reports values', () => {
    const a = new Const({ id: 'a', values: { value: 2 } });
    const b = new Const({ id: 'b', values: { value: 'three' } });
    const sum = new Add({ id: 's', values: { a, b } });

    expect(inspectGraph(sum)).toBe(
      [
        'Node: s (Add)',
        '  Input [a] connected to Node a (out)',
        '    Node: a (Const)',
        '      Input [value] has value: 2',
        '  Input [b] connected to Node b (out)',
        '    Node: b (Const)',
        '      Input [value] has value: "three"',
      ].join('\n')
    );
  });

  test('reports unconnected inputs', () => {
    expect(inspectGraph(new Add({ id: 'x' }))).toBe(
      ['Node: x (Add)', '  Input [a] is unconnected', '  Input [b] is unconnected'].join('\n')
    );
  });

  test('shared nodes are expanded once', () => {
    const a = new Const({ id: 'a', values: { value: 1 } });
    const sum = new Add({ id: 's', values: { a, b: a } });

    expect(inspectGraph(sum)).toBe(
      [
        'Node: s (Add)',
        '  Input [a] connected to Node a (out)',
        '    Node: a (Const)',
        '      Input [value] has value: 1',
        '  Input [b] connected to Node a (out)',
      ].join('\n')
    );
  });
});
