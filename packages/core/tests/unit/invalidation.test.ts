import { describe, expect, test } from 'vitest';

import { Add, Const } from '../fixtures/nodes.js';

function diamond(): { a: Const; b: Add; c: Add; d: Add } {
  const a = new Const({ values: { value: 1 } });
  const b = new Add({ values: { a, b: 10 } });
  const c = new Add({ values: { a, b: 20 } });
  const d = new Add({ values: { a: b, b: c } });
  return { a, b, c, d };
}

describe('cleanGraph', () => {
  test('new nodes are clean and unevaluated', () => {
    const { d } = diamond();
    expect(d.isClean).toBe(true);
    expect(d.isEvaluated).toBe(false);
    expect(d.cachedOutputs).toEqual({});
  });

  test('evaluation marks the subgraph dirty', () => {
    const { a, b, d } = diamond();
    d.evaluate();
    expect(d.isClean).toBe(false);
    expect(b.isClean).toBe(false);
    expect(a.isClean).toBe(false);
    expect(a.cachedOutputs).toEqual({ out: 1 });
  });

  test('values changed upstream take effect after cleaning', () => {
    const { a, b, c, d } = diamond();
    expect(d.evaluate().out).toBe(32);

    a.inputSocket('value').setValue(5);
    expect(d.evaluate().out).toBe(32);

    d.cleanGraph();
    for (const node of [a, b, c, d]) {
      expect(node.isEvaluated).toBe(false);
      expect(node.cachedOutputs).toEqual({});
      expect(node.isClean).toBe(true);
    }
    expect(d.evaluate().out).toBe(40);
    expect(a.builds).toBe(2);
  });

  test('cleaning a node leaves downstream caches alone', () => {
    const { a, b, d } = diamond();
    d.evaluate();

    b.cleanGraph();
    expect(b.isEvaluated).toBe(false);
    expect(a.isEvaluated).toBe(false);
    expect(d.isEvaluated).toBe(true);
    expect(d.evaluate().out).toBe(32);
    expect(b.builds).toBe(1);
  });

  test('the walk stops at nodes that are already clean', () => {
    const a = new Const({ values: { value: 1 } });
    const b = new Add({ values: { a, b: 2 } });
    const d = new Add({ values: { a: b, b: 3 } });
    expect(d.evaluate().out).toBe(6);

    b.cleanGraph();
    a.evaluate();
    d.cleanGraph();

    expect(d.isEvaluated).toBe(false);
    expect(b.isClean).toBe(true);
    expect(a.isEvaluated).toBe(true);
  });
});
