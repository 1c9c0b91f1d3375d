import { beforeEach, describe, expect, test } from 'vitest';

import { graphFromJSON, graphToJSON } from '../../src/graph-codec.js';
import { Node } from '../../src/node.js';
import { registerNodes, resetNodeRegistry } from '../../src/registry.js';
import { Add, Const } from '../fixtures/nodes.js';

describe('Const/Add pipeline', () => {
  beforeEach(() => {
    resetNodeRegistry();
    registerNodes([Const, Add]);
  });

  test('evaluates, persists and evaluates again', () => {
    const two = new Const({ values: { value: 2 } });
    const three = new Const({ values: { value: 3 } });
    const add = new Add({ values: { a: two, b: three } });

    expect(add.evaluate().out).toBe(5);

    const restored = graphFromJSON(graphToJSON(add));
    expect(restored).toBeInstanceOf(Add);
    if (!(restored instanceof Node)) return;
    expect(restored.nodeId).toBe(add.nodeId);
    expect(restored.evaluate().out).toBe(5);
  });

  test('evaluation after a change needs a clean', () => {
    const two = new Const({ values: { value: 2 } });
    const add = new Add({ values: { a: two, b: 3 } });
    expect(add.evaluate().out).toBe(5);

    two.inputSocket('value').setValue(10);
    add.cleanGraph();
    expect(add.evaluate().out).toBe(13);
  });
});
