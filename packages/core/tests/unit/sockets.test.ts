import { describe, expect, test } from 'vitest';

import { anySocket, getOrCreateSocket, getSocketKey } from '../../src/sockets.js';
import { Add, Const, Sphere, Union } from '../fixtures/nodes.js';

describe('socket keys', () => {
  test('aliases and case are normalized', () => {
    expect(getSocketKey('float')).toBe('number');
    expect(getSocketKey({ type: ' Vec3 ' })).toBe('vec3');
    expect(getSocketKey('')).toBe('any');
  });

  test('rete sockets are shared per key', () => {
    expect(getOrCreateSocket('int')).toBe(getOrCreateSocket('number'));
    expect(getOrCreateSocket('any')).toBe(anySocket);
    expect(getOrCreateSocket('vec2').name).toBe('vec2');
  });
});

describe('InputSocket', () => {
  test('starts empty without a default', () => {
    const node = new Const();
    const input = node.inputSocket('value');
    expect(input.state).toEqual({ kind: 'empty' });
    expect(input.hasValue).toBe(false);
    expect(input.resolve()).toBeUndefined();
  });

  test('starts with the declared default', () => {
    const input = new Sphere().inputSocket('radius');
    expect(input.hasValue).toBe(true);
    expect(input.value).toBe(1);
  });

  test('null leaves the socket empty', () => {
    const input = new Sphere().inputSocket('radius');
    input.setValue(null);
    expect(input.state.kind).toBe('empty');
  });

  test('setting a value deletes existing connections on both ends', () => {
    const source = new Const();
    const target = new Add();
    target.setInput('a', source);
    expect(source.outputRequestCount('out')).toBe(1);

    target.inputSocket('a').setValue(4);
    expect(source.outputRequestCount('out')).toBe(0);
    expect(target.inputSocket('a').isConnected).toBe(false);
    expect(target.inputSocket('a').value).toBe(4);
  });

  test('connecting clears a direct value', () => {
    const source = new Const();
    const target = new Add({ values: { a: 7 } });
    target.setInput('a', source);

    const input = target.inputSocket('a');
    expect(input.hasValue).toBe(false);
    expect(input.isConnected).toBe(true);
    expect(input.value).toBeUndefined();
  });

  test('several connections resolve to an ordered list', () => {
    const first = new Const({ values: { value: 'x' } });
    const second = new Const({ values: { value: 'y' } });
    const union = new Union({ args: [first, second] });

    const input = union.inputSocket('shapes');
    expect(input.isVariadic).toBe(true);
    expect(input.connections).toHaveLength(2);
    expect(input.resolve()).toEqual(['x', 'y']);
  });

  test('a single connection resolves to its value', () => {
    const source = new Const({ values: { value: 3 } });
    const target = new Add({ values: { a: source } });
    expect(target.inputSocket('a').resolve()).toBe(3);
  });
});

describe('OutputSocket', () => {
  test('counts outbound connections', () => {
    const source = new Const();
    const left = new Add({ values: { a: source } });
    const right = new Add({ values: { b: source } });

    const output = source.outputSocket('out');
    expect(output.requestCount).toBe(2);
    expect(output.connections[0]?.targetNode).toBe(left);
    expect(output.connections[1]?.targetNode).toBe(right);
  });
});
