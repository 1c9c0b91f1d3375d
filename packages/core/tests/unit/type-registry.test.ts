import { afterEach, describe, expect, test } from 'vitest';

import {
  canonicalTypeName,
  getRegisteredTypes,
  isRegisteredType,
  registerType,
  resetRegisteredTypes,
  socket,
} from '../../src/type-registry.js';

describe('type registry', () => {
  afterEach(() => {
    resetRegisteredTypes();
  });

  test('names are trimmed, de-aliased and lower-cased', () => {
    expect(canonicalTypeName(' Float ')).toBe('number');
    expect(canonicalTypeName('Tensor')).toBe('tensor');
    expect(canonicalTypeName('vector')).toBe('vec3');
    expect(canonicalTypeName('   ')).toBe('any');
  });

  test('aliases of built-in types are known', () => {
    expect(isRegisteredType('int')).toBe(true);
    expect(isRegisteredType('quaternion')).toBe(false);
  });

  test('registered types are stored in canonical form', () => {
    registerType(' Quaternion ');
    expect(isRegisteredType('quaternion')).toBe(true);
    expect(getRegisteredTypes()).toContain('quaternion');

    resetRegisteredTypes();
    expect(isRegisteredType('quaternion')).toBe(false);
  });

  test('socket() only sets the flags it is given', () => {
    expect(socket('number')).toEqual({ type: 'number' });
    expect(socket('expr', { variadic: true, optional: true, default: [] })).toEqual({
      type: 'expr',
      default: [],
      variadic: true,
      optional: true,
    });
  });
});
