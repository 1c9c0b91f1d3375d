// src/type-registry.ts
// Socket type names known to the engine, and their shorthand spellings

import type { SocketSpec } from './ports.js';

// ============ Aliases ============

/** Shorthand spellings accepted in socket declarations. */
export const TYPE_ALIASES: Readonly<Record<string, string>> = Object.freeze({
  str: 'string',
  int: 'number',
  float: 'number',
  double: 'number',
  bool: 'boolean',
  list: 'tuple',
  ndarray: 'array',
  vector: 'vec3',
});

/** Canonical name of a declared type: trimmed, lower-cased, alias resolved. */
export function canonicalTypeName(typeName: string): string {
  const name = typeName.trim().toLowerCase();
  if (!name) return 'any';
  return TYPE_ALIASES[name] ?? name;
}

// ============ Known Types ============

const BUILTIN_TYPES = [
  'any',
  'number',
  'string',
  'boolean',
  'tuple',
  'object',
  'vec2',
  'vec3',
  'vec4',
  'expr',
  'array',
  'tensor',
] as const;

const knownTypes = new Set<string>(BUILTIN_TYPES);

/**
 * Make a socket type known, so node definitions using it pass
 * `validateNodeDefinitions`. Names are stored in canonical form.
 */
export function registerType(typeName: string): void {
  knownTypes.add(canonicalTypeName(typeName));
}

export function isRegisteredType(typeName: string): boolean {
  return knownTypes.has(canonicalTypeName(typeName));
}

export function getRegisteredTypes(): string[] {
  return [...knownTypes].sort();
}

/** Forget types added with `registerType`. */
export function resetRegisteredTypes(): void {
  knownTypes.clear();
  for (const name of BUILTIN_TYPES) knownTypes.add(name);
}

// ============ Socket Factory ============

export interface SocketOptions {
  default?: unknown;
  /** Collector input: fan-in arrives as one ordered collection. */
  variadic?: boolean;
  /** Input the node can build without; `describeNode` marks it with `?`. */
  optional?: boolean;
}

/** `socket('vec3', { default: [0, 0, 0] })` */
export function socket(type: string, options: SocketOptions = {}): SocketSpec {
  const spec: SocketSpec = { type };
  if (options.default !== undefined) spec.default = options.default;
  if (options.variadic) spec.variadic = true;
  if (options.optional) spec.optional = true;
  return spec;
}
