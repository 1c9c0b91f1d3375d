// src/registry.ts
// Explicit node-type registration and lookup

import { ConstructionError, RegistryLookupError } from './errors.js';
import { getLogger } from './logger.js';
import {
  Node,
  nodeTypeName,
  type NodeClassInfo,
  type NodeConstructor,
  type NodeDefinition,
  type NodeOptions,
} from './node.js';
import { getSocketKey } from './sockets.js';
import { isRegisteredType } from './type-registry.js';

export type NodeRegistry = Map<string, NodeConstructor>;

let _nodeRegistry: NodeRegistry = new Map();

/**
 * Register a node class under its type name (or `name`). Re-registering the
 * same class is a no-op; a different class under a taken name throws.
 */
export function registerNode<T extends NodeConstructor>(NodeClass: T, name?: string): T {
  const typeName = name ?? nodeTypeName(NodeClass);
  const existing = _nodeRegistry.get(typeName);
  if (existing && existing !== NodeClass) {
    throw new ConstructionError(`node type '${typeName}' is already registered`);
  }
  _nodeRegistry.set(typeName, NodeClass);
  getLogger('registry').debug({ typeName }, 'Registered node');
  return NodeClass;
}

export function registerNodes(classes: NodeConstructor[]): void {
  for (const NodeClass of classes) registerNode(NodeClass);
}

export function hasNode(typeName: string): boolean {
  return _nodeRegistry.has(typeName);
}

/**
 * @throws RegistryLookupError for an unregistered type name
 */
export function lookupNode(typeName: string): NodeConstructor {
  const NodeClass = _nodeRegistry.get(typeName);
  if (!NodeClass) {
    throw new RegistryLookupError(typeName);
  }
  return NodeClass;
}

export function createNode(typeName: string, options?: NodeOptions): Node {
  const NodeClass = lookupNode(typeName);
  return new NodeClass(options);
}

export function getNodeRegistry(): NodeRegistry {
  return _nodeRegistry;
}

/**
 * Manually set the node registry (useful for testing or custom configurations).
 */
export function setNodeRegistry(registry: NodeRegistry | Record<string, NodeConstructor>): void {
  _nodeRegistry = registry instanceof Map ? new Map(registry) : new Map(Object.entries(registry));
}

/**
 * Reset the node registry (useful for testing).
 */
export function resetNodeRegistry(): void {
  _nodeRegistry = new Map();
}

/** All registered type names, sorted. */
export function listNodes(): string[] {
  return [..._nodeRegistry.keys()].sort();
}

/** Registered type names matching `pattern`, case-insensitive, sorted. */
export function searchNodes(pattern: string): string[] {
  const regex = new RegExp(pattern, 'i');
  return listNodes().filter((name) => regex.test(name));
}

/**
 * Short multi-line summary of a node type: inputs with type keys, outputs.
 */
export function describeNode(target: string | NodeClassInfo | Node): string {
  let typeName: string;
  let def: NodeDefinition;
  if (typeof target === 'string') {
    def = lookupNode(target).definition;
    typeName = target;
  } else if (target instanceof Node) {
    def = target.definition;
    typeName = target.typeName;
  } else {
    def = target.definition;
    typeName = nodeTypeName(target);
  }

  const inputs = Object.entries(def.inputs ?? {}).map(([name, spec]) => {
    const marker = spec.optional ? '?' : '';
    const suffix = spec.variadic ? '...' : '';
    return `${name}${marker}:${getSocketKey(spec)}${suffix}`;
  });
  const outputs = Object.keys(def.outputs ?? {});

  const lines = [typeName, `  Inputs: [${inputs.join(', ')}]`, `  Outputs: [${outputs.join(', ')}]`];
  if (def.description) lines.push(`  Description: ${def.description}`);
  return lines.join('\n');
}

// ============ Node Definition Validation ============

/**
 * Validate registered node definitions against the type registry.
 * Returns an array of error messages for unknown socket types.
 */
export function validateNodeDefinitions(registry: NodeRegistry = _nodeRegistry): string[] {
  const errors: string[] = [];
  for (const [typeName, NodeClass] of registry) {
    const def = NodeClass.definition;
    for (const [name, spec] of Object.entries(def.inputs ?? {})) {
      if (!isRegisteredType(spec.type)) {
        errors.push(`${typeName}: input '${name}' uses unknown type '${spec.type}'`);
      }
    }
    for (const [name, spec] of Object.entries(def.outputs ?? {})) {
      if (!isRegisteredType(spec.type)) {
        errors.push(`${typeName}: output '${name}' uses unknown type '${spec.type}'`);
      }
    }
    const variadic = Object.values(def.inputs ?? {}).filter((spec) => spec.variadic).length;
    if (variadic > 1) {
      errors.push(`${typeName}: declares ${variadic} variadic inputs, at most one allowed`);
    }
  }
  return errors;
}
