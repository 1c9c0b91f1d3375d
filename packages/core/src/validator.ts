// src/validator.ts
// Validates graph records for structural and semantic correctness

import { edgeKey, GraphRecordSchema, type GraphRecord } from './graph.js';
import type { NodeRegistry } from './registry.js';

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

/**
 * Validate a graph record for structural correctness and (optionally)
 * semantic correctness against a node registry.
 */
export function validateGraph(doc: unknown, nodeRegistry?: NodeRegistry): ValidationResult {
  const parsed = GraphRecordSchema.safeParse(doc);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  const graph = parsed.data;
  const errors: ValidationError[] = [];
  const types = new Map<string, string>();

  // Validate each node
  graph.nodes.forEach((node, i) => {
    if (types.has(node.id)) {
      errors.push({ path: `nodes.${i}.id`, message: `Duplicate node id: "${node.id}"` });
      return;
    }
    types.set(node.id, node.name);

    if (!nodeRegistry) return;
    const NodeClass = nodeRegistry.get(node.name);
    if (!NodeClass) {
      errors.push({ path: `nodes.${i}.name`, message: `Unknown node type: "${node.name}"` });
      return;
    }
    const inputs = NodeClass.definition.inputs ?? {};
    for (const socket of Object.keys(node.data)) {
      if (!(socket in inputs)) {
        errors.push({ path: `nodes.${i}.data.${socket}`, message: `Unknown input socket on ${node.name}` });
      }
    }
  });

  // Validate each connection
  graph.connections.forEach((edge, i) => {
    for (const end of ['source', 'target'] as const) {
      const typeName = types.get(edge[end]);
      if (typeName === undefined) {
        errors.push({ path: `connections.${i}.${end}`, message: `References non-existent node: "${edge[end]}"` });
        continue;
      }
      const def = nodeRegistry?.get(typeName)?.definition;
      if (!def) continue;

      const socket = end === 'source' ? edge.sourceOutput : edge.targetInput;
      const sockets = (end === 'source' ? def.outputs : def.inputs) ?? {};
      if (!(socket in sockets)) {
        const field = end === 'source' ? 'sourceOutput' : 'targetInput';
        errors.push({
          path: `connections.${i}.${field}`,
          message: `Unknown ${end === 'source' ? 'output' : 'input'} socket "${socket}" on ${typeName}`,
        });
      }
    }
  });

  // Check for duplicate connections
  const seen = new Set<string>();
  graph.connections.forEach((edge, i) => {
    const key = edgeKey(edge);
    if (seen.has(key)) {
      errors.push({ path: `connections.${i}`, message: `Duplicate connection: ${key}` });
    }
    seen.add(key);
  });

  if (hasCycles(graph)) {
    errors.push({ path: 'connections', message: 'Graph contains a cycle' });
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Check for cycles in the graph using DFS.
 */
export function hasCycles(graph: GraphRecord): boolean {
  const adj = new Map<string, string[]>();

  for (const node of graph.nodes) {
    adj.set(node.id, []);
  }

  for (const edge of graph.connections) {
    adj.get(edge.source)?.push(edge.target);
  }

  const visited = new Set<string>();
  const inStack = new Set<string>();

  function dfs(node: string): boolean {
    visited.add(node);
    inStack.add(node);

    for (const neighbor of adj.get(node) ?? []) {
      if (inStack.has(neighbor)) return true;
      if (!visited.has(neighbor) && dfs(neighbor)) return true;
    }

    inStack.delete(node);
    return false;
  }

  for (const node of adj.keys()) {
    if (!visited.has(node) && dfs(node)) return true;
  }

  return false;
}
