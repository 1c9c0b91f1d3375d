// src/graph-codec.ts
// Graph <-> wire record conversion (serialize from a root, rebuild from records)

import { BinaryTensor } from './binary.js';
import { Connection } from './connection.js';
import { ConstructionError, DecodeError, RegistryLookupError, SocketReferenceError } from './errors.js';
import { GraphRecordSchema, type GraphConnectionRecord, type GraphNodeRecord, type GraphRecord } from './graph.js';
import { getLogger } from './logger.js';
import type { Node, NodeConstructor } from './node.js';
import { getNodeRegistry, type NodeRegistry } from './registry.js';
import { decodeSocketValue, encodeValue, type EncodedValue } from './serialization.js';
import { collectGraph, findRoots } from './traversal.js';

// ============ Types ============

export interface SerializeOptions {
  /** Device tag written for binary tensors, replacing their own. */
  device?: string;
}

export interface DeserializeOptions {
  /** Registry to resolve node type names against. Defaults to the global one. */
  registry?: NodeRegistry;
}

export type SkippedItem =
  | { kind: 'connection'; connection: GraphConnectionRecord; reason: string }
  | { kind: 'value'; nodeId: string; socket: string; reason: string }
  | { kind: 'node'; nodeId: string; reason: string };

export interface DeserializedGraph {
  /** Nodes without outbound connections. */
  roots: Node[];
  /** Every rebuilt node by id. */
  nodes: Map<string, Node>;
  /** Records that were dropped while loading. */
  skipped: SkippedItem[];
}

export interface JsonOptions {
  /** Key the record is nested under, e.g. `{ "graph": {...} }`. */
  wrapperName?: string;
  space?: number;
}

// ============ Serialize ============

function serializeNode(node: Node, options: SerializeOptions): GraphNodeRecord {
  const data: Record<string, EncodedValue> = {};
  for (const [name, socket] of node.inputSockets) {
    if (!socket.hasValue) continue;

    let value = socket.value;
    if (options.device && value instanceof BinaryTensor) {
      value = BinaryTensor.fromArray(value, options.device);
    }
    try {
      data[name] = encodeValue(value);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      throw new ConstructionError(message, { nodeType: node.typeName, socket: name, cause: e });
    }
  }
  return { id: node.nodeId, name: node.typeName, data };
}

function serializeConnection(connection: Connection): GraphConnectionRecord {
  return {
    source: connection.sourceNode.nodeId,
    sourceOutput: connection.sourceOutput,
    target: connection.targetNode.nodeId,
    targetInput: connection.targetInput,
  };
}

/**
 * Serialize `root` and its upstream subgraph. Each node is emitted once with
 * the encoded direct values of its inputs; connected inputs appear as
 * connection records instead.
 */
export function serializeGraph(root: Node, options: SerializeOptions = {}): GraphRecord {
  const { nodes, connections } = collectGraph(root);
  return {
    nodes: nodes.map((node) => serializeNode(node, options)),
    connections: connections.map(serializeConnection),
  };
}

// ============ Deserialize ============

function resolveNodeClass(registry: NodeRegistry, typeName: string): NodeConstructor {
  const NodeClass = registry.get(typeName);
  if (!NodeClass) throw new RegistryLookupError(typeName);
  return NodeClass;
}

/**
 * Rebuild nodes and connections from a wire record.
 *
 * Unregistered types, node construction failures and undecodable values abort
 * the load. Connections naming unknown nodes or sockets are skipped and
 * reported in `skipped`.
 *
 * @throws DecodeError when the record does not have the wire shape
 */
export function deserializeGraph(input: unknown, options: DeserializeOptions = {}): DeserializedGraph {
  const parsed = GraphRecordSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join('.') || 'record';
    throw new DecodeError(`Malformed graph record at ${where}: ${issue?.message ?? 'invalid'}`, {
      cause: parsed.error,
    });
  }

  const log = getLogger('graph-codec');
  const registry = options.registry ?? getNodeRegistry();
  const nodes = new Map<string, Node>();
  const skipped: SkippedItem[] = [];

  // Step 1: nodes and their direct values
  for (const record of parsed.data.nodes) {
    if (nodes.has(record.id)) {
      log.warn({ nodeId: record.id, type: record.name }, 'Duplicate node id, keeping the first record');
      skipped.push({ kind: 'node', nodeId: record.id, reason: 'duplicate node id' });
      continue;
    }

    const NodeClass = resolveNodeClass(registry, record.name);
    const node = new NodeClass({ id: record.id });

    for (const [socketName, encoded] of Object.entries(record.data)) {
      const socket = node.inputSockets.get(socketName);
      if (!socket) {
        log.warn({ nodeId: record.id, type: record.name, socket: socketName }, 'Dropping value for unknown input socket');
        skipped.push({ kind: 'value', nodeId: record.id, socket: socketName, reason: 'unknown input socket' });
        continue;
      }
      try {
        socket.setValue(decodeSocketValue(encoded));
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        throw new DecodeError(`Node ${record.name}(${record.id}) input '${socketName}': ${message}`, { cause: e });
      }
    }

    nodes.set(record.id, node);
  }

  // Step 2: connections
  for (const edge of parsed.data.connections) {
    const source = nodes.get(edge.source);
    const target = nodes.get(edge.target);
    if (!source || !target) {
      const missing = !source ? edge.source : edge.target;
      log.warn({ ...edge }, `Connection references non-existent node "${missing}", skipping`);
      skipped.push({ kind: 'connection', connection: edge, reason: `unknown node '${missing}'` });
      continue;
    }

    try {
      new Connection(source, edge.sourceOutput, target, edge.targetInput);
    } catch (e) {
      if (!(e instanceof SocketReferenceError)) throw e;
      log.warn({ ...edge }, `${e.message}, skipping connection`);
      skipped.push({ kind: 'connection', connection: edge, reason: e.message });
    }
  }

  // Step 3: roots
  return { roots: findRoots(nodes.values()), nodes, skipped };
}

// ============ Wire Entry Points ============

export function toWire(root: Node, options?: SerializeOptions): GraphRecord {
  return serializeGraph(root, options);
}

/**
 * Rebuild a graph and return its single root, or the list of roots when the
 * record holds several disconnected sinks (or none).
 */
export function fromWire(record: unknown, options?: DeserializeOptions): Node | Node[] {
  const { roots } = deserializeGraph(record, options);
  const [only] = roots;
  return roots.length === 1 && only ? only : roots;
}

export function graphToJSON(root: Node, options: JsonOptions & SerializeOptions = {}): string {
  const record = serializeGraph(root, options);
  const payload = options.wrapperName ? { [options.wrapperName]: record } : record;
  return JSON.stringify(payload, null, options.space);
}

/**
 * @throws DecodeError for invalid JSON or a missing wrapper key
 */
export function graphFromJSON(text: string, options: JsonOptions & DeserializeOptions = {}): Node | Node[] {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (e) {
    throw new DecodeError('Graph JSON could not be parsed', { cause: e });
  }

  const { wrapperName } = options;
  if (wrapperName) {
    const wrapped: unknown =
      typeof payload === 'object' && payload !== null
        ? Object.entries(payload).find(([key]) => key === wrapperName)?.[1]
        : undefined;
    if (wrapped === undefined) {
      throw new DecodeError(`Graph JSON has no '${wrapperName}' key`);
    }
    payload = wrapped;
  }

  return fromWire(payload, options);
}
