// src/node.ts
// Core Node base class with NodeDefinition pattern and memoized evaluation

import { randomUUID } from 'node:crypto';

import { ClassicPreset } from 'rete';

import { BinaryArray, BinaryTensor, isTypedArray } from './binary.js';
import { getSettings } from './config.js';
import { Connection } from './connection.js';
import {
  ArgumentError,
  ConstructionError,
  EvaluationError,
  SocketReferenceError,
} from './errors.js';
import type { NodeInputs, NodeOutputs, NodeOutputValues, ResolvedInputs } from './ports.js';
import { InputSocket, OutputSocket } from './sockets.js';

// ============ NodeDefinition ============

export interface NodeDefinition {
  /** Registry and wire name. Defaults to the class name. */
  typeName?: string;
  inputs?: NodeInputs;
  outputs?: NodeOutputs;
  description?: string;
}

export interface NodeOptions {
  /** Stored id when restoring a graph; a fresh UUID otherwise. */
  id?: string;
  /** Initial input feeds: literals, nodes or output sockets. */
  values?: Record<string, unknown>;
}

/** Anything carrying a node definition: a node class. */
export interface NodeClassInfo {
  readonly name: string;
  definition: NodeDefinition;
}

export type NodeConstructor = (new (options?: NodeOptions) => Node) & NodeClassInfo;

/**
 * Registry/wire name of a node class. Only a definition declared on the class
 * itself names it; subclasses do not inherit their parent's name.
 */
export function nodeTypeName(NodeClass: NodeClassInfo): string {
  const own = Object.hasOwn(NodeClass, 'definition') ? NodeClass.definition : undefined;
  return own?.typeName ?? NodeClass.name;
}

/**
 * Copy a resolved input so a builder cannot mutate upstream caches. Opaque
 * objects (expression handles) are shared.
 */
export function copyValue<T>(value: T): T;
export function copyValue(value: unknown): unknown {
  if (value instanceof BinaryTensor) {
    return new BinaryTensor(value.data.slice(), value.shape, value.dtype, value.device);
  }
  if (value instanceof BinaryArray) {
    return new BinaryArray(value.data.slice(), value.shape, value.dtype);
  }
  if (isTypedArray(value)) {
    return value.slice();
  }
  if (Array.isArray(value)) {
    return value.map((v: unknown) => copyValue(v));
  }
  if (typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, copyValue(v)]));
  }
  return value;
}

// ============ Node ============

/**
 * Abstract base class for all graph nodes.
 *
 * Extends ClassicPreset.Node so nodes can be mirrored into a Rete NodeEditor.
 * Sockets come from the static `definition`; `build()` is the node's
 * expression-construction step and runs at most once per dirty period.
 */
export abstract class Node extends ClassicPreset.Node {
  static definition: NodeDefinition = {};

  readonly nodeId: string;
  readonly typeName: string;

  private readonly _inputSockets = new Map<string, InputSocket>();
  private readonly _outputSockets = new Map<string, OutputSocket>();
  private _inputs: ResolvedInputs = {};
  private _outputs: Readonly<NodeOutputValues> | null = null;
  private _clean = true;

  constructor(options: NodeOptions = {}) {
    const NodeClass = new.target;
    const typeName = nodeTypeName(NodeClass);
    super(typeName);

    this.typeName = typeName;
    this.nodeId = options.id ?? randomUUID();
    this.id = this.nodeId;

    const def = NodeClass.definition;
    const variadic = Object.entries(def.inputs ?? {}).filter(([, spec]) => spec.variadic);
    if (variadic.length > 1) {
      throw new ConstructionError(
        `at most one variadic input allowed, got ${variadic.map(([name]) => name).join(', ')}`,
        { nodeType: typeName }
      );
    }

    for (const [name, spec] of Object.entries(def.inputs ?? {})) {
      try {
        const socket = new InputSocket(name, spec, this);
        this.addInput(name, socket);
        this._inputSockets.set(name, socket);
      } catch (e) {
        throw new ConstructionError('failed to create input socket', {
          nodeType: typeName,
          socket: name,
          cause: e,
        });
      }
    }

    for (const [name, spec] of Object.entries(def.outputs ?? {})) {
      try {
        const socket = new OutputSocket(name, spec, this);
        this.addOutput(name, socket);
        this._outputSockets.set(name, socket);
      } catch (e) {
        throw new ConstructionError('failed to create output socket', {
          nodeType: typeName,
          socket: name,
          cause: e,
        });
      }
    }

    for (const [name, value] of Object.entries(options.values ?? {})) {
      if (!this._inputSockets.has(name)) {
        throw new ConstructionError('unknown input socket', { nodeType: typeName, socket: name });
      }
      this.setInput(name, value);
    }
  }

  get definition(): NodeDefinition {
    return (this.constructor as typeof Node).definition;
  }

  // ============ Sockets ============

  get inputSockets(): ReadonlyMap<string, InputSocket> {
    return this._inputSockets;
  }

  get outputSockets(): ReadonlyMap<string, OutputSocket> {
    return this._outputSockets;
  }

  inputSocket(name: string): InputSocket {
    const socket = this._inputSockets.get(name);
    if (!socket) throw new SocketReferenceError(this.typeName, this.nodeId, 'input', name);
    return socket;
  }

  outputSocket(name: string): OutputSocket {
    const socket = this._outputSockets.get(name);
    if (!socket) throw new SocketReferenceError(this.typeName, this.nodeId, 'output', name);
    return socket;
  }

  /** Output used when a whole node is wired into an input: `expr`, else the first. */
  get defaultOutput(): OutputSocket {
    const socket = this._outputSockets.get('expr') ?? [...this._outputSockets.values()][0];
    if (!socket) {
      throw new ConstructionError('node has no outputs to connect from', { nodeType: this.typeName });
    }
    return socket;
  }

  /**
   * Feed an input from a literal, a node (its default output) or an output
   * socket. Returns the connection when one is made.
   */
  setInput(name: string, source: unknown): Connection | undefined {
    if (source instanceof Node) {
      return new Connection(source, source.defaultOutput.name, this, name);
    }
    if (source instanceof OutputSocket) {
      return new Connection(source.node, source.name, this, name);
    }
    this.inputSocket(name).setValue(source);
    return undefined;
  }

  /** Wire `this.output -> target.input`. */
  connect(output: string, target: Node, input: string): Connection {
    return new Connection(this, output, target, input);
  }

  /**
   * Delete every connection on every socket of this node, on both ends.
   */
  detach(): void {
    for (const socket of this._inputSockets.values()) {
      for (const c of socket.connections) c.delete();
    }
    for (const socket of this._outputSockets.values()) {
      for (const c of socket.connections) c.delete();
    }
  }

  outputRequestCount(name: string): number {
    return this.outputSocket(name).requestCount;
  }

  /** Outbound connections summed over all outputs; zero means this node is a root. */
  get outboundConnectionCount(): number {
    let count = 0;
    for (const socket of this._outputSockets.values()) count += socket.requestCount;
    return count;
  }

  // ============ Evaluation ============

  get isEvaluated(): boolean {
    return this._outputs !== null;
  }

  get isClean(): boolean {
    return this._clean;
  }

  get cachedOutputs(): Readonly<NodeOutputValues> {
    return this._outputs ?? {};
  }

  get resolvedInputs(): Readonly<ResolvedInputs> {
    return this._inputs;
  }

  /**
   * Evaluate this node, returning cached outputs if it has already run since
   * the last `cleanGraph()`.
   *
   * @throws EvaluationError attributed to the node whose builder failed
   */
  evaluate(): Readonly<NodeOutputValues> {
    this._clean = false;
    if (this._outputs) {
      return this._outputs;
    }

    try {
      const inputs = this.resolveInputs();
      const outputs = this.build(inputs);
      for (const key of Object.keys(outputs)) {
        if (!this._outputSockets.has(key)) {
          throw new Error(`builder produced undeclared output '${key}'`);
        }
      }
      this._outputs = Object.freeze({ ...outputs });
      return this._outputs;
    } catch (e) {
      this._inputs = {};
      if (e instanceof EvaluationError) throw e;
      const error = e instanceof Error ? e : new Error(String(e));
      throw new EvaluationError(this.typeName, this.nodeId, error.message, {
        parameter: e instanceof ArgumentError ? e.parameter : undefined,
        cause: error,
      });
    }
  }

  /**
   * Resolve every input socket into the transient input table. Unset inputs
   * are left out.
   */
  protected resolveInputs(): ResolvedInputs {
    const copy = getSettings().copyInputs;
    const resolved: ResolvedInputs = {};
    for (const [name, socket] of this._inputSockets) {
      const value = socket.resolve();
      if (value !== undefined && value !== null) {
        resolved[name] = copy ? copyValue(value) : value;
      }
    }
    this._inputs = resolved;
    return resolved;
  }

  /**
   * Clear this node's cache and that of every node upstream of it. Nodes that
   * are already clean end the walk.
   */
  cleanGraph(): void {
    if (this._clean) return;
    this._outputs = null;
    this._inputs = {};
    this._clean = true;
    for (const socket of this._inputSockets.values()) {
      for (const connection of socket.connections) {
        connection.sourceNode.cleanGraph();
      }
    }
  }

  toString(): string {
    return this.typeName;
  }

  /** Build this node's outputs from its resolved inputs. */
  protected abstract build(inputs: ResolvedInputs): NodeOutputValues;
}
