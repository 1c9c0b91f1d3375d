// src/sockets.ts
// Input/output sockets and the socket-type key registry

import { ClassicPreset } from 'rete';

import type { Connection } from './connection.js';
import type { Node } from './node.js';
import type { SocketSpec } from './ports.js';
import { canonicalTypeName } from './type-registry.js';

// ============ Socket Key Helpers ============

/**
 * Convert a declared socket type (SocketSpec or string) to a canonical key.
 */
export function getSocketKey(specOrStr: SocketSpec | string): string {
  return canonicalTypeName(typeof specOrStr === 'string' ? specOrStr : specOrStr.type);
}

const socketCache = new Map<string, ClassicPreset.Socket>();
const anySocket = new ClassicPreset.Socket('any');

/**
 * Get or create the shared Rete socket for a given SocketSpec or type string.
 */
export function getOrCreateSocket(specOrStr: SocketSpec | string): ClassicPreset.Socket {
  const key = getSocketKey(specOrStr);
  if (key === 'any') return anySocket;

  let socket = socketCache.get(key);
  if (!socket) {
    socket = new ClassicPreset.Socket(key);
    socketCache.set(key, socket);
  }
  return socket;
}

export { anySocket };

// ============ Input Socket ============

/**
 * An input socket is fed by exactly one of: nothing, a direct value, or an
 * ordered list of connections.
 */
export type InputState =
  | { kind: 'empty' }
  | { kind: 'value'; value: unknown }
  | { kind: 'connected'; connections: readonly Connection[] };

const EMPTY: InputState = { kind: 'empty' };

function stateFor(value: unknown): InputState {
  return value === undefined || value === null ? EMPTY : { kind: 'value', value };
}

export class InputSocket extends ClassicPreset.Input<ClassicPreset.Socket> {
  readonly name: string;
  readonly spec: SocketSpec;
  /** Owning node. Not owned by the socket. */
  readonly node: Node;
  private _state: InputState;

  constructor(name: string, spec: SocketSpec, node: Node) {
    super(getOrCreateSocket(spec), name, spec.variadic ?? false);
    this.name = name;
    this.spec = spec;
    this.node = node;
    this._state = stateFor(spec.default);
  }

  get state(): InputState {
    return this._state;
  }

  get value(): unknown {
    return this._state.kind === 'value' ? this._state.value : undefined;
  }

  get connections(): readonly Connection[] {
    return this._state.kind === 'connected' ? this._state.connections : [];
  }

  get isConnected(): boolean {
    return this._state.kind === 'connected';
  }

  get hasValue(): boolean {
    return this._state.kind === 'value';
  }

  get isVariadic(): boolean {
    return this.spec.variadic ?? false;
  }

  /**
   * Feed the socket a direct value. Existing connections are deleted from
   * both ends. `null` and `undefined` leave the socket empty.
   */
  setValue(value: unknown): void {
    const previous = this.connections;
    this._state = stateFor(value);
    for (const connection of previous) {
      connection.delete();
    }
  }

  /** @internal Called by Connection. Clears any direct value. */
  connect(connection: Connection): void {
    const current = this.connections;
    if (current.includes(connection)) return;
    this._state = { kind: 'connected', connections: [...current, connection] };
  }

  /** @internal Called by Connection.delete(). */
  disconnect(connection: Connection): void {
    if (this._state.kind !== 'connected') return;
    const remaining = this._state.connections.filter((c) => c !== connection);
    this._state = remaining.length > 0 ? { kind: 'connected', connections: remaining } : EMPTY;
  }

  /**
   * Connected sockets evaluate their sources: one connection yields its
   * value, several yield an ordered array. Otherwise the direct value.
   */
  resolve(): unknown {
    const state = this._state;
    if (state.kind === 'connected') {
      const values = state.connections.map((c) => c.resolve());
      return values.length === 1 ? values[0] : values;
    }
    return state.kind === 'value' ? state.value : undefined;
  }
}

// ============ Output Socket ============

export class OutputSocket extends ClassicPreset.Output<ClassicPreset.Socket> {
  readonly name: string;
  readonly spec: SocketSpec;
  /** Owning node. Not owned by the socket. */
  readonly node: Node;
  private _connections: Connection[] = [];

  constructor(name: string, spec: SocketSpec, node: Node) {
    super(getOrCreateSocket(spec), name);
    this.name = name;
    this.spec = spec;
    this.node = node;
  }

  get connections(): readonly Connection[] {
    return this._connections;
  }

  get requestCount(): number {
    return this._connections.length;
  }

  /** @internal Called by Connection. */
  connect(connection: Connection): void {
    if (!this._connections.includes(connection)) {
      this._connections.push(connection);
    }
  }

  /** @internal Called by Connection.delete(). */
  disconnect(connection: Connection): void {
    this._connections = this._connections.filter((c) => c !== connection);
  }
}
