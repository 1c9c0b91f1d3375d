// src/ports.ts
// Socket declarations shared by node definitions, the registry and the codec

/**
 * Declaration of one socket on a node type.
 */
export interface SocketSpec {
  type: string;
  /** Initial direct value of an input socket. */
  default?: unknown;
  /** Collector input accepting fan-in as an ordered collection. */
  variadic?: boolean;
  /** Input the node can build without. */
  optional?: boolean;
}

export type NodeInputs = Record<string, SocketSpec>;
export type NodeOutputs = Record<string, SocketSpec>;

/** Values a node's builder receives, keyed by input name. Unset inputs are absent. */
export type ResolvedInputs = Record<string, unknown>;

/** Values a node's builder produces, keyed by output name. */
export type NodeOutputValues = Record<string, unknown>;
