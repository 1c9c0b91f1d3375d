// src/errors.ts
// Error classes raised by graph construction, evaluation and the wire codec

export class GraphError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GraphError';
  }
}

/**
 * Socket setup failed while constructing a node, or a value could not be
 * placed on the wire.
 */
export class ConstructionError extends GraphError {
  readonly nodeType: string | undefined;
  readonly socket: string | undefined;

  constructor(
    message: string,
    details: { nodeType?: string; socket?: string; cause?: unknown } = {}
  ) {
    const where = [details.nodeType, details.socket].filter(Boolean).join('.');
    super(where ? `${where}: ${message}` : message, { cause: details.cause });
    this.name = 'ConstructionError';
    this.nodeType = details.nodeType;
    this.socket = details.socket;
  }
}

/**
 * A connection or lookup named a socket that does not exist on the node.
 */
export class SocketReferenceError extends GraphError {
  readonly nodeId: string;
  readonly nodeType: string;
  readonly socket: string;
  readonly direction: 'input' | 'output';

  constructor(nodeType: string, nodeId: string, direction: 'input' | 'output', socket: string) {
    super(`Node ${nodeType}(${nodeId}) has no ${direction} socket '${socket}'`);
    this.name = 'SocketReferenceError';
    this.nodeType = nodeType;
    this.nodeId = nodeId;
    this.direction = direction;
    this.socket = socket;
  }
}

export class RegistryLookupError extends GraphError {
  readonly typeName: string;

  constructor(typeName: string) {
    super(`Node type '${typeName}' is not registered`);
    this.name = 'RegistryLookupError';
    this.typeName = typeName;
  }
}

export class DecodeError extends GraphError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecodeError';
  }
}

/**
 * Raised by expression builders to point at the parameter they rejected.
 */
export class ArgumentError extends GraphError {
  readonly parameter: string;

  constructor(parameter: string, message: string) {
    super(`Invalid argument '${parameter}': ${message}`);
    this.name = 'ArgumentError';
    this.parameter = parameter;
  }
}

export class EvaluationError extends GraphError {
  readonly nodeType: string;
  readonly nodeId: string;
  readonly parameter: string | undefined;

  constructor(
    nodeType: string,
    nodeId: string,
    message: string,
    details: { parameter?: string; cause?: unknown } = {}
  ) {
    const param = details.parameter ? ` [${details.parameter}]` : '';
    super(`Node ${nodeType}(${nodeId})${param}: ${message}`, { cause: details.cause });
    this.name = 'EvaluationError';
    this.nodeType = nodeType;
    this.nodeId = nodeId;
    this.parameter = details.parameter;
  }
}
