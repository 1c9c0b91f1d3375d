// src/index.ts
// Main entry point for @graphloom/core

export const VERSION = '0.1.0';

// Errors
export {
  GraphError,
  ConstructionError,
  SocketReferenceError,
  RegistryLookupError,
  DecodeError,
  ArgumentError,
  EvaluationError,
} from './errors.js';

// Settings and logging
export {
  SettingsSchema,
  type Settings,
  type SettingsInput,
  type LoadSettingsOptions,
  loadSettings,
  getSettings,
  updateSettings,
  resetSettings,
} from './config.js';
export { getLogger, setLogger, resetLogger, type Logger } from './logger.js';

// Socket types
export type { SocketSpec, NodeInputs, NodeOutputs, ResolvedInputs, NodeOutputValues } from './ports.js';
export {
  TYPE_ALIASES,
  canonicalTypeName,
  registerType,
  isRegisteredType,
  getRegisteredTypes,
  resetRegisteredTypes,
  socket,
  type SocketOptions,
} from './type-registry.js';
export {
  getSocketKey,
  getOrCreateSocket,
  anySocket,
  InputSocket,
  OutputSocket,
  type InputState,
} from './sockets.js';

// Binary values and the value codec
export {
  DTYPES,
  type DType,
  type TypedArray,
  isDType,
  isTypedArray,
  dtypeOf,
  BinaryArray,
  BinaryTensor,
} from './binary.js';
export {
  VALUE_TYPES,
  EncodedValueSchema,
  type ValueType,
  type EncodedValue,
  type RawEncodedValue,
  type TupleElement,
  type TupleValue,
  encodeValue,
  decodeValue,
  decodeSocketValue,
} from './serialization.js';

// Nodes
export {
  Node,
  nodeTypeName,
  copyValue,
  type NodeDefinition,
  type NodeOptions,
  type NodeClassInfo,
  type NodeConstructor,
} from './node.js';
export { Connection } from './connection.js';
export {
  ExpressionNode,
  defineExpressionNode,
  toArgument,
  type ExpressionBuilder,
  type ExpressionNodeOptions,
  type ExpressionNodeConstructor,
} from './expression-node.js';

// Registry
export {
  type NodeRegistry,
  registerNode,
  registerNodes,
  hasNode,
  lookupNode,
  createNode,
  getNodeRegistry,
  setNodeRegistry,
  resetNodeRegistry,
  listNodes,
  searchNodes,
  describeNode,
  validateNodeDefinitions,
} from './registry.js';

// Graph records, traversal and persistence
export {
  type GraphRecord,
  type GraphNodeRecord,
  type GraphConnectionRecord,
  GraphRecordSchema,
  GraphNodeRecordSchema,
  GraphConnectionRecordSchema,
  edgeKey,
} from './graph.js';
export { collectGraph, findRoots, type CollectedGraph } from './traversal.js';
export {
  serializeGraph,
  deserializeGraph,
  toWire,
  fromWire,
  graphToJSON,
  graphFromJSON,
  type SerializeOptions,
  type DeserializeOptions,
  type DeserializedGraph,
  type SkippedItem,
  type JsonOptions,
} from './graph-codec.js';
export { validateGraph, hasCycles, type ValidationError, type ValidationResult } from './validator.js';

// Debugging and editor integration
export { formatValue, inspectGraph } from './inspect.js';
export { toEditor, type Schemes } from './editor.js';
