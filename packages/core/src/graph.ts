// src/graph.ts
// Wire schema for persisted graphs: flat node and connection records

import { z } from 'zod';

import type { EncodedValue, RawEncodedValue } from './serialization.js';

// ============ Core Types ============

export interface GraphNodeRecord {
  id: string;
  /** Registered node type name. */
  name: string;
  /** Encoded direct values of input sockets; connected sockets are absent. */
  data: Record<string, EncodedValue | RawEncodedValue>;
}

export interface GraphConnectionRecord {
  source: string;
  sourceOutput: string;
  target: string;
  targetInput: string;
}

export interface GraphRecord {
  nodes: GraphNodeRecord[];
  connections: GraphConnectionRecord[];
}

// ============ Schemas ============

/**
 * Values are checked loosely here; the value codec validates each one when
 * it is decoded.
 */
export const RawEncodedValueSchema = z
  .object({ type: z.string(), data: z.unknown().optional() })
  .passthrough();

export const GraphNodeRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  data: z.record(RawEncodedValueSchema).default({}),
});

export const GraphConnectionRecordSchema = z.object({
  source: z.string(),
  sourceOutput: z.string(),
  target: z.string(),
  targetInput: z.string(),
});

export const GraphRecordSchema = z.object({
  nodes: z.array(GraphNodeRecordSchema),
  connections: z.array(GraphConnectionRecordSchema).default([]),
});

// ============ Edge Helpers ============

export function edgeKey(edge: GraphConnectionRecord): string {
  return `${edge.source}.${edge.sourceOutput}->${edge.target}.${edge.targetInput}`;
}
