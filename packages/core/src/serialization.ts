// src/serialization.ts
// Tagged value codec: socket values <-> JSON-safe EncodedValue records

import { gunzipSync, gzipSync } from 'fflate';
import { z } from 'zod';

import { BinaryArray, BinaryTensor, bytesPerElement, elementCount, isDType, isTypedArray, type DType } from './binary.js';
import { getSettings } from './config.js';
import { ConstructionError, DecodeError } from './errors.js';
import { getLogger } from './logger.js';

// ============ Wire Types ============

export type TupleElement = number | string | boolean | null | TupleElement[];
export type TupleValue = TupleElement[];

export const VALUE_TYPES = [
  'none',
  'bool',
  'string',
  'tuple',
  'binary_tensor',
  'binary_array',
  'other',
] as const;

export type ValueType = (typeof VALUE_TYPES)[number];

const TupleElementSchema: z.ZodType<TupleElement> = z.lazy(() =>
  z.union([z.number(), z.string(), z.boolean(), z.null(), z.array(TupleElementSchema)])
);

const DTypeSchema = z.custom<DType>((v) => typeof v === 'string' && isDType(v), {
  message: 'unsupported dtype',
});

const ShapeSchema = z.array(z.number().int().nonnegative());

export const EncodedValueSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('none'), data: z.null().default(null) }),
  z.object({ type: z.literal('bool'), data: z.boolean() }),
  z.object({ type: z.literal('string'), data: z.string() }),
  z.object({ type: z.literal('tuple'), data: z.array(TupleElementSchema) }),
  z.object({
    type: z.literal('binary_array'),
    data: z.string(),
    shape: ShapeSchema,
    dtype: DTypeSchema,
  }),
  z.object({
    type: z.literal('binary_tensor'),
    data: z.string(),
    shape: ShapeSchema,
    dtype: DTypeSchema,
    device: z.string().optional(),
  }),
  z.object({ type: z.literal('other'), data: z.string() }),
]);

export type EncodedValue = z.output<typeof EncodedValueSchema>;

/** Any record claiming to be an EncodedValue, before validation. */
export interface RawEncodedValue {
  type: string;
  data?: unknown;
  [key: string]: unknown;
}

// ============ Helpers ============

const DEFLATE_LEVELS = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9] as const;
type DeflateLevel = (typeof DEFLATE_LEVELS)[number];

function deflateLevel(level: number): DeflateLevel {
  return DEFLATE_LEVELS[Math.min(9, Math.max(0, Math.round(level)))] ?? 6;
}

function isTupleElement(v: unknown): v is TupleElement {
  if (v === null || typeof v === 'string' || typeof v === 'boolean') return true;
  if (typeof v === 'number') return Number.isFinite(v);
  return Array.isArray(v) && v.every(isTupleElement);
}

/** First non-finite number anywhere in a nested list, if any. */
function findNonFinite(v: unknown): number | undefined {
  if (typeof v === 'number') return Number.isFinite(v) ? undefined : v;
  if (!Array.isArray(v)) return undefined;
  for (const element of v) {
    const found = findNonFinite(element);
    if (found !== undefined) return found;
  }
  return undefined;
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  if (typeof v !== 'object' || v === null) return false;
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

function renderOther(value: unknown): string {
  if (isPlainObject(value) || Array.isArray(value)) {
    try {
      const json = JSON.stringify(value);
      if (json !== undefined) return json;
    } catch (e) {
      getLogger('codec').debug({ err: e }, 'value is not JSON-serializable, using String()');
    }
  }
  return String(value);
}

function packBytes(bytes: Uint8Array): string {
  const compressed = gzipSync(bytes, { level: deflateLevel(getSettings().compressionLevel) });
  return Buffer.from(compressed).toString('base64');
}

function unpackBytes(encoded: string): Uint8Array {
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(encoded)) {
    throw new DecodeError('binary payload is not valid base64');
  }
  const compressed = new Uint8Array(Buffer.from(encoded, 'base64'));
  try {
    return gunzipSync(compressed);
  } catch (e) {
    throw new DecodeError('binary payload is not a valid gzip stream', { cause: e });
  }
}

function unpackArray(data: string, shape: number[], dtype: DType): BinaryArray {
  const bytes = unpackBytes(data);
  const expected = elementCount(shape) * bytesPerElement(dtype);
  if (bytes.byteLength !== expected) {
    throw new DecodeError(
      `payload has ${bytes.byteLength} bytes, shape [${shape.join(', ')}] of ${dtype} needs ${expected}`
    );
  }
  return BinaryArray.fromBytes(bytes, shape, dtype);
}

// ============ Encode / Decode ============

/**
 * Encode a socket value into its wire record.
 *
 * Numbers become 1-tuples so every numeric parameter shares the tuple shape.
 * Values with no dedicated tag fall back to `other`, which is lossy.
 */
export function encodeValue(value: unknown): EncodedValue {
  if (value === null || value === undefined) {
    return { type: 'none', data: null };
  }
  if (typeof value === 'boolean') {
    return { type: 'bool', data: value };
  }
  if (typeof value === 'string') {
    return { type: 'string', data: value };
  }
  const nonFinite = findNonFinite(value);
  if (nonFinite !== undefined) {
    throw new ConstructionError(`cannot encode non-finite number ${nonFinite}`);
  }
  if (typeof value === 'number') {
    return { type: 'tuple', data: [value] };
  }
  if (Array.isArray(value) && value.every(isTupleElement)) {
    return { type: 'tuple', data: [...value] };
  }
  if (value instanceof BinaryTensor) {
    return {
      type: 'binary_tensor',
      data: packBytes(value.toBytes()),
      shape: [...value.shape],
      dtype: value.dtype,
      device: value.device,
    };
  }
  if (value instanceof BinaryArray || isTypedArray(value)) {
    const array = value instanceof BinaryArray ? value : new BinaryArray(value);
    return {
      type: 'binary_array',
      data: packBytes(array.toBytes()),
      shape: [...array.shape],
      dtype: array.dtype,
    };
  }
  return { type: 'other', data: renderOther(value) };
}

/**
 * Decode a wire record back into a socket value.
 *
 * @throws DecodeError on an unknown tag, malformed fields, or binary metadata
 *   that does not match the payload
 */
export function decodeValue(record: RawEncodedValue | EncodedValue): unknown {
  if (!(VALUE_TYPES as readonly string[]).includes(record.type)) {
    throw new DecodeError(`Unknown value type '${record.type}'`);
  }

  const parsed = EncodedValueSchema.safeParse(record);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join('.') || 'record';
    throw new DecodeError(`Malformed '${record.type}' value at ${where}: ${issue?.message ?? 'invalid'}`, {
      cause: parsed.error,
    });
  }

  const value = parsed.data;
  switch (value.type) {
    case 'none':
      return null;
    case 'bool':
    case 'string':
      return value.data;
    case 'tuple':
      return [...value.data];
    case 'binary_array':
      return unpackArray(value.data, value.shape, value.dtype);
    case 'binary_tensor':
      return BinaryTensor.fromArray(
        unpackArray(value.data, value.shape, value.dtype),
        value.device ?? getSettings().defaultDevice
      );
    case 'other':
      try {
        return JSON.parse(value.data);
      } catch {
        return value.data;
      }
  }
}

/**
 * Decode a socket value read from a stored graph. A record that fails to
 * decode but carries list-shaped data is restored as that list (a tuple).
 */
export function decodeSocketValue(record: RawEncodedValue | EncodedValue): unknown {
  try {
    return decodeValue(record);
  } catch (e) {
    if (e instanceof DecodeError && Array.isArray(record.data)) {
      getLogger('codec').warn(
        { type: record.type, err: e.message },
        'falling back to tuple for undecodable list value'
      );
      return [...record.data];
    }
    throw e;
  }
}
