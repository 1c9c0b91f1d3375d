// src/binary.ts
// Shaped binary buffers carried on sockets (arrays and device-tagged tensors)

export type TypedArray =
  | Float32Array
  | Float64Array
  | Int8Array
  | Int16Array
  | Int32Array
  | BigInt64Array
  | Uint8Array
  | Uint16Array
  | Uint32Array
  | BigUint64Array;

type TypedArrayConstructor = {
  new (buffer: ArrayBuffer, byteOffset?: number, length?: number): TypedArray;
  readonly BYTES_PER_ELEMENT: number;
};

export const DTYPES = {
  float32: Float32Array,
  float64: Float64Array,
  int8: Int8Array,
  int16: Int16Array,
  int32: Int32Array,
  int64: BigInt64Array,
  uint8: Uint8Array,
  uint16: Uint16Array,
  uint32: Uint32Array,
  uint64: BigUint64Array,
  bool: Uint8Array,
} as const satisfies Record<string, TypedArrayConstructor>;

export type DType = keyof typeof DTYPES;

export function isDType(value: string): value is DType {
  return Object.prototype.hasOwnProperty.call(DTYPES, value);
}

export function isTypedArray(value: unknown): value is TypedArray {
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

/**
 * Element type tag for a typed array. Uint8Array maps to `uint8`; use an
 * explicit `bool` dtype on a BinaryArray for boolean masks.
 */
export function dtypeOf(data: TypedArray): DType {
  if (data instanceof Float32Array) return 'float32';
  if (data instanceof Float64Array) return 'float64';
  if (data instanceof Int8Array) return 'int8';
  if (data instanceof Int16Array) return 'int16';
  if (data instanceof Int32Array) return 'int32';
  if (data instanceof BigInt64Array) return 'int64';
  if (data instanceof Uint16Array) return 'uint16';
  if (data instanceof Uint32Array) return 'uint32';
  if (data instanceof BigUint64Array) return 'uint64';
  return 'uint8';
}

export function bytesPerElement(dtype: DType): number {
  return DTYPES[dtype].BYTES_PER_ELEMENT;
}

export function elementCount(shape: readonly number[]): number {
  return shape.reduce((acc, dim) => acc * dim, 1);
}

/**
 * Dense row-major buffer with an explicit shape and element type.
 */
export class BinaryArray {
  readonly data: TypedArray;
  readonly shape: readonly number[];
  readonly dtype: DType;

  constructor(data: TypedArray, shape?: readonly number[], dtype?: DType) {
    const resolvedShape = shape ?? [data.length];
    if (resolvedShape.some((d) => !Number.isInteger(d) || d < 0)) {
      throw new RangeError(`Invalid shape [${resolvedShape.join(', ')}]`);
    }
    if (elementCount(resolvedShape) !== data.length) {
      throw new RangeError(
        `Shape [${resolvedShape.join(', ')}] does not match ${data.length} elements`
      );
    }
    if (dtype !== undefined && !(data instanceof DTYPES[dtype])) {
      throw new RangeError(`dtype ${dtype} does not match ${data.constructor.name} data`);
    }
    this.data = data;
    this.shape = [...resolvedShape];
    this.dtype = dtype ?? dtypeOf(data);
  }

  /** Little-endian view of the element bytes. */
  toBytes(): Uint8Array {
    return new Uint8Array(this.data.buffer, this.data.byteOffset, this.data.byteLength);
  }

  /**
   * Rebuild an array from raw bytes, copying into a fresh, aligned buffer.
   */
  static fromBytes(bytes: Uint8Array, shape: readonly number[], dtype: DType): BinaryArray {
    const Ctor: TypedArrayConstructor = DTYPES[dtype];
    const copy = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(copy).set(bytes);
    return new BinaryArray(new Ctor(copy), shape, dtype);
  }
}

/**
 * A BinaryArray tagged with the device it was produced on. The tag is
 * informational; data always lives in host memory.
 */
export class BinaryTensor extends BinaryArray {
  readonly device: string;

  constructor(data: TypedArray, shape?: readonly number[], dtype?: DType, device = 'cpu') {
    super(data, shape, dtype);
    this.device = device;
  }

  static fromArray(array: BinaryArray, device: string): BinaryTensor {
    return new BinaryTensor(array.data, array.shape, array.dtype, device);
  }
}
