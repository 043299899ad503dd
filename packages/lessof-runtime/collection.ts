// packages/lessof-runtime/collection.ts
// Sequence shapes the builder and the sort routines accept

import { enc, Kind, type TypeCode } from "../lessof-type-spec/src/mod.ts";
import { InvalidArgumentError, UnsupportedTypeError } from "./errors.ts";
import { leafPaths, sizeOf, typeString } from "./introspection.ts";
import { type Memory, ObjectMemory, PackedMemory } from "./memory.ts";
import { type TypeLike, toTypeCode, type Type } from "./type-object.ts";

/** A live JS array whose elements all have the described type. */
export class Slice<T = unknown> {
  readonly type: TypeCode;
  readonly items: T[];

  constructor(type: TypeCode, items: T[]) {
    this.type = type;
    this.items = items;
  }

  get length(): number {
    return this.items.length;
  }
}

export function sliceOf<T>(type: Type<T>, items: T[]): Slice<T>;
export function sliceOf(type: TypeCode, items: unknown[]): Slice;
export function sliceOf(type: TypeLike, items: unknown[]): Slice {
  return new Slice(toTypeCode(type), items);
}

export type PackedSliceOptions = {
  /** Element count; defaults to as many whole elements as fit. */
  length?: number;
  /** Byte order of multi-byte values (default: true). */
  littleEndian?: boolean;
};

/** Fixed-size elements laid out back to back in a byte buffer. */
export class PackedSlice {
  readonly type: TypeCode;
  readonly view: DataView;
  readonly length: number;
  readonly littleEndian: boolean;

  constructor(
    type: TypeCode,
    view: DataView,
    length: number,
    littleEndian: boolean,
  ) {
    this.type = type;
    this.view = view;
    this.length = length;
    this.littleEndian = littleEndian;
  }

  get size(): number {
    return sizeOf(this.type);
  }
}

/**
 * Lay a packed slice over `source`. Every leaf of the type must have a
 * fixed-width representation, so string fields are rejected.
 */
export function packedSliceOf(
  type: TypeLike,
  source: ArrayBufferLike | ArrayBufferView,
  options: PackedSliceOptions = {},
): PackedSlice {
  const bc = toTypeCode(type);
  const view = ArrayBuffer.isView(source)
    ? new DataView(source.buffer, source.byteOffset, source.byteLength)
    : new DataView(source);

  for (const leaf of leafPaths(bc)) {
    if (leaf.kind === Kind.STRING) {
      throw new UnsupportedTypeError(
        `packed storage cannot hold string field ${
          leaf.path.join(".") || "<element>"
        } of ${typeString(bc)}`,
        leaf.type,
      );
    }
  }

  const size = sizeOf(bc);
  const fits = size === 0 ? 0 : Math.floor(view.byteLength / size);
  const length = options.length ?? fits;
  if (!Number.isInteger(length) || length < 0 || (size > 0 && length > fits)) {
    throw new InvalidArgumentError(
      `packed slice of ${length} x ${size} bytes does not fit in ${view.byteLength} bytes`,
      source,
    );
  }
  return new PackedSlice(bc, view, length, options.littleEndian ?? true);
}

export type TypedArray =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array
  | BigInt64Array
  | BigUint64Array;

const HOST_LITTLE_ENDIAN = new Uint8Array(new Uint16Array([1]).buffer)[0] === 1;

export function isTypedArray(x: unknown): x is TypedArray {
  return ArrayBuffer.isView(x) && !(x instanceof DataView);
}

/** Element type of a typed array, from its constructor. */
export function typedArrayType(a: TypedArray): TypeCode {
  if (a instanceof Int8Array) return enc.int8();
  if (a instanceof Uint8Array || a instanceof Uint8ClampedArray) {
    return enc.uint8();
  }
  if (a instanceof Int16Array) return enc.int16();
  if (a instanceof Uint16Array) return enc.uint16();
  if (a instanceof Int32Array) return enc.int32();
  if (a instanceof Uint32Array) return enc.uint32();
  if (a instanceof Float32Array) return enc.f32();
  if (a instanceof Float64Array) return enc.f64();
  if (a instanceof BigInt64Array) return enc.int64();
  return enc.uint64();
}

export type Swap = (i: number, j: number) => void;

/** A collection resolved to its element type, storage and swapper. */
export type Sequence = {
  readonly type: TypeCode;
  readonly memory: Memory;
  readonly swap: Swap;
};

function swapItems(items: unknown[]): Swap {
  return (i, j) => {
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  };
}

function swapBytes(view: DataView, size: number): Swap {
  const bytes = new Uint8Array(view.buffer, view.byteOffset, view.byteLength);
  const scratch = new Uint8Array(size);
  return (i, j) => {
    const a = i * size;
    const b = j * size;
    scratch.set(bytes.subarray(a, a + size));
    bytes.copyWithin(a, b, b + size);
    bytes.set(scratch, b);
  };
}

function packedSequence(
  type: TypeCode,
  view: DataView,
  length: number,
  littleEndian: boolean,
): Sequence {
  const size = sizeOf(type);
  return {
    type,
    memory: new PackedMemory(view, size, length, littleEndian),
    swap: swapBytes(view, size),
  };
}

/**
 * Resolve any accepted collection. Plain arrays carry no element type and
 * resolve to an interface element.
 */
export function sequenceOf(collection: unknown): Sequence {
  if (collection instanceof Slice) {
    return {
      type: collection.type,
      memory: new ObjectMemory(collection.items, sizeOf(collection.type)),
      swap: swapItems(collection.items),
    };
  }
  if (collection instanceof PackedSlice) {
    return packedSequence(
      collection.type,
      collection.view,
      collection.length,
      collection.littleEndian,
    );
  }
  if (isTypedArray(collection)) {
    return packedSequence(
      typedArrayType(collection),
      new DataView(
        collection.buffer,
        collection.byteOffset,
        collection.byteLength,
      ),
      collection.length,
      HOST_LITTLE_ENDIAN,
    );
  }
  if (Array.isArray(collection)) {
    const type = enc.iface();
    return {
      type,
      memory: new ObjectMemory(collection, sizeOf(type)),
      swap: swapItems(collection),
    };
  }
  throw new InvalidArgumentError(
    `argument is not a sequence: ${describe(collection)}`,
    collection,
  );
}

function describe(x: unknown): string {
  if (x === null) return "null";
  if (typeof x === "object") return x.constructor?.name ?? "object";
  return typeof x;
}
