// packages/lessof-runtime/memory.ts
// Readers that resolve one leaf location to a per-index accessor, once.

import { Kind } from "../lessof-type-spec/src/mod.ts";
import type { Location, PathSegment } from "./introspection.ts";
import type { Read } from "./leaves.ts";

export type IntKind =
  | Kind.INT8
  | Kind.INT16
  | Kind.INT32
  | Kind.UINT8
  | Kind.UINT16
  | Kind.UINT32;

/** Eight-byte integers, read as `bigint` so every value compares exactly. */
export type Int64Kind = Kind.INT | Kind.INT64 | Kind.UINT | Kind.UINT64;

function signed64(kind: Int64Kind): boolean {
  return kind === Kind.INT || kind === Kind.INT64;
}

export type FloatKind = Kind.FLOAT32 | Kind.FLOAT64;

/**
 * Element storage as seen by the comparator builder: a base, an element
 * size and typed reads at a location inside element `i`.
 */
export interface Memory {
  /** Current number of elements. */
  readonly length: number;
  /** Element size in bytes. */
  readonly size: number;
  bool(at: Location): Read<boolean>;
  int(kind: IntKind, at: Location): Read<number>;
  int64(kind: Int64Kind, at: Location): Read<bigint>;
  float(kind: FloatKind, at: Location): Read<number>;
  /** Undefined when the storage has no representation for strings. */
  string(at: Location): Read<string> | undefined;
  address(at: Location): Read<bigint>;
}

// ============================================================================
// Opaque identities
// ============================================================================

const identities = new WeakMap<object, bigint>();
let nextIdentity = 1n;

/**
 * Numeric identity of a reference-like value. Objects and functions are
 * numbered on first sight; nil is 0; numbers and bigints are raw addresses.
 */
export function identityOf(v: unknown): bigint {
  if (typeof v === "bigint") return BigInt.asUintN(64, v);
  if (typeof v === "number") {
    return Number.isInteger(v) ? BigInt.asUintN(64, BigInt(v)) : 0n;
  }
  if ((typeof v === "object" && v !== null) || typeof v === "function") {
    let id = identities.get(v);
    if (id === undefined) {
      id = nextIdentity++;
      identities.set(v, id);
    }
    return id;
  }
  return 0n;
}

// ============================================================================
// Object-backed elements
// ============================================================================

function field(v: unknown, key: PathSegment): unknown {
  if (typeof v === "object" && v !== null) {
    return Reflect.get(v, key);
  }
  return undefined;
}

function accessor(path: readonly PathSegment[]): (v: unknown) => unknown {
  return path.reduce<(v: unknown) => unknown>(
    (get, key) => (v) => field(get(v), key),
    (v) => v,
  );
}

function toNumber(v: unknown): number {
  if (typeof v === "number") return v;
  if (typeof v === "bigint") return Number(v);
  return 0;
}

function toBigInt(v: unknown): bigint {
  if (typeof v === "bigint") return v;
  if (typeof v === "number" && Number.isFinite(v)) return BigInt(Math.trunc(v));
  return 0n;
}

// Values are read as if stored into a field of the declared width.
const narrowInt: Record<IntKind, (v: number) => number> = {
  [Kind.INT8]: (v) => (v << 24) >> 24,
  [Kind.INT16]: (v) => (v << 16) >> 16,
  [Kind.INT32]: (v) => v | 0,
  [Kind.UINT8]: (v) => v & 0xff,
  [Kind.UINT16]: (v) => v & 0xffff,
  [Kind.UINT32]: (v) => v >>> 0,
};

/** Elements are JS values in a live array; leaves are property paths. */
export class ObjectMemory implements Memory {
  readonly size: number;
  private readonly items: readonly unknown[];

  constructor(items: readonly unknown[], size: number) {
    this.items = items;
    this.size = size;
  }

  get length(): number {
    return this.items.length;
  }

  private at(loc: Location): Read<unknown> {
    const items = this.items;
    const get = accessor(loc.path);
    return (i) => get(items[i]);
  }

  bool(loc: Location): Read<boolean> {
    const read = this.at(loc);
    return (i) => read(i) === true;
  }

  int(kind: IntKind, loc: Location): Read<number> {
    const read = this.at(loc);
    const narrow = narrowInt[kind];
    return (i) => narrow(toNumber(read(i)));
  }

  int64(kind: Int64Kind, loc: Location): Read<bigint> {
    const read = this.at(loc);
    return signed64(kind)
      ? (i) => BigInt.asIntN(64, toBigInt(read(i)))
      : (i) => BigInt.asUintN(64, toBigInt(read(i)));
  }

  float(kind: FloatKind, loc: Location): Read<number> {
    const read = this.at(loc);
    return kind === Kind.FLOAT32
      ? (i) => Math.fround(toNumber(read(i)))
      : (i) => toNumber(read(i));
  }

  string(loc: Location): Read<string> {
    const read = this.at(loc);
    return (i) => {
      const v = read(i);
      return typeof v === "string" ? v : "";
    };
  }

  address(loc: Location): Read<bigint> {
    const read = this.at(loc);
    return (i) => identityOf(read(i));
  }
}

// ============================================================================
// Packed elements
// ============================================================================

type PackedInt = (view: DataView, offset: number, le: boolean) => number;

const packedInt: Record<IntKind, PackedInt> = {
  [Kind.INT8]: (view, o) => view.getInt8(o),
  [Kind.INT16]: (view, o, le) => view.getInt16(o, le),
  [Kind.INT32]: (view, o, le) => view.getInt32(o, le),
  [Kind.UINT8]: (view, o) => view.getUint8(o),
  [Kind.UINT16]: (view, o, le) => view.getUint16(o, le),
  [Kind.UINT32]: (view, o, le) => view.getUint32(o, le),
};

/**
 * Fixed-size elements back to back in a byte buffer. A leaf of element `i`
 * lives at `i * size + offset`.
 */
export class PackedMemory implements Memory {
  readonly view: DataView;
  readonly size: number;
  readonly length: number;
  readonly littleEndian: boolean;

  constructor(
    view: DataView,
    size: number,
    length: number,
    littleEndian: boolean,
  ) {
    this.view = view;
    this.size = size;
    this.length = length;
    this.littleEndian = littleEndian;
  }

  bool(at: Location): Read<boolean> {
    const { view, size } = this;
    const off = at.offset;
    return (i) => view.getUint8(i * size + off) !== 0;
  }

  int(kind: IntKind, at: Location): Read<number> {
    const { view, size, littleEndian: le } = this;
    const off = at.offset;
    const get = packedInt[kind];
    return (i) => get(view, i * size + off, le);
  }

  int64(kind: Int64Kind, at: Location): Read<bigint> {
    const { view, size, littleEndian: le } = this;
    const off = at.offset;
    return signed64(kind)
      ? (i) => view.getBigInt64(i * size + off, le)
      : (i) => view.getBigUint64(i * size + off, le);
  }

  float(kind: FloatKind, at: Location): Read<number> {
    const { view, size, littleEndian: le } = this;
    const off = at.offset;
    return kind === Kind.FLOAT32
      ? (i) => view.getFloat32(i * size + off, le)
      : (i) => view.getFloat64(i * size + off, le);
  }

  string(): undefined {
    return undefined;
  }

  address(at: Location): Read<bigint> {
    const { view, size, littleEndian: le } = this;
    const off = at.offset;
    return (i) => view.getBigUint64(i * size + off, le);
  }
}
