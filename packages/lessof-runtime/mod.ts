// packages/lessof-runtime/mod.ts
// Builds less(i, j) predicates for sorting collections by element type
import { Kind, type ScalarKind, type TypeCode } from "../lessof-type-spec/src/mod.ts";
import { match, P } from "ts-pattern";
import { sequenceOf } from "./collection.ts";
import { UnsupportedTypeError } from "./errors.ts";
import {
  descend,
  getFields,
  type LeafPath,
  leafPaths,
  type Location,
  MAX_DEPTH,
  ROOT,
  sizeOf,
  typeString,
  unsortable,
} from "./introspection.ts";
import {
  type Less,
  lessBool,
  lessComplex,
  lessFloat,
  lessOrdered,
  lessString,
} from "./leaves.ts";
import type { Memory } from "./memory.ts";

export type { Less, Read } from "./leaves.ts";
export { lessBool, lessComplex, lessFloat, lessOrdered, lessString } from "./leaves.ts";

export {
  InvalidArgumentError,
  LessOfError,
  UnsupportedTypeError,
} from "./errors.ts";

export type {
  FieldInfo,
  LeafPath,
  Layout,
  Location,
  PathSegment,
} from "./introspection.ts";
export {
  alignOf,
  descend,
  getFields,
  getKind,
  kindName,
  layoutOf,
  leafPaths,
  MAX_DEPTH,
  ROOT,
  sizeOf,
  typeString,
  unwrapNamed,
} from "./introspection.ts";

export type { FloatKind, Int64Kind, IntKind, Memory } from "./memory.ts";
export { identityOf, ObjectMemory, PackedMemory } from "./memory.ts";

export type {
  PackedSliceOptions,
  Sequence,
  Swap,
  TypedArray,
} from "./collection.ts";
export {
  isTypedArray,
  PackedSlice,
  packedSliceOf,
  sequenceOf,
  Slice,
  sliceOf,
  typedArrayType,
} from "./collection.ts";

export type { Infer, TypeLike } from "./type-object.ts";
export { ArrayType, StructType, toTypeCode, Type } from "./type-object.ts";
export type { Complex, Opaque } from "./builders.ts";
export { t } from "./builders.ts";

export { sliceIsSorted, sortSlice, sortSliceStable } from "./sort.ts";

export { enc, Kind } from "../lessof-type-spec/src/mod.ts";
export type { FieldCode, ScalarKind, TypeCode } from "../lessof-type-spec/src/mod.ts";

// ============================================================================
// Builder
// ============================================================================

/**
 * Returned for empty collections and for element types with nothing to
 * compare. A sort never calls it on an empty input; when it is called every
 * pair is equal.
 */
export const NO_COMPARE: Less = () => false;

export type BuildInfo = {
  readonly type: TypeCode;
  readonly length: number;
  readonly leaves: readonly LeafPath[];
};

export type OfOptions = {
  /** Called once after a predicate has been built. */
  onBuild?: (info: BuildInfo) => void;
};

/**
 * Returns a less function for `collection`, suitable for sortSlice.
 *
 * The ordering rules are more general than JS's `<`:
 *
 *  - bool compares false before true
 *  - integers, floats and strings order by value; strings by UTF-8 bytes
 *  - NaN compares less than non-NaN floats
 *  - complex compares real, then imag
 *  - chan, func, map, pointers and raw addresses compare by identity
 *  - structs compare each non-blank field in turn
 *  - arrays compare each element in turn
 *
 * @throws InvalidArgumentError if `collection` is not a sequence
 * @throws UnsupportedTypeError if the element type reaches an interface,
 *   a slice, or a kind its storage cannot hold
 *
 * @example
 * ```ts
 * const xs = new Int32Array([2, 4, 1, 3]);
 * sortSlice(xs, Of(xs)); // Int32Array [1, 2, 3, 4]
 * ```
 */
export function Of(collection: unknown, options: OfOptions = {}): Less {
  const { type, memory } = sequenceOf(collection);
  if (memory.length === 0) {
    return NO_COMPARE; // won't be called
  }
  const less = resolve(memory, ROOT, type) ?? NO_COMPARE;

  if (options.onBuild) {
    const info: BuildInfo = {
      type,
      length: memory.length,
      leaves: leafPaths(type),
    };
    try {
      options.onBuild(info);
    } catch (err) {
      console.error("lessof: onBuild hook error:", err);
    }
  }
  return less;
}

/**
 * Compile `type`, located at `at` inside each element of `memory`, into a
 * comparator that defers to `optEq` when its values are equal. Returns
 * `optEq` itself when the type has no leaves.
 */
export function resolve(
  memory: Memory,
  at: Location,
  type: TypeCode,
  optEq?: Less,
  depth = 0,
): Less | undefined {
  if (depth > MAX_DEPTH) {
    throw new UnsupportedTypeError(
      `type nesting exceeds ${MAX_DEPTH} levels`,
      type,
    );
  }
  switch (type[0]) {
    case Kind.NAMED:
      return resolve(memory, at, type[2], optEq, depth + 1);
    case Kind.ARRAY: {
      const [, len, elem] = type;
      const width = sizeOf(elem);
      let ret = optEq;
      for (let i = len - 1; i >= 0; i--) {
        ret = resolve(memory, descend(at, width * i, i), elem, ret, depth + 1);
      }
      return ret;
    }
    case Kind.STRUCT: {
      // Walk fields from the back, building the tie-breaker chain in reverse.
      const fields = getFields(type);
      let ret = optEq;
      for (let i = fields.length - 1; i >= 0; i--) {
        const f = fields[i];
        if (f.blank) continue;
        ret = resolve(memory, descend(at, f.offset, f.name), f.type, ret, depth + 1);
      }
      return ret;
    }
    case Kind.INTERFACE:
    case Kind.SLICE:
      throw unsortable(type);
    default:
      return leafLess(memory, at, type, optEq);
  }
}

function leafLess(
  memory: Memory,
  at: Location,
  type: readonly [ScalarKind],
  optEq: Less | undefined,
): Less {
  return match<ScalarKind, Less>(type[0])
    .with(Kind.BOOL, () => lessBool(memory.bool(at), optEq))
    .with(
      P.union(
        Kind.INT8,
        Kind.INT16,
        Kind.INT32,
        Kind.UINT8,
        Kind.UINT16,
        Kind.UINT32,
      ),
      (kind) => lessOrdered(memory.int(kind, at), optEq),
    )
    .with(
      P.union(Kind.INT, Kind.INT64, Kind.UINT, Kind.UINT64),
      (kind) => lessOrdered(memory.int64(kind, at), optEq),
    )
    .with(
      P.union(Kind.FLOAT32, Kind.FLOAT64),
      (kind) => lessFloat(memory.float(kind, at), optEq),
    )
    .with(Kind.COMPLEX64, () =>
      lessComplex(
        memory.float(Kind.FLOAT32, descend(at, 0, "re")),
        memory.float(Kind.FLOAT32, descend(at, 4, "im")),
        optEq,
      ))
    .with(Kind.COMPLEX128, () =>
      lessComplex(
        memory.float(Kind.FLOAT64, descend(at, 0, "re")),
        memory.float(Kind.FLOAT64, descend(at, 8, "im")),
        optEq,
      ))
    .with(Kind.STRING, () => {
      const read = memory.string(at);
      if (!read) {
        throw new UnsupportedTypeError(
          `storage cannot hold ${typeString(type)} values`,
          type,
        );
      }
      return lessString(read, optEq);
    })
    .with(
      P.union(
        Kind.CHAN,
        Kind.FUNC,
        Kind.MAP,
        Kind.PTR,
        Kind.UNSAFE_POINTER,
        Kind.UINTPTR,
      ),
      () => lessOrdered(memory.address(at), optEq),
    )
    .otherwise(() => {
      throw unsortable(type);
    });
}
