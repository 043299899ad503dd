// packages/lessof-runtime/builders.ts
// Programmatic element type builders

import { enc } from "../lessof-type-spec/src/mod.ts";
import { ArrayType, type Infer, StructType, Type } from "./type-object.ts";

export type Complex = { re: number; im: number };

/** Reference-like values compare by identity; numbers are raw addresses. */
export type Opaque = object | bigint | number | null | undefined;

/**
 * Fluent API for element types whose values are JS objects.
 *
 * @example
 * ```ts
 * const Row$ = t.struct({ s: t.string(), i: t.int() });
 * const rows = sliceOf(Row$, [{ s: "b", i: 1 }, { s: "a", i: 2 }]);
 * sortSlice(rows, Of(rows));
 * ```
 */
export const t = {
  bool(): Type<boolean> {
    return new Type(enc.bool());
  },

  /** Platform-width integers as JS numbers. */
  int(): Type<number> {
    return new Type(enc.int());
  },
  int8(): Type<number> {
    return new Type(enc.int8());
  },
  int16(): Type<number> {
    return new Type(enc.int16());
  },
  int32(): Type<number> {
    return new Type(enc.int32());
  },
  int64(): Type<bigint> {
    return new Type(enc.int64());
  },
  uint(): Type<number> {
    return new Type(enc.uint());
  },
  uint8(): Type<number> {
    return new Type(enc.uint8());
  },
  uint16(): Type<number> {
    return new Type(enc.uint16());
  },
  uint32(): Type<number> {
    return new Type(enc.uint32());
  },
  uint64(): Type<bigint> {
    return new Type(enc.uint64());
  },
  uintptr(): Type<Opaque> {
    return new Type(enc.uintptr());
  },

  float32(): Type<number> {
    return new Type(enc.f32());
  },
  float64(): Type<number> {
    return new Type(enc.f64());
  },
  complex64(): Type<Complex> {
    return new Type(enc.c64());
  },
  complex128(): Type<Complex> {
    return new Type(enc.c128());
  },

  string(): Type<string> {
    return new Type(enc.str());
  },

  chan(): Type<Opaque> {
    return new Type(enc.chan());
  },
  func(): Type<Opaque> {
    return new Type(enc.func());
  },
  map(): Type<Opaque> {
    return new Type(enc.map());
  },
  ptr(): Type<Opaque> {
    return new Type(enc.ptr());
  },
  unsafePointer(): Type<Opaque> {
    return new Type(enc.unsafePtr());
  },

  /**
   * Fixed-length array; values are JS arrays of `length` elements.
   *
   * @example
   * ```ts
   * const Triple$ = t.array(3, t.int());
   * ```
   */
  array<T>(length: number, element: Type<T>): ArrayType<T> {
    return new ArrayType(enc.arr(length, element.bc), length, element);
  },

  /**
   * Record type. Fields compare in key order; a field keyed `_` is a
   * placeholder and never compared.
   */
  struct<F extends Record<string, Type<unknown>>>(
    fields: F,
  ): StructType<{ [K in keyof F]: Infer<F[K]> }> {
    return new StructType(
      enc.struct(
        Object.entries(fields).map(([name, type]) => ({ name, type: type.bc })),
      ),
    );
  },

  named<T>(name: string, type: Type<T>): Type<T> {
    return new Type(enc.named(name, type.bc));
  },
};
