// packages/lessof-runtime/type-object.ts
// Type objects: a descriptor plus the JS value shape it describes

import { type Kind, type TypeCode } from "../lessof-type-spec/src/mod.ts";
import {
  type FieldInfo,
  getFields,
  getKind,
  type LeafPath,
  layoutOf,
  leafPaths,
  typeString,
} from "./introspection.ts";

/**
 * Wraps a descriptor and carries the JS shape of its values as `T`, so
 * collections built from it are checked at compile time.
 */
export class Type<T = unknown> {
  /** Phantom: never set, only carries `T`. */
  declare readonly __value?: T;

  readonly bc: TypeCode;

  constructor(bytecode: TypeCode) {
    this.bc = bytecode;
  }

  get kind(): Kind {
    return getKind(this.bc);
  }

  /** Type string, e.g. `[3]int32` or `struct { S string; I int }`. */
  get name(): string {
    return typeString(this.bc);
  }

  get size(): number {
    return layoutOf(this.bc).size;
  }

  get align(): number {
    return layoutOf(this.bc).align;
  }

  /** Ordered comparison leaves; throws UnsupportedTypeError for open kinds. */
  leaves(): readonly LeafPath[] {
    return leafPaths(this.bc);
  }
}

export class ArrayType<T> extends Type<T[]> {
  readonly length: number;
  readonly element: Type<T>;

  constructor(bytecode: TypeCode, length: number, element: Type<T>) {
    super(bytecode);
    this.length = length;
    this.element = element;
  }
}

export class StructType<T> extends Type<T> {
  fields(): FieldInfo[] {
    return getFields(this.bc);
  }
}

export type Infer<X> = X extends Type<infer T> ? T : never;

/** Either form a collection's element type may be given in. */
export type TypeLike<T = unknown> = Type<T> | TypeCode;

export function toTypeCode(t: TypeLike): TypeCode {
  return t instanceof Type ? t.bc : t;
}
