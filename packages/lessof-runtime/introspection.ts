// packages/lessof-runtime/introspection.ts
// Layout, rendering and leaf flattening over element type descriptors

import {
  BLANK_FIELD,
  Kind,
  type ScalarKind,
  type TypeCode,
} from "../lessof-type-spec/src/mod.ts";
import { UnsupportedTypeError } from "./errors.ts";

export const MAX_DEPTH = 100;

export type PathSegment = string | number;

/** Where a value sits inside one element: byte offsets and property keys. */
export type Location = {
  readonly offset: number;
  readonly offsets: readonly number[];
  readonly path: readonly PathSegment[];
};

export const ROOT: Location = { offset: 0, offsets: [], path: [] };

export function descend(
  at: Location,
  offset: number,
  key: PathSegment,
): Location {
  return {
    offset: at.offset + offset,
    offsets: [...at.offsets, offset],
    path: [...at.path, key],
  };
}

export type LeafPath = Location & {
  readonly kind: ScalarKind;
  readonly type: TypeCode;
};

export type Layout = { readonly size: number; readonly align: number };

export type FieldInfo = {
  readonly name: string;
  readonly type: TypeCode;
  readonly offset: number;
  readonly blank: boolean;
};

const KIND_NAMES: Record<Kind, string> = {
  [Kind.BOOL]: "bool",
  [Kind.INT]: "int",
  [Kind.INT8]: "int8",
  [Kind.INT16]: "int16",
  [Kind.INT32]: "int32",
  [Kind.INT64]: "int64",
  [Kind.UINT]: "uint",
  [Kind.UINT8]: "uint8",
  [Kind.UINT16]: "uint16",
  [Kind.UINT32]: "uint32",
  [Kind.UINT64]: "uint64",
  [Kind.UINTPTR]: "uintptr",
  [Kind.FLOAT32]: "float32",
  [Kind.FLOAT64]: "float64",
  [Kind.COMPLEX64]: "complex64",
  [Kind.COMPLEX128]: "complex128",
  [Kind.STRING]: "string",
  [Kind.CHAN]: "chan",
  [Kind.FUNC]: "func",
  [Kind.MAP]: "map",
  [Kind.PTR]: "ptr",
  [Kind.UNSAFE_POINTER]: "unsafe.Pointer",
  [Kind.ARRAY]: "array",
  [Kind.STRUCT]: "struct",
  [Kind.FIELD]: "field",
  [Kind.NAMED]: "named",
  [Kind.INTERFACE]: "interface",
  [Kind.SLICE]: "slice",
};

const SCALAR_LAYOUTS: Record<ScalarKind, Layout> = {
  [Kind.BOOL]: { size: 1, align: 1 },
  [Kind.INT]: { size: 8, align: 8 },
  [Kind.INT8]: { size: 1, align: 1 },
  [Kind.INT16]: { size: 2, align: 2 },
  [Kind.INT32]: { size: 4, align: 4 },
  [Kind.INT64]: { size: 8, align: 8 },
  [Kind.UINT]: { size: 8, align: 8 },
  [Kind.UINT8]: { size: 1, align: 1 },
  [Kind.UINT16]: { size: 2, align: 2 },
  [Kind.UINT32]: { size: 4, align: 4 },
  [Kind.UINT64]: { size: 8, align: 8 },
  [Kind.UINTPTR]: { size: 8, align: 8 },
  [Kind.FLOAT32]: { size: 4, align: 4 },
  [Kind.FLOAT64]: { size: 8, align: 8 },
  [Kind.COMPLEX64]: { size: 8, align: 4 },
  [Kind.COMPLEX128]: { size: 16, align: 8 },
  [Kind.STRING]: { size: 16, align: 8 },
  [Kind.CHAN]: { size: 8, align: 8 },
  [Kind.FUNC]: { size: 8, align: 8 },
  [Kind.MAP]: { size: 8, align: 8 },
  [Kind.PTR]: { size: 8, align: 8 },
  [Kind.UNSAFE_POINTER]: { size: 8, align: 8 },
};

export function kindName(kind: Kind): string {
  return KIND_NAMES[kind] ?? `kind(${kind})`;
}

/** Strip NAMED wrappers. */
export function unwrapNamed(t: TypeCode): TypeCode {
  let cur = t;
  while (cur[0] === Kind.NAMED) {
    cur = cur[2];
  }
  return cur;
}

/** Kind of the underlying type (NAMED is transparent). */
export function getKind(t: TypeCode): Kind {
  return unwrapNamed(t)[0];
}

export function typeString(t: TypeCode): string {
  switch (t[0]) {
    case Kind.NAMED:
      return t[1];
    case Kind.ARRAY:
      return `[${t[1]}]${typeString(t[2])}`;
    case Kind.SLICE:
      return `[]${typeString(t[1])}`;
    case Kind.INTERFACE:
      return "interface {}";
    case Kind.STRUCT:
      return t[1].length === 0
        ? "struct {}"
        : `struct { ${
          t[1].map(([, name, type]) => `${name} ${typeString(type)}`).join("; ")
        } }`;
    case Kind.FUNC:
      return "func()";
    case Kind.PTR:
      return "*";
    default:
      return kindName(t[0]);
  }
}

export function unsortable(t: TypeCode): UnsupportedTypeError {
  return new UnsupportedTypeError(
    `un-sortable type ${typeString(t)} (kind ${kindName(getKind(t))})`,
    t,
  );
}

function alignUp(n: number, align: number): number {
  return Math.ceil(n / align) * align;
}

const layoutCache = new WeakMap<TypeCode, Layout>();

export function layoutOf(t: TypeCode): Layout {
  return layoutAt(t, 0);
}

function tooDeep(t: TypeCode): UnsupportedTypeError {
  return new UnsupportedTypeError(
    `type nesting exceeds ${MAX_DEPTH} levels`,
    t,
  );
}

function layoutAt(t: TypeCode, depth: number): Layout {
  const cached = layoutCache.get(t);
  if (cached) return cached;
  if (depth > MAX_DEPTH) throw tooDeep(t);

  let layout: Layout;
  switch (t[0]) {
    case Kind.NAMED:
      layout = layoutAt(t[2], depth + 1);
      break;
    case Kind.ARRAY: {
      const elem = layoutAt(t[2], depth + 1);
      layout = { size: elem.size * t[1], align: elem.align };
      break;
    }
    case Kind.STRUCT: {
      let size = 0;
      let align = 1;
      for (const [, , type] of t[1]) {
        const f = layoutAt(type, depth + 1);
        size = alignUp(size, f.align) + f.size;
        align = Math.max(align, f.align);
      }
      layout = { size: alignUp(size, align), align };
      break;
    }
    case Kind.INTERFACE:
      layout = { size: 16, align: 8 };
      break;
    case Kind.SLICE:
      layout = { size: 24, align: 8 };
      break;
    default:
      layout = SCALAR_LAYOUTS[t[0]];
      if (!layout) throw unsortable(t);
  }
  layoutCache.set(t, layout);
  return layout;
}

export function sizeOf(t: TypeCode): number {
  return layoutOf(t).size;
}

export function alignOf(t: TypeCode): number {
  return layoutOf(t).align;
}

/** Fields of a struct type with their byte offsets, in declaration order. */
export function getFields(t: TypeCode): FieldInfo[] {
  const st = unwrapNamed(t);
  if (st[0] !== Kind.STRUCT) return [];
  let offset = 0;
  return st[1].map(([, name, type]) => {
    offset = alignUp(offset, alignOf(type));
    const field = { name, type, offset, blank: name === BLANK_FIELD };
    offset += sizeOf(type);
    return field;
  });
}

const leafCache = new WeakMap<TypeCode, readonly LeafPath[]>();

/**
 * Flatten a type into the ordered leaves a comparator chain visits:
 * array elements by index, struct fields in declaration order, blank
 * fields skipped.
 */
export function leafPaths(t: TypeCode): readonly LeafPath[] {
  const cached = leafCache.get(t);
  if (cached) return cached;
  const out: LeafPath[] = [];
  collectLeaves(t, ROOT, out, 0);
  leafCache.set(t, out);
  return out;
}

function collectLeaves(
  t: TypeCode,
  at: Location,
  out: LeafPath[],
  depth: number,
): void {
  if (depth > MAX_DEPTH) throw tooDeep(t);
  switch (t[0]) {
    case Kind.NAMED:
      collectLeaves(t[2], at, out, depth + 1);
      return;
    case Kind.ARRAY: {
      const width = sizeOf(t[2]);
      for (let i = 0; i < t[1]; i++) {
        collectLeaves(t[2], descend(at, width * i, i), out, depth + 1);
      }
      return;
    }
    case Kind.STRUCT:
      for (const f of getFields(t)) {
        if (f.blank) continue;
        collectLeaves(f.type, descend(at, f.offset, f.name), out, depth + 1);
      }
      return;
    case Kind.INTERFACE:
    case Kind.SLICE:
      throw unsortable(t);
    default:
      if (!(t[0] in SCALAR_LAYOUTS)) throw unsortable(t);
      out.push({ ...at, kind: t[0], type: t });
  }
}
