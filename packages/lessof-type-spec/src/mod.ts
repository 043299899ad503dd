// packages/lessof-type-spec/src/mod.ts
// Element type descriptors as nested tuples, one Kind tag per level.
export enum Kind {
  // scalars
  BOOL,
  INT,
  INT8,
  INT16,
  INT32,
  INT64,
  UINT,
  UINT8,
  UINT16,
  UINT32,
  UINT64,
  UINTPTR,
  FLOAT32,
  FLOAT64,
  COMPLEX64,
  COMPLEX128,
  STRING,
  // opaque reference-like values, ordered by identity
  CHAN,
  FUNC,
  MAP,
  PTR,
  UNSAFE_POINTER,
  // composites
  ARRAY,
  STRUCT,
  FIELD,
  NAMED,
  // representable but never orderable
  INTERFACE,
  SLICE,
}

export type ScalarKind =
  | Kind.BOOL
  | Kind.INT
  | Kind.INT8
  | Kind.INT16
  | Kind.INT32
  | Kind.INT64
  | Kind.UINT
  | Kind.UINT8
  | Kind.UINT16
  | Kind.UINT32
  | Kind.UINT64
  | Kind.UINTPTR
  | Kind.FLOAT32
  | Kind.FLOAT64
  | Kind.COMPLEX64
  | Kind.COMPLEX128
  | Kind.STRING
  | Kind.CHAN
  | Kind.FUNC
  | Kind.MAP
  | Kind.PTR
  | Kind.UNSAFE_POINTER;

export type FieldCode = readonly [Kind.FIELD, string, TypeCode];

export type TypeCode =
  | readonly [ScalarKind]
  | readonly [Kind.ARRAY, number, TypeCode]
  | readonly [Kind.STRUCT, readonly FieldCode[]]
  | readonly [Kind.NAMED, string, TypeCode]
  | readonly [Kind.INTERFACE]
  | readonly [Kind.SLICE, TypeCode];

// Struct fields with this name are placeholders and never compared.
export const BLANK_FIELD = "_";

export const enc = {
  bool: (): TypeCode => [Kind.BOOL],
  int: (): TypeCode => [Kind.INT],
  int8: (): TypeCode => [Kind.INT8],
  int16: (): TypeCode => [Kind.INT16],
  int32: (): TypeCode => [Kind.INT32],
  int64: (): TypeCode => [Kind.INT64],
  uint: (): TypeCode => [Kind.UINT],
  uint8: (): TypeCode => [Kind.UINT8],
  uint16: (): TypeCode => [Kind.UINT16],
  uint32: (): TypeCode => [Kind.UINT32],
  uint64: (): TypeCode => [Kind.UINT64],
  uintptr: (): TypeCode => [Kind.UINTPTR],
  f32: (): TypeCode => [Kind.FLOAT32],
  f64: (): TypeCode => [Kind.FLOAT64],
  c64: (): TypeCode => [Kind.COMPLEX64],
  c128: (): TypeCode => [Kind.COMPLEX128],
  str: (): TypeCode => [Kind.STRING],
  chan: (): TypeCode => [Kind.CHAN],
  func: (): TypeCode => [Kind.FUNC],
  map: (): TypeCode => [Kind.MAP],
  ptr: (): TypeCode => [Kind.PTR],
  unsafePtr: (): TypeCode => [Kind.UNSAFE_POINTER],
  iface: (): TypeCode => [Kind.INTERFACE],

  // Nested payload
  arr: (len: number, t: TypeCode): TypeCode => [Kind.ARRAY, len, t],
  slice: (t: TypeCode): TypeCode => [Kind.SLICE, t],
  struct: (
    fields: { name: string; type: TypeCode }[],
  ): TypeCode => [
    Kind.STRUCT,
    fields.map((f): FieldCode => [Kind.FIELD, f.name, f.type]),
  ],
  named: (name: string, t: TypeCode): TypeCode => [Kind.NAMED, name, t],
};
