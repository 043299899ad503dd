// packages/lessof-runtime/mod.test.ts
import { expect, test, vi } from "vitest";
import { enc, type TypeCode } from "../lessof-type-spec/src/mod.ts";
import {
  type BuildInfo,
  InvalidArgumentError,
  NO_COMPARE,
  Of,
  packedSliceOf,
  sliceOf,
  sortSlice,
  t,
  UnsupportedTypeError,
} from "./mod.ts";

const StringInt = enc.struct([
  { name: "S", type: enc.str() },
  { name: "I", type: enc.int() },
]);

const Blank = enc.struct([
  { name: "A", type: enc.int32() },
  { name: "_", type: enc.int32() },
  { name: "B", type: enc.int32() },
]);

function sorted(type: TypeCode, items: unknown[]): unknown[] {
  const s = sliceOf(type, items);
  sortSlice(s, Of(s));
  return s.items;
}

// Rows of int32 fields, little-endian.
function packInt32(rows: number[][]): DataView {
  const width = rows[0].length * 4;
  const view = new DataView(new ArrayBuffer(rows.length * width));
  rows.forEach((row, r) => {
    row.forEach((v, c) => view.setInt32(r * width + c * 4, v, true));
  });
  return view;
}

test("Of: int", () => {
  expect(sorted(enc.int(), [2, 4, 1, 3, 0, -1, 5])).toEqual([
    -1, 0, 1, 2, 3, 4, 5,
  ]);
});

test("Of: string", () => {
  expect(sorted(enc.str(), ["foo", "quux", "baz", "bar"])).toEqual([
    "bar", "baz", "foo", "quux",
  ]);
});

test("Of: struct compares fields in declaration order", () => {
  const items = [
    { S: "a", I: 2 },
    { S: "b", I: 2 },
    { S: "b", I: 1 },
    { S: "a", I: 1 },
  ];
  expect(sorted(StringInt, items)).toEqual([
    { S: "a", I: 1 },
    { S: "a", I: 2 },
    { S: "b", I: 1 },
    { S: "b", I: 2 },
  ]);
});

test("Of: equal first field is decided by the second", () => {
  const Pair = enc.struct([
    { name: "a", type: enc.str() },
    { name: "b", type: enc.int() },
  ]);
  expect(sorted(Pair, [{ a: "x", b: 2 }, { a: "x", b: 1 }])).toEqual([
    { a: "x", b: 1 },
    { a: "x", b: 2 },
  ]);
});

test("Of: bool", () => {
  expect(sorted(enc.bool(), [false, true, false, false, true])).toEqual([
    false, false, false, true, true,
  ]);
});

test("Of: complex64 and complex128", () => {
  for (const type of [enc.c64(), enc.c128()]) {
    const items = [
      { re: 1, im: 2 },
      { re: 2, im: 1 },
      { re: 1, im: 1 },
      { re: 2, im: 2 },
    ];
    expect(sorted(type, items)).toEqual([
      { re: 1, im: 1 },
      { re: 1, im: 2 },
      { re: 2, im: 1 },
      { re: 2, im: 2 },
    ]);
  }
});

test("Of: array compares the lowest index first", () => {
  const items = [[3, 2, 1], [2, 3, 1], [1, 3, 2], [1, 1, 2], [1, 1, 1]];
  expect(sorted(enc.arr(3, enc.int()), items)).toEqual([
    [1, 1, 1],
    [1, 1, 2],
    [1, 3, 2],
    [2, 3, 1],
    [3, 2, 1],
  ]);
});

test("Of: blank field is skipped in packed storage", () => {
  const s = packedSliceOf(Blank, packInt32([[1, 0, 5], [1, 99, 2]]));
  const less = Of(s);
  expect(less(0, 1)).toBe(false);
  expect(less(1, 0)).toBe(true);
});

test("Of: elements differing only in the blank field are equal", () => {
  const packed = Of(packedSliceOf(Blank, packInt32([[1, 0, 2], [1, 99, 2]])));
  expect(packed(0, 1)).toBe(false);
  expect(packed(1, 0)).toBe(false);

  const objects = Of(sliceOf(Blank, [{ A: 1, _: 0, B: 2 }, { A: 1, _: 99, B: 2 }]));
  expect(objects(0, 1)).toBe(false);
  expect(objects(1, 0)).toBe(false);
});

test("Of: blank field orders like the struct without it", () => {
  const Plain = enc.struct([
    { name: "A", type: enc.int32() },
    { name: "B", type: enc.int32() },
  ]);
  const items = [
    { A: 1, _: 7, B: 2 },
    { A: 1, _: 0, B: 3 },
    { A: 0, _: 9, B: 9 },
    { A: 1, _: 3, B: 2 },
  ];
  const withBlank = Of(sliceOf(Blank, items));
  const without = Of(sliceOf(Plain, items));
  for (let i = 0; i < items.length; i++) {
    for (let j = 0; j < items.length; j++) {
      expect(withBlank(i, j)).toBe(without(i, j));
    }
  }
});

test("Of: NaN sorts before every float", () => {
  const out = sorted(enc.f64(), [1, NaN, -1]);
  expect(Number.isNaN(out[0])).toBe(true);
  expect(out.slice(1)).toEqual([-1, 1]);
});

test("Of: NaN against NaN defers to the next field", () => {
  const Rec = enc.struct([
    { name: "F", type: enc.f64() },
    { name: "I", type: enc.int() },
  ]);
  const less = Of(sliceOf(Rec, [{ F: NaN, I: 2 }, { F: NaN, I: 1 }]));
  expect(less(1, 0)).toBe(true);
  expect(less(0, 1)).toBe(false);
});

test("Of: -0 and +0 are equal", () => {
  const Rec = enc.struct([
    { name: "F", type: enc.f64() },
    { name: "I", type: enc.int() },
  ]);
  const less = Of(sliceOf(Rec, [{ F: -0, I: 2 }, { F: 0, I: 1 }]));
  expect(less(1, 0)).toBe(true);
});

test("Of: integers are read at their declared width", () => {
  expect(sorted(enc.int8(), [127, 128, -1])).toEqual([128, -1, 127]);
  expect(sorted(enc.uint8(), [-1, 1, 256])).toEqual([256, 1, -1]);
  expect(sorted(enc.uint32(), [-1, 0, 2])).toEqual([0, 2, -1]);
  expect(sorted(enc.int64(), [2n ** 63n, 0n, -1n])).toEqual([
    2n ** 63n,
    -1n,
    0n,
  ]);
});

test("Of: float32 values compare after rounding to single precision", () => {
  const less = Of(sliceOf(enc.f32(), [1.00000001, 1]));
  expect(less(0, 1)).toBe(false);
  expect(less(1, 0)).toBe(false);
});

test("Of: strings order by code point", () => {
  expect(sorted(enc.str(), ["\u{1F600}", "｡", "a"])).toEqual([
    "a",
    "｡",
    "\u{1F600}",
  ]);
});

test("Of: pointers compare by identity", () => {
  const a = {};
  const b = () => {};
  const c = new Map();
  const less = Of(sliceOf(enc.ptr(), [a, b, c, null]));
  // identities are handed out on first sight, in index order here
  less(0, 1);
  less(1, 2);
  expect(less(0, 1)).toBe(true);
  expect(less(1, 2)).toBe(true);
  expect(less(3, 0)).toBe(true);
  expect(less(0, 0)).toBe(false);
});

test("Of: raw addresses compare numerically", () => {
  expect(sorted(enc.uintptr(), [30, 10n, 20])).toEqual([10n, 20, 30]);
});

test("Of: typed arrays infer the element kind", () => {
  const ints = new Int32Array([2, 4, 1, 3, 0, -1, 5]);
  sortSlice(ints, Of(ints));
  expect(Array.from(ints)).toEqual([-1, 0, 1, 2, 3, 4, 5]);

  const bytes = new Uint8Array([200, 3, 255, 0]);
  sortSlice(bytes, Of(bytes));
  expect(Array.from(bytes)).toEqual([0, 3, 200, 255]);

  const bigs = new BigInt64Array([3n, -5n, 0n]);
  sortSlice(bigs, Of(bigs));
  expect(Array.from(bigs)).toEqual([-5n, 0n, 3n]);

  const floats = new Float64Array([3, NaN, -Infinity, 0]);
  sortSlice(floats, Of(floats));
  expect(Number.isNaN(floats[0])).toBe(true);
  expect(Array.from(floats.subarray(1))).toEqual([-Infinity, 0, 3]);
});

test("Of: typed array views sort only their window", () => {
  const backing = new Int16Array([9, 3, 2, 1, -9]);
  const window = backing.subarray(1, 4);
  sortSlice(window, Of(window));
  expect(Array.from(backing)).toEqual([9, 1, 2, 3, -9]);
});

test("Of: packed struct with bool, float and complex fields", () => {
  const Rec = enc.struct([
    { name: "Ok", type: enc.bool() },
    { name: "X", type: enc.f64() },
    { name: "Z", type: enc.c64() },
  ]);
  // Ok@0, X@8, Z@16, 24 bytes per element
  const view = new DataView(new ArrayBuffer(72));
  const rows: Array<[boolean, number, number, number]> = [
    [true, 1.5, 0, 0],
    [false, 2, 1, 0],
    [false, 2, 0, 5],
  ];
  rows.forEach(([ok, x, re, im], r) => {
    view.setUint8(r * 24, ok ? 1 : 0);
    view.setFloat64(r * 24 + 8, x, true);
    view.setFloat32(r * 24 + 16, re, true);
    view.setFloat32(r * 24 + 20, im, true);
  });

  const s = packedSliceOf(Rec, view);
  sortSlice(s, Of(s));

  const read = (r: number) => [
    view.getUint8(r * 24),
    view.getFloat64(r * 24 + 8, true),
    view.getFloat32(r * 24 + 16, true),
    view.getFloat32(r * 24 + 20, true),
  ];
  expect([read(0), read(1), read(2)]).toEqual([
    [0, 2, 0, 5],
    [0, 2, 1, 0],
    [1, 1.5, 0, 0],
  ]);
});

test("Of: a retained predicate sorts a refilled buffer", () => {
  const buf = sliceOf(t.int(), [3, 1, 2]);
  const less = Of(buf);
  sortSlice(buf, less);
  expect(buf.items).toEqual([1, 2, 3]);

  buf.items.splice(0, 3, 9, 7, 8);
  sortSlice(buf, less);
  expect(buf.items).toEqual([7, 8, 9]);
});

test("Of: empty input returns the no-op predicate", () => {
  expect(Of(sliceOf(enc.int(), []))).toBe(NO_COMPARE);
  expect(Of([])).toBe(NO_COMPARE);
  expect(Of(new Float32Array(0))).toBe(NO_COMPARE);
  // the element type is never decomposed
  expect(Of(sliceOf(enc.iface(), []))).toBe(NO_COMPARE);
});

test("Of: a type with no leaves compares everything equal", () => {
  expect(Of(sliceOf(enc.struct([]), [{}, {}]))).toBe(NO_COMPARE);
  expect(Of(sliceOf(enc.arr(0, enc.int()), [[], []]))).toBe(NO_COMPARE);
});

test("Of: non-sequences are rejected", () => {
  expect(() => Of(42)).toThrow(InvalidArgumentError);
  expect(() => Of("abc")).toThrow(InvalidArgumentError);
  expect(() => Of({ length: 2 })).toThrow(InvalidArgumentError);
  expect(() => Of(null)).toThrow("argument is not a sequence: null");
  expect(() => Of(new DataView(new ArrayBuffer(8)))).toThrow(
    "argument is not a sequence: DataView",
  );
});

test("Of: open element values are rejected", () => {
  expect(() => Of([1, 2, 3])).toThrow(UnsupportedTypeError);
  expect(() => Of([1, 2, 3])).toThrow(
    "un-sortable type interface {} (kind interface)",
  );
});

test("Of: nested sequences are rejected wherever they appear", () => {
  expect(() => Of(sliceOf(enc.slice(enc.int()), [[1], [2]]))).toThrow(
    "un-sortable type []int (kind slice)",
  );

  const Rec = enc.struct([
    { name: "A", type: enc.int() },
    { name: "Tags", type: enc.slice(enc.str()) },
  ]);
  expect(() => Of(sliceOf(Rec, [{ A: 1, Tags: [] }]))).toThrow(
    "un-sortable type []string (kind slice)",
  );
});

test("Of: the error carries the offending type", () => {
  const Rec = enc.struct([{ name: "V", type: enc.named("Any", enc.iface()) }]);
  try {
    Of(sliceOf(Rec, [{ V: 1 }]));
    expect.unreachable();
  } catch (err) {
    expect(err).toBeInstanceOf(UnsupportedTypeError);
    if (err instanceof UnsupportedTypeError) {
      expect(err.message).toBe("un-sortable type interface {} (kind interface)");
      expect(err.type).toEqual(enc.iface());
    }
  }
});

test("Of: packed int compares values above 2^53 exactly", () => {
  const view = new DataView(new ArrayBuffer(16));
  view.setBigInt64(0, 2n ** 53n + 1n, true);
  view.setBigInt64(8, 2n ** 53n, true);
  const less = Of(packedSliceOf(enc.int(), view));
  expect(less(1, 0)).toBe(true);
  expect(less(0, 1)).toBe(false);
});

test("Of: uint wraps negatives the same in object and packed storage", () => {
  expect(sorted(enc.uint(), [-1, 0, 5])).toEqual([0, 5, -1]);

  const view = new DataView(new ArrayBuffer(24));
  [-1n, 0n, 5n].forEach((v, i) =>
    view.setBigUint64(i * 8, BigInt.asUintN(64, v), true)
  );
  const s = packedSliceOf(enc.uint(), view);
  sortSlice(s, Of(s));
  expect([0, 1, 2].map((i) => view.getBigInt64(i * 8, true))).toEqual([
    0n, 5n, -1n,
  ]);
});

test("Of: string fields in packed storage are rejected", () => {
  expect(() =>
    packedSliceOf(StringInt, new ArrayBuffer(48))
  ).toThrow(UnsupportedTypeError);
});

test("Of: nesting beyond the depth limit is rejected", () => {
  let deep = enc.int();
  for (let i = 0; i < 101; i++) deep = enc.arr(1, deep);
  expect(() => Of(sliceOf(deep, [null]))).toThrow(
    "type nesting exceeds 100 levels",
  );
});

test("Of: onBuild reports the leaf chain", () => {
  let info: BuildInfo | undefined;
  Of(sliceOf(StringInt, [{ S: "a", I: 1 }]), {
    onBuild: (i) => {
      info = i;
    },
  });
  expect(info?.length).toBe(1);
  expect(info?.leaves.map((l) => l.path)).toEqual([["S"], ["I"]]);
  expect(info?.leaves.map((l) => l.offset)).toEqual([0, 16]);
});

test("Of: a failing onBuild hook is logged, not thrown", () => {
  const spy = vi.spyOn(console, "error").mockImplementation(() => {});
  const boom = new Error("boom");
  const less = Of(sliceOf(enc.int(), [2, 1]), {
    onBuild: () => {
      throw boom;
    },
  });
  expect(less(1, 0)).toBe(true);
  expect(spy).toHaveBeenCalledWith("lessof: onBuild hook error:", boom);
  spy.mockRestore();
});
