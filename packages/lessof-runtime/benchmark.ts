// packages/lessof-runtime/benchmark.ts
// Hand-written comparator vs built predicates over a 10k-row struct slice

import { Of, sliceOf, sortSlice, t } from "./mod.ts";

const ITERATIONS = 200;
const WARMUP = 20;
const ROWS = 10_000;

// Mean milliseconds per call after a warmup.
function time(fn: () => void): number {
  for (let i = 0; i < WARMUP; i++) fn();
  const start = performance.now();
  for (let i = 0; i < ITERATIONS; i++) fn();
  return (performance.now() - start) / ITERATIONS;
}

// mulberry32, fixed seed so every run sorts the same rows
function rng(seed: number): () => number {
  let s = seed >>> 0;
  return () => {
    s = (s + 0x6d2b79f5) >>> 0;
    let r = Math.imul(s ^ (s >>> 15), 1 | s);
    r = (r + Math.imul(r ^ (r >>> 7), 61 | r)) ^ r;
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

const Row$ = t.struct({ s: t.string(), i: t.int() });
type Row = { s: string; i: number };

const next = rng(123);
const unsorted: Row[] = Array.from({ length: ROWS }, () => ({
  s: String(Math.floor(next() * 1e9)),
  i: Math.floor(next() * 1e9),
}));

const buf = sliceOf(Row$, unsorted.slice());
const refill = () => {
  for (let k = 0; k < ROWS; k++) buf.items[k] = unsorted[k];
};

console.log(`struct { s string; i int }, ${ROWS} rows, ${ITERATIONS} sorts`);

const native = time(() => {
  refill();
  const items = buf.items;
  sortSlice(buf, (i, j) => {
    const va = items[i];
    const vb = items[j];
    if (va.s === vb.s) return va.i < vb.i;
    return va.s < vb.s;
  });
});

const built = time(() => {
  refill();
  sortSlice(buf, Of(buf));
});

const lessReused = Of(buf);
const reused = time(() => {
  refill();
  sortSlice(buf, lessReused);
});

for (const [name, ms] of [
  ["native", native],
  ["built per sort", built],
  ["built once, reused", reused],
] as const) {
  console.log(
    `  ${name.padEnd(20)} ${ms.toFixed(3)} ms/sort  ${(ms / native).toFixed(2)}x`,
  );
}
