// packages/lessof-runtime/sort.ts
// Index-based in-place sorting driven by a less(i, j) predicate

import { type Swap, sequenceOf } from "./collection.ts";
import type { Less } from "./leaves.ts";

type Data = { readonly less: Less; readonly swap: Swap };

/**
 * Sort `collection` in place so that no element is less than its
 * predecessor. Not stable.
 */
export function sortSlice(collection: unknown, less: Less): void {
  const { memory, swap } = sequenceOf(collection);
  const n = memory.length;
  quickSort({ less, swap }, 0, n, maxDepth(n));
}

/** Like sortSlice, keeping equal elements in their original order. */
export function sortSliceStable(collection: unknown, less: Less): void {
  const { memory, swap } = sequenceOf(collection);
  stable({ less, swap }, memory.length);
}

export function sliceIsSorted(collection: unknown, less: Less): boolean {
  const { memory } = sequenceOf(collection);
  for (let i = memory.length - 1; i > 0; i--) {
    if (less(i, i - 1)) return false;
  }
  return true;
}

// 2 * ceil(lg(n + 1))
function maxDepth(n: number): number {
  let depth = 0;
  for (let i = n; i > 0; i >>= 1) depth++;
  return depth * 2;
}

function insertionSort(d: Data, a: number, b: number): void {
  for (let i = a + 1; i < b; i++) {
    for (let j = i; j > a && d.less(j, j - 1); j--) {
      d.swap(j, j - 1);
    }
  }
}

function siftDown(d: Data, lo: number, hi: number, first: number): void {
  let root = lo;
  for (;;) {
    let child = 2 * root + 1;
    if (child >= hi) return;
    if (child + 1 < hi && d.less(first + child, first + child + 1)) child++;
    if (!d.less(first + root, first + child)) return;
    d.swap(first + root, first + child);
    root = child;
  }
}

function heapSort(d: Data, a: number, b: number): void {
  const first = a;
  const hi = b - a;
  for (let i = (hi - 1) >> 1; i >= 0; i--) siftDown(d, i, hi, first);
  for (let i = hi - 1; i >= 0; i--) {
    d.swap(first, first + i);
    siftDown(d, 0, i, first);
  }
}

// Leaves the median of the three at m1.
function medianOfThree(d: Data, m1: number, m0: number, m2: number): void {
  if (d.less(m1, m0)) d.swap(m1, m0);
  if (d.less(m2, m1)) {
    d.swap(m2, m1);
    if (d.less(m1, m0)) d.swap(m1, m0);
  }
}

// Returns the pivot's final index p: [a, p) < pivot <= (p, b).
function partition(d: Data, a: number, b: number): number {
  medianOfThree(d, a, a + ((b - a) >> 1), b - 1);
  let i = a + 1;
  let j = b - 1;
  for (;;) {
    while (i <= j && d.less(i, a)) i++;
    while (i <= j && !d.less(j, a)) j--;
    if (i > j) break;
    d.swap(i, j);
    i++;
    j--;
  }
  d.swap(a, j);
  return j;
}

function quickSort(d: Data, a: number, b: number, depth: number): void {
  while (b - a > 12) {
    if (depth === 0) {
      heapSort(d, a, b);
      return;
    }
    depth--;
    const p = partition(d, a, b);
    // Recurse into the smaller side, loop on the larger.
    if (p - a < b - p) {
      quickSort(d, a, p, depth);
      a = p + 1;
    } else {
      quickSort(d, p + 1, b, depth);
      b = p;
    }
  }
  if (b - a > 1) {
    for (let i = a + 6; i < b; i++) {
      if (d.less(i, i - 6)) d.swap(i, i - 6);
    }
    insertionSort(d, a, b);
  }
}

const BLOCK_SIZE = 20;

function stable(d: Data, n: number): void {
  let a = 0;
  let b = BLOCK_SIZE;
  while (b <= n) {
    insertionSort(d, a, b);
    a = b;
    b += BLOCK_SIZE;
  }
  insertionSort(d, a, n);

  for (let block = BLOCK_SIZE; block < n; block *= 2) {
    a = 0;
    b = 2 * block;
    while (b <= n) {
      symMerge(d, a, a + block, b);
      a = b;
      b += 2 * block;
    }
    const m = a + block;
    if (m < n) symMerge(d, a, m, n);
  }
}

// Merges the sorted runs [a, m) and [m, b) in place (SymMerge, Kim & Kutzner).
function symMerge(d: Data, a: number, m: number, b: number): void {
  if (m - a === 1) {
    let i = m;
    let j = b;
    while (i < j) {
      const h = (i + j) >>> 1;
      if (d.less(h, a)) i = h + 1;
      else j = h;
    }
    for (let k = a; k < i - 1; k++) d.swap(k, k + 1);
    return;
  }
  if (b - m === 1) {
    let i = a;
    let j = m;
    while (i < j) {
      const h = (i + j) >>> 1;
      if (!d.less(m, h)) i = h + 1;
      else j = h;
    }
    for (let k = m; k > i; k--) d.swap(k, k - 1);
    return;
  }

  const mid = (a + b) >>> 1;
  const n = mid + m;
  let start: number;
  let r: number;
  if (m > mid) {
    start = n - b;
    r = mid;
  } else {
    start = a;
    r = m;
  }
  const p = n - 1;
  while (start < r) {
    const c = (start + r) >>> 1;
    if (!d.less(p - c, c)) start = c + 1;
    else r = c;
  }

  const end = n - start;
  if (start < m && m < end) rotate(d, start, m, end);
  if (a < start && start < mid) symMerge(d, a, start, mid);
  if (mid < end && end < b) symMerge(d, mid, end, b);
}

function swapRange(d: Data, a: number, b: number, n: number): void {
  for (let i = 0; i < n; i++) d.swap(a + i, b + i);
}

// Rotates [a, m) and [m, b) so that [m, b) comes first.
function rotate(d: Data, a: number, m: number, b: number): void {
  let i = m - a;
  let j = b - m;
  while (i !== j) {
    if (i > j) {
      swapRange(d, m - i, m, j);
      i -= j;
    } else {
      swapRange(d, m - i, m + j - i, i);
      j -= i;
    }
  }
  swapRange(d, m - i, m, i);
}
