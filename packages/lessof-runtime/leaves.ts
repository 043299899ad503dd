// packages/lessof-runtime/leaves.ts
// Terminal comparators, one per family of scalar kinds.
//
// Each reads both values through a precomputed reader and, when they are
// equal, hands the decision to the optional continuation (the next
// tie-breaker). Without a continuation, equal means "not less".

export type Less = (i: number, j: number) => boolean;

export type Read<V> = (i: number) => V;

export function lessBool(read: Read<boolean>, optEq?: Less): Less {
  return (i, j) => {
    const va = read(i);
    const vb = read(j);
    if (va === vb) {
      return optEq ? optEq(i, j) : false;
    }
    return va === false;
  };
}

/** Integers, 64-bit integers and opaque identities. */
export function lessOrdered<V extends number | bigint>(
  read: Read<V>,
  optEq?: Less,
): Less {
  return (i, j) => {
    const va = read(i);
    const vb = read(j);
    if (va === vb) {
      return optEq ? optEq(i, j) : false;
    }
    return va < vb;
  };
}

/**
 * NaN sorts before every other value. Two NaNs tie and fall through to the
 * continuation, as do -0 and +0.
 */
export function lessFloat(read: Read<number>, optEq?: Less): Less {
  return (i, j) => {
    const va = read(i);
    const vb = read(j);
    const nanA = va !== va;
    const nanB = vb !== vb;
    if (va === vb || (nanA && nanB)) {
      return optEq ? optEq(i, j) : false;
    }
    return va < vb || (nanA && !nanB);
  };
}

export function lessComplex(
  re: Read<number>,
  im: Read<number>,
  optEq?: Less,
): Less {
  return lessFloat(re, lessFloat(im, optEq));
}

export function lessString(read: Read<string>, optEq?: Less): Less {
  return (i, j) => {
    const va = read(i);
    const vb = read(j);
    if (va === vb) {
      return optEq ? optEq(i, j) : false;
    }
    return stringBefore(va, vb);
  };
}

// UTF-8 byte order is code point order. UTF-16 code unit order differs only
// where a surrogate pair meets a unit in U+E000..U+FFFF, so the first
// differing position is compared by code point.
export function stringBefore(a: string, b: string): boolean {
  const n = Math.min(a.length, b.length);
  for (let k = 0; k < n; k++) {
    const x = a.charCodeAt(k);
    const y = b.charCodeAt(k);
    if (x !== y) {
      return (a.codePointAt(k) ?? x) < (b.codePointAt(k) ?? y);
    }
  }
  return a.length < b.length;
}
