/* --------------------------- DCT 8×8 tables -------------------------- */
export const N = 8;
export const BLOCK_AREA = N * N;

const ALPHA = Array.from({ length: N }, (_, u) => (u === 0 ? Math.SQRT1_2 : 1));

// BASIS[u * N + x] = ½·α(u)·cos((2x+1)uπ/16): orthonormal 1D DCT-II rows
const BASIS = new Float64Array(BLOCK_AREA);
for (let u = 0; u < N; u++) {
  for (let x = 0; x < N; x++) {
    BASIS[u * N + x] = 0.5 * ALPHA[u] * Math.cos(((2 * x + 1) * u * Math.PI) / (2 * N));
  }
}

/**
 * Natural (row-major) index of the k-th coefficient in low-to-high frequency order.
 * Walks the anti-diagonals alternately, same as the JPEG zigzag.
 */
export const ZIGZAG: readonly number[] = (() => {
  const order: number[] = [];
  for (let s = 0; s < 2 * N - 1; s++) {
    const lo = Math.max(0, s - (N - 1));
    const hi = Math.min(s, N - 1);
    if (s % 2 === 1) {
      for (let row = lo; row <= hi; row++) order.push(row * N + (s - row));
    } else {
      for (let row = hi; row >= lo; row--) order.push(row * N + (s - row));
    }
  }
  return order;
})();

/**
 * Forward 2D DCT-II of a row-major 8×8 block: row pass, then column pass.
 * out[v * 8 + u] holds vertical frequency v, horizontal frequency u.
 */
export function fdct8x8(block: ArrayLike<number>, out = new Float64Array(BLOCK_AREA)): Float64Array {
  const tmp = new Float64Array(BLOCK_AREA);

  for (let y = 0; y < N; y++) {
    for (let u = 0; u < N; u++) {
      let sum = 0;
      for (let x = 0; x < N; x++) sum += BASIS[u * N + x] * block[y * N + x];
      tmp[y * N + u] = sum;
    }
  }
  for (let u = 0; u < N; u++) {
    for (let v = 0; v < N; v++) {
      let sum = 0;
      for (let y = 0; y < N; y++) sum += BASIS[v * N + y] * tmp[y * N + u];
      out[v * N + u] = sum;
    }
  }
  return out;
}

/** Inverse of fdct8x8: column pass, then row pass. */
export function idct8x8(coeffs: ArrayLike<number>, out = new Float64Array(BLOCK_AREA)): Float64Array {
  const tmp = new Float64Array(BLOCK_AREA);

  for (let u = 0; u < N; u++) {
    for (let y = 0; y < N; y++) {
      let sum = 0;
      for (let v = 0; v < N; v++) sum += BASIS[v * N + y] * coeffs[v * N + u];
      tmp[y * N + u] = sum;
    }
  }
  for (let y = 0; y < N; y++) {
    for (let x = 0; x < N; x++) {
      let sum = 0;
      for (let u = 0; u < N; u++) sum += BASIS[u * N + x] * tmp[y * N + u];
      out[y * N + x] = sum;
    }
  }
  return out;
}
