import type { CoefficientBlocks, QuantizedBlocks } from "./block-transform";
import { BLOCK_AREA, N, ZIGZAG, idct8x8 } from "./dct";
import type { QuantTable } from "./quantize";
import type { Plane } from "./types";
import { clamp, createPlane } from "./utils";

/** Zigzag levels back to natural-order coefficients. */
export function dequantizeBlock(
  levels: ArrayLike<number>,
  table: QuantTable,
  out = new Float64Array(BLOCK_AREA)
): Float64Array {
  for (let k = 0; k < BLOCK_AREA; k++) {
    const i = ZIGZAG[k];
    out[i] = levels[k] * table[i];
  }
  return out;
}

/** Inverse DCT, undo the level shift, clamp to [0, 255]. */
export function reconstructBlock(coeffs: ArrayLike<number>, out = new Float64Array(BLOCK_AREA)): Float64Array {
  idct8x8(coeffs, out);
  for (let i = 0; i < BLOCK_AREA; i++) out[i] = clamp(out[i] + 128, 0, 255);
  return out;
}

export function dequantize(blocks: QuantizedBlocks, table: QuantTable): CoefficientBlocks {
  const { levels, ...grid } = blocks;
  const coeffs = new Float64Array(grid.count * BLOCK_AREA);

  for (let b = 0; b < grid.count; b++) {
    const offset = b * BLOCK_AREA;
    dequantizeBlock(
      levels.subarray(offset, offset + BLOCK_AREA),
      table,
      coeffs.subarray(offset, offset + BLOCK_AREA)
    );
  }
  return { ...grid, coeffs };
}

/** Reassemble a plane of the original size; samples in edge padding are dropped. */
export function inverseTransform(blocks: CoefficientBlocks): Plane {
  const plane = createPlane(blocks.planeWidth, blocks.planeHeight);
  const samples = new Float64Array(BLOCK_AREA);

  for (let by = 0; by < blocks.blocksDown; by++) {
    for (let bx = 0; bx < blocks.blocksAcross; bx++) {
      const offset = (by * blocks.blocksAcross + bx) * BLOCK_AREA;
      reconstructBlock(blocks.coeffs.subarray(offset, offset + BLOCK_AREA), samples);

      const x0 = bx * N, y0 = by * N;
      const w = Math.min(N, plane.width - x0);
      const h = Math.min(N, plane.height - y0);
      for (let y = 0; y < h; y++) {
        for (let x = 0; x < w; x++) plane.data[(y0 + y) * plane.width + x0 + x] = samples[y * N + x];
      }
    }
  }
  return plane;
}

/** Dequantize and inverse-transform every block of a plane. */
export function inverse(blocks: QuantizedBlocks, table: QuantTable): Plane {
  return inverseTransform(dequantize(blocks, table));
}

/**
 * Sum of squared differences between two coefficient arenas of the same grid. The DCT is
 * orthonormal, so this equals the squared sample error of the padded, unclamped plane.
 */
export function squaredError(a: CoefficientBlocks, b: CoefficientBlocks): number {
  if (a.coeffs.length !== b.coeffs.length) {
    throw new RangeError(`coefficient arenas differ in length: ${a.coeffs.length} vs ${b.coeffs.length}`);
  }
  let sum = 0;
  for (let i = 0; i < a.coeffs.length; i++) {
    const d = a.coeffs[i] - b.coeffs[i];
    sum += d * d;
  }
  return sum;
}
