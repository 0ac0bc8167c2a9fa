import { BLOCK_AREA, N, ZIGZAG, fdct8x8 } from "./dct";
import type { QuantTable } from "./quantize";
import type { Plane } from "./types";
import { clamp, roundHalfAway, sampleAt } from "./utils";

// 8-bit samples give |coefficient| ≤ 1024; anything outside 12-bit range is an overflow
export const COEFFICIENT_MIN = -2048;
export const COEFFICIENT_MAX = 2047;

/* -------------------------- Block utilities -------------------------- */

/** Block grid over a plane; block i covers columns (i % across)·8.. and rows ⌊i / across⌋·8.. */
export interface BlockGrid {
  planeWidth: number;
  planeHeight: number;
  blocksAcross: number;
  blocksDown: number;
  count: number;
}

/** Unquantized coefficients, 64 per block in natural order, block i at offset i·64. */
export interface CoefficientBlocks extends BlockGrid {
  coeffs: Float64Array;
}

/** Quantized levels, 64 per block in zigzag (low-to-high frequency) order. */
export interface QuantizedBlocks extends BlockGrid {
  levels: Int32Array;
}

export function blockGrid(planeWidth: number, planeHeight: number): BlockGrid {
  const blocksAcross = Math.ceil(planeWidth / N);
  const blocksDown = Math.ceil(planeHeight / N);
  return { planeWidth, planeHeight, blocksAcross, blocksDown, count: blocksAcross * blocksDown };
}

/** Level-shifted 8×8 window; positions past the right/bottom edge repeat the last column/row. */
export function extractBlock(
  plane: Plane,
  bx: number,
  by: number,
  out = new Float64Array(BLOCK_AREA)
): Float64Array {
  const x0 = bx * N, y0 = by * N;
  for (let y = 0; y < N; y++) {
    for (let x = 0; x < N; x++) out[y * N + x] = sampleAt(plane, x0 + x, y0 + y) - 128;
  }
  return out;
}

/** DCT of one level-shifted block, clamped to the coefficient range. */
export function transformBlock(samples: ArrayLike<number>, out = new Float64Array(BLOCK_AREA)): Float64Array {
  fdct8x8(samples, out);
  for (let i = 0; i < BLOCK_AREA; i++) out[i] = clamp(out[i], COEFFICIENT_MIN, COEFFICIENT_MAX);
  return out;
}

/** Divide by the step and round; written in zigzag order. */
export function quantizeBlock(
  coeffs: ArrayLike<number>,
  table: QuantTable,
  out = new Int32Array(BLOCK_AREA)
): Int32Array {
  for (let k = 0; k < BLOCK_AREA; k++) {
    const i = ZIGZAG[k];
    out[k] = roundHalfAway(coeffs[i] / table[i]);
  }
  return out;
}

/* ------------------------------ Planes ------------------------------- */

export function forwardTransform(plane: Plane): CoefficientBlocks {
  const grid = blockGrid(plane.width, plane.height);
  const coeffs = new Float64Array(grid.count * BLOCK_AREA);
  const samples = new Float64Array(BLOCK_AREA);

  for (let by = 0; by < grid.blocksDown; by++) {
    for (let bx = 0; bx < grid.blocksAcross; bx++) {
      const offset = (by * grid.blocksAcross + bx) * BLOCK_AREA;
      extractBlock(plane, bx, by, samples);
      transformBlock(samples, coeffs.subarray(offset, offset + BLOCK_AREA));
    }
  }
  return { ...grid, coeffs };
}

export function quantize(blocks: CoefficientBlocks, table: QuantTable): QuantizedBlocks {
  const { coeffs, ...grid } = blocks;
  const levels = new Int32Array(grid.count * BLOCK_AREA);

  for (let b = 0; b < grid.count; b++) {
    const offset = b * BLOCK_AREA;
    quantizeBlock(
      coeffs.subarray(offset, offset + BLOCK_AREA),
      table,
      levels.subarray(offset, offset + BLOCK_AREA)
    );
  }
  return { ...grid, levels };
}

/** Transform and quantize every block of a plane. */
export function forward(plane: Plane, table: QuantTable): QuantizedBlocks {
  return quantize(forwardTransform(plane), table);
}

export function countZeroLevels(blocks: QuantizedBlocks): number {
  let zeros = 0;
  for (let i = 0; i < blocks.levels.length; i++) if (blocks.levels[i] === 0) zeros++;
  return zeros;
}
