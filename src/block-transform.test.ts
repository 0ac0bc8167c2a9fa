import { describe, it, expect } from "vitest";
import {
  COEFFICIENT_MAX,
  COEFFICIENT_MIN,
  blockGrid,
  countZeroLevels,
  extractBlock,
  forward,
  forwardTransform,
  quantizeBlock,
  transformBlock,
} from "./block-transform";
import { BLOCK_AREA } from "./dct";
import { LUMA_BASE, buildQuantTable } from "./quantize";
import type { Plane } from "./types";

function planeOf(width: number, height: number, fn: (x: number, y: number) => number): Plane {
  const data = new Float64Array(width * height);
  for (let y = 0; y < height; y++) for (let x = 0; x < width; x++) data[y * width + x] = fn(x, y);
  return { width, height, data };
}

describe("blockGrid", () => {
  it("rounds partial blocks up", () => {
    expect(blockGrid(10, 10)).toEqual({ planeWidth: 10, planeHeight: 10, blocksAcross: 2, blocksDown: 2, count: 4 });
    expect(blockGrid(16, 8).count).toBe(2);
    expect(blockGrid(1, 1).count).toBe(1);
  });
});

describe("extractBlock", () => {
  const plane = planeOf(10, 10, (x) => x + 128);

  it("level-shifts samples", () => {
    const block = extractBlock(plane, 0, 0);
    expect(block[0]).toBe(0);
    expect(block[7]).toBe(7);
  });

  it("replicates the last column past the right edge", () => {
    const block = extractBlock(plane, 1, 0);
    expect(block[0]).toBe(8);
    expect(block[1]).toBe(9);
    expect(block[7]).toBe(9);
    expect(block[63]).toBe(9);
  });

  it("replicates the last row past the bottom edge", () => {
    const block = extractBlock(plane, 0, 1);
    expect(block[0]).toBe(0);
    expect(block[63]).toBe(7);
  });
});

describe("transformBlock", () => {
  it("clamps coefficients to the representable range", () => {
    expect(transformBlock(new Float64Array(BLOCK_AREA).fill(1000))[0]).toBe(COEFFICIENT_MAX);
    expect(transformBlock(new Float64Array(BLOCK_AREA).fill(-1000))[0]).toBe(COEFFICIENT_MIN);
  });
});

describe("quantizeBlock", () => {
  it("rounds half away from zero and stores levels in zigzag order", () => {
    const coeffs = new Float64Array(BLOCK_AREA);
    coeffs[0] = 80;
    coeffs[1] = 24; // zigzag position 1
    coeffs[8] = -24; // zigzag position 2
    const levels = quantizeBlock(coeffs, new Float64Array(BLOCK_AREA).fill(16));

    expect(levels[0]).toBe(5);
    expect(levels[1]).toBe(2);
    expect(levels[2]).toBe(-2);
    expect(levels.slice(3).every((v) => v === 0)).toBe(true);
  });
});

describe("forward", () => {
  it("zeroes every level of a mid-gray plane", () => {
    const q = forward(planeOf(16, 8, () => 128), buildQuantTable(LUMA_BASE, 1));
    expect(q.count).toBe(2);
    expect(q.levels).toHaveLength(2 * BLOCK_AREA);
    expect(countZeroLevels(q)).toBe(2 * BLOCK_AREA);
  });

  it("quantizes a flat block into a single DC level", () => {
    const q = forward(planeOf(8, 8, () => 200), buildQuantTable(LUMA_BASE, 1));
    expect(q.levels[0]).toBe(36); // DC 8·72 = 576, step 16
    expect(countZeroLevels(q)).toBe(BLOCK_AREA - 1);
  });

  it("keeps blocks independent in the arena", () => {
    const plane = planeOf(16, 8, (x) => (x < 8 ? 128 : 200));
    const coeffs = forwardTransform(plane).coeffs;
    expect(coeffs[0]).toBeCloseTo(0, 9);
    expect(coeffs[BLOCK_AREA]).toBeCloseTo(576, 9);
  });
});
