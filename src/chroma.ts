import type { DownsampleMode, Plane, UpsampleMode } from "./types";
import { ceilHalf, clonePlane, createPlane, sampleAt } from "./utils";

/**
 * 4:2:0 chroma downsampling: one sample per 2×2 cell, ceil(W/2)×ceil(H/2).
 * Cells hanging off an odd edge replicate the last row/column.
 */
export function downsample(plane: Plane, mode: DownsampleMode = "average"): Plane {
  const half = createPlane(ceilHalf(plane.width), ceilHalf(plane.height));

  for (let hy = 0; hy < half.height; hy++) {
    const y = hy * 2;
    for (let hx = 0; hx < half.width; hx++) {
      const x = hx * 2;
      half.data[hy * half.width + hx] =
        mode === "sample"
          ? sampleAt(plane, x, y)
          : (sampleAt(plane, x, y) +
              sampleAt(plane, x + 1, y) +
              sampleAt(plane, x, y + 1) +
              sampleAt(plane, x + 1, y + 1)) /
            4;
    }
  }
  return half;
}

/**
 * Expand a 4:2:0 plane back to targetW×targetH. A plane already at the target size is copied.
 * "bilinear" places each half-resolution sample at the centre of its 2×2 footprint.
 */
export function upsample(
  half: Plane,
  targetW: number,
  targetH: number,
  mode: UpsampleMode = "replicate"
): Plane {
  if (half.width === targetW && half.height === targetH) return clonePlane(half);

  const out = createPlane(targetW, targetH);
  for (let y = 0; y < targetH; y++) {
    for (let x = 0; x < targetW; x++) {
      out.data[y * targetW + x] =
        mode === "bilinear" ? bilinearAt(half, x / 2 - 0.25, y / 2 - 0.25) : sampleAt(half, x >> 1, y >> 1);
    }
  }
  return out;
}

function bilinearAt(plane: Plane, sx: number, sy: number): number {
  const x0 = Math.floor(sx);
  const y0 = Math.floor(sy);
  const fx = sx - x0;
  const fy = sy - y0;
  const top = sampleAt(plane, x0, y0) * (1 - fx) + sampleAt(plane, x0 + 1, y0) * fx;
  const bottom = sampleAt(plane, x0, y0 + 1) * (1 - fx) + sampleAt(plane, x0 + 1, y0 + 1) * fx;
  return top * (1 - fy) + bottom * fy;
}
