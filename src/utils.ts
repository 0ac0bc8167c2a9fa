import type { Plane } from "./types";

export function clamp(v: number, lo: number, hi: number): number {
  return v < lo ? lo : v > hi ? hi : v;
}

export function clampByte(v: number): number {
  return clamp(Math.round(v), 0, 255);
}

// JPEG rounds quantized levels half away from zero (Math.round alone biases negatives)
export function roundHalfAway(v: number): number {
  return v < 0 ? -Math.round(-v) : Math.round(v);
}

export function ceilHalf(n: number): number {
  return (n + 1) >> 1;
}

export function createPlane(width: number, height: number): Plane {
  return { width, height, data: new Float64Array(width * height) };
}

export function clonePlane(plane: Plane): Plane {
  return { width: plane.width, height: plane.height, data: plane.data.slice() };
}

/** Sample at (x, y) with edge replication outside the plane. */
export function sampleAt(plane: Plane, x: number, y: number): number {
  const cx = x < 0 ? 0 : x >= plane.width ? plane.width - 1 : x;
  const cy = y < 0 ? 0 : y >= plane.height ? plane.height - 1 : y;
  return plane.data[cy * plane.width + cx];
}
