import { JpegArtifactError } from "./errors";
import type { RgbaImage } from "./types";

function assertSameShape(a: RgbaImage, b: RgbaImage): void {
  if (a.width !== b.width || a.height !== b.height || a.pixels.length !== b.pixels.length) {
    throw new JpegArtifactError(
      `images differ in shape: ${a.width}x${a.height} vs ${b.width}x${b.height}`,
      "SHAPE_MISMATCH"
    );
  }
}

/** Mean absolute difference over the R, G and B channels (alpha ignored). */
export function meanAbsoluteError(a: RgbaImage, b: RgbaImage): number {
  assertSameShape(a, b);
  let sum = 0;
  for (let p = 0; p < a.pixels.length; p += 4) {
    sum +=
      Math.abs(a.pixels[p] - b.pixels[p]) +
      Math.abs(a.pixels[p + 1] - b.pixels[p + 1]) +
      Math.abs(a.pixels[p + 2] - b.pixels[p + 2]);
  }
  return sum / ((a.pixels.length / 4) * 3);
}

/** Peak signal-to-noise ratio in dB over RGB; Infinity for identical images. */
export function psnr(a: RgbaImage, b: RgbaImage): number {
  assertSameShape(a, b);
  let sq = 0;
  for (let p = 0; p < a.pixels.length; p += 4) {
    for (let c = 0; c < 3; c++) {
      const d = a.pixels[p + c] - b.pixels[p + c];
      sq += d * d;
    }
  }
  const mse = sq / ((a.pixels.length / 4) * 3);
  return mse === 0 ? Infinity : 10 * Math.log10((255 * 255) / mse);
}

/** Largest per-channel difference over R, G and B. */
export function maxChannelDifference(a: RgbaImage, b: RgbaImage): number {
  assertSameShape(a, b);
  let max = 0;
  for (let p = 0; p < a.pixels.length; p += 4) {
    for (let c = 0; c < 3; c++) max = Math.max(max, Math.abs(a.pixels[p + c] - b.pixels[p + c]));
  }
  return max;
}
