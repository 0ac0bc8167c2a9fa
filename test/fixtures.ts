import { JpegArtifactError, type ErrorCode } from "../src/errors";
import type { RgbaImage } from "../src/types";

export type PixelFn = (x: number, y: number) => [number, number, number, number];

export function makeImage(width: number, height: number, fn: PixelFn): RgbaImage<Uint8Array> {
  const pixels = new Uint8Array(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      pixels.set(fn(x, y), (y * width + x) * 4);
    }
  }
  return { width, height, pixels };
}

export function solid(width: number, height: number, r: number, g: number, b: number, a = 255): RgbaImage<Uint8Array> {
  return makeImage(width, height, () => [r, g, b, a]);
}

// deterministic integer hash in [0, 255]
export function noise(x: number, y: number, seed = 0): number {
  let h = Math.imul(x + 1, 0x27d4eb2d) ^ Math.imul(y + 1, 0x165667b1) ^ Math.imul(seed + 1, 0x9e3779b9);
  h = Math.imul(h ^ (h >>> 15), 0x85ebca6b);
  h ^= h >>> 13;
  return (h >>> 0) & 0xff;
}

/** Gradient + hard edge + texture, with a varying alpha channel. */
export function testCard(width: number, height: number): RgbaImage<Uint8Array> {
  return makeImage(width, height, (x, y) => {
    const edge = x < width / 2 ? 40 : 210;
    const r = Math.round((x / Math.max(1, width - 1)) * 255);
    const g = Math.min(255, Math.round(edge * 0.7 + noise(x, y) * 0.3));
    const b = Math.round((y / Math.max(1, height - 1)) * 200 + noise(x, y, 7) * 0.2);
    return [r, g, b, (x * 37 + y * 11) % 256];
  });
}

export function alphaOf(image: RgbaImage): number[] {
  const out: number[] = [];
  for (let p = 3; p < image.pixels.length; p += 4) out.push(image.pixels[p]);
  return out;
}

/** Code of the JpegArtifactError thrown by fn, or undefined. */
export function thrownCode(fn: () => unknown): ErrorCode | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof JpegArtifactError ? err.code : undefined;
  }
  return undefined;
}
