import { upsample } from "./chroma";
import { yCbCrToRgb } from "./color";
import type { CompressedImage, Plane, UpsampleMode } from "./types";

/**
 * Bring chroma back to full size, convert to RGB and reattach the original alpha
 * into a new width×height×4 buffer.
 */
export function assemble(
  y: Plane,
  cb: Plane,
  cr: Plane,
  alpha: Uint8Array,
  width: number,
  height: number,
  upsampleMode: UpsampleMode = "replicate"
): CompressedImage {
  const cbFull = upsample(cb, width, height, upsampleMode);
  const crFull = upsample(cr, width, height, upsampleMode);
  const pixels = new Uint8ClampedArray(width * height * 4);

  for (let row = 0; row < height; row++) {
    for (let col = 0; col < width; col++) {
      const i = row * width + col;
      const [r, g, b] = yCbCrToRgb(y.data[i], cbFull.data[i], crFull.data[i]);
      const p = i * 4;
      pixels[p] = r;
      pixels[p + 1] = g;
      pixels[p + 2] = b;
      pixels[p + 3] = alpha[i];
    }
  }
  return { width, height, pixels };
}
