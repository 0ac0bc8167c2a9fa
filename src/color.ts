import type { Plane, RGB, RgbaImage, YCbCr } from "./types";
import { clampByte, createPlane } from "./utils";

/* ------------------- BT.601 full-range (JFIF) weights ------------------- */
// Both directions derive from KR/KB so the inverse undoes the forward exactly.
const KR = 0.299;
const KB = 0.114;
const KG = 1 - KR - KB;
const CB_SCALE = 2 * (1 - KB); // 1.772
const CR_SCALE = 2 * (1 - KR); // 1.402

export function rgbToYCbCr(r: number, g: number, b: number): YCbCr {
  const y = KR * r + KG * g + KB * b;
  return [y, 128 + (b - y) / CB_SCALE, 128 + (r - y) / CR_SCALE];
}

/** Rounded and clamped to [0, 255]. */
export function yCbCrToRgb(y: number, cb: number, cr: number): RGB {
  const r = y + CR_SCALE * (cr - 128);
  const b = y + CB_SCALE * (cb - 128);
  const g = (y - KR * r - KB * b) / KG;
  return [clampByte(r), clampByte(g), clampByte(b)];
}

export interface ColorPlanes {
  y: Plane;
  cb: Plane;
  cr: Plane;
  alpha: Uint8Array;
}

/** Split an RGBA image into full-resolution Y, Cb, Cr planes and a copy of its alpha channel. */
export function toPlanes(image: RgbaImage): ColorPlanes {
  const { width, height, pixels } = image;
  const y = createPlane(width, height);
  const cb = createPlane(width, height);
  const cr = createPlane(width, height);
  const alpha = new Uint8Array(width * height);

  for (let i = 0, p = 0; i < width * height; i++, p += 4) {
    const [Y, Cb, Cr] = rgbToYCbCr(pixels[p], pixels[p + 1], pixels[p + 2]);
    y.data[i] = Y;
    cb.data[i] = Cb;
    cr.data[i] = Cr;
    alpha[i] = pixels[p + 3];
  }
  return { y, cb, cr, alpha };
}
