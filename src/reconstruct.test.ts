import { describe, it, expect } from "vitest";
import { rgbToYCbCr } from "./color";
import { assemble } from "./reconstruct";
import type { Plane } from "./types";

function filled(width: number, height: number, value: number): Plane {
  return { width, height, data: new Float64Array(width * height).fill(value) };
}

describe("assemble", () => {
  const [y, cb, cr] = rgbToYCbCr(255, 0, 0);

  it("upsamples half-resolution chroma and converts back to RGB", () => {
    const out = assemble(filled(3, 3, y), filled(2, 2, cb), filled(2, 2, cr), new Uint8Array(9).fill(255), 3, 3);

    expect(out.width).toBe(3);
    expect(out.height).toBe(3);
    expect(out.pixels).toBeInstanceOf(Uint8ClampedArray);
    expect(out.pixels).toHaveLength(36);
    for (let p = 0; p < 36; p += 4) {
      expect(Array.from(out.pixels.subarray(p, p + 4))).toEqual([255, 0, 0, 255]);
    }
  });

  it("reattaches alpha byte for byte", () => {
    const alpha = Uint8Array.from([0, 1, 128, 255]);
    const out = assemble(filled(2, 2, 128), filled(1, 1, 128), filled(1, 1, 128), alpha, 2, 2);
    expect([out.pixels[3], out.pixels[7], out.pixels[11], out.pixels[15]]).toEqual([0, 1, 128, 255]);
    expect(Array.from(out.pixels.subarray(0, 3))).toEqual([128, 128, 128]);
  });

  it("accepts full-resolution chroma unchanged", () => {
    const out = assemble(filled(2, 1, 128), filled(2, 1, 128), filled(2, 1, 128), new Uint8Array(2), 2, 1, "bilinear");
    expect(Array.from(out.pixels)).toEqual([128, 128, 128, 0, 128, 128, 128, 0]);
  });
});
