import { Jimp } from "jimp";
import { PNG } from "pngjs";
import jpeg from "jpeg-js";

import { compressWithReport, validateImage } from "./engine";
import { JpegArtifactError } from "./errors";
import { qualityToStrength } from "./quantize";
import type { ArtifactOptions, ArtifactResult, CompressedImage, RgbaImage } from "./types";

export const DEFAULT_STRENGTH = 0.5;
export const DEFAULT_JPEG_QUALITY = 95;

/* ---------------------------- Containers ----------------------------- */
function toBuffer(pixels: RgbaImage["pixels"]): Buffer {
  return Buffer.from(pixels.buffer, pixels.byteOffset, pixels.byteLength);
}

export function encodePng(image: RgbaImage): Buffer {
  const png = new PNG({ width: image.width, height: image.height });
  png.data = toBuffer(image.pixels);
  return PNG.sync.write(png);
}

export function encodeJpeg(image: RgbaImage, quality = DEFAULT_JPEG_QUALITY): Buffer {
  const { width, height, pixels } = image;
  return jpeg.encode({ data: toBuffer(pixels), width, height }, quality).data;
}

/** Decode PNG or JPEG bytes (anything jimp reads) into RGBA. */
export async function readImage(imageBuffer: Buffer): Promise<RgbaImage<Uint8Array>> {
  try {
    const img = await Jimp.read(imageBuffer);
    const { width, height, data } = img.bitmap;
    return { width, height, pixels: new Uint8Array(data) };
  } catch (err) {
    throw new JpegArtifactError(`could not decode image (${imageBuffer.length} bytes)`, "DECODE_FAILED", err);
  }
}

/* ------------------------- Real JPEG reference ----------------------- */
/**
 * Encode and decode through an actual baseline JPEG codec, for comparison with the simulation.
 * Baseline JPEG has no alpha, so the input alpha is copied back.
 */
export function referenceJpegRoundTrip(image: RgbaImage, quality: number): CompressedImage {
  validateImage(image);
  const q = Math.round(Math.min(100, Math.max(1, quality)));
  const decoded = jpeg.decode(encodeJpeg(image, q), { useTArray: true });

  const pixels = new Uint8ClampedArray(decoded.data);
  for (let p = 3; p < pixels.length; p += 4) pixels[p] = image.pixels[p];
  return { width: decoded.width, height: decoded.height, pixels };
}

/* ============================ FILE-LEVEL ============================== */
export async function addJpegArtifacts(
  imageBuffer: Buffer,
  options: ArtifactOptions = {}
): Promise<ArtifactResult> {
  const strength =
    options.strength ?? (options.quality !== undefined ? qualityToStrength(options.quality) : DEFAULT_STRENGTH);
  const output = options.output ?? "png";
  const jpegQuality = options.jpegQuality ?? DEFAULT_JPEG_QUALITY;

  const source = await readImage(imageBuffer);
  const { image, report } = compressWithReport(source, strength, options);

  const buffer = output === "jpeg" ? encodeJpeg(image, jpegQuality) : encodePng(image);

  if (options.verbose) {
    console.log(
      `[jpeg-artifacts] ${image.width}x${image.height} strength=${report.strength.toFixed(2)} ` +
        `factor=${report.factor.toFixed(3)} zeros=${(report.zeroCoefficientRatio * 100).toFixed(1)}% ` +
        `-> ${output} (${buffer.length} bytes)`
    );
  }

  return { image: buffer, width: image.width, height: image.height, report };
}
