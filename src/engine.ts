import { inverseTransform, dequantize, squaredError } from "./block-inverse";
import { countZeroLevels, forwardTransform, quantize } from "./block-transform";
import { downsample } from "./chroma";
import { toPlanes } from "./color";
import { JpegArtifactError } from "./errors";
import { qualityToStrength, quantizationParams } from "./quantize";
import { assemble } from "./reconstruct";
import type {
  CompressOptions,
  CompressedImage,
  CompressionResult,
  EngineStage,
  RgbaImage,
} from "./types";

export const DEFAULT_COMPRESS_OPTIONS = {
  subsampling: "4:2:0",
  chromaDownsample: "average",
  chromaUpsample: "replicate",
} as const satisfies CompressOptions;

export const ENGINE_STAGES: readonly EngineStage[] = [
  "Idle",
  "Validating",
  "Converting",
  "Subsampling",
  "Transforming",
  "Quantizing",
  "Dequantizing",
  "InverseTransforming",
  "Reconstructing",
  "Done",
];

/** Throws INVALID_DIMENSIONS unless width/height are positive integers and the buffer is W·H·4 long. */
export function validateImage(image: RgbaImage): void {
  const { width, height, pixels } = image;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new JpegArtifactError(
      `width and height must be positive integers, got ${width}x${height}`,
      "INVALID_DIMENSIONS"
    );
  }
  const expected = width * height * 4;
  if (pixels.length !== expected) {
    throw new JpegArtifactError(
      `pixel buffer holds ${pixels.length} bytes, expected ${expected} for ${width}x${height} RGBA`,
      "INVALID_DIMENSIONS"
    );
  }
}

/* ============================== PIPELINE ============================== */
export function compressWithReport(
  image: RgbaImage,
  strength: number,
  options: CompressOptions = {}
): CompressionResult {
  const subsampling = options.subsampling ?? DEFAULT_COMPRESS_OPTIONS.subsampling;
  const chromaDownsample = options.chromaDownsample ?? DEFAULT_COMPRESS_OPTIONS.chromaDownsample;
  const chromaUpsample = options.chromaUpsample ?? DEFAULT_COMPRESS_OPTIONS.chromaUpsample;
  const enter = options.onStage ?? (() => {});

  enter("Idle");
  enter("Validating");
  validateImage(image);
  const params = quantizationParams(strength);
  const { width, height } = image;

  enter("Converting");
  const { y, cb, cr, alpha } = toPlanes(image);

  enter("Subsampling");
  const cbSub = subsampling === "4:2:0" ? downsample(cb, chromaDownsample) : cb;
  const crSub = subsampling === "4:2:0" ? downsample(cr, chromaDownsample) : cr;

  enter("Transforming");
  const yCoeffs = forwardTransform(y);
  const cbCoeffs = forwardTransform(cbSub);
  const crCoeffs = forwardTransform(crSub);

  enter("Quantizing");
  const yLevels = quantize(yCoeffs, params.luma);
  const cbLevels = quantize(cbCoeffs, params.chroma);
  const crLevels = quantize(crCoeffs, params.chroma);

  enter("Dequantizing");
  const yDeq = dequantize(yLevels, params.luma);
  const cbDeq = dequantize(cbLevels, params.chroma);
  const crDeq = dequantize(crLevels, params.chroma);

  enter("InverseTransforming");
  const yOut = inverseTransform(yDeq);
  const cbOut = inverseTransform(cbDeq);
  const crOut = inverseTransform(crDeq);

  enter("Reconstructing");
  const output = assemble(yOut, cbOut, crOut, alpha, width, height, chromaUpsample);

  enter("Done");

  const levelCount = yLevels.levels.length + cbLevels.levels.length + crLevels.levels.length;
  const zeros = countZeroLevels(yLevels) + countZeroLevels(cbLevels) + countZeroLevels(crLevels);
  const sse = squaredError(yCoeffs, yDeq) + squaredError(cbCoeffs, cbDeq) + squaredError(crCoeffs, crDeq);
  return {
    image: output,
    report: {
      strength: params.strength,
      factor: params.factor,
      lumaBlocks: yLevels.count,
      chromaBlocks: cbLevels.count + crLevels.count,
      zeroCoefficientRatio: zeros / levelCount,
      meanSquaredError: sse / levelCount,
    },
  };
}

/**
 * Degrade an RGBA image the way a JPEG round trip would.
 * strength is clamped to [0, 1]; the input buffer is never written.
 */
export function compress(image: RgbaImage, strength: number, options?: CompressOptions): CompressedImage {
  return compressWithReport(image, strength, options).image;
}

/** Same pipeline on a 0..100 quality scale (100 = near-lossless). */
export function compressWithQuality(
  image: RgbaImage,
  quality: number,
  options?: CompressOptions
): CompressedImage {
  return compress(image, qualityToStrength(quality), options);
}

/** Promise-returning form for hosts that await their image operations. */
export async function compressAsync(
  image: RgbaImage,
  strength: number,
  options?: CompressOptions
): Promise<CompressedImage> {
  return compress(image, strength, options);
}
