export {
  compress,
  compressAsync,
  compressWithQuality,
  compressWithReport,
  validateImage,
  DEFAULT_COMPRESS_OPTIONS,
  ENGINE_STAGES,
} from "./engine";
export { rgbToYCbCr, yCbCrToRgb, toPlanes } from "./color";
export { downsample, upsample } from "./chroma";
export {
  forward,
  forwardTransform,
  quantize,
  transformBlock,
  quantizeBlock,
  extractBlock,
  blockGrid,
} from "./block-transform";
export {
  inverse,
  inverseTransform,
  dequantize,
  dequantizeBlock,
  reconstructBlock,
  squaredError,
} from "./block-inverse";
export { assemble } from "./reconstruct";
export {
  strengthToFactor,
  strengthToRung,
  qualityToStrength,
  clampStrength,
  buildQuantTable,
  quantizationParams,
  LUMA_BASE,
  CHROMA_BASE,
} from "./quantize";
export { fdct8x8, idct8x8, ZIGZAG } from "./dct";
export { meanAbsoluteError, psnr, maxChannelDifference } from "./metrics";
export { addJpegArtifacts, readImage, encodePng, encodeJpeg, referenceJpegRoundTrip } from "./artifacts";
export { JpegArtifactError, isJpegArtifactError } from "./errors";
export type { ErrorCode } from "./errors";
export type { BlockGrid, CoefficientBlocks, QuantizedBlocks } from "./block-transform";
export type { QuantTable, QuantizationParams } from "./quantize";
export type { ColorPlanes } from "./color";
export type * from "./types";
