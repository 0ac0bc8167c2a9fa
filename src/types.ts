/** Bytes accepted as RGBA input: plain bytes, Node Buffers or canvas-style clamped bytes. */
export type PixelBuffer = Uint8Array | Uint8ClampedArray;

export interface RgbaImage<P extends PixelBuffer = PixelBuffer> {
  readonly width: number;
  readonly height: number;
  readonly pixels: P; // RGBA, row-major, length = width * height * 4
}

/** Output of the pipeline; always a freshly allocated buffer. */
export type CompressedImage = RgbaImage<Uint8ClampedArray>;

/** Single-channel sample grid. */
export interface Plane {
  readonly width: number;
  readonly height: number;
  readonly data: Float64Array;
}

export type RGB = [number, number, number];
export type YCbCr = [number, number, number];

export type Subsampling = "4:2:0" | "4:4:4";
export type DownsampleMode = "average" | "sample";
export type UpsampleMode = "replicate" | "bilinear";

export type EngineStage =
  | "Idle"
  | "Validating"
  | "Converting"
  | "Subsampling"
  | "Transforming"
  | "Quantizing"
  | "Dequantizing"
  | "InverseTransforming"
  | "Reconstructing"
  | "Done";

export interface CompressOptions {
  subsampling?: Subsampling;           // chroma resolution, independent of strength
  chromaDownsample?: DownsampleMode;
  chromaUpsample?: UpsampleMode;
  onStage?: (stage: EngineStage) => void;
}

export interface CompressionReport {
  strength: number;          // after clamping
  factor: number;            // strengthToFactor(strength), a power of two
  lumaBlocks: number;
  chromaBlocks: number;      // Cb + Cr
  zeroCoefficientRatio: number; // share of quantized levels equal to 0
  meanSquaredError: number;  // per coefficient over Y, Cb, Cr; non-decreasing in strength
}

export interface CompressionResult {
  image: CompressedImage;
  report: CompressionReport;
}

export interface ArtifactOptions extends CompressOptions {
  strength?: number;         // 0..1, wins over quality
  quality?: number;          // 0..100, inverse of strength
  output?: "png" | "jpeg";   // container for the degraded pixels
  jpegQuality?: number;      // only for output: "jpeg"
  verbose?: boolean;
}

export interface ArtifactResult {
  image: Buffer;
  width: number;
  height: number;
  report: CompressionReport;
}
