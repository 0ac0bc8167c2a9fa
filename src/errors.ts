export type ErrorCode =
  | "INVALID_DIMENSIONS"
  | "SHAPE_MISMATCH"
  | "INVALID_STRENGTH"
  | "INVALID_QUALITY"
  | "DECODE_FAILED";

export class JpegArtifactError extends Error {
  override readonly name = "JpegArtifactError";

  constructor(
    message: string,
    public readonly code: ErrorCode,
    override readonly cause?: unknown
  ) {
    super(message, { cause });
  }
}

export function isJpegArtifactError(err: unknown): err is JpegArtifactError {
  return err instanceof JpegArtifactError;
}
