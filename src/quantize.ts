import { BLOCK_AREA } from "./dct";
import { JpegArtifactError } from "./errors";
import { clamp } from "./utils";
import tables from "./quant-tables.json";

/** Per-position quantization steps, natural row-major order. */
export type QuantTable = Float64Array;

// Fine steps at low frequencies, coarse at high ones; chroma coarser than luma.
export const LUMA_BASE: readonly number[] = checkTable("luma", tables.luma);
export const CHROMA_BASE: readonly number[] = checkTable("chroma", tables.chroma);

// Factors form a doubling ladder MIN_FACTOR·2^k, k = 0..LADDER_STEPS. Every step at rung k+1 is
// twice the step at rung k, so each coarser rounding grid is a subset of every finer one.
export const LADDER_STEPS = 15;
export const MAX_FACTOR = 8;
export const MIN_FACTOR = MAX_FACTOR / Math.pow(2, LADDER_STEPS); // 2^-12

function checkTable(name: string, values: number[]): readonly number[] {
  if (values.length !== BLOCK_AREA || values.some((v) => !(v > 0))) {
    throw new Error(`quant-tables.json: "${name}" must hold ${BLOCK_AREA} positive entries`);
  }
  return values;
}

/** Clamp a strength into [0, 1]; NaN has no nearest bound and is rejected. */
export function clampStrength(strength: number): number {
  if (Number.isNaN(strength)) {
    throw new JpegArtifactError("strength must be a number in [0, 1], got NaN", "INVALID_STRENGTH");
  }
  return clamp(strength, 0, 1);
}

/** 0..100 quality (100 = best) onto strength; clamped the same way strength is. */
export function qualityToStrength(quality: number): number {
  if (Number.isNaN(quality)) {
    throw new JpegArtifactError("quality must be a number in [0, 100], got NaN", "INVALID_QUALITY");
  }
  return clamp((100 - quality) / 100, 0, 1);
}

/** Ladder rung for a strength: round(LADDER_STEPS · √s), 0..LADDER_STEPS. */
export function strengthToRung(strength: number): number {
  return Math.round(LADDER_STEPS * Math.sqrt(clampStrength(strength)));
}

/**
 * Strength → multiplier applied to the base matrices.
 * factor = MIN_FACTOR · 2^rung: MIN_FACTOR at s = 0, MAX_FACTOR at s = 1, non-decreasing between.
 */
export function strengthToFactor(strength: number): number {
  return MIN_FACTOR * Math.pow(2, strengthToRung(strength));
}

export function buildQuantTable(base: readonly number[], factor: number): QuantTable {
  if (!(factor > 0)) {
    throw new RangeError(`quantization factor must be positive, got ${factor}`);
  }
  const table = new Float64Array(BLOCK_AREA);
  for (let i = 0; i < BLOCK_AREA; i++) table[i] = base[i] * factor;
  return table;
}

export interface QuantizationParams {
  strength: number;
  factor: number;
  luma: QuantTable;
  chroma: QuantTable;
}

export function quantizationParams(strength: number): QuantizationParams {
  const s = clampStrength(strength);
  const factor = strengthToFactor(s);
  return {
    strength: s,
    factor,
    luma: buildQuantTable(LUMA_BASE, factor),
    chroma: buildQuantTable(CHROMA_BASE, factor),
  };
}
