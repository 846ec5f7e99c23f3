/**
 * Construction of the immutable CraterParams record.
 *
 * Interactive callers use createCraterParams() with explicit overrides, batch
 * callers use randomCraterParams() with a random source and ranges. Both clamp
 * every field to its documented range and repair the inner/outer radius pair,
 * so the generator can assume pre-validated input.
 */

import { MathUtils } from 'three';
import {
  CRATER_PARAM_RANGES,
  DEFAULT_CRATER_PARAMS,
  DEFAULT_RANDOM_RANGES,
  INNER_RADIUS_REPAIR_RATIO,
  NUMERIC_CRATER_PARAMS,
} from '../core/CraterSettings';
import type { CraterParams, NumericCraterParam, RandomRanges, RandomSource } from '../types';
import { randomInRange, randomIntInRange } from './random';

/**
 * Reset-to-defaults record
 */
export function defaultCraterParams(): CraterParams {
  return Object.freeze({ ...DEFAULT_CRATER_PARAMS });
}

/**
 * Clamp one numeric parameter to its range. Non-finite values fall back to the default.
 */
export function clampParam(name: NumericCraterParam, value: number): number {
  if (!Number.isFinite(value)) {
    return DEFAULT_CRATER_PARAMS[name];
  }
  const [min, max] = CRATER_PARAM_RANGES[name];
  const clamped = MathUtils.clamp(value, min, max);
  return name === 'resolution' ? Math.round(clamped) : clamped;
}

export function clampCraterParams(params: CraterParams): CraterParams {
  const clamped: Record<NumericCraterParam, number> = { ...params };
  for (const name of NUMERIC_CRATER_PARAMS) {
    clamped[name] = clampParam(name, params[name]);
  }
  return { ...params, ...clamped };
}

/**
 * Inner radius must stay below the outer radius; otherwise it becomes 70% of it.
 * Returns the input unchanged when the pair is already valid.
 */
export function repairRadii(params: CraterParams): CraterParams {
  if (params.innerRadius < params.outerRadius) {
    return params;
  }
  return { ...params, innerRadius: params.outerRadius * INNER_RADIUS_REPAIR_RATIO };
}

export function hasValidRadii(params: Pick<CraterParams, 'innerRadius' | 'outerRadius'>): boolean {
  return params.innerRadius < params.outerRadius;
}

/**
 * Interactive constructor: defaults merged with overrides, clamped, repaired, frozen
 */
export function createCraterParams(overrides: Partial<CraterParams> = {}): CraterParams {
  const merged: CraterParams = { ...DEFAULT_CRATER_PARAMS, ...overrides };
  return Object.freeze(repairRadii(clampCraterParams(merged)));
}

/**
 * Batch constructor: draws the randomized fields from their ranges.
 * Fields without a random range (bottom, wall angles, rounding...) come from base.
 */
export function randomCraterParams(
  random: RandomSource,
  ranges: RandomRanges = DEFAULT_RANDOM_RANGES,
  base: Partial<CraterParams> = {}
): CraterParams {
  const draw = (range: readonly [number, number]) => randomInRange(random, range[0], range[1]);

  return createCraterParams({
    ...base,
    outerRadius: draw(ranges.outerRadius),
    innerRadius: draw(ranges.innerRadius),
    depth: draw(ranges.depth),
    rimHeight: draw(ranges.rimHeight),
    resolution: randomIntInRange(random, ranges.resolution[0], ranges.resolution[1]),
    noiseStrength: draw(ranges.noise),
    outsideNoiseStrength: draw(ranges.noise),
    blastAsymmetry: draw(ranges.blastAsymmetry),
    edgeFragmentation: draw(ranges.edgeFragmentation),
    rimHeightVariation: draw(ranges.rimHeightVariation),
    rimNoiseScale: draw(ranges.rimNoiseScale),
    // Always on for randomized craters
    createMaterials: true,
    autoUv: true,
    optimizeForGames: true,
  });
}
