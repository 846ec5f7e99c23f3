/**
 * Crater-wide settings and constants.
 *
 * This is the SINGLE SOURCE OF TRUTH for default values, parameter ranges and
 * tuned constants used across the generator. Do not duplicate these values
 * elsewhere - always import from this file.
 */

import type { CraterParams, NumericCraterParam, RandomRanges, RingTier } from '../types';

/**
 * Default crater (matches the reference crater the profile was tuned on)
 */
export const DEFAULT_CRATER_PARAMS: Readonly<CraterParams> = Object.freeze({
  outerRadius: 2.6,
  innerRadius: 1.3,
  depth: 0.5,
  rimHeight: 0.58,
  resolution: 24,
  noiseStrength: 0.05,
  outsideNoiseStrength: 0.02,
  closeBottom: true,
  bottomThickness: 1.0,
  outerWallAngle: 0,
  innerWallAngle: 0,
  outerEdgeRounding: 0,
  rimEdgeRounding: 0,
  craterOutlineIrregularity: 0,
  innerAsymmetry: 0,
  blastAsymmetry: 0,
  edgeFragmentation: 0,
  rimHeightVariation: 0,
  rimNoiseScale: 3,
  optimizeForGames: true,
  createMaterials: true,
  autoUv: true,
});

/**
 * Inclusive [min, max] range per numeric parameter
 */
export const CRATER_PARAM_RANGES: Readonly<Record<NumericCraterParam, readonly [number, number]>> = {
  outerRadius: [0.5, 100],
  innerRadius: [0.1, 50],
  depth: [0.1, 100],
  rimHeight: [0, 100],
  resolution: [8, 500],
  noiseStrength: [0, 30],
  outsideNoiseStrength: [0, 30],
  bottomThickness: [0.1, 10],
  outerWallAngle: [-89, 89],   // degrees
  innerWallAngle: [-89, 89],   // degrees
  outerEdgeRounding: [0, 1],
  rimEdgeRounding: [0, 1],
  craterOutlineIrregularity: [0, 100],
  innerAsymmetry: [0, 1],
  blastAsymmetry: [0, 1],
  edgeFragmentation: [0, 100],
  rimHeightVariation: [0, 1],
  rimNoiseScale: [0.5, 10],
};

export const NUMERIC_CRATER_PARAMS: readonly NumericCraterParam[] = [
  'outerRadius', 'innerRadius', 'depth', 'rimHeight', 'resolution',
  'noiseStrength', 'outsideNoiseStrength', 'bottomThickness',
  'outerWallAngle', 'innerWallAngle', 'outerEdgeRounding', 'rimEdgeRounding',
  'craterOutlineIrregularity', 'innerAsymmetry', 'blastAsymmetry',
  'edgeFragmentation', 'rimHeightVariation', 'rimNoiseScale',
];

/**
 * Ranges used by the batch (randomized) constructor
 */
export const DEFAULT_RANDOM_RANGES: Readonly<RandomRanges> = {
  outerRadius: [1, 20],
  innerRadius: [0.5, 10],
  depth: [0.1, 10],
  rimHeight: [0, 5],
  resolution: [8, 64],
  noise: [0, 1],
  blastAsymmetry: [0, 0.5],
  edgeFragmentation: [0, 5],
  rimHeightVariation: [0, 0.3],
  rimNoiseScale: [1, 8],
};

/**
 * Inner radius becomes this fraction of the outer radius when the pair is invalid
 */
export const INNER_RADIUS_REPAIR_RATIO = 0.7;

// ============================================
// Ring profile
// ============================================

/**
 * Blast asymmetry strength per ring tier (strongest at the base)
 */
export const BLAST_TIER_STRENGTH: Readonly<Record<RingTier, number>> = {
  outerRounding: 1.0,
  base: 1.0,
  slope: 0.8,
  rimRounding: 0.7,
  rim: 0.6,
  bowl: 0.4,
};

/**
 * Outline irregularity attenuation per ring tier (fades toward the interior)
 */
export const IRREGULARITY_TIER_ATTENUATION: Readonly<Record<RingTier, number>> = {
  outerRounding: 1.0,
  base: 1.0,
  slope: 0.85,
  rimRounding: 0.75,
  rim: 0.7,
  bowl: 0.4,
};

export const IRREGULARITY_SCALE = 0.15;
export const INNER_ASYMMETRY_SCALE = 0.35;

export const SLOPE_HEIGHT_EXPONENT = 0.8;
export const BOWL_RADIUS_SHRINK = 0.7;
export const INNER_WALL_OFFSET_MULTIPLIER = 2.0;
export const CENTER_OFFSET_RATIO = 0.1;
/** Bowl rings never shrink below this fraction of the inner radius */
export const MIN_BOWL_RADIUS_RATIO = 0.02;

/** Extra rings per unit of edge rounding */
export const ROUNDING_RINGS_PER_UNIT = 3;
/** With a closed bottom, outer rounding drops at most this fraction of the bottom thickness */
export const ROUNDING_MAX_DROP_RATIO = 0.5;

// ============================================
// Fragmentation
// ============================================

export const FRAGMENTATION_BASE_THRESHOLD = 0.4;
export const FRAGMENTATION_THRESHOLD_SLOPE = 0.7;
export const FRAGMENTATION_DAMAGE_EXPONENT = 0.7;
export const FRAGMENTATION_DAMAGE_GAIN = 2.0;
/** A fragmented vertex keeps at least this fraction of its height */
export const FRAGMENTATION_FLOOR = 0.05;

// ============================================
// Bottom closure
// ============================================

export const WALL_RING_COUNT = 5;
export const WALL_OFFSET_MULTIPLIER = 3.0;
export const WALL_OFFSET_EXPONENT = 1.5;
/** Bottom center only shifts when the outer wall angle exceeds this (degrees) */
export const BOTTOM_CENTER_OFFSET_MIN_ANGLE = 1;
/** Bottom plate stays this fraction of the thickness below the lowest surface vertex */
export const BOTTOM_CLEARANCE_RATIO = 0.1;

// ============================================
// Surface detail
// ============================================

export const DETAIL_TRANSITION_RATIO = 0.3;
export const DETAIL_NOISE_GAIN = 0.1;
export const DETAIL_FALLOFF_GAIN = 0.3;
export const DETAIL_FALLOFF_RADIUS_RATIO = 2.0;
export const DETAIL_MAX_OFFSET_RIM_RATIO = 0.2;
export const DETAIL_MAX_OFFSET = 0.5;

// ============================================
// Topology
// ============================================

export const MERGE_DISTANCE = 0.001;
export const DEGENERATE_DISTANCE = 0.0001;

// ============================================
// Zones
// ============================================

export const ZONE_INNER_RADIUS_RATIO = 1.2;
export const ZONE_INNER_HEIGHT_RATIO = 0.4;
export const ZONE_STEEP_NORMAL_Z = 0.4;
export const ZONE_BOTTOM_TOLERANCE = 0.05;
export const ZONE_SIDE_WALL_Z = -0.05;
export const ZONE_SIDE_WALL_RADIUS_RATIO = 0.8;
