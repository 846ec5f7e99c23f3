/**
 * Builds one ring of crater vertices.
 *
 * Vertex k sits at angle θ = 2πk/N. Its radius is scaled by the product of the
 * active radial factors (blast asymmetry, outline irregularity, and inner
 * asymmetry on bowl rings), and rim-weighted rings additionally pick up rim
 * height variation and edge fragmentation. Every factor is exactly neutral
 * (1 or 0) when its parameter is 0.
 */

import { MathUtils } from 'three';
import {
  BLAST_TIER_STRENGTH,
  FRAGMENTATION_BASE_THRESHOLD,
  FRAGMENTATION_DAMAGE_EXPONENT,
  FRAGMENTATION_DAMAGE_GAIN,
  FRAGMENTATION_FLOOR,
  FRAGMENTATION_THRESHOLD_SLOPE,
  INNER_ASYMMETRY_SCALE,
  IRREGULARITY_SCALE,
  IRREGULARITY_TIER_ATTENUATION,
} from '../core/CraterSettings';
import type { MeshBuilder } from '../geometry/MeshBuilder';
import type { CraterParams, RingTier } from '../types';
import {
  FRAGMENTATION_OCTAVES,
  OUTLINE_OCTAVES,
  rimVariationOctaves,
  sampleOctaves,
  type NoiseField,
} from './noise';

/**
 * Per-generation state shared by every ring
 */
export interface RingContext {
  params: CraterParams;
  noise: NoiseField;
  blastAngle: number;          // Radians
  innerAsymmetryAngle: number; // Radians
}

export interface RingPlan {
  tier: RingTier;
  radius: number;
  height: number;
  rimWeight: number;  // 0 = no rim variation/fragmentation, 1 = full rim
}

/**
 * Angle of vertex k in a ring of the given resolution
 */
export function ringAngle(k: number, resolution: number): number {
  return (2 * Math.PI * k) / resolution;
}

/**
 * Off-center explosion: stretches the ring toward the blast direction
 */
export function blastAsymmetryFactor(
  theta: number,
  blastAsymmetry: number,
  blastAngle: number,
  tierStrength: number
): number {
  if (blastAsymmetry === 0) return 1;
  return 1 + blastAsymmetry * Math.cos(theta - blastAngle) * tierStrength;
}

/**
 * Multi-octave noise sampled on the unit circle, so the outline wraps seamlessly
 */
export function outlineNoise(noise: NoiseField, theta: number, layer: number = 0): number {
  return sampleOctaves(noise, Math.cos(theta), Math.sin(theta), layer, OUTLINE_OCTAVES);
}

export function irregularityFactor(
  noise: NoiseField,
  theta: number,
  irregularity: number,
  tierAttenuation: number
): number {
  if (irregularity === 0) return 1;
  return 1 + outlineNoise(noise, theta) * (irregularity / 50) * IRREGULARITY_SCALE * tierAttenuation;
}

/**
 * Bowl-only bias toward a second random direction, roughened by noise
 */
export function innerAsymmetryFactor(
  noise: NoiseField,
  theta: number,
  innerAsymmetry: number,
  innerAsymmetryAngle: number
): number {
  if (innerAsymmetry === 0) return 1;
  const bias = 0.6 * Math.cos(theta - innerAsymmetryAngle) + 0.4 * outlineNoise(noise, theta, 1);
  return 1 + innerAsymmetry * bias * INNER_ASYMMETRY_SCALE;
}

/**
 * Additive rim height perturbation at (x, y)
 */
export function rimHeightVariation(
  noise: NoiseField,
  x: number,
  y: number,
  params: Pick<CraterParams, 'rimHeightVariation' | 'rimHeight' | 'rimNoiseScale'>
): number {
  if (params.rimHeightVariation === 0) return 0;
  const n = sampleOctaves(noise, x, y, 0, rimVariationOctaves(params.rimNoiseScale));
  return n * params.rimHeightVariation * params.rimHeight;
}

export function fragmentationNoise(noise: NoiseField, x: number, y: number): number {
  return sampleOctaves(noise, x, y, 0, FRAGMENTATION_OCTAVES);
}

/**
 * Height multiplier for a rim vertex given its fragmentation noise.
 *
 * The threshold tightens as fragmentation grows; the damage follows a power
 * curve of how far the noise exceeds it and is floored, so a vertex only
 * collapses toward the base level and is never removed.
 */
export function fragmentationFactor(fragNoise: number, edgeFragmentation: number): number {
  if (edgeFragmentation <= 0) return 1;
  const intensity = edgeFragmentation / 100;
  const threshold = FRAGMENTATION_BASE_THRESHOLD - intensity * FRAGMENTATION_THRESHOLD_SLOPE;
  if (fragNoise <= threshold) return 1;

  const excess = MathUtils.clamp((fragNoise - threshold) / (1 - threshold), 0, 1);
  const damage = excess ** FRAGMENTATION_DAMAGE_EXPONENT * intensity * FRAGMENTATION_DAMAGE_GAIN;
  return Math.max(FRAGMENTATION_FLOOR, 1 - damage);
}

/**
 * Position of one ring vertex
 */
export function ringVertexPosition(plan: RingPlan, k: number, ctx: RingContext): [number, number, number] {
  const { params, noise } = ctx;
  const theta = ringAngle(k, params.resolution);

  let radial = blastAsymmetryFactor(theta, params.blastAsymmetry, ctx.blastAngle, BLAST_TIER_STRENGTH[plan.tier])
    * irregularityFactor(noise, theta, params.craterOutlineIrregularity, IRREGULARITY_TIER_ATTENUATION[plan.tier]);
  if (plan.tier === 'bowl') {
    radial *= innerAsymmetryFactor(noise, theta, params.innerAsymmetry, ctx.innerAsymmetryAngle);
  }

  const x = plan.radius * Math.cos(theta) * radial;
  const y = plan.radius * Math.sin(theta) * radial;

  let z = plan.height;
  const w = plan.rimWeight;
  if (w > 0) {
    const variation = rimHeightVariation(noise, x, y, params);
    const fragmentation = fragmentationFactor(fragmentationNoise(noise, x, y), params.edgeFragmentation);
    z = (z + w * variation) * MathUtils.lerp(1, fragmentation, w);
  }

  return [x, y, z];
}

/**
 * Add one ring to the mesh; returns its vertex indices in angular order
 */
export function buildRing(builder: MeshBuilder, plan: RingPlan, ctx: RingContext): number[] {
  const vertices: number[] = [];
  for (let k = 0; k < ctx.params.resolution; k++) {
    const [x, y, z] = ringVertexPosition(plan, k, ctx);
    vertices.push(builder.addVertex(x, y, z));
  }
  return vertices;
}
