import { MathUtils, type Vector3 } from 'three';
import {
  DETAIL_FALLOFF_GAIN,
  DETAIL_FALLOFF_RADIUS_RATIO,
  DETAIL_MAX_OFFSET,
  DETAIL_MAX_OFFSET_RIM_RATIO,
  DETAIL_NOISE_GAIN,
  DETAIL_TRANSITION_RATIO,
} from '../core/CraterSettings';
import type { CraterParams } from '../types';
import { SURFACE_DETAIL_OCTAVES, sampleOctaves, type NoiseField } from './noise';

type DetailParams = Pick<CraterParams, 'innerRadius' | 'outerRadius' | 'rimHeight' | 'noiseStrength' | 'outsideNoiseStrength'>;

/**
 * Noise strength at a distance from the crater axis.
 * Inside and outside strengths blend linearly across a band of ±30% of the
 * inner radius around the rim.
 */
export function blendedNoiseStrength(distance: number, params: DetailParams): number {
  const rimRadius = params.innerRadius;
  const transition = rimRadius * DETAIL_TRANSITION_RATIO;

  if (distance < rimRadius - transition) return params.noiseStrength;
  if (distance > rimRadius + transition) return params.outsideNoiseStrength;

  const blend = MathUtils.clamp((distance - (rimRadius - transition)) / (2 * transition), 0, 1);
  return params.noiseStrength * (1 - blend) + params.outsideNoiseStrength * blend;
}

/**
 * Largest height change the detail pass may apply
 */
export function maxDetailOffset(rimHeight: number): number {
  return Math.min(rimHeight * DETAIL_MAX_OFFSET_RIM_RATIO, DETAIL_MAX_OFFSET);
}

/**
 * Height offset for a vertex given its detail noise value and axis distance.
 * Fades to zero at twice the outer radius and is clamped against spikes.
 */
export function detailOffset(noiseValue: number, distance: number, params: DetailParams): number {
  const falloffRadius = params.outerRadius * DETAIL_FALLOFF_RADIUS_RATIO;
  if (distance >= falloffRadius) return 0;

  const strength = blendedNoiseStrength(distance, params);
  const falloff = 1 - distance / falloffRadius;
  const offset = noiseValue * strength * DETAIL_NOISE_GAIN * falloff * DETAIL_FALLOFF_GAIN;
  const limit = maxDetailOffset(params.rimHeight);
  return MathUtils.clamp(offset, -limit, limit);
}

/**
 * Displace vertex heights with fine multi-octave noise.
 * Only z changes; the vertex list and faces are untouched.
 *
 * @returns Number of vertices whose height changed
 */
export function applySurfaceDetail(positions: readonly Vector3[], params: DetailParams, noise: NoiseField): number {
  if (params.noiseStrength <= 0 && params.outsideNoiseStrength <= 0) {
    return 0;
  }

  let displaced = 0;
  for (const p of positions) {
    const distance = Math.sqrt(p.x * p.x + p.y * p.y);
    const n = sampleOctaves(noise, p.x, p.y, p.z, SURFACE_DETAIL_OCTAVES);
    const offset = detailOffset(n, distance, params);
    if (offset !== 0) {
      p.z += offset;
      displaced++;
    }
  }
  return displaced;
}
