import alea from 'alea';
import { createNoise3D, type NoiseFunction3D } from 'simplex-noise';

/**
 * Deterministic coherent noise in [-1, 1]
 */
export interface NoiseField {
  sample(x: number, y: number, z: number): number;
}

export type Octave = {
  frequency: number,
  weight: number,
}

export type NoiseFieldArgs = {
  seed: number,
  offset: [number, number, number],
}

export class NoiseFieldBuilder {
  private args: NoiseFieldArgs = {
    seed: 0,
    offset: [0, 0, 0],
  }

  seed(value: number) {
    this.args.seed = value;
    return this;
  }

  offset(x: number, y: number, z: number) {
    this.args.offset = [x, y, z];
    return this;
  }

  build() {
    return createNoiseField(this.args);
  }
}

export function createNoiseField(args: NoiseFieldArgs): NoiseField {
  const noise3D: NoiseFunction3D = createNoise3D(alea(args.seed));
  const [ox, oy, oz] = args.offset;

  return {
    sample: (x: number, y: number, z: number) => noise3D(x + ox, y + oy, z + oz),
  };
}

/**
 * Weighted sum of the field sampled at each octave's frequency
 */
export function sampleOctaves(
  field: NoiseField,
  x: number,
  y: number,
  z: number,
  octaves: readonly Octave[]
): number {
  let value = 0;
  for (const { frequency, weight } of octaves) {
    value += field.sample(x * frequency, y * frequency, z * frequency) * weight;
  }
  return value;
}

// Octave sets used by the deformation passes

/** Outline wobble around the ring: ~2 major, ~5 medium, ~11 small bumps */
export const OUTLINE_OCTAVES: readonly Octave[] = [
  { frequency: 2, weight: 0.6 },
  { frequency: 5, weight: 0.3 },
  { frequency: 11, weight: 0.1 },
];

export const FRAGMENTATION_OCTAVES: readonly Octave[] = [
  { frequency: 0.5, weight: 0.6 },  // Large chunks
  { frequency: 2.0, weight: 0.4 },  // Smaller detail
];

export const SURFACE_DETAIL_OCTAVES: readonly Octave[] = [
  { frequency: 1, weight: 0.5 },
  { frequency: 3, weight: 0.3 },
  { frequency: 8, weight: 0.2 },
];

/**
 * Rim height octaves for a given rim noise scale
 */
export function rimVariationOctaves(rimNoiseScale: number): Octave[] {
  const scale = rimNoiseScale * 0.1;
  return [
    { frequency: scale, weight: 0.7 },
    { frequency: scale * 3, weight: 0.3 },
  ];
}
