import { describe, it, expect } from 'vitest';
import { DEFAULT_CRATER_PARAMS } from '../core/CraterSettings';
import {
  clampParam,
  createCraterParams,
  defaultCraterParams,
  hasValidRadii,
  randomCraterParams,
  repairRadii,
} from './params';

describe(defaultCraterParams.name, () => {
  it('returns a frozen copy of the defaults', () => {
    const params = defaultCraterParams();
    expect(params).toEqual(DEFAULT_CRATER_PARAMS);
    expect(Object.isFrozen(params)).toBe(true);
  });
});

describe(clampParam.name, () => {
  it.each([
    { name: 'resolution' as const, value: 7.6, expected: 8 },
    { name: 'resolution' as const, value: 33.4, expected: 33 },
    { name: 'resolution' as const, value: 1000, expected: 500 },
    { name: 'outerRadius' as const, value: 200, expected: 100 },
    { name: 'outerWallAngle' as const, value: -120, expected: -89 },
    { name: 'edgeFragmentation' as const, value: 42, expected: 42 },
  ])('clamps $name=$value to $expected', ({ name, value, expected }) => {
    expect(clampParam(name, value)).toBe(expected);
  });

  it('falls back to the default for non-finite values', () => {
    expect(clampParam('depth', Number.NaN)).toBe(0.5);
    expect(clampParam('rimNoiseScale', Number.POSITIVE_INFINITY)).toBe(3);
  });
});

describe(repairRadii.name, () => {
  it('returns the input unchanged when inner < outer', () => {
    const params = defaultCraterParams();
    expect(repairRadii(params)).toBe(params);
  });

  it.each([
    { innerRadius: 2.6 },
    { innerRadius: 3 },
  ])('sets inner to 70% of outer when inner=$innerRadius', ({ innerRadius }) => {
    const repaired = repairRadii({ ...defaultCraterParams(), innerRadius });
    expect(repaired.innerRadius).toBeCloseTo(1.82, 10);
    expect(repaired.outerRadius).toBe(2.6);
  });
});

describe(hasValidRadii.name, () => {
  it('requires inner strictly below outer', () => {
    expect(hasValidRadii({ innerRadius: 1, outerRadius: 2 })).toBe(true);
    expect(hasValidRadii({ innerRadius: 2, outerRadius: 2 })).toBe(false);
  });
});

describe(createCraterParams.name, () => {
  it('merges overrides over defaults', () => {
    const params = createCraterParams({ depth: 2, closeBottom: false });
    expect(params.depth).toBe(2);
    expect(params.closeBottom).toBe(false);
    expect(params.outerRadius).toBe(2.6);
  });

  it('clamps and repairs before freezing', () => {
    const params = createCraterParams({ innerRadius: 5, resolution: 2 });
    expect(params.resolution).toBe(8);
    expect(params.innerRadius).toBeCloseTo(1.82, 10);
    expect(Object.isFrozen(params)).toBe(true);
  });
});

describe(randomCraterParams.name, () => {
  it('draws every randomized field from its range', () => {
    const params = randomCraterParams(() => 0.5);
    expect(params.outerRadius).toBeCloseTo(10.5);
    expect(params.innerRadius).toBeCloseTo(5.25);
    expect(params.depth).toBeCloseTo(5.05);
    expect(params.rimHeight).toBeCloseTo(2.5);
    expect(params.resolution).toBe(36);
    expect(params.noiseStrength).toBeCloseTo(0.5);
    expect(params.outsideNoiseStrength).toBeCloseTo(0.5);
    expect(params.blastAsymmetry).toBeCloseTo(0.25);
    expect(params.edgeFragmentation).toBeCloseTo(2.5);
    expect(params.rimHeightVariation).toBeCloseTo(0.15);
    expect(params.rimNoiseScale).toBeCloseTo(4.5);
  });

  it('forces the output toggles on and keeps base fields', () => {
    const params = randomCraterParams(() => 0.5, undefined, {
      closeBottom: false,
      autoUv: false,
      outerWallAngle: 20,
    });
    expect(params.closeBottom).toBe(false);
    expect(params.outerWallAngle).toBe(20);
    expect(params.autoUv).toBe(true);
    expect(params.createMaterials).toBe(true);
    expect(params.optimizeForGames).toBe(true);
  });

  it('repairs an inner radius drawn above the outer radius', () => {
    const params = randomCraterParams(() => 0, {
      outerRadius: [2, 2],
      innerRadius: [3, 3],
      depth: [1, 1],
      rimHeight: [0.5, 0.5],
      resolution: [16, 16],
      noise: [0, 0],
      blastAsymmetry: [0, 0],
      edgeFragmentation: [0, 0],
      rimHeightVariation: [0, 0],
      rimNoiseScale: [2, 2],
    });
    expect(params.innerRadius).toBeCloseTo(1.4, 10);
    expect(params.resolution).toBe(16);
  });
});
