import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { boxUvProjector } from '../export/uvProjection';
import { faceCentroid, faceNormal } from '../geometry/faceMath';
import { MaterialZone, type CraterParams, type UvProjector } from '../types';
import { CraterGenerationError, generateCrater } from './CraterGenerator';
import { NoiseFieldBuilder, type NoiseField } from './noise';
import { createCraterParams, defaultCraterParams } from './params';
import { createSeededRandom } from './random';

const quiet: Partial<CraterParams> = {
  noiseStrength: 0,
  outsideNoiseStrength: 0,
  closeBottom: false,
  optimizeForGames: false,
};

describe(generateCrater.name, () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('builds the reference crater surface', () => {
    const { mesh, report, uvs } = generateCrater(createCraterParams(quiet));
    expect(mesh.positions).toHaveLength(5 * 24 + 1);
    expect(mesh.faces).toHaveLength(4 * 24 + 24);
    expect(report.skippedFaces).toEqual([]);
    expect(report.topology).toBeNull();
    expect(report.stageErrors).toEqual([]);
    expect(uvs).toBeNull();
    for (const face of mesh.faces) {
      expect(faceNormal(mesh.positions, face.vertices).z).toBeGreaterThanOrEqual(0);
    }
  });

  it('triangulates every quad when optimizing', () => {
    const { mesh, report } = generateCrater(createCraterParams({ ...quiet, optimizeForGames: true }));
    expect(mesh.faces).toHaveLength(4 * 24 * 2 + 24);
    expect(mesh.faces.every(face => face.vertices.length === 3)).toBe(true);
    expect(report.topology).toEqual({ mergedVertices: 0, removedFaces: 0, flippedFaces: 0, triangulatedFaces: 96 });
    expect(report.vertexCount).toBe(121);
    expect(report.faceCount).toBe(216);
  });

  it('logs a summary line', () => {
    generateCrater(createCraterParams(quiet));
    expect(console.log).toHaveBeenCalledWith('[CraterGenerator] Crater: 120 faces, 121 vertices');
  });

  it('keeps vertical walls under the base ring', () => {
    const { mesh } = generateCrater(createCraterParams({ ...quiet, closeBottom: true }));
    expect(mesh.positions).toHaveLength(121 + 5 * 24 + 1);
    for (let ring = 0; ring < 5; ring++) {
      for (let k = 0; k < 24; k++) {
        const wall = mesh.positions[121 + ring * 24 + k];
        expect(wall.x).toBe(mesh.positions[k].x);
        expect(wall.y).toBe(mesh.positions[k].y);
      }
    }
  });

  it('does not draw directions for disabled asymmetries', () => {
    const random = vi.fn(() => 0.25);
    const { report } = generateCrater(createCraterParams(quiet), { random });
    expect(random).not.toHaveBeenCalled();
    expect(report.blastAngle).toBe(0);
    expect(report.innerAsymmetryAngle).toBe(0);
  });

  it('draws the blast and inner directions from the random source', () => {
    const random = vi.fn().mockReturnValueOnce(0.25).mockReturnValueOnce(0.5);
    const { report } = generateCrater(createCraterParams({ ...quiet, blastAsymmetry: 0.5, innerAsymmetry: 0.5 }), { random });
    expect(random).toHaveBeenCalledTimes(2);
    expect(report.blastAngle).toBeCloseTo(Math.PI / 2, 12);
    expect(report.innerAsymmetryAngle).toBeCloseTo(Math.PI, 12);
  });

  it('reproduces the mesh for the same seed', () => {
    const params = createCraterParams({ blastAsymmetry: 0.3, innerAsymmetry: 0.5, edgeFragmentation: 50 });
    const a = generateCrater(params, { random: createSeededRandom('test-seed') });
    const b = generateCrater(params, { random: createSeededRandom('test-seed') });
    expect(b.mesh.positions).toEqual(a.mesh.positions);
    expect(b.report.blastAngle).toBe(a.report.blastAngle);
  });

  it('builds the default noise field from the noise seed and offset', () => {
    const params = createCraterParams({ ...quiet, craterOutlineIrregularity: 40 });
    const seeded = generateCrater(params, { noiseSeed: 5, noiseOffset: [1, 2, 3] });
    const explicit = generateCrater(params, { noise: new NoiseFieldBuilder().seed(5).offset(1, 2, 3).build() });
    expect(seeded.mesh.positions).toEqual(explicit.mesh.positions);
  });

  it('varies the outline with the noise seed', () => {
    const params = createCraterParams({ ...quiet, craterOutlineIrregularity: 40 });
    const a = generateCrater(params, { noiseSeed: 1 });
    const b = generateCrater(params, { noiseSeed: 2 });
    expect(generateCrater(params, { noiseSeed: 1 }).mesh.positions).toEqual(a.mesh.positions);
    expect(b.mesh.positions).not.toEqual(a.mesh.positions);
  });

  it.each([
    { name: 'deep outer rounding', overrides: { outerRadius: 20, innerRadius: 2, outerEdgeRounding: 1 } },
    { name: 'a bowl deeper than the bottom', overrides: { outerRadius: 100, innerRadius: 50, depth: 100 } },
  ])('closes $name without flipping faces', ({ overrides }) => {
    const { report } = generateCrater(createCraterParams({ ...quiet, ...overrides, closeBottom: true, optimizeForGames: true }));
    expect(report.topology?.flippedFaces).toBe(0);
    expect(report.skippedFaces).toEqual([]);
  });

  it('keeps fragmented rim heights between the floor and the rim height', () => {
    const { mesh } = generateCrater(createCraterParams({ ...quiet, edgeFragmentation: 100 }));
    // Rings: base, slope, slope, rim
    for (let k = 3 * 24; k < 4 * 24; k++) {
      const z = mesh.positions[k].z;
      expect(z).toBeGreaterThanOrEqual(0.05 * 0.58 - 1e-12);
      expect(z).toBeLessThanOrEqual(0.58);
    }
  });

  it('assigns the closed bottom to the outer zone', () => {
    const { mesh } = generateCrater(createCraterParams({ ...quiet, closeBottom: true }));
    const bottom = mesh.faces.filter(face => faceCentroid(mesh.positions, face.vertices).z <= -0.95);
    expect(bottom).toHaveLength(24);
    expect(bottom.every(face => face.zone === MaterialZone.Outer)).toBe(true);
    expect(mesh.faces.some(face => face.zone === MaterialZone.Inner)).toBe(true);
  });

  it('leaves every face in the inner zone without materials', () => {
    const { mesh } = generateCrater(createCraterParams({ ...quiet, closeBottom: true, createMaterials: false }));
    expect(mesh.faces.every(face => face.zone === MaterialZone.Inner)).toBe(true);
  });

  it('projects uvs per face corner', () => {
    const { mesh, uvs } = generateCrater(createCraterParams(quiet), { uvProjector: boxUvProjector });
    expect(uvs).toHaveLength(mesh.faces.length);
    uvs?.forEach((faceUvs, f) => expect(faceUvs).toHaveLength(mesh.faces[f].vertices.length));
  });

  it('skips uvs when autoUv is off', () => {
    const projector: UvProjector = { project: vi.fn(() => []) };
    const { uvs } = generateCrater(createCraterParams({ ...quiet, autoUv: false }), { uvProjector: projector });
    expect(uvs).toBeNull();
    expect(projector.project).not.toHaveBeenCalled();
  });

  it('records a failing optional stage and continues', () => {
    const projector: UvProjector = {
      project: () => {
        throw new Error('projection failed');
      },
    };
    const { mesh, uvs, report } = generateCrater(createCraterParams(quiet), { uvProjector: projector });
    expect(mesh.faces).toHaveLength(120);
    expect(uvs).toBeNull();
    expect(report.stageErrors).toEqual([{ stage: 'uv', message: 'projection failed' }]);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('rejects unrepaired radii', () => {
    const params = { ...defaultCraterParams(), innerRadius: 3 };
    expect(() => generateCrater(params)).toThrow(CraterGenerationError);
  });

  it('wraps failures of required stages', () => {
    const broken = new Error('noise unavailable');
    const noise: NoiseField = {
      sample: () => {
        throw broken;
      },
    };
    let caught: unknown;
    try {
      generateCrater(createCraterParams(quiet), { noise });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CraterGenerationError);
    if (caught instanceof CraterGenerationError) {
      expect(caught.stage).toBe('assembly');
      expect(caught.cause).toBe(broken);
    }
  });
});
