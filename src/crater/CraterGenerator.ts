/**
 * Crater generation pipeline.
 *
 * parameters → assembly → bottom closure (optional) → surface detail →
 * topology cleanup (optional) → material zones → uv projection (optional)
 *
 * Assembly, bottom closure and surface detail are required: any failure there
 * aborts with CraterGenerationError and no mesh. Topology, zone and uv failures
 * are logged and recorded in the report; the pipeline continues with what it has.
 */

import { MeshBuilder } from '../geometry/MeshBuilder';
import { optimizeTopology } from '../geometry/TopologyOptimizer';
import {
  MaterialZone,
  type CraterMesh,
  type CraterParams,
  type FaceUvs,
  type GenerationReport,
  type GenerationStage,
  type RandomSource,
  type StageError,
  type TopologyStats,
  type UvProjector,
} from '../types';
import { buildBottomClosure } from './BottomClosure';
import { assembleCrater } from './CraterAssembler';
import { NoiseFieldBuilder, type NoiseField } from './noise';
import { hasValidRadii } from './params';
import { defaultRandom, randomAngle } from './random';
import { applySurfaceDetail } from './SurfaceDetail';
import { classifyZones } from './ZoneClassifier';

export class CraterGenerationError extends Error {
  readonly stage: GenerationStage | 'validation';

  constructor(message: string, stage: GenerationStage | 'validation', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CraterGenerationError';
    this.stage = stage;
  }
}

export interface GenerateOptions {
  /** Source of the blast and inner-asymmetry directions (default Math.random) */
  random?: RandomSource;
  /** Coherent noise for every deformation pass; overrides noiseSeed and noiseOffset */
  noise?: NoiseField;
  /** Seed of the default noise field (default 0) */
  noiseSeed?: number;
  /** Shift of the default noise field's sampling domain */
  noiseOffset?: [number, number, number];
  /** Runs when params.autoUv is on */
  uvProjector?: UvProjector;
}

export interface GeneratedCrater {
  mesh: CraterMesh;
  uvs: FaceUvs | null;
  report: GenerationReport;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Run a required stage, wrapping any failure
 */
function required<T>(stage: GenerationStage, run: () => T): T {
  try {
    return run();
  } catch (err) {
    if (err instanceof CraterGenerationError) throw err;
    throw new CraterGenerationError(`Crater ${stage} failed: ${errorMessage(err)}`, stage, { cause: err });
  }
}

/**
 * Run a recoverable stage; failures are logged and recorded, yielding null
 */
function recoverable<T>(stage: GenerationStage, errors: StageError[], run: () => T): T | null {
  try {
    return run();
  } catch (err) {
    console.error(`[CraterGenerator] ${stage} failed:`, err);
    errors.push({ stage, message: errorMessage(err) });
    return null;
  }
}

function defaultNoise(options: GenerateOptions): NoiseField {
  const builder = new NoiseFieldBuilder().seed(options.noiseSeed ?? 0);
  if (options.noiseOffset) {
    builder.offset(...options.noiseOffset);
  }
  return builder.build();
}

/**
 * Generate one crater mesh. The call owns its buffers and keeps no state;
 * only the random source and the noise seed decide whether two calls produce
 * the same mesh.
 */
export function generateCrater(params: CraterParams, options: GenerateOptions = {}): GeneratedCrater {
  if (!hasValidRadii(params)) {
    throw new CraterGenerationError(
      `innerRadius (${params.innerRadius}) must be smaller than outerRadius (${params.outerRadius})`,
      'validation'
    );
  }

  const random = options.random ?? defaultRandom;
  const noise = options.noise ?? defaultNoise(options);
  const blastAngle = params.blastAsymmetry > 0 ? randomAngle(random) : 0;
  const innerAsymmetryAngle = params.innerAsymmetry > 0 ? randomAngle(random) : 0;

  const builder = new MeshBuilder();
  const rings = required('assembly', () =>
    assembleCrater(builder, { params, noise, blastAngle, innerAsymmetryAngle })
  );

  if (params.closeBottom) {
    required('bottomClosure', () => buildBottomClosure(builder, rings[0].vertices, params));
  }

  required('surfaceDetail', () => {
    builder.setStage('surfaceDetail');
    return applySurfaceDetail(builder.positions, params, noise);
  });

  const stageErrors: StageError[] = [];
  let mesh = builder.toMesh();
  let topology: TopologyStats | null = null;

  if (params.optimizeForGames) {
    const optimized = recoverable('topology', stageErrors, () => optimizeTopology({
      positions: mesh.positions,
      faces: mesh.faces.map(face => face.vertices),
    }));
    if (optimized) {
      topology = optimized.stats;
      mesh = {
        positions: optimized.mesh.positions,
        faces: optimized.mesh.faces.map(vertices => ({ vertices, zone: MaterialZone.Inner })),
      };
    }
  }

  if (params.createMaterials) {
    const current = mesh;
    recoverable('zones', stageErrors, () => classifyZones(current, params));
  }

  let uvs: FaceUvs | null = null;
  const projector = options.uvProjector;
  if (params.autoUv && projector) {
    const current = mesh;
    uvs = recoverable('uv', stageErrors, () => projector.project(current));
  }

  const report: GenerationReport = {
    blastAngle,
    innerAsymmetryAngle,
    skippedFaces: builder.skipped,
    topology,
    stageErrors,
    vertexCount: mesh.positions.length,
    faceCount: mesh.faces.length,
  };

  console.log(`[CraterGenerator] Crater: ${report.faceCount} faces, ${report.vertexCount} vertices`);
  return { mesh, uvs, report };
}
