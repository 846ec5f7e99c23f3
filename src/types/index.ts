import type { Vector3 } from 'three';

// ============================================
// Parameters
// ============================================

/**
 * Immutable crater configuration read by every generation stage.
 * Angles are in degrees; the crater's vertical axis is z.
 */
export interface CraterParams {
  readonly outerRadius: number;     // Ground-level base radius
  readonly innerRadius: number;     // Rim (lip) radius, always < outerRadius
  readonly depth: number;           // Depth of the bowl center below ground
  readonly rimHeight: number;       // Rim height above ground
  readonly resolution: number;      // Vertices per ring (8-500)
  readonly noiseStrength: number;   // Surface noise inside the rim
  readonly outsideNoiseStrength: number; // Surface noise outside the rim
  readonly closeBottom: boolean;
  readonly bottomThickness: number;
  readonly outerWallAngle: number;  // 0 = vertical underside walls
  readonly innerWallAngle: number;  // 0 = no radial bowl adjustment
  readonly outerEdgeRounding: number;  // 0-1
  readonly rimEdgeRounding: number;    // 0-1
  readonly craterOutlineIrregularity: number; // 0-100
  readonly innerAsymmetry: number;  // 0-1
  readonly blastAsymmetry: number;  // 0-1
  readonly edgeFragmentation: number; // 0-100
  readonly rimHeightVariation: number; // 0-1
  readonly rimNoiseScale: number;
  readonly optimizeForGames: boolean;
  readonly createMaterials: boolean;
  readonly autoUv: boolean;
}

type KeysOfType<T, V> = { [K in keyof T]: T[K] extends V ? K : never }[keyof T];

export type NumericCraterParam = KeysOfType<CraterParams, number>;

export type Range = readonly [min: number, max: number];

/**
 * Ranges for randomized (batch) crater construction
 */
export interface RandomRanges {
  outerRadius: Range;
  innerRadius: Range;
  depth: Range;
  rimHeight: Range;
  resolution: Range;
  noise: Range;        // Shared by inside and outside surface noise
  blastAsymmetry: Range;
  edgeFragmentation: Range;
  rimHeightVariation: Range;
  rimNoiseScale: Range;
}

/**
 * Uniform random source in [0, 1)
 */
export type RandomSource = () => number;

// ============================================
// Mesh
// ============================================

/**
 * Material slot selected per face
 */
export const MaterialZone = {
  Inner: 0,
  Outer: 1,
} as const;

export type MaterialZone = typeof MaterialZone[keyof typeof MaterialZone];

export interface CraterFace {
  vertices: number[];   // Counter-clockwise seen from the side the face points to
  zone: MaterialZone;
}

/**
 * The generator's deliverable: vertex positions and faces referencing them by index
 */
export interface CraterMesh {
  positions: Vector3[];
  faces: CraterFace[];
}

/**
 * Flat buffers for hand-off to renderers and external tools
 */
export interface CraterMeshData {
  positions: Float32Array;   // xyz per vertex
  indices: Uint32Array;      // 3 per triangle
  zones: Uint8Array;         // 1 per triangle
}

// ============================================
// Rings
// ============================================

export type RingTier = 'outerRounding' | 'base' | 'slope' | 'rimRounding' | 'rim' | 'bowl';

export interface Ring {
  tier: RingTier | 'wall' | 'center';
  vertices: number[];
}

// ============================================
// Reporting
// ============================================

export type GenerationStage = 'assembly' | 'bottomClosure' | 'surfaceDetail' | 'topology' | 'zones' | 'uv';

export type FaceRejection = 'degenerate' | 'duplicate' | 'invalid-index';

export interface SkippedFace {
  stage: GenerationStage;
  vertices: number[];
  reason: FaceRejection;
}

export interface TopologyStats {
  mergedVertices: number;
  removedFaces: number;
  flippedFaces: number;
  triangulatedFaces: number;
}

export interface StageError {
  stage: GenerationStage;
  message: string;
}

export interface GenerationReport {
  blastAngle: number;          // Radians, [0, 2π)
  innerAsymmetryAngle: number; // Radians, [0, 2π)
  skippedFaces: SkippedFace[];
  topology: TopologyStats | null;
  stageErrors: StageError[];
  vertexCount: number;
  faceCount: number;
}

// ============================================
// External collaborators
// ============================================

/**
 * UV coordinates per face corner, aligned with CraterMesh.faces
 */
export type FaceUvs = Array<Array<[number, number]>>;

export interface UvProjector {
  project(mesh: CraterMesh): FaceUvs;
}

/**
 * External decimation service; returns a mesh with approximately targetFaceCount faces
 */
export interface MeshSimplifier {
  simplify(mesh: CraterMesh, targetFaceCount: number): CraterMesh;
}
