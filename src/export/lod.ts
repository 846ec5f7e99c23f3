import type { CraterMesh, MeshSimplifier } from '../types';

export interface LodLevel {
  name: string;
  ratio: number;  // Fraction of the source face count
}

export const DEFAULT_LOD_LEVELS: readonly LodLevel[] = [
  { name: 'LOD0', ratio: 1.0 },
  { name: 'LOD1', ratio: 0.5 },
  { name: 'LOD2', ratio: 0.25 },
  { name: 'collision', ratio: 0.1 },
];

/** Fewest faces ever requested from the simplifier */
export const MIN_LOD_FACES = 4;

export interface LodVariant {
  name: string;
  targetFaceCount: number;
  mesh: CraterMesh;
}

export type LodResult =
  | { ok: true; variants: LodVariant[] }
  | { ok: false; reason: 'no-input' };

export function lodTargetFaceCount(faceCount: number, ratio: number): number {
  return Math.max(MIN_LOD_FACES, Math.round(faceCount * ratio));
}

/**
 * Request one simplified variant per level. Levels with ratio 1 keep the
 * source mesh without calling the simplifier.
 */
export function buildLodVariants(
  mesh: CraterMesh,
  simplifier: MeshSimplifier,
  levels: readonly LodLevel[] = DEFAULT_LOD_LEVELS
): LodResult {
  const faceCount = mesh.faces.length;
  if (faceCount === 0) {
    console.warn('[LOD] Empty mesh, no variants built');
    return { ok: false, reason: 'no-input' };
  }

  const variants = levels.map(level => {
    if (level.ratio >= 1) {
      return { name: level.name, targetFaceCount: faceCount, mesh };
    }
    const targetFaceCount = lodTargetFaceCount(faceCount, level.ratio);
    return { name: level.name, targetFaceCount, mesh: simplifier.simplify(mesh, targetFaceCount) };
  });

  return { ok: true, variants };
}
