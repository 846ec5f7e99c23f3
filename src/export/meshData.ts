import { triangulateFace } from '../geometry/TopologyOptimizer';
import type { CraterMesh, CraterMeshData } from '../types';

/**
 * Flatten a crater mesh into typed buffers. Faces that are not triangles yet
 * are triangulated on the way; each triangle keeps its face's zone.
 */
export function toMeshData(mesh: CraterMesh): CraterMeshData {
  const positions = new Float32Array(mesh.positions.length * 3);
  mesh.positions.forEach((p, i) => p.toArray(positions, i * 3));

  const indices: number[] = [];
  const zones: number[] = [];
  for (const face of mesh.faces) {
    for (const tri of triangulateFace(mesh.positions, face.vertices)) {
      indices.push(...tri);
      zones.push(face.zone);
    }
  }

  return {
    positions,
    indices: new Uint32Array(indices),
    zones: new Uint8Array(zones),
  };
}
