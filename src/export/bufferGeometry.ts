import { BufferAttribute, BufferGeometry } from 'three';
import { mergeVertices } from 'three/examples/jsm/utils/BufferGeometryUtils.js';
import { triangulateFace } from '../geometry/TopologyOptimizer';
import type { CraterMesh, FaceUvs, MaterialZone } from '../types';

interface ZoneTriangle {
  zone: MaterialZone;
  corners: number[];               // Vertex indices
  uvs: Array<[number, number]> | null;
}

/**
 * Triangles of every face, each corner carrying the uv of its face corner
 */
function collectTriangles(mesh: CraterMesh, uvs: FaceUvs | null): ZoneTriangle[] {
  const triangles: ZoneTriangle[] = [];
  mesh.faces.forEach((face, f) => {
    const faceUvs = uvs?.[f];
    for (const tri of triangulateFace(mesh.positions, face.vertices)) {
      triangles.push({
        zone: face.zone,
        corners: tri,
        uvs: faceUvs ? tri.map(v => faceUvs[face.vertices.indexOf(v)]) : null,
      });
    }
  });
  // Stable sort keeps face order within a zone
  return triangles.sort((a, b) => a.zone - b.zone);
}

function addZoneGroups(geometry: BufferGeometry, triangles: readonly ZoneTriangle[]) {
  geometry.clearGroups();
  let start = 0;
  while (start < triangles.length) {
    const zone = triangles[start].zone;
    let end = start;
    while (end < triangles.length && triangles[end].zone === zone) end++;
    geometry.addGroup(start * 3, (end - start) * 3, zone);
    start = end;
  }
}

/**
 * Build a renderable geometry with one draw group per material zone
 * (group.materialIndex is the zone). With UVs, vertices are split per face
 * corner and then welded wherever position and uv agree.
 */
export function toBufferGeometry(mesh: CraterMesh, uvs: FaceUvs | null = null): BufferGeometry {
  const triangles = collectTriangles(mesh, uvs);
  let geometry = new BufferGeometry();

  if (uvs) {
    const positions = new Float32Array(triangles.length * 9);
    const uvArray = new Float32Array(triangles.length * 6);
    triangles.forEach((tri, t) => {
      tri.corners.forEach((v, c) => {
        mesh.positions[v].toArray(positions, t * 9 + c * 3);
        const uv = tri.uvs?.[c] ?? [0, 0];
        uvArray[t * 6 + c * 2] = uv[0];
        uvArray[t * 6 + c * 2 + 1] = uv[1];
      });
    });
    geometry.setAttribute('position', new BufferAttribute(positions, 3));
    geometry.setAttribute('uv', new BufferAttribute(uvArray, 2));
    geometry = mergeVertices(geometry);
  } else {
    const positions = new Float32Array(mesh.positions.length * 3);
    mesh.positions.forEach((p, i) => p.toArray(positions, i * 3));
    geometry.setAttribute('position', new BufferAttribute(positions, 3));
    geometry.setIndex(new BufferAttribute(new Uint32Array(triangles.flatMap(tri => tri.corners)), 1));
  }

  addZoneGroups(geometry, triangles);
  geometry.computeVertexNormals();
  geometry.computeBoundingSphere();
  return geometry;
}
