/**
 * Game-ready topology cleanup.
 * Pipeline:
 * 1. Merge vertices closer than the merge distance (spatial hash + union-find)
 * 2. Dissolve degenerate geometry (collapse tiny edges, drop zero-area faces)
 * 3. Recalculate normals: consistent winding across shared edges, then orient
 *    each connected component outward
 * 4. Triangulate: best diagonal for quads, best-ear clipping for larger polygons
 *
 * Running the pipeline on its own output changes nothing.
 */

import { Triangle, Vector3 } from 'three';
import { DEGENERATE_DISTANCE, MERGE_DISTANCE } from '../core/CraterSettings';
import type { TopologyStats } from '../types';
import { faceKey } from './MeshBuilder';
import { faceArea, newellNormal } from './faceMath';

/**
 * Positions plus faces as vertex index lists, with no per-face data attached
 */
export interface PolygonMesh {
  positions: Vector3[];
  faces: number[][];
}

export interface TopologyOptions {
  mergeDistance?: number;
  degenerateDistance?: number;
}

export interface TopologyResult {
  mesh: PolygonMesh;
  stats: TopologyStats;
  /** For each output face, the input face it came from */
  sourceFaces: number[];
}

function edgeKey(a: number, b: number): string {
  return a < b ? `${a}_${b}` : `${b}_${a}`;
}

function root(parent: Int32Array, v: number): number {
  while (parent[v] !== v) {
    parent[v] = parent[parent[v]];
    v = parent[v];
  }
  return v;
}

/**
 * Union keeping the lowest index as representative, so earlier vertices keep their position
 */
function union(parent: Int32Array, a: number, b: number): boolean {
  const ra = root(parent, a);
  const rb = root(parent, b);
  if (ra === rb) return false;
  if (ra < rb) {
    parent[rb] = ra;
  } else {
    parent[ra] = rb;
  }
  return true;
}

function identityParents(count: number): Int32Array {
  const parent = new Int32Array(count);
  for (let i = 0; i < count; i++) parent[i] = i;
  return parent;
}

/**
 * Drop repeated vertices (including the wrap-around pair) from a face loop
 */
function dedupeLoop(face: readonly number[]): number[] {
  const loop: number[] = [];
  for (const v of face) {
    if (loop.length === 0 || loop[loop.length - 1] !== v) loop.push(v);
  }
  while (loop.length > 1 && loop[0] === loop[loop.length - 1]) loop.pop();
  return loop;
}

interface Remapped {
  mesh: PolygonMesh;
  sourceFaces: number[];
  removedFaces: number;
}

/**
 * Apply a vertex union to the mesh: faces point at representatives, collapsed
 * and duplicate faces are dropped, unused vertices are compacted away.
 */
function applyUnion(mesh: PolygonMesh, parent: Int32Array, sourceFaces: readonly number[]): Remapped {
  const seen = new Set<string>();
  const faces: number[][] = [];
  const sources: number[] = [];

  mesh.faces.forEach((face, i) => {
    const loop = dedupeLoop(face.map(v => root(parent, v)));
    if (loop.length < 3 || new Set(loop).size !== loop.length) return;
    const key = faceKey(loop);
    if (seen.has(key)) return;
    seen.add(key);
    faces.push(loop);
    sources.push(sourceFaces[i]);
  });

  const used = new Uint8Array(mesh.positions.length);
  for (const face of faces) {
    for (const v of face) used[v] = 1;
  }
  const remap = new Int32Array(mesh.positions.length).fill(-1);
  const positions: Vector3[] = [];
  mesh.positions.forEach((p, i) => {
    if (used[i]) {
      remap[i] = positions.length;
      positions.push(p);
    }
  });

  return {
    mesh: { positions, faces: faces.map(face => face.map(v => remap[v])) },
    sourceFaces: sources,
    removedFaces: mesh.faces.length - faces.length,
  };
}

/**
 * Weld vertices within distance of each other
 */
export function mergeByDistance(mesh: PolygonMesh, distance: number, sourceFaces?: readonly number[]) {
  const sources = sourceFaces ?? mesh.faces.map((_, i) => i);
  const parent = identityParents(mesh.positions.length);
  const cellSize = distance > 0 ? distance : 1;
  const grid = new Map<string, number[]>();
  const distSq = distance * distance;
  let merged = 0;

  mesh.positions.forEach((p, i) => {
    const cx = Math.floor(p.x / cellSize);
    const cy = Math.floor(p.y / cellSize);
    const cz = Math.floor(p.z / cellSize);

    for (let dx = -1; dx <= 1; dx++) {
      for (let dy = -1; dy <= 1; dy++) {
        for (let dz = -1; dz <= 1; dz++) {
          const cell = grid.get(`${cx + dx},${cy + dy},${cz + dz}`);
          if (!cell) continue;
          for (const j of cell) {
            if (p.distanceToSquared(mesh.positions[j]) <= distSq && union(parent, i, j)) {
              merged++;
            }
          }
        }
      }
    }

    const key = `${cx},${cy},${cz}`;
    let cell = grid.get(key);
    if (!cell) {
      cell = [];
      grid.set(key, cell);
    }
    cell.push(i);
  });

  return { ...applyUnion(mesh, parent, sources), merged };
}

/**
 * Collapse edges shorter than distance and drop faces with (near) zero area
 */
export function dissolveDegenerate(mesh: PolygonMesh, distance: number, sourceFaces?: readonly number[]): Remapped {
  const sources = sourceFaces ?? mesh.faces.map((_, i) => i);
  const parent = identityParents(mesh.positions.length);
  const distSq = distance * distance;

  for (const face of mesh.faces) {
    for (let i = 0; i < face.length; i++) {
      const a = face[i];
      const b = face[(i + 1) % face.length];
      if (mesh.positions[a].distanceToSquared(mesh.positions[b]) < distSq) {
        union(parent, a, b);
      }
    }
  }

  const collapsed = applyUnion(mesh, parent, sources);
  const minArea = distSq;
  const keep = collapsed.mesh.faces.map(face => faceArea(collapsed.mesh.positions, face) >= minArea);
  if (keep.every(Boolean)) {
    return { ...collapsed, removedFaces: mesh.faces.length - collapsed.mesh.faces.length };
  }

  const filtered = applyUnion(
    { positions: collapsed.mesh.positions, faces: collapsed.mesh.faces.filter((_, i) => keep[i]) },
    identityParents(collapsed.mesh.positions.length),
    collapsed.sourceFaces.filter((_, i) => keep[i])
  );
  return { ...filtered, removedFaces: mesh.faces.length - filtered.mesh.faces.length };
}

/**
 * True when face traverses the directed edge a → b
 */
function traverses(face: readonly number[], a: number, b: number): boolean {
  for (let i = 0; i < face.length; i++) {
    if (face[i] === a && face[(i + 1) % face.length] === b) return true;
  }
  return false;
}

/**
 * Make winding consistent across shared edges, then orient each connected
 * component outward: positive signed volume when it is closed, upward
 * area-weighted normal when it is open. Faces are reversed in place.
 *
 * @returns Number of faces whose winding changed
 */
export function recalculateNormals(mesh: PolygonMesh): number {
  const { faces, positions } = mesh;
  const edgeFaces = new Map<string, number[]>();
  faces.forEach((face, f) => {
    for (let i = 0; i < face.length; i++) {
      const key = edgeKey(face[i], face[(i + 1) % face.length]);
      let list = edgeFaces.get(key);
      if (!list) {
        list = [];
        edgeFaces.set(key, list);
      }
      list.push(f);
    }
  });

  const flipped = new Uint8Array(faces.length);
  const visited = new Uint8Array(faces.length);
  const flip = (f: number) => {
    faces[f].reverse();
    flipped[f] ^= 1;
  };

  for (let start = 0; start < faces.length; start++) {
    if (visited[start]) continue;
    const component: number[] = [start];
    const queue: number[] = [start];
    visited[start] = 1;
    let closed = true;

    while (queue.length > 0) {
      const f = queue.shift();
      if (f === undefined) break;
      const face = faces[f];
      for (let i = 0; i < face.length; i++) {
        const a = face[i];
        const b = face[(i + 1) % face.length];
        const neighbors = edgeFaces.get(edgeKey(a, b)) ?? [];
        if (neighbors.length < 2) closed = false;
        for (const nf of neighbors) {
          if (visited[nf]) continue;
          visited[nf] = 1;
          // Neighbors must walk the shared edge in the opposite direction
          if (traverses(faces[nf], a, b)) flip(nf);
          component.push(nf);
          queue.push(nf);
        }
      }
    }

    if (componentFacesInward(positions, component.map(f => faces[f]), closed)) {
      component.forEach(flip);
    }
  }

  return flipped.reduce((count, value) => count + value, 0);
}

function componentFacesInward(positions: readonly Vector3[], faces: readonly number[][], closed: boolean): boolean {
  if (closed) {
    let volume = 0;
    const cross = new Vector3();
    for (const face of faces) {
      const a = positions[face[0]];
      for (let i = 1; i < face.length - 1; i++) {
        cross.crossVectors(positions[face[i]], positions[face[i + 1]]);
        volume += a.dot(cross);
      }
    }
    return volume < 0;
  }

  let up = 0;
  const normal = new Vector3();
  for (const face of faces) {
    up += newellNormal(positions, face, normal).z;
  }
  return up < 0;
}

const _triangle = new Triangle();

/**
 * Smallest interior angle of a triangle (radians); 0 for degenerate triangles
 */
export function minTriangleAngle(a: Vector3, b: Vector3, c: Vector3): number {
  _triangle.set(a, b, c);
  if (_triangle.getArea() === 0) return 0;
  const angleAt = (p: Vector3, q: Vector3, r: Vector3) => {
    const u = new Vector3().subVectors(q, p);
    const v = new Vector3().subVectors(r, p);
    return u.angleTo(v);
  };
  return Math.min(angleAt(a, b, c), angleAt(b, c, a), angleAt(c, a, b));
}

function triangleQuality(positions: readonly Vector3[], tri: readonly number[]): number {
  return minTriangleAngle(positions[tri[0]], positions[tri[1]], positions[tri[2]]);
}

/**
 * Split a quad along the diagonal that gives the better-shaped pair of triangles
 */
export function triangulateQuad(positions: readonly Vector3[], quad: readonly number[]): number[][] {
  const [a, b, c, d] = quad;
  const splitAC = [[a, b, c], [a, c, d]];
  const splitBD = [[a, b, d], [b, c, d]];
  const quality = (tris: number[][]) => Math.min(...tris.map(tri => triangleQuality(positions, tri)));
  return quality(splitBD) > quality(splitAC) ? splitBD : splitAC;
}

/**
 * Ear clipping that always clips the best-shaped valid ear first
 */
export function triangulatePolygon(positions: readonly Vector3[], polygon: readonly number[]): number[][] {
  const normal = newellNormal(positions, polygon);
  // Project onto the plane that drops the normal's dominant axis
  const ax = Math.abs(normal.x);
  const ay = Math.abs(normal.y);
  const az = Math.abs(normal.z);
  const [u, v]: ['x' | 'y' | 'z', 'x' | 'y' | 'z'] = az >= ax && az >= ay ? ['x', 'y'] : ax >= ay ? ['y', 'z'] : ['z', 'x'];
  const dominant = az >= ax && az >= ay ? normal.z : ax >= ay ? normal.x : normal.y;
  const sign = dominant < 0 ? -1 : 1;

  const cross2 = (o: number, p: number, q: number) => {
    const po = positions[o];
    const pp = positions[p];
    const pq = positions[q];
    return ((pp[u] - po[u]) * (pq[v] - po[v]) - (pp[v] - po[v]) * (pq[u] - po[u])) * sign;
  };
  const inside = (pt: number, a: number, b: number, c: number) =>
    cross2(a, b, pt) >= 0 && cross2(b, c, pt) >= 0 && cross2(c, a, pt) >= 0;

  const loop = [...polygon];
  const triangles: number[][] = [];

  while (loop.length > 3) {
    let best = -1;
    let bestQuality = -1;
    let fallback = 0;
    let fallbackQuality = -1;

    for (let i = 0; i < loop.length; i++) {
      const prev = loop[(i - 1 + loop.length) % loop.length];
      const cur = loop[i];
      const next = loop[(i + 1) % loop.length];
      const quality = triangleQuality(positions, [prev, cur, next]);
      if (quality > fallbackQuality) {
        fallbackQuality = quality;
        fallback = i;
      }
      if (cross2(prev, cur, next) <= 0) continue;
      const blocked = loop.some(other => other !== prev && other !== cur && other !== next && inside(other, prev, cur, next));
      if (!blocked && quality > bestQuality) {
        bestQuality = quality;
        best = i;
      }
    }

    const ear = best >= 0 ? best : fallback;
    triangles.push([
      loop[(ear - 1 + loop.length) % loop.length],
      loop[ear],
      loop[(ear + 1) % loop.length],
    ]);
    loop.splice(ear, 1);
  }

  triangles.push([loop[0], loop[1], loop[2]]);
  return triangles;
}

export function triangulateFace(positions: readonly Vector3[], face: readonly number[]): number[][] {
  if (face.length === 3) return [[...face]];
  if (face.length === 4) return triangulateQuad(positions, face);
  return triangulatePolygon(positions, face);
}

export function triangulate(mesh: PolygonMesh, sourceFaces?: readonly number[]) {
  const sources = sourceFaces ?? mesh.faces.map((_, i) => i);
  const faces: number[][] = [];
  const outSources: number[] = [];
  let triangulated = 0;

  mesh.faces.forEach((face, i) => {
    if (face.length > 3) triangulated++;
    for (const tri of triangulateFace(mesh.positions, face)) {
      faces.push(tri);
      outSources.push(sources[i]);
    }
  });

  return { mesh: { positions: mesh.positions, faces }, sourceFaces: outSources, triangulated };
}

/**
 * Full cleanup pipeline. The input mesh is not modified.
 */
export function optimizeTopology(input: PolygonMesh, options: TopologyOptions = {}): TopologyResult {
  const mergeDistance = options.mergeDistance ?? MERGE_DISTANCE;
  const degenerateDistance = options.degenerateDistance ?? DEGENERATE_DISTANCE;
  const mesh: PolygonMesh = {
    positions: input.positions.map(p => p.clone()),
    faces: input.faces.map(face => [...face]),
  };

  const merged = mergeByDistance(mesh, mergeDistance);
  const dissolved = dissolveDegenerate(merged.mesh, degenerateDistance, merged.sourceFaces);
  const flippedFaces = recalculateNormals(dissolved.mesh);
  const triangulated = triangulate(dissolved.mesh, dissolved.sourceFaces);

  return {
    mesh: triangulated.mesh,
    sourceFaces: triangulated.sourceFaces,
    stats: {
      mergedVertices: merged.merged,
      removedFaces: merged.removedFaces + dissolved.removedFaces,
      flippedFaces,
      triangulatedFaces: triangulated.triangulated,
    },
  };
}
