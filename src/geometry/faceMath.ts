import { Vector3 } from 'three';

/**
 * Unnormalized polygon normal by Newell's method; its length is twice the polygon area.
 * Works for non-planar quads and any winding.
 */
export function newellNormal(positions: readonly Vector3[], face: readonly number[], out = new Vector3()): Vector3 {
  out.set(0, 0, 0);
  for (let i = 0; i < face.length; i++) {
    const a = positions[face[i]];
    const b = positions[face[(i + 1) % face.length]];
    out.x += (a.y - b.y) * (a.z + b.z);
    out.y += (a.z - b.z) * (a.x + b.x);
    out.z += (a.x - b.x) * (a.y + b.y);
  }
  return out;
}

/**
 * Unit face normal; falls back to +z for zero-area faces
 */
export function faceNormal(positions: readonly Vector3[], face: readonly number[], out = new Vector3()): Vector3 {
  newellNormal(positions, face, out);
  if (out.lengthSq() === 0) {
    return out.set(0, 0, 1);
  }
  return out.normalize();
}

export function faceArea(positions: readonly Vector3[], face: readonly number[]): number {
  return newellNormal(positions, face).length() * 0.5;
}

/**
 * Median center (mean of the face's vertices)
 */
export function faceCentroid(positions: readonly Vector3[], face: readonly number[], out = new Vector3()): Vector3 {
  out.set(0, 0, 0);
  for (const index of face) {
    out.add(positions[index]);
  }
  return out.divideScalar(face.length);
}

/**
 * Distance from the crater's vertical axis
 */
export function radialDistance(p: Vector3): number {
  return Math.sqrt(p.x * p.x + p.y * p.y);
}
