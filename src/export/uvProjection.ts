import { Box3, Vector3 } from 'three';
import { newellNormal } from '../geometry/faceMath';
import type { CraterMesh, FaceUvs, UvProjector } from '../types';

type Axis = 'x' | 'y' | 'z';

/**
 * Plane axes for projecting along the normal's dominant axis
 */
export function projectionAxes(normal: Vector3): [Axis, Axis] {
  const ax = Math.abs(normal.x);
  const ay = Math.abs(normal.y);
  const az = Math.abs(normal.z);
  if (az >= ax && az >= ay) return ['x', 'y'];
  if (ax >= ay) return ['y', 'z'];
  return ['x', 'z'];
}

/**
 * Box (tri-planar) projection: each face is projected on the side of the
 * mesh's bounding box its normal faces most, with one uniform scale so that
 * texel density matches across the three planes.
 */
export class BoxUvProjector implements UvProjector {
  project(mesh: CraterMesh): FaceUvs {
    const bounds = new Box3().setFromPoints(mesh.positions);
    const size = bounds.getSize(new Vector3());
    const scale = Math.max(size.x, size.y, size.z) || 1;
    const normal = new Vector3();

    return mesh.faces.map(face => {
      const [u, v] = projectionAxes(newellNormal(mesh.positions, face.vertices, normal));
      return face.vertices.map(index => {
        const p = mesh.positions[index];
        const uv: [number, number] = [(p[u] - bounds.min[u]) / scale, (p[v] - bounds.min[v]) / scale];
        return uv;
      });
    });
  }
}

export const boxUvProjector: UvProjector = new BoxUvProjector();
