import { Vector3 } from 'three';
import {
  ZONE_BOTTOM_TOLERANCE,
  ZONE_INNER_HEIGHT_RATIO,
  ZONE_INNER_RADIUS_RATIO,
  ZONE_SIDE_WALL_RADIUS_RATIO,
  ZONE_SIDE_WALL_Z,
  ZONE_STEEP_NORMAL_Z,
} from '../core/CraterSettings';
import { faceCentroid, faceNormal, radialDistance } from '../geometry/faceMath';
import { MaterialZone, type CraterMesh, type CraterParams } from '../types';

type ZoneParams = Pick<CraterParams, 'innerRadius' | 'outerRadius' | 'rimHeight' | 'closeBottom' | 'bottomThickness'>;

export interface ZoneCounts {
  inner: number;
  outer: number;
}

/**
 * Material zone of one face from its centroid and unit normal.
 * Bowl, rim and steep faces are inner; gentle faces outside the rim are outer.
 * The underside of a closed crater is always outer.
 */
export function classifyFace(centroid: Vector3, normal: Vector3, params: ZoneParams): MaterialZone {
  const distance = radialDistance(centroid);

  if (params.closeBottom) {
    if (centroid.z <= -params.bottomThickness + ZONE_BOTTOM_TOLERANCE) {
      return MaterialZone.Outer;
    }
    if (centroid.z < ZONE_SIDE_WALL_Z && distance > params.outerRadius * ZONE_SIDE_WALL_RADIUS_RATIO) {
      return MaterialZone.Outer;
    }
  }

  if (
    distance < params.innerRadius * ZONE_INNER_RADIUS_RATIO ||
    centroid.z > params.rimHeight * ZONE_INNER_HEIGHT_RATIO ||
    normal.z < ZONE_STEEP_NORMAL_Z
  ) {
    return MaterialZone.Inner;
  }
  return MaterialZone.Outer;
}

/**
 * Assign a zone to every face of the mesh in place
 */
export function classifyZones(mesh: CraterMesh, params: ZoneParams): ZoneCounts {
  const counts: ZoneCounts = { inner: 0, outer: 0 };
  const centroid = new Vector3();
  const normal = new Vector3();

  for (const face of mesh.faces) {
    faceCentroid(mesh.positions, face.vertices, centroid);
    faceNormal(mesh.positions, face.vertices, normal);
    face.zone = classifyFace(centroid, normal, params);
    if (face.zone === MaterialZone.Inner) {
      counts.inner++;
    } else {
      counts.outer++;
    }
  }
  return counts;
}
