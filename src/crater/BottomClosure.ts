/**
 * Solid bottom for the crater.
 *
 * Wall rings drop from the boundary ring down to the bottom plate while moving
 * radially outward by a wall offset derived from the outer wall angle. The
 * offset grows along a power curve so the wall bows smoothly. The last wall
 * ring is fanned onto a bottom center vertex.
 */

import { MathUtils } from 'three';
import {
  BOTTOM_CENTER_OFFSET_MIN_ANGLE,
  BOTTOM_CLEARANCE_RATIO,
  CENTER_OFFSET_RATIO,
  WALL_OFFSET_EXPONENT,
  WALL_OFFSET_MULTIPLIER,
  WALL_RING_COUNT,
} from '../core/CraterSettings';
import type { MeshBuilder } from '../geometry/MeshBuilder';
import { stitchFan, stitchRings } from '../geometry/stitching';
import type { CraterParams, Ring } from '../types';

type WallParams = Pick<CraterParams, 'bottomThickness' | 'outerWallAngle'>;

/**
 * Full radial offset of the bottom ring
 */
export function wallOffset(params: WallParams): number {
  return params.bottomThickness * Math.tan(MathUtils.degToRad(params.outerWallAngle)) * WALL_OFFSET_MULTIPLIER;
}

/**
 * Radial offset of wall ring i (1-based)
 */
export function wallRingOffset(params: WallParams, ring: number): number {
  return wallOffset(params) * (ring / WALL_RING_COUNT) ** WALL_OFFSET_EXPONENT;
}

/**
 * Height of the bottom plate: -bottomThickness, or lower when the surface
 * reaches that far, so the plate never cuts through the bowl
 */
export function bottomPlateZ(params: Pick<CraterParams, 'bottomThickness'>, lowestSurfaceZ: number): number {
  return Math.min(-params.bottomThickness, lowestSurfaceZ - params.bottomThickness * BOTTOM_CLEARANCE_RATIO);
}

export function bottomCenterPosition(params: WallParams, plateZ = -params.bottomThickness): [number, number, number] {
  const offset = Math.abs(params.outerWallAngle) > BOTTOM_CENTER_OFFSET_MIN_ANGLE
    ? wallOffset(params) * CENTER_OFFSET_RATIO
    : 0;
  return [offset, offset, plateZ];
}

/**
 * Close the crater below its boundary ring.
 * Returns the wall rings from the boundary outward, ending with the bottom center.
 */
export function buildBottomClosure(
  builder: MeshBuilder,
  boundary: readonly number[],
  params: CraterParams
): Ring[] {
  builder.setStage('bottomClosure');

  // Snapshot: new vertices are appended while we read the boundary
  const base = boundary.map(index => builder.positions[index].clone());
  const lowestSurfaceZ = builder.positions.reduce((lowest, p) => Math.min(lowest, p.z), 0);
  const bottomZ = bottomPlateZ(params, lowestSurfaceZ);
  const rings: Ring[] = [];

  for (let i = 1; i <= WALL_RING_COUNT; i++) {
    const t = i / WALL_RING_COUNT;
    const offset = wallRingOffset(params, i);
    const vertices = base.map(p => {
      const distance = Math.sqrt(p.x * p.x + p.y * p.y);
      let x = p.x;
      let y = p.y;
      if (distance > 0) {
        x += (p.x / distance) * offset;
        y += (p.y / distance) * offset;
      }
      return builder.addVertex(x, y, MathUtils.lerp(p.z, bottomZ, t));
    });
    rings.push({ tier: 'wall', vertices });
  }

  const [cx, cy, cz] = bottomCenterPosition(params, bottomZ);
  const center = builder.addVertex(cx, cy, cz);

  // Walls and bottom face away from the crater interior: reversed winding
  let skipped = 0;
  let previous: readonly number[] = boundary;
  for (const ring of rings) {
    skipped += stitchRings(builder, previous, ring.vertices, { reverse: true }).skipped;
    previous = ring.vertices;
  }
  skipped += stitchFan(builder, previous, center, { reverse: true }).skipped;

  if (skipped > 0) {
    console.warn(`[BottomClosure] Skipped ${skipped} face(s) while closing the bottom`);
  }

  rings.push({ tier: 'center', vertices: [center] });
  return rings;
}
