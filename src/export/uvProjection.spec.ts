import { describe, it, expect } from 'vitest';
import { Vector3 } from 'three';
import { MaterialZone, type CraterMesh } from '../types';
import { boxUvProjector, projectionAxes } from './uvProjection';

describe(projectionAxes.name, () => {
  it.each([
    { normal: new Vector3(0, 0, 1), expected: ['x', 'y'] },
    { normal: new Vector3(0.2, 0.1, -0.9), expected: ['x', 'y'] },
    { normal: new Vector3(-1, 0.3, 0.2), expected: ['y', 'z'] },
    { normal: new Vector3(0.1, 0.8, 0.2), expected: ['x', 'z'] },
  ])('projects along the dominant axis of $normal', ({ normal, expected }) => {
    expect(projectionAxes(normal)).toEqual(expected);
  });
});

describe('boxUvProjector', () => {
  it('maps a flat face into the unit square', () => {
    const mesh: CraterMesh = {
      positions: [new Vector3(0, 0, 0), new Vector3(2, 0, 0), new Vector3(2, 2, 0), new Vector3(0, 2, 0)],
      faces: [{ vertices: [0, 1, 2, 3], zone: MaterialZone.Inner }],
    };
    expect(boxUvProjector.project(mesh)).toEqual([[[0, 0], [1, 0], [1, 1], [0, 1]]]);
  });

  it('uses one scale for every plane', () => {
    const mesh: CraterMesh = {
      positions: [new Vector3(0, 0, 0), new Vector3(4, 0, 0), new Vector3(4, 0, 1), new Vector3(0, 0, 1)],
      faces: [{ vertices: [0, 1, 2, 3], zone: MaterialZone.Inner }],
    };
    expect(boxUvProjector.project(mesh)).toEqual([[[0, 0], [1, 0], [1, 0.25], [0, 0.25]]]);
  });
});
