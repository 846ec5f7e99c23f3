import { describe, it, expect } from 'vitest';
import { Vector3 } from 'three';
import { MaterialZone, type CraterMesh, type FaceUvs } from '../types';
import { toBufferGeometry } from './bufferGeometry';

function twoTriangles(): CraterMesh {
  return {
    positions: [new Vector3(0, 0, 0), new Vector3(1, 0, 0), new Vector3(1, 1, 0), new Vector3(0, 1, 0)],
    faces: [
      { vertices: [0, 1, 2], zone: MaterialZone.Outer },
      { vertices: [0, 2, 3], zone: MaterialZone.Inner },
    ],
  };
}

describe(toBufferGeometry.name, () => {
  it('groups triangles by zone', () => {
    const geometry = toBufferGeometry(twoTriangles());
    expect(geometry.groups).toEqual([
      { start: 0, count: 3, materialIndex: 0 },
      { start: 3, count: 3, materialIndex: 1 },
    ]);
    expect(Array.from(geometry.getIndex()?.array ?? [])).toEqual([0, 2, 3, 0, 1, 2]);
    expect(geometry.getAttribute('position').count).toBe(4);
  });

  it('computes upward normals for an upward face', () => {
    const geometry = toBufferGeometry(twoTriangles());
    expect(geometry.getAttribute('normal').getZ(0)).toBeCloseTo(1, 12);
  });

  it('welds corners that share position and uv', () => {
    const uvs: FaceUvs = [
      [[0, 0], [1, 0], [1, 1]],
      [[0, 0], [1, 1], [0, 1]],
    ];
    const geometry = toBufferGeometry(twoTriangles(), uvs);
    expect(geometry.getAttribute('position').count).toBe(4);
    expect(geometry.getAttribute('uv').count).toBe(4);
    expect(geometry.getIndex()?.count).toBe(6);
  });

  it('keeps corners apart where uvs differ', () => {
    const uvs: FaceUvs = [
      [[0, 0], [1, 0], [1, 1]],
      [[0.5, 0.5], [1, 1], [0, 1]],
    ];
    const geometry = toBufferGeometry(twoTriangles(), uvs);
    expect(geometry.getAttribute('position').count).toBe(5);
  });
});
