import { describe, it, expect } from 'vitest';
import { Vector3 } from 'three';
import { faceArea, faceCentroid, faceNormal, newellNormal, radialDistance } from './faceMath';

const square = [
  new Vector3(0, 0, 0),
  new Vector3(1, 0, 0),
  new Vector3(1, 1, 0),
  new Vector3(0, 1, 0),
];

describe(newellNormal.name, () => {
  it('has twice the polygon area as length', () => {
    expect(newellNormal(square, [0, 1, 2, 3]).toArray()).toEqual([0, 0, 2]);
  });

  it('flips with the winding', () => {
    expect(newellNormal(square, [3, 2, 1, 0]).z).toBe(-2);
  });
});

describe(faceNormal.name, () => {
  it('is a unit vector', () => {
    expect(faceNormal(square, [0, 1, 2]).toArray()).toEqual([0, 0, 1]);
  });

  it('falls back to +z for zero-area faces', () => {
    const line = [new Vector3(0, 0, 0), new Vector3(1, 0, 0), new Vector3(2, 0, 0)];
    expect(faceNormal(line, [0, 1, 2]).toArray()).toEqual([0, 0, 1]);
  });
});

describe(faceArea.name, () => {
  it.each([
    { face: [0, 1, 2, 3], expected: 1 },
    { face: [0, 1, 2], expected: 0.5 },
  ])('is $expected for $face', ({ face, expected }) => {
    expect(faceArea(square, face)).toBe(expected);
  });
});

describe(faceCentroid.name, () => {
  it('averages the face vertices', () => {
    expect(faceCentroid(square, [0, 1, 2, 3]).toArray()).toEqual([0.5, 0.5, 0]);
  });
});

describe(radialDistance.name, () => {
  it('ignores height', () => {
    expect(radialDistance(new Vector3(3, 4, -7))).toBe(5);
  });
});
