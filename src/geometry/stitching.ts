/**
 * Ring stitching.
 *
 * Adjacent rings with the same resolution are joined by a band of quads, and a
 * ring is closed onto a single vertex by a triangle fan. Vertex k of one ring is
 * angularly aligned with vertex k of the next, so quad k spans angles k..k+1.
 */

import type { MeshBuilder } from './MeshBuilder';

export interface StitchOptions {
  /** Reverse winding, for bands that face away from the crater's interior */
  reverse?: boolean;
}

export interface StitchResult {
  added: number;
  skipped: number;
}

/**
 * Quad indices joining ring cur to ring next at position k
 */
export function bandQuad(cur: readonly number[], next: readonly number[], k: number): number[] {
  const n = cur.length;
  const k1 = (k + 1) % n;
  return [cur[k], cur[k1], next[k1], next[k]];
}

/**
 * Triangle indices joining ring cur to the center vertex at position k
 */
export function fanTriangle(cur: readonly number[], center: number, k: number): number[] {
  const k1 = (k + 1) % cur.length;
  return [cur[k], cur[k1], center];
}

export function stitchRings(
  builder: MeshBuilder,
  cur: readonly number[],
  next: readonly number[],
  options: StitchOptions = {}
): StitchResult {
  if (cur.length !== next.length) {
    throw new Error(`Cannot stitch rings of different sizes (${cur.length} vs ${next.length})`);
  }
  const result: StitchResult = { added: 0, skipped: 0 };
  for (let k = 0; k < cur.length; k++) {
    const quad = bandQuad(cur, next, k);
    record(result, builder.addFace(options.reverse ? quad.reverse() : quad).ok);
  }
  return result;
}

export function stitchFan(
  builder: MeshBuilder,
  ring: readonly number[],
  center: number,
  options: StitchOptions = {}
): StitchResult {
  const result: StitchResult = { added: 0, skipped: 0 };
  for (let k = 0; k < ring.length; k++) {
    const tri = fanTriangle(ring, center, k);
    record(result, builder.addFace(options.reverse ? tri.reverse() : tri).ok);
  }
  return result;
}

function record(result: StitchResult, ok: boolean) {
  if (ok) {
    result.added++;
  } else {
    result.skipped++;
  }
}
