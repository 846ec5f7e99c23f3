import { Vector3 } from 'three';
import {
  MaterialZone,
  type CraterMesh,
  type FaceRejection,
  type GenerationStage,
  type SkippedFace,
} from '../types';

export type FaceInsertResult =
  | { ok: true; face: number }
  | { ok: false; reason: FaceRejection };

/**
 * Order-independent key for a face's vertex set
 */
export function faceKey(vertices: readonly number[]): string {
  return [...vertices].sort((a, b) => a - b).join(',');
}

/**
 * Accumulates vertices and faces for one generation pass.
 *
 * Vertex indices are dense and assigned in creation order. Face insertion never
 * throws: a face that repeats a vertex, references a missing vertex, or reuses
 * the vertex set of an existing face is rejected and recorded.
 */
export class MeshBuilder {
  readonly positions: Vector3[] = [];
  readonly faces: number[][] = [];
  readonly skipped: SkippedFace[] = [];

  private faceKeys = new Set<string>();
  private stage: GenerationStage = 'assembly';

  get vertexCount(): number {
    return this.positions.length;
  }

  get faceCount(): number {
    return this.faces.length;
  }

  /**
   * Stage that skipped faces are attributed to
   */
  setStage(stage: GenerationStage): void {
    this.stage = stage;
  }

  addVertex(x: number, y: number, z: number): number {
    this.positions.push(new Vector3(x, y, z));
    return this.positions.length - 1;
  }

  addFace(vertices: readonly number[]): FaceInsertResult {
    const result = this.tryAddFace(vertices);
    if (!result.ok) {
      this.skipped.push({ stage: this.stage, vertices: [...vertices], reason: result.reason });
    }
    return result;
  }

  private tryAddFace(vertices: readonly number[]): FaceInsertResult {
    if (vertices.some(v => !Number.isInteger(v) || v < 0 || v >= this.positions.length)) {
      return { ok: false, reason: 'invalid-index' };
    }
    if (vertices.length < 3 || new Set(vertices).size !== vertices.length) {
      return { ok: false, reason: 'degenerate' };
    }
    const key = faceKey(vertices);
    if (this.faceKeys.has(key)) {
      return { ok: false, reason: 'duplicate' };
    }
    this.faceKeys.add(key);
    this.faces.push([...vertices]);
    return { ok: true, face: this.faces.length - 1 };
  }

  /**
   * Skipped faces recorded for one stage
   */
  skippedIn(stage: GenerationStage): SkippedFace[] {
    return this.skipped.filter(face => face.stage === stage);
  }

  /**
   * Hand the buffers over as a mesh; every face starts in the inner zone
   */
  toMesh(): CraterMesh {
    return {
      positions: this.positions,
      faces: this.faces.map(vertices => ({ vertices, zone: MaterialZone.Inner })),
    };
  }
}
