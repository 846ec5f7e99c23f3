export * from './types';
export * from './core/CraterSettings';

export { createCraterParams, defaultCraterParams, randomCraterParams, repairRadii, clampParam, hasValidRadii } from './crater/params';
export { createSeededRandom, defaultRandom } from './crater/random';
export { NoiseFieldBuilder, createNoiseField, sampleOctaves, type NoiseField, type Octave } from './crater/noise';
export { generateCrater, CraterGenerationError, type GenerateOptions, type GeneratedCrater } from './crater/CraterGenerator';
export { planRings, assembleCrater } from './crater/CraterAssembler';
export { buildBottomClosure } from './crater/BottomClosure';
export { applySurfaceDetail } from './crater/SurfaceDetail';
export { classifyFace, classifyZones, type ZoneCounts } from './crater/ZoneClassifier';

export { MeshBuilder, type FaceInsertResult } from './geometry/MeshBuilder';
export { optimizeTopology, type PolygonMesh, type TopologyOptions, type TopologyResult } from './geometry/TopologyOptimizer';

export { toMeshData } from './export/meshData';
export { toBufferGeometry } from './export/bufferGeometry';
export { BoxUvProjector, boxUvProjector } from './export/uvProjection';
export { buildLodVariants, DEFAULT_LOD_LEVELS, type LodLevel, type LodResult, type LodVariant } from './export/lod';
