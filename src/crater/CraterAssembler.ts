/**
 * Crater surface assembly.
 *
 * Profile, from the outside in:
 * - outer rounding rings (optional): curve the base edge down and outward
 * - base ring at ground level on the outer radius
 * - slope rings: radius interpolated outer → inner, sub-linear height rise
 * - rim rounding rings (optional): ease the slope into the rim
 * - rim ring at the inner radius and rim height
 * - bowl rings: shrinking radius, descending to the crater depth
 * - center vertex at the crater depth
 *
 * Adjacent rings are joined by quad bands and the last ring is fanned onto the
 * center. The surface stays open along its outermost ring.
 */

import { MathUtils } from 'three';
import {
  BOWL_RADIUS_SHRINK,
  CENTER_OFFSET_RATIO,
  INNER_WALL_OFFSET_MULTIPLIER,
  MIN_BOWL_RADIUS_RATIO,
  ROUNDING_MAX_DROP_RATIO,
  ROUNDING_RINGS_PER_UNIT,
  SLOPE_HEIGHT_EXPONENT,
} from '../core/CraterSettings';
import type { MeshBuilder } from '../geometry/MeshBuilder';
import { stitchFan, stitchRings } from '../geometry/stitching';
import type { CraterParams, Ring } from '../types';
import { buildRing, type RingContext, type RingPlan } from './RingBuilder';

/**
 * Slope ring count: 2 for low resolutions, 3 from 48 vertices per ring
 */
export function slopeRingCount(resolution: number): number {
  return Math.max(2, Math.min(3, Math.floor(resolution / 16)));
}

/**
 * Bowl ring count: 1 for low resolutions, 2 from 40 vertices per ring
 */
export function bowlRingCount(resolution: number): number {
  return Math.max(1, Math.min(2, Math.floor(resolution / 20)));
}

export function roundingRingCount(rounding: number): number {
  return rounding > 0 ? Math.max(1, Math.round(rounding * ROUNDING_RINGS_PER_UNIT)) : 0;
}

/**
 * Radial offset per unit of depth below the rim caused by the inner wall angle
 */
export function innerWallOffsetFactor(innerWallAngle: number): number {
  return Math.tan(MathUtils.degToRad(innerWallAngle)) * INNER_WALL_OFFSET_MULTIPLIER;
}

/**
 * Scale applied to outer rounding drops so that, with a closed bottom, the
 * outermost ring stays within ROUNDING_MAX_DROP_RATIO of the bottom thickness
 */
export function roundingDropScale(params: CraterParams, deepestDrop: number): number {
  if (!params.closeBottom || deepestDrop <= 0) return 1;
  return Math.min(1, (params.bottomThickness * ROUNDING_MAX_DROP_RATIO) / deepestDrop);
}

function outerRoundingPlans(params: CraterParams): RingPlan[] {
  const count = roundingRingCount(params.outerEdgeRounding);
  const extent = params.outerEdgeRounding * (params.outerRadius - params.innerRadius) * 0.5;
  const drop = (phi: number) => extent * (1 - Math.cos(phi)) * 0.5;
  const scale = roundingDropScale(params, drop((count / (count + 1)) * Math.PI * 0.5));
  const plans: RingPlan[] = [];

  // Outermost first, walking a quarter arc back toward the base ring
  for (let j = 1; j <= count; j++) {
    const s = (count - j + 1) / (count + 1);
    const phi = s * Math.PI * 0.5;
    plans.push({
      tier: 'outerRounding',
      radius: params.outerRadius + extent * Math.sin(phi),
      height: -drop(phi) * scale,
      rimWeight: 0,
    });
  }
  return plans;
}

function rimRoundingPlans(params: CraterParams, lastSlope: RingPlan): RingPlan[] {
  const count = roundingRingCount(params.rimEdgeRounding);
  const plans: RingPlan[] = [];

  for (let j = 1; j <= count; j++) {
    const u = j / (count + 1);
    // Ease-out toward the rim; more rounding bends the curve further
    const ease = u + params.rimEdgeRounding * (Math.sin(u * Math.PI * 0.5) - u);
    plans.push({
      tier: 'rimRounding',
      radius: MathUtils.lerp(lastSlope.radius, params.innerRadius, u),
      height: MathUtils.lerp(lastSlope.height, params.rimHeight, ease),
      rimWeight: u,
    });
  }
  return plans;
}

/**
 * Ordered ring profile from the outermost ring to the last bowl ring
 */
export function planRings(params: CraterParams): RingPlan[] {
  const { outerRadius, innerRadius, rimHeight, depth, resolution } = params;
  const plans: RingPlan[] = [...outerRoundingPlans(params)];

  plans.push({ tier: 'base', radius: outerRadius, height: 0, rimWeight: 0 });

  const slopeRings = slopeRingCount(resolution);
  let lastSlope = plans[plans.length - 1];
  for (let i = 1; i <= slopeRings; i++) {
    // Strictly between base and rim so no slope ring coincides with the rim
    const t = i / (slopeRings + 1);
    lastSlope = {
      tier: 'slope',
      radius: outerRadius - (outerRadius - innerRadius) * t,
      height: rimHeight * t ** SLOPE_HEIGHT_EXPONENT,
      rimWeight: 0,
    };
    plans.push(lastSlope);
  }

  plans.push(...rimRoundingPlans(params, lastSlope));
  plans.push({ tier: 'rim', radius: innerRadius, height: rimHeight, rimWeight: 1 });

  const bowlRings = bowlRingCount(resolution);
  const wallFactor = innerWallOffsetFactor(params.innerWallAngle);
  const minRadius = innerRadius * MIN_BOWL_RADIUS_RATIO;
  for (let i = 1; i <= bowlRings; i++) {
    const t = i / bowlRings;
    const depthFactor = (rimHeight + depth) * t;
    const radius = innerRadius * (1 - t * BOWL_RADIUS_SHRINK) + depthFactor * wallFactor;
    plans.push({
      tier: 'bowl',
      radius: Math.max(minRadius, radius),
      height: rimHeight - depthFactor,
      rimWeight: 0,
    });
  }

  return plans;
}

/**
 * Crater floor center, shifted by the inner wall angle
 */
export function centerPosition(params: CraterParams): [number, number, number] {
  const offset = (params.rimHeight + params.depth) * innerWallOffsetFactor(params.innerWallAngle) * CENTER_OFFSET_RATIO;
  return [offset, offset, -params.depth];
}

/**
 * Build and stitch every ring of the crater surface.
 * Returns the rings outermost first, ending with the single-vertex center ring.
 */
export function assembleCrater(builder: MeshBuilder, ctx: RingContext): Ring[] {
  builder.setStage('assembly');

  const rings: Ring[] = planRings(ctx.params).map(plan => ({
    tier: plan.tier,
    vertices: buildRing(builder, plan, ctx),
  }));

  const [cx, cy, cz] = centerPosition(ctx.params);
  const center = builder.addVertex(cx, cy, cz);

  let skipped = 0;
  for (let i = 0; i < rings.length - 1; i++) {
    skipped += stitchRings(builder, rings[i].vertices, rings[i + 1].vertices).skipped;
  }
  skipped += stitchFan(builder, rings[rings.length - 1].vertices, center).skipped;

  if (skipped > 0) {
    console.warn(`[CraterAssembler] Skipped ${skipped} face(s) while stitching ${rings.length} rings`);
  }

  rings.push({ tier: 'center', vertices: [center] });
  return rings;
}
