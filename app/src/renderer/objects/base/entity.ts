import type {
  EntityBase,
  EntityKind,
  GridSpan,
  Point,
  Rect,
  ShadowSample,
  Size,
} from '@amarre/shared';
import {
  MIN_ENTITY_SCALE,
  SCALE_EPSILON,
  SHADOW_TRAIL_LIFETIME_MS,
  SHADOW_TRAIL_MIN_DISTANCE,
} from '../../constants';
import { distanceSquared } from '../../../utils/geometry';

/**
 * Shared entity state and helpers used by every entity kind.
 *
 * Entities are plain data; these helpers keep the size invariant
 * (size = max(1, round(baseSize * scale))) and maintain the shadow trail.
 */

export function createEntityBase<K extends EntityKind>(
  id: string,
  kind: K,
  pos: Point,
  baseSize: Size,
  span: GridSpan,
): EntityBase & { kind: K } {
  return {
    id,
    kind,
    pos: { x: pos.x, y: pos.y },
    baseSize: { ...baseSize },
    size: { ...baseSize },
    scale: 1.0,
    span: { ...span },
    trail: [],
    lastTrailSample: null,
  };
}

export function scaledSize(baseSize: Size, scale: number): Size {
  return {
    width: Math.max(1, Math.round(baseSize.width * scale)),
    height: Math.max(1, Math.round(baseSize.height * scale)),
  };
}

/**
 * Resize around the top-left corner.
 *
 * Scale is clamped to MIN_ENTITY_SCALE; changes smaller than SCALE_EPSILON
 * are ignored. Returns true when the size was recomputed.
 */
export function applyEntityScale(entity: EntityBase, scale: number): boolean {
  const clamped = Math.max(MIN_ENTITY_SCALE, scale);
  if (Math.abs(clamped - entity.scale) < SCALE_EPSILON) {
    return false;
  }
  entity.scale = clamped;
  entity.size = scaledSize(entity.baseSize, clamped);
  return true;
}

export function getEntityRect(entity: EntityBase): Rect {
  return {
    x: entity.pos.x,
    y: entity.pos.y,
    width: entity.size.width,
    height: entity.size.height,
  };
}

// Age of a sample in ms, or null when the clock went backwards
export function getSampleAge(sample: ShadowSample, now: number): number | null {
  const age = now - sample.time;
  return age < 0 ? null : age;
}

/**
 * Drop samples older than the trail lifetime (or from the future) from the
 * front of the trail. Clears the distance reference once the trail is empty.
 */
export function trimShadowTrail(entity: EntityBase, now: number): void {
  while (entity.trail.length > 0) {
    const age = getSampleAge(entity.trail[0], now);
    if (age !== null && age <= SHADOW_TRAIL_LIFETIME_MS) {
      break;
    }
    entity.trail.shift();
  }
  if (entity.trail.length === 0) {
    entity.lastTrailSample = null;
  }
}

/**
 * Record the current position into the shadow trail unless the entity has
 * moved less than SHADOW_TRAIL_MIN_DISTANCE since the last sample.
 */
export function recordShadowSample(entity: EntityBase, now: number): boolean {
  const current = { x: entity.pos.x, y: entity.pos.y };
  if (
    entity.lastTrailSample &&
    distanceSquared(current, entity.lastTrailSample) <
      SHADOW_TRAIL_MIN_DISTANCE * SHADOW_TRAIL_MIN_DISTANCE
  ) {
    return false;
  }
  entity.trail.push({ ...current, scale: entity.scale, time: now });
  entity.lastTrailSample = current;
  trimShadowTrail(entity, now);
  return true;
}

export function clearShadowTrail(entity: EntityBase): void {
  entity.trail = [];
  entity.lastTrailSample = null;
}

/**
 * Opacity multiplier for a trail sample: 1 when fresh, 0 at the end of its
 * lifetime. Returns null for samples that should not be drawn.
 */
export function getShadowFade(sample: ShadowSample, now: number): number | null {
  const age = getSampleAge(sample, now);
  if (age === null || age > SHADOW_TRAIL_LIFETIME_MS) {
    return null;
  }
  return 1 - age / SHADOW_TRAIL_LIFETIME_MS;
}
