import RBush from 'rbush';
import {
  EntityKind,
  type CardEntity,
  type DeckEntity,
  type Point,
  type Rect,
  type SceneEntity,
} from '@amarre/shared';
import { applyEntityScale, getEntityRect } from './objects/base/entity';
import { rectContainsPoint, rectsIntersect } from '../utils/geometry';

/**
 * Bounding box for RBush spatial indexing
 */
export interface BBox {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
  id: string; // Entity ID
}

/**
 * SceneManager owns every top-level entity on the table.
 *
 * - Z-order is list position: the last entry is drawn on top.
 * - World-resident entities are kept in an RBush index for hit-testing and
 *   overlap queries. Cards docked in the hand live in screen space and are
 *   left out of the index.
 * - Positions and scales change only through moveEntity/setEntityScale so the
 *   index never goes stale.
 */
export class SceneManager {
  private entities: Map<string, SceneEntity> = new Map();
  private order: string[] = [];
  private zIndex: Map<string, number> = new Map();
  private spatialIndex: RBush<BBox> = new RBush();
  private bboxCache: Map<string, BBox> = new Map(); // Cache bboxes for accurate removal
  private idCounters: Map<string, number> = new Map();

  /**
   * Allocate a fresh id such as "card-3"
   */
  nextId(prefix: string): string {
    let next = (this.idCounters.get(prefix) ?? 0) + 1;
    while (this.entities.has(`${prefix}-${next}`)) {
      next++;
    }
    this.idCounters.set(prefix, next);
    return `${prefix}-${next}`;
  }

  /**
   * Add an entity on top of the z-order
   */
  addEntity(entity: SceneEntity): void {
    if (this.entities.has(entity.id)) {
      console.warn(`[SceneManager] Entity ${entity.id} already in scene`);
      return;
    }
    this.entities.set(entity.id, entity);
    this.order.push(entity.id);
    this.zIndex.set(entity.id, this.order.length - 1);
    this.reindex(entity.id);
  }

  /**
   * Remove an entity; unknown ids are ignored
   */
  removeEntity(id: string): SceneEntity | undefined {
    const entity = this.entities.get(id);
    if (!entity) return undefined;

    this.unindex(id);
    this.entities.delete(id);
    this.order = this.order.filter((entry) => entry !== id);
    this.rebuildZIndex();
    return entity;
  }

  getEntity(id: string): SceneEntity | undefined {
    return this.entities.get(id);
  }

  getCard(id: string): CardEntity | undefined {
    const entity = this.entities.get(id);
    return entity?.kind === EntityKind.Card ? entity : undefined;
  }

  /**
   * The table's deck, if one remains
   */
  getDeck(): DeckEntity | undefined {
    for (const id of this.order) {
      const entity = this.entities.get(id);
      if (entity?.kind === EntityKind.Deck) {
        return entity;
      }
    }
    return undefined;
  }

  has(id: string): boolean {
    return this.entities.has(id);
  }

  /**
   * All entities back-to-front
   */
  getAllEntities(): SceneEntity[] {
    const result: SceneEntity[] = [];
    for (const id of this.order) {
      const entity = this.entities.get(id);
      if (entity) result.push(entity);
    }
    return result;
  }

  getZIndex(id: string): number {
    return this.zIndex.get(id) ?? -1;
  }

  get size(): number {
    return this.entities.size;
  }

  /**
   * Raise entities to the top, keeping their relative order
   */
  bringToFront(ids: string[]): void {
    const raised = this.order.filter((id) => ids.includes(id));
    if (raised.length === 0) return;
    this.order = [
      ...this.order.filter((id) => !ids.includes(id)),
      ...raised,
    ];
    this.rebuildZIndex();
  }

  /**
   * Move an entity's top-left corner and refresh its index entry
   */
  moveEntity(id: string, pos: Point): void {
    const entity = this.entities.get(id);
    if (!entity) return;
    entity.pos = { x: pos.x, y: pos.y };
    this.reindex(id);
  }

  /**
   * Rescale around the top-left corner and refresh its index entry
   */
  setEntityScale(id: string, scale: number): boolean {
    const entity = this.entities.get(id);
    if (!entity) return false;
    const changed = applyEntityScale(entity, scale);
    if (changed) this.reindex(id);
    return changed;
  }

  /**
   * Re-sync the spatial index after a residency change (hand in/out)
   */
  reindex(id: string): void {
    this.unindex(id);
    const entity = this.entities.get(id);
    if (!entity || !isWorldResident(entity)) return;

    const bbox = toBBox(entity);
    this.spatialIndex.insert(bbox);
    this.bboxCache.set(id, bbox); // Cache for accurate removal later
  }

  /**
   * Hit-test: the topmost world entity containing a world point
   */
  hitTest(point: Point): SceneEntity | null {
    const candidates = this.spatialIndex.search({
      minX: point.x,
      minY: point.y,
      maxX: point.x,
      maxY: point.y,
    });

    let best: SceneEntity | null = null;
    let bestZ = -1;
    for (const bbox of candidates) {
      const entity = this.entities.get(bbox.id);
      if (!entity || !rectContainsPoint(getEntityRect(entity), point)) {
        continue;
      }
      const z = this.getZIndex(bbox.id);
      if (z > bestZ) {
        best = entity;
        bestZ = z;
      }
    }
    return best;
  }

  /**
   * World entities strictly overlapping a rect, topmost first
   */
  queryRect(rect: Rect, exclude: ReadonlySet<string> = new Set()): SceneEntity[] {
    const candidates = this.spatialIndex.search({
      minX: rect.x,
      minY: rect.y,
      maxX: rect.x + rect.width,
      maxY: rect.y + rect.height,
    });

    const hits: SceneEntity[] = [];
    for (const bbox of candidates) {
      if (exclude.has(bbox.id)) continue;
      const entity = this.entities.get(bbox.id);
      if (entity && rectsIntersect(getEntityRect(entity), rect)) {
        hits.push(entity);
      }
    }
    return hits.sort((a, b) => this.getZIndex(b.id) - this.getZIndex(a.id));
  }

  /**
   * Clear all entities from the scene
   */
  clear(): void {
    this.entities.clear();
    this.order = [];
    this.zIndex.clear();
    this.spatialIndex.clear();
    this.bboxCache.clear();
  }

  private unindex(id: string): void {
    // Remove using the cached bbox; the entity may have moved since
    const bbox = this.bboxCache.get(id);
    if (bbox) {
      this.spatialIndex.remove(bbox, (a, b) => a.id === b.id);
      this.bboxCache.delete(id);
    }
  }

  private rebuildZIndex(): void {
    this.zIndex.clear();
    this.order.forEach((id, index) => this.zIndex.set(id, index));
  }
}

function isWorldResident(entity: SceneEntity): boolean {
  return entity.kind !== EntityKind.Card || !entity.inHand;
}

function toBBox(entity: SceneEntity): BBox {
  const rect = getEntityRect(entity);
  return {
    minX: rect.x,
    minY: rect.y,
    maxX: rect.x + rect.width,
    maxY: rect.y + rect.height,
    id: entity.id,
  };
}
