import type { Point } from '@amarre/shared';
import type { SceneManager } from '../SceneManager';
import type { GroupManager } from './GroupManager';
import { DRAG_LIFT_SCALE } from '../constants';
import { recordShadowSample } from '../objects/base/entity';
import { DRAG_STALE_ENTITY } from '../../constants/errorIds';

/**
 * What the pointer is carrying: one entity, or a whole amarre moved by
 * its anchor card.
 */
export type DragTarget =
  | { kind: 'entity'; id: string }
  | { kind: 'group'; groupId: string; anchorId: string };

/**
 * Drag state for one press-move-release interaction.
 */
export interface DragSession {
  target: DragTarget;
  offset: Point; // pointer - anchor top-left, world units
  origins: Map<string, Point>; // pre-drag positions for revert
}

/**
 * DragManager - Handles entity dragging.
 *
 * Manages:
 * - Single entity and whole-group drags
 * - Z-order management (dragged entities move to top)
 * - Lift scale while carried
 * - Shadow trail sampling while moving
 */
export class DragManager {
  private session: DragSession | null = null;

  /**
   * Check if currently dragging.
   */
  isDragging(): boolean {
    return this.session !== null;
  }

  getSession(): DragSession | null {
    return this.session;
  }

  /**
   * Pick up a single entity.
   */
  startEntityDrag(
    sceneManager: SceneManager,
    entityId: string,
    pointerWorld: Point,
  ): boolean {
    const entity = sceneManager.getEntity(entityId);
    if (!entity) {
      console.warn('[DragManager] Cannot drag missing entity', {
        errorId: DRAG_STALE_ENTITY,
        entityId,
      });
      return false;
    }

    this.session = {
      target: { kind: 'entity', id: entity.id },
      offset: {
        x: pointerWorld.x - entity.pos.x,
        y: pointerWorld.y - entity.pos.y,
      },
      origins: new Map([[entity.id, { ...entity.pos }]]),
    };

    sceneManager.bringToFront([entity.id]);
    sceneManager.setEntityScale(entity.id, DRAG_LIFT_SCALE);
    return true;
  }

  /**
   * Pick up an amarre by its anchor; all members are raised and lifted.
   */
  startGroupDrag(
    sceneManager: SceneManager,
    groups: GroupManager,
    groupId: string,
    pointerWorld: Point,
  ): boolean {
    const group = groups.getGroup(groupId);
    const anchorId = groups.getAnchorId(groupId);
    const anchor = anchorId ? sceneManager.getCard(anchorId) : undefined;
    if (!group || !anchor) {
      console.warn('[DragManager] Cannot drag missing group', {
        errorId: DRAG_STALE_ENTITY,
        groupId,
      });
      return false;
    }

    const origins = new Map<string, Point>();
    for (const id of group.cardIds) {
      const member = sceneManager.getEntity(id);
      if (member) origins.set(id, { ...member.pos });
    }

    this.session = {
      target: { kind: 'group', groupId: group.id, anchorId: anchor.id },
      offset: {
        x: pointerWorld.x - anchor.pos.x,
        y: pointerWorld.y - anchor.pos.y,
      },
      origins,
    };

    sceneManager.bringToFront(group.cardIds);
    groups.setGroupScale(sceneManager, group.id, DRAG_LIFT_SCALE);
    return true;
  }

  /**
   * Follow the pointer. Ends the session if the carried entity vanished.
   */
  updateDrag(
    sceneManager: SceneManager,
    groups: GroupManager,
    pointerWorld: Point,
    now: number,
  ): boolean {
    const session = this.session;
    if (!session) return false;

    const pos = {
      x: pointerWorld.x - session.offset.x,
      y: pointerWorld.y - session.offset.y,
    };

    const { target } = session;
    const leadId = target.kind === 'entity' ? target.id : target.anchorId;
    const lead = sceneManager.getEntity(leadId);
    if (!lead) {
      console.warn('[DragManager] Dragged entity no longer in scene', {
        errorId: DRAG_STALE_ENTITY,
        entityId: leadId,
      });
      this.session = null;
      return false;
    }

    if (target.kind === 'group' && groups.getGroup(target.groupId)) {
      groups.moveGroup(sceneManager, target.groupId, pos);
    } else {
      sceneManager.moveEntity(lead.id, pos);
    }
    recordShadowSample(lead, now);
    return true;
  }

  /**
   * Release: returns the finished session for drop resolution.
   */
  endDrag(): DragSession | null {
    const session = this.session;
    this.session = null;
    return session;
  }
}
