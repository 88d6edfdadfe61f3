/**
 * Drop resolution
 *
 * Runs when the pointer releases a drag. In order:
 * 1. hand dock (single loose card only)
 * 2. return to deck (modifier held over the deck)
 * 3. grid snap
 * 4. move off the deck to a free neighbor slot, or revert
 * 5. merge with overlapped cards, then dissolve undersized groups
 */

import {
  EntityKind,
  type DropOutcome,
  type Point,
  type Rect,
  type SceneEntity,
} from '@amarre/shared';
import type { RendererContext } from '../RendererContext';
import type { DragSession } from '../managers/DragManager';
import { getEntityRect } from '../objects/base/entity';
import { shuffleIn } from '../objects/deck/utils';
import { rectsIntersect } from '../../utils/geometry';
import {
  DROP_RELOCATE_NO_SLOT,
  DROP_STALE_ENTITY,
} from '../../constants/errorIds';
import { DEBUG } from '../../utils/debug';

/**
 * Finish the current drag. Returns the outcome, or null when nothing was
 * being dragged or the dragged entities are gone.
 */
export function resolveDrop(
  context: RendererContext,
  pointerScreen: Point,
  modifierHeld: boolean,
): DropOutcome | null {
  const session = context.drag.endDrag();
  if (!session) return null;

  const { sceneManager } = context;
  const ids = Array.from(session.origins.keys()).filter((id) =>
    sceneManager.has(id),
  );
  const lead = getLead(context, session);
  if (!lead || ids.length === 0) {
    console.warn('[drop] Released entity no longer in scene', {
      errorId: DROP_STALE_ENTITY,
      target: session.target,
    });
    return null;
  }

  const groupId = getLiveGroupId(context, session);
  if (groupId) {
    context.groups.setGroupScale(sceneManager, groupId, 1.0);
  } else {
    for (const id of ids) sceneManager.setEntityScale(id, 1.0);
  }

  const outcome = settle(context, session, lead, groupId, ids, {
    pointerScreen,
    modifierHeld,
  });
  if (DEBUG.TABLE_ACTIONS) {
    console.log('[drop] Resolved', { outcome, ids });
  }
  context.postResponse({ type: 'drop-resolved', outcome, ids });
  return outcome;
}

function settle(
  context: RendererContext,
  session: DragSession,
  lead: SceneEntity,
  groupId: string | null,
  ids: string[],
  release: { pointerScreen: Point; modifierHeld: boolean },
): DropOutcome {
  const { sceneManager, groups, camera, hand } = context;
  const isLooseCard = lead.kind === EntityKind.Card && groupId === null;

  // 1. Hand
  if (isLooseCard && lead.kind === EntityKind.Card) {
    const docked = hand.handleDrop(
      sceneManager,
      groups,
      lead,
      release.pointerScreen,
      worldRectToScreen(context, getEntityRect(lead)),
      camera.getViewport(),
    );
    if (docked) {
      hand.layout(sceneManager, camera.getViewport(), release.pointerScreen);
      return 'handed';
    }
  }

  // 2. Back into the deck
  const deck = sceneManager.getDeck();
  if (
    isLooseCard &&
    lead.kind === EntityKind.Card &&
    release.modifierHeld &&
    deck &&
    rectsIntersect(getEntityRect(lead), getEntityRect(deck))
  ) {
    groups.detachCard(sceneManager, lead.id);
    shuffleIn(deck, lead.label, context.random);
    sceneManager.removeEntity(lead.id);
    return 'returned-to-deck';
  }

  // 3. Snap
  context.gridSnap.snapEntity(sceneManager, lead.id);
  if (groupId) {
    groups.updateAnchor(sceneManager, groupId);
  }

  // 4. Keep the deck clear
  if (
    lead.kind === EntityKind.Card &&
    deck &&
    rectsIntersect(getEntityRect(lead), getEntityRect(deck))
  ) {
    const slot = context.gridSnap.findFreeSlot(
      sceneManager,
      deck,
      lead,
      new Set(ids),
    );
    if (!slot) {
      console.warn('[drop] No free slot next to the deck, reverting', {
        errorId: DROP_RELOCATE_NO_SLOT,
        ids,
      });
      for (const [id, origin] of session.origins) {
        sceneManager.moveEntity(id, origin);
      }
      return 'reverted';
    }
    if (groupId) {
      groups.moveGroup(sceneManager, groupId, slot);
    } else {
      sceneManager.moveEntity(lead.id, slot);
    }
  }

  // 5. Merge
  const merged = mergeReleasedCards(context, ids);
  groups.dissolveUndersized(sceneManager);
  return merged ? 'merged' : 'snapped';
}

/**
 * For each released card, stack it with the topmost overlapping world card
 * that is not already in its group.
 */
function mergeReleasedCards(context: RendererContext, ids: string[]): boolean {
  const { sceneManager, groups } = context;
  let merged = false;

  for (const id of ids) {
    const card = sceneManager.getCard(id);
    if (!card || card.inHand) continue;

    const exclude = new Set(groups.getMemberIds(card));
    const other = sceneManager
      .queryRect(getEntityRect(card), exclude)
      .find((entity) => entity.kind === EntityKind.Card && !entity.inHand);
    if (!other) continue;

    if (groups.merge(sceneManager, card.id, other.id) !== 'none') {
      merged = true;
    }
  }
  return merged;
}

function getLead(
  context: RendererContext,
  session: DragSession,
): SceneEntity | undefined {
  const { target } = session;
  const leadId = target.kind === 'entity' ? target.id : target.anchorId;
  return context.sceneManager.getEntity(leadId);
}

function getLiveGroupId(
  context: RendererContext,
  session: DragSession,
): string | null {
  const { target } = session;
  if (target.kind !== 'group') return null;
  return context.groups.getGroup(target.groupId) ? target.groupId : null;
}

function worldRectToScreen(context: RendererContext, rect: Rect): Rect {
  const topLeft = context.camera.worldToScreen(rect);
  const zoom = context.camera.getZoom();
  return {
    ...topLeft,
    width: rect.width * zoom,
    height: rect.height * zoom,
  };
}
