/**
 * Pointer event handlers
 *
 * Handles pointer down, move, up and leave. Only the primary button
 * starts or ends gestures; a press picks (in order) a hand card, the draw
 * gesture on the deck, a world entity to drag, or empty table to pan.
 */

import {
  EntityKind,
  type CardEntity,
  type MainToRendererMessage,
  type Point,
  type PointerEventData,
  type SceneEntity,
} from '@amarre/shared';
import type { RendererContext } from '../RendererContext';
import { resolveDrop } from './drop';
import { drawCardFromDeck } from './deck';

const PRIMARY_BUTTON = 0;

/** Ctrl on Windows/Linux, Cmd on Mac */
export function isModifierHeld(event: PointerEventData): boolean {
  return event.ctrlKey || event.metaKey;
}

function toScreenPoint(event: PointerEventData): Point {
  return { x: event.clientX, y: event.clientY };
}

/**
 * Handle pointer down event
 */
export function handlePointerDown(
  message: Extract<MainToRendererMessage, { type: 'pointer-down' }>,
  context: RendererContext,
): void {
  const event = message.event;
  if (!event.isPrimary || (event.button ?? PRIMARY_BUTTON) !== PRIMARY_BUTTON) {
    return;
  }

  const screen = toScreenPoint(event);
  const now = context.clock();
  context.gestures.updatePointer(screen);

  // A release we never saw: settle the old drag before starting anew
  if (context.drag.isDragging()) {
    resolveDrop(context, screen, false);
  }
  context.camera.endPan();

  // The hand sits above the world
  const handCard = context.hand.hitTest(context.sceneManager, screen);
  if (handCard) {
    pickUpFromHand(context, handCard, screen);
    return;
  }

  const world = context.camera.screenToWorld(screen);
  const hit = context.sceneManager.hitTest(world);
  if (!hit) {
    context.gestures.resetClicks();
    context.camera.startPan(screen);
    return;
  }

  if (
    hit.kind === EntityKind.Deck &&
    isModifierHeld(event) &&
    context.gestures.isRepeatClick(hit.id, now)
  ) {
    context.gestures.resetClicks();
    drawCardFromDeck(context, hit.id, world);
    return;
  }

  context.gestures.recordClick(hit.id, now);
  beginDrag(context, hit, world, isModifierHeld(event));
}

/**
 * Handle pointer move event
 *
 * Drags the carried entity, or pans when the press started on empty table.
 */
export function handlePointerMove(
  message: Extract<MainToRendererMessage, { type: 'pointer-move' }>,
  context: RendererContext,
): void {
  const screen = toScreenPoint(message.event);
  context.gestures.updatePointer(screen);

  if (context.drag.isDragging()) {
    context.drag.updateDrag(
      context.sceneManager,
      context.groups,
      context.camera.screenToWorld(screen),
      context.clock(),
    );
    return;
  }

  context.camera.updatePan(screen);
}

/**
 * Handle pointer up event
 *
 * Ends the drag (drop resolution) and always stops panning.
 */
export function handlePointerUp(
  message: Extract<MainToRendererMessage, { type: 'pointer-up' }>,
  context: RendererContext,
): void {
  const event = message.event;
  if ((event.button ?? PRIMARY_BUTTON) !== PRIMARY_BUTTON) return;

  const screen = toScreenPoint(event);
  context.gestures.updatePointer(screen);

  if (context.drag.isDragging()) {
    resolveDrop(context, screen, isModifierHeld(event));
  }
  context.camera.endPan();
}

/**
 * Handle pointer leave event (cursor left canvas)
 *
 * Clears hand hover; an active drag keeps going under pointer capture.
 */
export function handlePointerLeave(
  _message: Extract<MainToRendererMessage, { type: 'pointer-leave' }>,
  context: RendererContext,
): void {
  context.gestures.clearPointer();
}

/**
 * Start dragging a world entity. A grouped card carries its group unless
 * the modifier pulls it out first.
 */
export function beginDrag(
  context: RendererContext,
  entity: SceneEntity,
  pointerWorld: Point,
  modifierHeld: boolean,
): boolean {
  const { sceneManager, groups, drag } = context;

  if (entity.kind === EntityKind.Card && entity.groupId !== null) {
    if (!modifierHeld) {
      return drag.startGroupDrag(sceneManager, groups, entity.groupId, pointerWorld);
    }
    groups.detachCard(sceneManager, entity.id);
  }
  return drag.startEntityDrag(sceneManager, entity.id, pointerWorld);
}

/**
 * Lift a card out of the hand into world space, centered under the pointer
 */
function pickUpFromHand(
  context: RendererContext,
  card: CardEntity,
  screen: Point,
): void {
  const { sceneManager } = context;
  const removed = context.hand.removeCard(sceneManager, card.id);
  if (!removed) return;

  const world = context.camera.screenToWorld(screen);
  sceneManager.moveEntity(removed.id, {
    x: world.x - removed.size.width / 2,
    y: world.y - removed.size.height / 2,
  });
  sceneManager.bringToFront([removed.id]);
  context.drag.startEntityDrag(sceneManager, removed.id, world);
}
