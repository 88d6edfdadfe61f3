/**
 * Frame handler
 *
 * One tick of the loop: expire shadow trails, lay out the hand, report
 * scene status when it changed. Drawing happens after this in the
 * VisualManager.
 */

import type { MainToRendererMessage, SceneStatus } from '@amarre/shared';
import type { RendererContext } from '../RendererContext';
import { trimShadowTrail } from '../objects/base/entity';

export function handleTick(
  message: Extract<MainToRendererMessage, { type: 'tick' }>,
  context: RendererContext,
): void {
  if (!context.running) return;

  for (const entity of context.sceneManager.getAllEntities()) {
    trimShadowTrail(entity, message.now);
  }

  context.hand.layout(
    context.sceneManager,
    context.camera.getViewport(),
    context.gestures.getPointer(),
  );

  const status = getSceneStatus(context);
  if (!sameStatus(status, context.lastStatus)) {
    context.lastStatus = status;
    context.postResponse({ type: 'scene-status', status });
  }
}

export function getSceneStatus(context: RendererContext): SceneStatus {
  const deck = context.sceneManager.getDeck();
  return {
    deckCount: deck ? deck.cards.length : null,
    handCount: context.hand.count,
    groupCount: context.groups.count,
    zoom: context.camera.getZoom(),
  };
}

function sameStatus(a: SceneStatus, b: SceneStatus | null): boolean {
  return (
    b !== null &&
    a.deckCount === b.deckCount &&
    a.handCount === b.handCount &&
    a.groupCount === b.groupCount &&
    a.zoom === b.zoom
  );
}
