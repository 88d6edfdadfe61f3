/**
 * Keyboard message handlers
 */

import type { MainToRendererMessage } from '@amarre/shared';
import type { RendererContext } from '../RendererContext';
import { getEntityRect } from '../objects/base/entity';
import { rectCenter } from '../../utils/geometry';

/**
 * Handle key down
 *
 * Home restores the default view. Escape twice within the double-press
 * window recenters the camera on the deck (or the origin once the deck is
 * gone); one press only arms it.
 */
export function handleKeyDown(
  message: Extract<MainToRendererMessage, { type: 'key-down' }>,
  context: RendererContext,
): void {
  if (message.event.key === 'Home') {
    context.camera.reset();
    return;
  }
  if (message.event.key !== 'Escape') return;
  if (!context.gestures.registerEscape(context.clock())) return;

  const deck = context.sceneManager.getDeck();
  context.camera.recenter(
    deck ? rectCenter(getEntityRect(deck)) : { x: 0, y: 0 },
  );
}
