/**
 * Camera message handlers
 *
 * Handles wheel zoom anchored at the cursor.
 */

import type { MainToRendererMessage } from '@amarre/shared';
import type { RendererContext } from '../RendererContext';

/**
 * Handle wheel event for zooming
 *
 * Positive steps zoom in. The world point under the cursor stays put.
 */
export function handleWheel(
  message: Extract<MainToRendererMessage, { type: 'wheel' }>,
  context: RendererContext,
): void {
  const { steps, clientX, clientY } = message.event;
  if (steps === 0) return;
  context.camera.adjustZoom(steps, { x: clientX, y: clientY });
}
