/**
 * Lifecycle message handlers
 *
 * Handles resize and quit. Resizing the pixi renderer itself is done by the
 * orchestrator; here the camera and hand pick up the new viewport.
 */

import type { MainToRendererMessage } from '@amarre/shared';
import type { RendererContext } from '../RendererContext';

/**
 * Handle canvas resize
 */
export function handleResize(
  message: Extract<MainToRendererMessage, { type: 'resize' }>,
  context: RendererContext,
): void {
  const { width, height } = message;
  if (width <= 0 || height <= 0) {
    console.warn('[lifecycle] Ignoring resize to empty viewport', {
      width,
      height,
    });
    return;
  }
  context.camera.resize({ width, height });
  context.hand.layout(
    context.sceneManager,
    context.camera.getViewport(),
    context.gestures.getPointer(),
  );
}

/**
 * Handle quit: stop the frame loop
 */
export function handleQuit(
  _message: Extract<MainToRendererMessage, { type: 'quit' }>,
  context: RendererContext,
): void {
  context.running = false;
  context.postResponse({ type: 'stopped' });
}
