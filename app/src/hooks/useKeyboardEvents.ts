import { useEffect } from 'react';
import type { IRendererAdapter } from '../renderer/IRendererAdapter';

/**
 * Forward key presses to the renderer while the table is live
 */
export function useKeyboardEvents(
  renderer: IRendererAdapter | null,
  isCanvasInitialized: boolean,
): void {
  useEffect(() => {
    if (!renderer || !isCanvasInitialized) return;

    const keyHandler = (event: KeyboardEvent) => {
      if (event.repeat) return;
      renderer.sendMessage({
        type: 'key-down',
        event: {
          key: event.key,
          metaKey: event.metaKey,
          ctrlKey: event.ctrlKey,
          shiftKey: event.shiftKey,
        },
      });
    };

    window.addEventListener('keydown', keyHandler);
    return () => {
      window.removeEventListener('keydown', keyHandler);
    };
  }, [renderer, isCanvasInitialized]);
}
