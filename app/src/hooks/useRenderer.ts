import { useEffect, useState } from 'react';
import type { IRendererAdapter } from '../renderer/IRendererAdapter';
import { MainThreadRendererAdapter } from '../renderer/MainThreadRendererAdapter';

export type RendererFactory = () => IRendererAdapter;

export const createMainThreadRenderer: RendererFactory = () =>
  new MainThreadRendererAdapter();

/**
 * Hook for managing renderer lifecycle
 *
 * Creates the adapter on mount and destroys it on unmount. Ready state and
 * canvas initialization are tracked by the Board's message handler.
 */
export function useRenderer(
  createAdapter: RendererFactory = createMainThreadRenderer,
): IRendererAdapter | null {
  const [renderer, setRenderer] = useState<IRendererAdapter | null>(null);

  useEffect(() => {
    const adapter = createAdapter();
    setRenderer(adapter);

    return () => {
      console.log('[useRenderer] Cleaning up renderer');
      adapter.destroy();
      setRenderer(null);
    };
  }, [createAdapter]);

  return renderer;
}
