import { useEffect, useRef } from 'react';
import type { IRendererAdapter } from '../renderer/IRendererAdapter';
import type {
  DisplayConfig,
  MainToRendererMessage,
  WheelEventData,
} from '@amarre/shared';

// Wheel delta per zoom step (one mouse notch)
export const WHEEL_STEP_DELTA = 100;

/**
 * Adds a wheel delta to the running total and takes whole zoom steps out
 * of it. Scrolling up (negative deltaY) zooms in; the remainder carries
 * over so trackpads step once per notch's worth of travel.
 */
export function accumulateWheel(
  accumulated: number,
  deltaY: number,
): { steps: number; remainder: number } {
  const total = accumulated + deltaY;
  const notches = Math.trunc(total / WHEEL_STEP_DELTA);
  return {
    steps: notches === 0 ? 0 : -notches,
    remainder: total - notches * WHEEL_STEP_DELTA,
  };
}

/**
 * Hook for managing canvas lifecycle
 *
 * - Sends the init message (canvas, size, DPR, display config) once the
 *   renderer is ready
 * - Forwards container resizes (ResizeObserver)
 * - Forwards wheel events (prevents default page scroll and browser zoom)
 */
export function useCanvasLifecycle(
  canvasRef: React.RefObject<HTMLCanvasElement | null>,
  containerRef: React.RefObject<HTMLDivElement | null>,
  renderer: IRendererAdapter | null,
  config: DisplayConfig,
  isReady: boolean,
  isCanvasInitialized: boolean,
  addMessage: (msg: string) => void,
): void {
  const initSentRef = useRef<IRendererAdapter | null>(null);
  const wheelDeltaRef = useRef(0);

  // Wheel event listener
  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;

    const wheelHandler = (event: WheelEvent) => {
      if (!renderer || !isCanvasInitialized) return;

      // Prevent default browser zoom AND page scroll
      event.preventDefault();

      const { steps, remainder } = accumulateWheel(
        wheelDeltaRef.current,
        event.deltaY,
      );
      wheelDeltaRef.current = remainder;
      if (steps === 0) return;

      const rect = canvas.getBoundingClientRect();
      const wheelData: WheelEventData = {
        steps,
        clientX: event.clientX - rect.left,
        clientY: event.clientY - rect.top,
      };

      const message: MainToRendererMessage = {
        type: 'wheel',
        event: wheelData,
      };
      renderer.sendMessage(message);
    };

    // Add with passive: false to allow preventDefault
    canvas.addEventListener('wheel', wheelHandler, { passive: false });

    return () => {
      canvas.removeEventListener('wheel', wheelHandler);
    };
  }, [canvasRef, renderer, isCanvasInitialized]);

  // Canvas initialization
  useEffect(() => {
    const canvas = canvasRef.current;
    if (!isReady || !canvas || !renderer) {
      return;
    }

    // One init per renderer (React strict mode runs effects twice)
    if (initSentRef.current === renderer) {
      return;
    }
    initSentRef.current = renderer;

    const dpr = window.devicePixelRatio || 1;
    const width = canvas.clientWidth || config.width;
    const height = canvas.clientHeight || config.height;

    console.log('[useCanvasLifecycle] Sending init message to renderer...', {
      width,
      height,
      dpr,
    });
    renderer.sendMessage({
      type: 'init',
      canvas,
      width,
      height,
      dpr,
      config,
    });
    addMessage(`Table ${width}x${height} at ${config.frameRate} fps`);
  }, [canvasRef, renderer, config, isReady, addMessage]);

  // Canvas resize
  useEffect(() => {
    const container = containerRef.current;
    if (!container || !renderer || !isCanvasInitialized) return;

    const resizeObserver = new ResizeObserver((entries) => {
      for (const entry of entries) {
        const message: MainToRendererMessage = {
          type: 'resize',
          width: entry.contentRect.width,
          height: entry.contentRect.height,
          dpr: window.devicePixelRatio || 1,
        };
        renderer.sendMessage(message);
      }
    });

    resizeObserver.observe(container);

    return () => {
      resizeObserver.disconnect();
    };
  }, [containerRef, renderer, isCanvasInitialized]);
}
