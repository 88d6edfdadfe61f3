import { useCallback } from 'react';
import type { IRendererAdapter } from '../renderer/IRendererAdapter';
import type { PointerEventData, MainToRendererMessage } from '@amarre/shared';

export interface PointerEventHandlers {
  onPointerDown: (event: React.PointerEvent<HTMLCanvasElement>) => void;
  onPointerMove: (event: React.PointerEvent<HTMLCanvasElement>) => void;
  onPointerUp: (event: React.PointerEvent<HTMLCanvasElement>) => void;
  onPointerCancel: (event: React.PointerEvent<HTMLCanvasElement>) => void;
  onPointerLeave: () => void;
}

/**
 * Serialize a pointer event in canvas-relative CSS pixels
 */
export function serializePointerEvent(
  event: React.PointerEvent,
  canvas: HTMLCanvasElement | null,
): PointerEventData {
  const pointerType = event.pointerType;
  const isValidType =
    pointerType === 'mouse' || pointerType === 'pen' || pointerType === 'touch';

  if (!isValidType) {
    console.warn('Unexpected pointer type:', pointerType, 'defaulting to mouse');
  }

  let canvasX = event.clientX;
  let canvasY = event.clientY;
  if (canvas) {
    const rect = canvas.getBoundingClientRect();
    canvasX = event.clientX - rect.left;
    canvasY = event.clientY - rect.top;
  }

  return {
    pointerId: event.pointerId,
    pointerType: isValidType ? pointerType : 'mouse',
    clientX: canvasX,
    clientY: canvasY,
    button: event.button,
    buttons: event.buttons,
    isPrimary: event.isPrimary,
    metaKey: event.metaKey,
    ctrlKey: event.ctrlKey,
    shiftKey: event.shiftKey,
  };
}

/**
 * Hook for handling pointer events and forwarding to renderer
 *
 * A cancelled pointer is forwarded as a release so drags and pans always
 * end.
 */
export function usePointerEvents(
  canvasRef: React.RefObject<HTMLCanvasElement | null>,
  renderer: IRendererAdapter | null,
  isCanvasInitialized: boolean,
): PointerEventHandlers {
  const send = useCallback(
    (message: MainToRendererMessage) => {
      if (!renderer || !isCanvasInitialized) return;
      renderer.sendMessage(message);
    },
    [renderer, isCanvasInitialized],
  );

  const handlePointerDown = useCallback(
    (event: React.PointerEvent<HTMLCanvasElement>) => {
      // Ignore right-click (button 2)
      if (event.button === 2) {
        return;
      }

      // Keep receiving moves and the release outside the canvas
      const target = event.currentTarget;
      if (typeof target.setPointerCapture === 'function') {
        target.setPointerCapture(event.pointerId);
      }

      send({
        type: 'pointer-down',
        event: serializePointerEvent(event, canvasRef.current),
      });
    },
    [send, canvasRef],
  );

  const handlePointerMove = useCallback(
    (event: React.PointerEvent<HTMLCanvasElement>) => {
      send({
        type: 'pointer-move',
        event: serializePointerEvent(event, canvasRef.current),
      });
    },
    [send, canvasRef],
  );

  const handlePointerUp = useCallback(
    (event: React.PointerEvent<HTMLCanvasElement>) => {
      send({
        type: 'pointer-up',
        event: serializePointerEvent(event, canvasRef.current),
      });
    },
    [send, canvasRef],
  );

  const handlePointerCancel = useCallback(
    (event: React.PointerEvent<HTMLCanvasElement>) => {
      send({
        type: 'pointer-up',
        event: { ...serializePointerEvent(event, canvasRef.current), button: 0 },
      });
    },
    [send, canvasRef],
  );

  const handlePointerLeave = useCallback(() => {
    send({ type: 'pointer-leave' });
  }, [send]);

  return {
    onPointerDown: handlePointerDown,
    onPointerMove: handlePointerMove,
    onPointerUp: handlePointerUp,
    onPointerCancel: handlePointerCancel,
    onPointerLeave: handlePointerLeave,
  };
}
