import { useEffect, useRef, useState, useCallback, useMemo } from 'react';
import type {
  DisplayConfig,
  RendererToMainMessage,
  SceneStatus,
} from '@amarre/shared';
import { BoardMessageBus, type BoardHandlerContext } from './Board/BoardMessageBus';
import { useRenderer, type RendererFactory } from '../hooks/useRenderer';
import { usePointerEvents } from '../hooks/usePointerEvents';
import { useCanvasLifecycle } from '../hooks/useCanvasLifecycle';
import { useKeyboardEvents } from '../hooks/useKeyboardEvents';

const MAX_MESSAGES = 5;

export interface BoardProps {
  config: DisplayConfig;
  createRenderer?: RendererFactory;
}

/**
 * One-line summary shown under the table
 */
export function formatSceneStatus(status: SceneStatus): string {
  const deck = status.deckCount === null ? 'empty' : String(status.deckCount);
  return `Deck: ${deck} | Hand: ${status.handCount} | Groups: ${status.groupCount} | Zoom: ${Math.round(status.zoom * 100)}%`;
}

function Board({ config, createRenderer }: BoardProps) {
  const canvasRef = useRef<HTMLCanvasElement>(null);
  const containerRef = useRef<HTMLDivElement>(null);
  const messageBusRef = useRef(new BoardMessageBus());

  const renderer = useRenderer(createRenderer);

  const [messages, setMessages] = useState<string[]>([]);
  const [isReady, setIsReady] = useState(false);
  const [isCanvasInitialized, setIsCanvasInitialized] = useState(false);
  const [isStopped, setIsStopped] = useState(false);
  const [status, setStatus] = useState<SceneStatus | null>(null);

  const addMessage = useCallback((msg: string) => {
    setMessages((prev) => [...prev, msg].slice(-MAX_MESSAGES));
  }, []);

  useEffect(() => {
    document.title = config.caption;
  }, [config.caption]);

  // Handle messages from renderer
  useEffect(() => {
    if (!renderer) return;

    setIsReady(false);
    setIsCanvasInitialized(false);
    setIsStopped(false);

    const context: BoardHandlerContext = {
      setIsReady,
      setIsCanvasInitialized,
      setStatus,
      setIsStopped,
      addMessage,
    };
    renderer.onMessage((message: RendererToMainMessage) => {
      messageBusRef.current.handleMessage(message, context);
    });
  }, [renderer, addMessage]);

  useCanvasLifecycle(
    canvasRef,
    containerRef,
    renderer,
    config,
    isReady,
    isCanvasInitialized,
    addMessage,
  );
  useKeyboardEvents(renderer, isCanvasInitialized && !isStopped);
  const pointerHandlers = usePointerEvents(
    canvasRef,
    renderer,
    isCanvasInitialized && !isStopped,
  );

  const handleQuit = useCallback(() => {
    renderer?.sendMessage({ type: 'quit' });
  }, [renderer]);

  const tableStyle = useMemo<React.CSSProperties>(
    () =>
      config.fullscreen
        ? { width: '100vw', height: '100vh' }
        : { width: `${config.width}px`, height: `${config.height}px` },
    [config.fullscreen, config.width, config.height],
  );

  return (
    <div className="board" data-testid="board">
      <div ref={containerRef} style={{ ...tableStyle, position: 'relative' }}>
        <canvas
          ref={canvasRef}
          data-testid="board-canvas"
          style={{
            width: '100%',
            height: '100%',
            display: 'block',
            touchAction: 'none',
          }}
          onContextMenu={(e) => e.preventDefault()}
          {...pointerHandlers}
        />
      </div>

      <div
        className="status"
        data-testid="scene-status"
        style={{ fontSize: '12px', padding: '4px 0' }}
      >
        {status
          ? formatSceneStatus(status)
          : isCanvasInitialized
            ? 'Table ready'
            : 'Loading table...'}
      </div>

      <div className="controls">
        <button
          onClick={handleQuit}
          disabled={!isCanvasInitialized || isStopped}
          data-testid="quit-button"
        >
          Leave table
        </button>
      </div>

      <ul className="messages" data-testid="messages">
        {messages.map((msg, index) => (
          <li key={index} data-testid={`message-${index}`}>
            {msg}
          </li>
        ))}
      </ul>
    </div>
  );
}

export default Board;
