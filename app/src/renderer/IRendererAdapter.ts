import type {
  MainToRendererMessage,
  RendererToMainMessage,
} from '@amarre/shared';

/**
 * Interface for renderer communication.
 *
 * The Board talks to the renderer only through this, so tests can swap in
 * a fake and the renderer never reaches into React state.
 */
export interface IRendererAdapter {
  /**
   * Send a message to the renderer.
   */
  sendMessage(message: MainToRendererMessage): void;

  /**
   * Register a handler for messages from the renderer.
   */
  onMessage(handler: (message: RendererToMainMessage) => void): void;

  /**
   * Clean up resources.
   */
  destroy(): void;
}
