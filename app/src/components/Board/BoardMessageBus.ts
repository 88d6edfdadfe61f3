import { MessageHandlerRegistry } from '../../messaging/MessageHandlerRegistry';
import type { RendererToMainMessage, SceneStatus } from '@amarre/shared';

export interface BoardHandlerContext {
  // State setters
  setIsReady: (ready: boolean) => void;
  setIsCanvasInitialized: (initialized: boolean) => void;
  setStatus: (status: SceneStatus) => void;
  setIsStopped: (stopped: boolean) => void;
  addMessage: (msg: string) => void;
}

/**
 * Message bus for handling renderer-to-main messages
 *
 * Routes messages to board state updates using MessageHandlerRegistry.
 */
export class BoardMessageBus {
  private registry = new MessageHandlerRegistry<
    RendererToMainMessage,
    BoardHandlerContext
  >();

  constructor() {
    this.registerHandlers();
  }

  private registerHandlers(): void {
    // Lifecycle
    this.registry.register('ready', (_msg, ctx) => {
      ctx.setIsReady(true);
      ctx.addMessage('Renderer is ready');
    });

    this.registry.register('initialized', (_msg, ctx) => {
      ctx.setIsCanvasInitialized(true);
      ctx.addMessage('Canvas initialized');
    });

    this.registry.register('stopped', (_msg, ctx) => {
      ctx.setIsStopped(true);
      ctx.addMessage('Table closed');
    });

    // Table events
    this.registry.register('card-drawn', (msg, ctx) => {
      ctx.addMessage(`Drew ${msg.label}`);
    });

    this.registry.register('deck-exhausted', (_msg, ctx) => {
      ctx.addMessage('The deck is empty');
    });

    this.registry.register('drop-resolved', (msg, ctx) => {
      if (msg.outcome === 'reverted') {
        ctx.addMessage('No room next to the deck, card returned');
      } else if (msg.outcome === 'returned-to-deck') {
        ctx.addMessage('Card shuffled back into the deck');
      }
    });

    this.registry.register('scene-status', (msg, ctx) => {
      ctx.setStatus(msg.status);
    });

    // Errors
    this.registry.register('error', (msg, ctx) => {
      console.error('[BoardMessageBus] Renderer error:', msg.error, msg.context);
      ctx.addMessage(`Error: ${msg.error}`);
    });

    this.registry.register('warning', (msg, ctx) => {
      console.warn('[BoardMessageBus] Renderer warning:', msg.message);
      ctx.addMessage(msg.message);
    });
  }

  handleMessage(
    message: RendererToMainMessage,
    context: BoardHandlerContext,
  ): void {
    this.registry.handle(message, context);
  }
}
