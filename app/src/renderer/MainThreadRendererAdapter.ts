import type {
  MainToRendererMessage,
  RendererToMainMessage,
} from '@amarre/shared';
import type { IRendererAdapter } from './IRendererAdapter';
import { RendererOrchestrator } from './RendererOrchestrator';

/**
 * Main-thread implementation of RendererOrchestrator.
 *
 * Implements postResponse with a callback instead of postMessage.
 */
class MainThreadRendererOrchestrator extends RendererOrchestrator {
  private callback: ((message: RendererToMainMessage) => void) | null = null;

  setCallback(callback: (message: RendererToMainMessage) => void): void {
    this.callback = callback;
  }

  protected postResponse(message: RendererToMainMessage): void {
    if (this.callback) {
      this.callback(message);
    }
  }
}

/**
 * Adapter that runs the renderer on the main thread. Messages are sent via
 * direct method calls and received via callback.
 */
export class MainThreadRendererAdapter implements IRendererAdapter {
  private renderer: MainThreadRendererOrchestrator;
  private messageHandler: ((message: RendererToMainMessage) => void) | null =
    null;

  constructor() {
    this.renderer = new MainThreadRendererOrchestrator();

    this.renderer.setCallback((message: RendererToMainMessage) => {
      if (this.messageHandler) {
        this.messageHandler(message);
      }
    });
  }

  sendMessage(message: MainToRendererMessage): void {
    this.renderer.handleMessage(message).catch((error: unknown) => {
      console.error('[MainThreadRendererAdapter] handleMessage error:', error);

      // Forward any unhandled errors to the message handler
      if (this.messageHandler) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        this.messageHandler({
          type: 'error',
          error: `Unhandled renderer error: ${errorMsg}`,
          context: message.type,
        });
      }
    });
  }

  onMessage(handler: (message: RendererToMainMessage) => void): void {
    this.messageHandler = handler;

    // Send ready on the next task, once the caller finished wiring up
    setTimeout(() => {
      handler({ type: 'ready' });
    }, 0);
  }

  destroy(): void {
    this.messageHandler = null;
    this.renderer.destroy();
  }
}
