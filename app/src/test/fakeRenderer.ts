import { vi } from 'vitest';
import type {
  MainToRendererMessage,
  RendererToMainMessage,
} from '@amarre/shared';
import type { IRendererAdapter } from '../renderer/IRendererAdapter';

/**
 * In-process stand-in for the renderer: records what the Board sends and
 * lets a test push renderer messages back.
 */
export class FakeRendererAdapter implements IRendererAdapter {
  sent: MainToRendererMessage[] = [];
  destroy = vi.fn();
  private handler: ((message: RendererToMainMessage) => void) | null = null;

  sendMessage(message: MainToRendererMessage): void {
    this.sent.push(message);
  }

  onMessage(handler: (message: RendererToMainMessage) => void): void {
    this.handler = handler;
  }

  emit(message: RendererToMainMessage): void {
    this.handler?.(message);
  }

  sentOfType<T extends MainToRendererMessage['type']>(
    type: T,
  ): Extract<MainToRendererMessage, { type: T }>[] {
    return this.sent.filter(
      (message): message is Extract<MainToRendererMessage, { type: T }> =>
        message.type === type,
    );
  }
}
