/**
 * Renderer Message Bus
 *
 * Registers all message handlers and middleware for the renderer.
 */

import { MessageHandlerRegistry } from '../messaging/MessageHandlerRegistry';
import type { MainToRendererMessage } from '@amarre/shared';
import type { RendererContext } from './RendererContext';
import {
  loggingMiddleware,
  performanceMiddleware,
  errorHandlingMiddleware,
} from '../messaging/middleware';

import * as lifecycle from './handlers/lifecycle';
import * as pointer from './handlers/pointer';
import * as camera from './handlers/camera';
import * as keyboard from './handlers/keyboard';
import * as frame from './handlers/frame';

/**
 * Message bus for renderer
 *
 * Routes every message except 'init' (owned by the orchestrator, which
 * creates the pixi application) to its handler.
 */
export class RendererMessageBus {
  private registry = new MessageHandlerRegistry<
    MainToRendererMessage,
    RendererContext
  >();

  constructor() {
    this.registerMiddleware();
    this.registerHandlers();
  }

  /**
   * Register middleware in execution order
   *
   * Order matters:
   * 1. Error handling (outermost - catches all errors)
   * 2. Performance tracking
   * 3. Logging
   */
  private registerMiddleware(): void {
    this.registry.use(errorHandlingMiddleware);
    this.registry.use(performanceMiddleware);
    this.registry.use(loggingMiddleware);
  }

  private registerHandlers(): void {
    // Lifecycle
    this.registry.register('resize', lifecycle.handleResize);
    this.registry.register('quit', lifecycle.handleQuit);

    // Pointer events
    this.registry.register('pointer-down', pointer.handlePointerDown);
    this.registry.register('pointer-move', pointer.handlePointerMove);
    this.registry.register('pointer-up', pointer.handlePointerUp);
    this.registry.register('pointer-leave', pointer.handlePointerLeave);

    // Camera
    this.registry.register('wheel', camera.handleWheel);

    // Keyboard
    this.registry.register('key-down', keyboard.handleKeyDown);

    // Frame
    this.registry.register('tick', frame.handleTick);
  }

  has(type: MainToRendererMessage['type']): boolean {
    return this.registry.has(type);
  }

  /**
   * Handle a message by routing to the appropriate handler
   */
  handleMessage(message: MainToRendererMessage, context: RendererContext): void {
    this.registry.handle(message, context);
  }
}
