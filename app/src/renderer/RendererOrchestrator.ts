/**
 * Renderer Orchestrator
 *
 * Owns the pixi application and the frame loop. Input messages go through
 * RendererMessageBus; every ticker frame runs a 'tick' through the bus and
 * then syncs the VisualManager.
 */

import { Application } from 'pixi.js';
import {
  AMARRE_VERSION,
  type MainToRendererMessage,
  type RendererToMainMessage,
} from '@amarre/shared';
import { RendererMessageBus } from './RendererMessageBus';
import {
  createRendererContext,
  type RendererContext,
} from './RendererContext';
import { VisualManager } from './managers/VisualManager';
import { populateInitialScene } from './initialScene';
import { RENDER_INIT_FAILED } from '../constants/errorIds';

const TABLE_COLOR = 0x2e5e3e;

/**
 * Abstract base class for renderer orchestrator
 *
 * Subclasses provide postResponse for their communication channel.
 */
export abstract class RendererOrchestrator {
  // PixiJS
  private app: Application | null = null;
  private visual: VisualManager = new VisualManager();

  private messageBus: RendererMessageBus = new RendererMessageBus();
  private context: RendererContext | null = null;

  private readonly onTick = (): void => {
    this.frame();
  };

  /**
   * Send response message to main thread
   */
  protected abstract postResponse(message: RendererToMainMessage): void;

  /**
   * Handle incoming message
   *
   * Routes 'init' to initialize(), everything else to the message bus.
   */
  async handleMessage(message: MainToRendererMessage): Promise<void> {
    if (message.type === 'init') {
      await this.initialize(message);
      return;
    }

    const context = this.context;
    if (!context) {
      throw new Error(
        `RendererOrchestrator not initialized (got ${message.type})`,
      );
    }

    this.messageBus.handleMessage(message, context);

    if (message.type === 'resize') {
      this.visual.resize(message.width, message.height);
    }
    if (!context.running) {
      this.stop();
    }
  }

  private async initialize(
    message: Extract<MainToRendererMessage, { type: 'init' }>,
  ): Promise<void> {
    const { canvas, width, height, dpr, config } = message;
    console.log('[RendererOrchestrator] Initializing PixiJS...', {
      width,
      height,
      dpr,
      frameRate: config.frameRate,
    });

    const context = createRendererContext({
      viewport: { width, height },
      postResponse: (response) => this.postResponse(response),
    });

    try {
      this.app = new Application();
      await this.app.init({
        canvas,
        width,
        height,
        resolution: dpr,
        autoDensity: true,
        backgroundColor: TABLE_COLOR,
        autoStart: false, // frame loop starts once the scene exists
        antialias: true,
      });
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      console.error('[RendererOrchestrator] Initialization failed:', {
        errorId: RENDER_INIT_FAILED,
        error: errorMsg,
      });
      this.app = null;
      this.postResponse({
        type: 'error',
        error: `PixiJS initialization failed: ${errorMsg}`,
        context: 'init',
      });
      return;
    }

    this.visual.initialize(this.app, dpr);
    populateInitialScene(context);
    this.context = context;

    this.app.ticker.maxFPS = config.frameRate;
    this.app.ticker.add(this.onTick);
    this.app.ticker.start();

    console.log('[RendererOrchestrator] ✓ PixiJS initialized successfully', {
      renderer: this.app.renderer.name,
      version: AMARRE_VERSION,
    });
    this.postResponse({ type: 'initialized' });
  }

  private frame(): void {
    const context = this.context;
    if (!context) return;

    const now = context.clock();
    this.messageBus.handleMessage({ type: 'tick', now }, context);
    this.visual.sync({
      sceneManager: context.sceneManager,
      camera: context.camera,
      hand: context.hand,
      showGrid: context.drag.isDragging() || context.camera.isPanningActive(),
      now,
    });

    if (!context.running) {
      this.stop();
    }
  }

  private stop(): void {
    if (this.app?.ticker.started) {
      console.log('[RendererOrchestrator] Frame loop stopped');
      this.app.ticker.stop();
    }
  }

  /**
   * Cleanup resources
   */
  destroy(): void {
    this.stop();
    this.visual.destroy();
    if (this.app) {
      this.app.ticker.remove(this.onTick);
      this.app.destroy();
      this.app = null;
    }
    if (this.context) {
      this.context.sceneManager.clear();
      this.context.groups.clear();
      this.context.hand.clear();
      this.context = null;
    }
  }
}
