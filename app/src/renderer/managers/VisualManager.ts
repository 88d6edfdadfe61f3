import { Container, Graphics, Text } from 'pixi.js';
import type { Application, TextOptions } from 'pixi.js';
import { EntityKind, type SceneEntity } from '@amarre/shared';
import { getRenderKey, renderEntity } from '../objects';
import { getShadowFade } from '../objects/base/entity';
import type { SceneManager } from '../SceneManager';
import type { CameraManager } from './CameraManager';
import type { HandZoneManager } from './HandZoneManager';
import {
  GRID_DASH_LENGTH,
  GRID_GAP_LENGTH,
  GRID_LINE_WIDTH,
} from '../constants';
import { getGridLines } from '../../utils/gridSnap';
import { RENDER_VISUAL_FAILED } from '../../constants/errorIds';

const TRAIL_COLOR = 0x000000;
const TRAIL_MAX_ALPHA = 0.25;
const GRID_COLOR = 0x5a6b5a;
const GRID_ALPHA = 0.6;
const BASE_TEXT_RESOLUTION = 3;
const MAX_TEXT_RESOLUTION = 12;

interface EntityVisual {
  container: Container;
  key: string;
}

/**
 * What one frame needs to draw
 */
export interface FrameState {
  sceneManager: SceneManager;
  camera: CameraManager;
  hand: HandZoneManager;
  showGrid: boolean;
  now: number;
}

/**
 * VisualManager - Draws the scene with pixi.
 *
 * Layers, back to front:
 * - grid: dashed lines in screen space (only while dragging or panning)
 * - world: camera-transformed container with shadow trails under entities
 * - hand: screen-space container for docked cards
 *
 * Visuals are cached per entity and rebuilt only when the behavior's
 * render key changes; position, scale and order are updated every frame.
 */
export class VisualManager {
  private app: Application | null = null;
  private gridLayer: Graphics | null = null;
  private worldLayer: Container | null = null;
  private trailLayer: Graphics | null = null;
  private entityLayer: Container | null = null;
  private handLayer: Container | null = null;

  private visuals: Map<string, EntityVisual> = new Map();
  private dpr = 1;

  initialize(app: Application, dpr: number): void {
    this.app = app;
    this.dpr = dpr;

    this.gridLayer = new Graphics();
    this.worldLayer = new Container();
    this.trailLayer = new Graphics();
    this.entityLayer = new Container();
    this.entityLayer.sortableChildren = true;
    this.handLayer = new Container();
    this.handLayer.sortableChildren = true;

    this.worldLayer.addChild(this.trailLayer, this.entityLayer);
    app.stage.addChild(this.gridLayer, this.worldLayer, this.handLayer);
  }

  /**
   * Bring every layer up to date with the scene. The application's ticker
   * renders the stage afterwards.
   */
  sync(frame: FrameState): void {
    const { sceneManager, camera } = frame;
    if (!this.worldLayer) return;

    const zoom = camera.getZoom();
    const center = camera.getCenter();
    const screenCenter = camera.getScreenCenter();
    this.worldLayer.scale.set(zoom);
    this.worldLayer.position.set(
      screenCenter.x - center.x * zoom,
      screenCenter.y - center.y * zoom,
    );

    this.drawGrid(frame);
    this.drawTrails(frame);

    const live = new Set<string>();
    for (const entity of sceneManager.getAllEntities()) {
      live.add(entity.id);
      this.syncEntity(entity, frame);
    }
    for (const id of Array.from(this.visuals.keys())) {
      if (!live.has(id)) this.removeVisual(id);
    }
  }

  resize(width: number, height: number): void {
    this.app?.renderer.resize(width, height);
  }

  /**
   * Text at a resolution that stays sharp at the current zoom
   */
  createText(options: TextOptions, zoom: number): Text {
    const resolution = Math.min(
      MAX_TEXT_RESOLUTION,
      BASE_TEXT_RESOLUTION * this.dpr * Math.max(1, zoom),
    );
    return new Text({ ...options, resolution });
  }

  clear(): void {
    for (const id of Array.from(this.visuals.keys())) {
      this.removeVisual(id);
    }
    this.gridLayer?.clear();
    this.trailLayer?.clear();
  }

  destroy(): void {
    this.clear();
    this.app = null;
    this.gridLayer = null;
    this.worldLayer = null;
    this.trailLayer = null;
    this.entityLayer = null;
    this.handLayer = null;
  }

  private syncEntity(entity: SceneEntity, frame: FrameState): void {
    const visual = this.ensureVisual(entity, frame.camera.getZoom());
    if (!visual) return;

    const { container } = visual;
    container.scale.set(entity.scale);

    if (entity.kind === EntityKind.Card && entity.inHand && entity.handRect) {
      const order = frame.hand.getRenderOrder();
      this.reparent(container, this.handLayer);
      container.position.set(entity.handRect.x, entity.handRect.y);
      container.zIndex = order.indexOf(entity.id);
      return;
    }

    this.reparent(container, this.entityLayer);
    container.position.set(entity.pos.x, entity.pos.y);
    container.zIndex = frame.sceneManager.getZIndex(entity.id);
  }

  private ensureVisual(entity: SceneEntity, zoom: number): EntityVisual | null {
    const key = getRenderKey(entity);
    const existing = this.visuals.get(entity.id);
    if (existing && existing.key === key) return existing;

    let container: Container;
    try {
      container = renderEntity(entity, {
        createText: (options) => this.createText(options, zoom),
      });
    } catch (error) {
      console.error('[VisualManager] Failed to render entity', {
        errorId: RENDER_VISUAL_FAILED,
        entityId: entity.id,
        error: error instanceof Error ? error.message : String(error),
      });
      return existing ?? null;
    }

    if (existing) {
      const parent = existing.container.parent;
      existing.container.destroy({ children: true });
      parent?.addChild(container);
    }

    const visual = { container, key };
    this.visuals.set(entity.id, visual);
    return visual;
  }

  private reparent(container: Container, layer: Container | null): void {
    if (layer && container.parent !== layer) {
      layer.addChild(container);
    }
  }

  private removeVisual(id: string): void {
    const visual = this.visuals.get(id);
    if (!visual) return;
    visual.container.destroy({ children: true });
    this.visuals.delete(id);
  }

  private drawTrails(frame: FrameState): void {
    const trail = this.trailLayer;
    if (!trail) return;
    trail.clear();

    for (const entity of frame.sceneManager.getAllEntities()) {
      for (const sample of entity.trail) {
        const fade = getShadowFade(sample, frame.now);
        if (fade === null) continue;
        trail
          .rect(
            sample.x,
            sample.y,
            entity.baseSize.width * sample.scale,
            entity.baseSize.height * sample.scale,
          )
          .fill({ color: TRAIL_COLOR, alpha: TRAIL_MAX_ALPHA * fade });
      }
    }
  }

  private drawGrid(frame: FrameState): void {
    const grid = this.gridLayer;
    if (!grid) return;
    grid.clear();
    if (!frame.showGrid) return;

    const { camera } = frame;
    const viewport = camera.getViewport();
    const topLeft = camera.screenToWorld({ x: 0, y: 0 });
    const bottomRight = camera.screenToWorld({
      x: viewport.width,
      y: viewport.height,
    });
    const { xs, ys } = getGridLines({
      x: topLeft.x,
      y: topLeft.y,
      width: bottomRight.x - topLeft.x,
      height: bottomRight.y - topLeft.y,
    });

    const period = GRID_DASH_LENGTH + GRID_GAP_LENGTH;
    for (const worldX of xs) {
      const x = camera.worldToScreen({ x: worldX, y: 0 }).x;
      for (let y = 0; y < viewport.height; y += period) {
        grid.moveTo(x, y).lineTo(x, Math.min(y + GRID_DASH_LENGTH, viewport.height));
      }
    }
    for (const worldY of ys) {
      const y = camera.worldToScreen({ x: 0, y: worldY }).y;
      for (let x = 0; x < viewport.width; x += period) {
        grid.moveTo(x, y).lineTo(Math.min(x + GRID_DASH_LENGTH, viewport.width), y);
      }
    }
    grid.stroke({ width: GRID_LINE_WIDTH, color: GRID_COLOR, alpha: GRID_ALPHA });
  }
}
