import type { Point, Size } from '@amarre/shared';
import {
  DEFAULT_ZOOM,
  MIN_ZOOM,
  MAX_ZOOM,
  ZOOM_STEP_FACTOR,
  ZOOM_EPSILON,
} from '../constants';

/**
 * CameraManager - Maps between world and screen coordinates.
 *
 * The camera is a world-space center point plus a zoom factor:
 * - worldToScreen(p) = screenCenter + (p - center) * zoom
 * - screenToWorld(p) = center + (p - screenCenter) / zoom
 *
 * Zoom is clamped to [MIN_ZOOM, MAX_ZOOM] and anchored at the cursor.
 * The visual layer reads center/zoom each frame to place the world
 * container; nothing here touches pixi.
 */
export class CameraManager {
  private center: Point = { x: 0, y: 0 };
  private zoom: number = DEFAULT_ZOOM;
  private viewport: Size;

  // Pan state
  private isPanningState = false;
  private lastPanPoint: Point | null = null;

  constructor(viewport: Size) {
    this.viewport = { ...viewport };
  }

  getCenter(): Point {
    return { ...this.center };
  }

  getZoom(): number {
    return this.zoom;
  }

  getViewport(): Size {
    return { ...this.viewport };
  }

  getScreenCenter(): Point {
    return { x: this.viewport.width / 2, y: this.viewport.height / 2 };
  }

  /**
   * Handle canvas resize. The world center stays in the middle of the
   * screen.
   */
  resize(viewport: Size): void {
    this.viewport = { ...viewport };
  }

  worldToScreen(point: Point): Point {
    const screenCenter = this.getScreenCenter();
    return {
      x: screenCenter.x + (point.x - this.center.x) * this.zoom,
      y: screenCenter.y + (point.y - this.center.y) * this.zoom,
    };
  }

  /**
   * Convert a screen point to world coordinates.
   * A zero zoom skips the division instead of producing Infinity.
   */
  screenToWorld(point: Point): Point {
    const screenCenter = this.getScreenCenter();
    const dx = point.x - screenCenter.x;
    const dy = point.y - screenCenter.y;
    if (this.zoom === 0) {
      return { x: this.center.x + dx, y: this.center.y + dy };
    }
    return {
      x: this.center.x + dx / this.zoom,
      y: this.center.y + dy / this.zoom,
    };
  }

  /**
   * Zoom by ZOOM_STEP_FACTOR^steps, keeping the world point under `cursor`
   * fixed on screen. Returns false when the clamped zoom did not change.
   */
  adjustZoom(steps: number, cursor: Point): boolean {
    const target = clampZoom(this.zoom * Math.pow(ZOOM_STEP_FACTOR, steps));
    if (Math.abs(target - this.zoom) < ZOOM_EPSILON) {
      return false;
    }

    const worldBefore = this.screenToWorld(cursor);
    this.zoom = target;
    const worldAfter = this.screenToWorld(cursor);

    this.center = {
      x: this.center.x + (worldBefore.x - worldAfter.x),
      y: this.center.y + (worldBefore.y - worldAfter.y),
    };
    return true;
  }

  /**
   * Move the camera by a screen-space delta (content follows the pointer).
   */
  pan(delta: Point): void {
    const zoom = Math.max(this.zoom, ZOOM_EPSILON);
    this.center = {
      x: this.center.x - delta.x / zoom,
      y: this.center.y - delta.y / zoom,
    };
  }

  recenter(point: Point): void {
    this.center = { x: point.x, y: point.y };
  }

  /**
   * Back to the origin at the default zoom
   */
  reset(): void {
    this.center = { x: 0, y: 0 };
    this.zoom = DEFAULT_ZOOM;
  }

  /**
   * Start a pan gesture at a screen point.
   */
  startPan(screenPoint: Point): void {
    this.isPanningState = true;
    this.lastPanPoint = { ...screenPoint };
  }

  /**
   * Continue the pan gesture. Returns false when no pan is active.
   */
  updatePan(screenPoint: Point): boolean {
    if (!this.isPanningState || !this.lastPanPoint) {
      return false;
    }
    this.pan({
      x: screenPoint.x - this.lastPanPoint.x,
      y: screenPoint.y - this.lastPanPoint.y,
    });
    this.lastPanPoint = { ...screenPoint };
    return true;
  }

  endPan(): void {
    this.isPanningState = false;
    this.lastPanPoint = null;
  }

  isPanningActive(): boolean {
    return this.isPanningState;
  }
}

export function clampZoom(zoom: number): number {
  return Math.min(MAX_ZOOM, Math.max(MIN_ZOOM, zoom));
}
