import { describe, it, expect, beforeEach } from 'vitest';
import { CameraManager, clampZoom } from './CameraManager';

describe('CameraManager', () => {
  let camera: CameraManager;

  beforeEach(() => {
    camera = new CameraManager({ width: 800, height: 600 });
  });

  it('maps the world origin to the middle of an 800x600 screen', () => {
    expect(camera.worldToScreen({ x: 0, y: 0 })).toEqual({ x: 400, y: 300 });
    expect(camera.screenToWorld({ x: 400, y: 300 })).toEqual({ x: 0, y: 0 });
  });

  it('round-trips points at any zoom and center', () => {
    camera.recenter({ x: 123, y: -45 });
    camera.adjustZoom(3, { x: 100, y: 500 });

    for (const point of [
      { x: 0, y: 0 },
      { x: -250.5, y: 17 },
      { x: 1000, y: -1000 },
    ]) {
      const back = camera.screenToWorld(camera.worldToScreen(point));
      expect(back.x).toBeCloseTo(point.x, 6);
      expect(back.y).toBeCloseTo(point.y, 6);
    }
  });

  describe('adjustZoom', () => {
    it('steps by a factor of 1.2', () => {
      expect(camera.adjustZoom(1, { x: 400, y: 300 })).toBe(true);
      expect(camera.getZoom()).toBeCloseTo(1.2);
    });

    it('stays within [0.25, 2]', () => {
      camera.adjustZoom(20, { x: 400, y: 300 });
      expect(camera.getZoom()).toBe(2);
      expect(camera.adjustZoom(1, { x: 400, y: 300 })).toBe(false);

      camera.adjustZoom(-40, { x: 400, y: 300 });
      expect(camera.getZoom()).toBe(0.25);
    });

    it('keeps the world point under the cursor fixed', () => {
      const cursor = { x: 600, y: 150 };
      const before = camera.screenToWorld(cursor);

      camera.adjustZoom(2, cursor);

      const after = camera.worldToScreen(before);
      expect(after.x).toBeCloseTo(cursor.x, 6);
      expect(after.y).toBeCloseTo(cursor.y, 6);
    });
  });

  describe('panning', () => {
    it('moves content with the pointer', () => {
      camera.startPan({ x: 100, y: 100 });
      expect(camera.updatePan({ x: 150, y: 80 })).toBe(true);

      expect(camera.getCenter()).toEqual({ x: -50, y: 20 });
      expect(camera.worldToScreen({ x: 0, y: 0 })).toEqual({ x: 450, y: 280 });
    });

    it('divides the delta by the zoom', () => {
      camera.adjustZoom(20, { x: 400, y: 300 }); // zoom 2
      camera.pan({ x: 100, y: 0 });
      expect(camera.getCenter()).toEqual({ x: -50, y: 0 });
    });

    it('ignores moves when no pan is active', () => {
      expect(camera.updatePan({ x: 10, y: 10 })).toBe(false);
      camera.startPan({ x: 0, y: 0 });
      camera.endPan();
      expect(camera.isPanningActive()).toBe(false);
      expect(camera.updatePan({ x: 10, y: 10 })).toBe(false);
    });
  });

  it('reset restores the origin and default zoom', () => {
    camera.recenter({ x: 300, y: 300 });
    camera.adjustZoom(2, { x: 0, y: 0 });

    camera.reset();

    expect(camera.getCenter()).toEqual({ x: 0, y: 0 });
    expect(camera.getZoom()).toBe(1);
  });

  it('keeps the center in the middle after a resize', () => {
    camera.resize({ width: 1000, height: 400 });
    expect(camera.worldToScreen({ x: 0, y: 0 })).toEqual({ x: 500, y: 200 });
  });

  it('clampZoom bounds arbitrary values', () => {
    expect(clampZoom(0)).toBe(0.25);
    expect(clampZoom(9)).toBe(2);
    expect(clampZoom(1.5)).toBe(1.5);
  });
});
