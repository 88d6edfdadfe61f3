import type { Point } from '@amarre/shared';
import {
  DOUBLE_CLICK_WINDOW_MS,
  ESCAPE_DOUBLE_PRESS_WINDOW_MS,
} from '../constants';

/**
 * Last click, for double-click detection.
 */
interface ClickRecord {
  entityId: string;
  time: number;
}

/**
 * GestureRecognizer - Interprets timed input sequences.
 *
 * Tracks:
 * - Current pointer position in screen space (last reported)
 * - Repeat clicks on the same entity within DOUBLE_CLICK_WINDOW_MS
 * - Escape double-press within ESCAPE_DOUBLE_PRESS_WINDOW_MS
 *
 * All windows treat a negative age (clock going backwards) as expired.
 */
export class GestureRecognizer {
  private pointer: Point | null = null;
  private lastClick: ClickRecord | null = null;
  private lastEscape: number | null = null;

  /**
   * Update the current pointer position.
   */
  updatePointer(point: Point): void {
    this.pointer = { ...point };
  }

  /**
   * Pointer left the canvas.
   */
  clearPointer(): void {
    this.pointer = null;
  }

  getPointer(): Point | null {
    return this.pointer ? { ...this.pointer } : null;
  }

  /**
   * True if this click repeats the previous one on the same entity.
   */
  isRepeatClick(entityId: string, now: number): boolean {
    if (!this.lastClick || this.lastClick.entityId !== entityId) {
      return false;
    }
    return withinWindow(now - this.lastClick.time, DOUBLE_CLICK_WINDOW_MS);
  }

  recordClick(entityId: string, now: number): void {
    this.lastClick = { entityId, time: now };
  }

  resetClicks(): void {
    this.lastClick = null;
  }

  /**
   * Register an Escape press. Returns true when it completes a
   * double-press; the tracker is disarmed afterwards.
   */
  registerEscape(now: number): boolean {
    if (
      this.lastEscape !== null &&
      withinWindow(now - this.lastEscape, ESCAPE_DOUBLE_PRESS_WINDOW_MS)
    ) {
      this.lastEscape = null;
      return true;
    }
    this.lastEscape = now;
    return false;
  }
}

function withinWindow(age: number, windowMs: number): boolean {
  return age >= 0 && age <= windowMs;
}
