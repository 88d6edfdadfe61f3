import { describe, it, expect, beforeEach } from 'vitest';
import { GestureRecognizer } from './GestureRecognizer';

describe('GestureRecognizer', () => {
  let gestures: GestureRecognizer;

  beforeEach(() => {
    gestures = new GestureRecognizer();
  });

  it('tracks and clears the pointer', () => {
    expect(gestures.getPointer()).toBeNull();
    gestures.updatePointer({ x: 10, y: 20 });
    expect(gestures.getPointer()).toEqual({ x: 10, y: 20 });
    gestures.clearPointer();
    expect(gestures.getPointer()).toBeNull();
  });

  describe('repeat clicks', () => {
    it('matches the same entity inside the window', () => {
      gestures.recordClick('deck-1', 1000);
      expect(gestures.isRepeatClick('deck-1', 1400)).toBe(true);
      expect(gestures.isRepeatClick('deck-1', 1401)).toBe(false);
    });

    it('does not match another entity', () => {
      gestures.recordClick('deck-1', 1000);
      expect(gestures.isRepeatClick('card-1', 1100)).toBe(false);
    });

    it('treats a clock going backwards as expired', () => {
      gestures.recordClick('deck-1', 1000);
      expect(gestures.isRepeatClick('deck-1', 999)).toBe(false);
    });

    it('forgets the click after a reset', () => {
      gestures.recordClick('deck-1', 1000);
      gestures.resetClicks();
      expect(gestures.isRepeatClick('deck-1', 1100)).toBe(false);
    });
  });

  describe('escape double press', () => {
    it('fires on the second press inside the window', () => {
      expect(gestures.registerEscape(0)).toBe(false);
      expect(gestures.registerEscape(500)).toBe(true);
    });

    it('disarms after firing', () => {
      gestures.registerEscape(0);
      gestures.registerEscape(100);
      expect(gestures.registerEscape(200)).toBe(false);
      expect(gestures.registerEscape(300)).toBe(true);
    });

    it('re-arms when the window has passed', () => {
      gestures.registerEscape(0);
      expect(gestures.registerEscape(501)).toBe(false);
      expect(gestures.registerEscape(900)).toBe(true);
    });
  });
});
