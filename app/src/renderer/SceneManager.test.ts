import { describe, it, expect, beforeEach } from 'vitest';
import { SceneManager } from './SceneManager';
import { createCardEntity } from './objects/card/utils';
import { createDeckEntity } from './objects/deck/utils';

describe('SceneManager', () => {
  let sceneManager: SceneManager;

  beforeEach(() => {
    sceneManager = new SceneManager();
  });

  describe('addEntity', () => {
    it('adds an entity on top of the z-order', () => {
      const deck = createDeckEntity('deck-1', { x: 0, y: 0 }, []);
      const card = createCardEntity('card-1', 'A♠', { x: 0, y: 0 });

      sceneManager.addEntity(deck);
      sceneManager.addEntity(card);

      expect(sceneManager.getEntity('card-1')).toBe(card);
      expect(sceneManager.getAllEntities().map((e) => e.id)).toEqual([
        'deck-1',
        'card-1',
      ]);
      expect(sceneManager.getZIndex('card-1')).toBe(1);
      expect(sceneManager.size).toBe(2);
    });

    it('ignores a duplicate id', () => {
      sceneManager.addEntity(createCardEntity('card-1', 'A♠', { x: 0, y: 0 }));
      sceneManager.addEntity(createCardEntity('card-1', 'K♥', { x: 50, y: 0 }));

      expect(sceneManager.size).toBe(1);
      expect(sceneManager.getCard('card-1')?.label).toBe('A♠');
    });
  });

  describe('removeEntity', () => {
    it('removes the entity from the scene and the index', () => {
      sceneManager.addEntity(createCardEntity('card-1', 'A♠', { x: 0, y: 0 }));

      sceneManager.removeEntity('card-1');

      expect(sceneManager.getEntity('card-1')).toBeUndefined();
      expect(sceneManager.hitTest({ x: 10, y: 10 })).toBeNull();
    });

    it('returns undefined for unknown ids', () => {
      expect(sceneManager.removeEntity('missing')).toBeUndefined();
    });
  });

  describe('nextId', () => {
    it('numbers ids per prefix and skips taken ones', () => {
      sceneManager.addEntity(createCardEntity('card-2', 'A♠', { x: 0, y: 0 }));

      expect(sceneManager.nextId('card')).toBe('card-1');
      expect(sceneManager.nextId('card')).toBe('card-3');
      expect(sceneManager.nextId('deck')).toBe('deck-1');
    });
  });

  describe('getCard / getDeck', () => {
    it('narrows by kind', () => {
      sceneManager.addEntity(createDeckEntity('deck-1', { x: 0, y: 0 }, ['A♠']));

      expect(sceneManager.getCard('deck-1')).toBeUndefined();
      expect(sceneManager.getDeck()?.id).toBe('deck-1');
    });
  });

  describe('bringToFront', () => {
    it('raises the given ids and keeps their relative order', () => {
      for (const id of ['a', 'b', 'c', 'd']) {
        sceneManager.addEntity(createCardEntity(id, 'A♠', { x: 0, y: 0 }));
      }

      sceneManager.bringToFront(['c', 'a']);

      expect(sceneManager.getAllEntities().map((e) => e.id)).toEqual([
        'b',
        'd',
        'a',
        'c',
      ]);
    });
  });

  describe('hitTest', () => {
    it('returns the topmost entity under the point', () => {
      sceneManager.addEntity(createCardEntity('low', 'A♠', { x: 0, y: 0 }));
      sceneManager.addEntity(createCardEntity('high', 'K♠', { x: 50, y: 0 }));

      expect(sceneManager.hitTest({ x: 60, y: 10 })?.id).toBe('high');
      expect(sceneManager.hitTest({ x: 10, y: 10 })?.id).toBe('low');
    });

    it('treats the right and bottom edges as outside', () => {
      sceneManager.addEntity(createCardEntity('card-1', 'A♠', { x: 0, y: 0 }));

      expect(sceneManager.hitTest({ x: 0, y: 0 })?.id).toBe('card-1');
      expect(sceneManager.hitTest({ x: 90, y: 10 })).toBeNull();
      expect(sceneManager.hitTest({ x: 10, y: 132 })).toBeNull();
    });

    it('follows moves', () => {
      sceneManager.addEntity(createCardEntity('card-1', 'A♠', { x: 0, y: 0 }));

      sceneManager.moveEntity('card-1', { x: 500, y: 500 });

      expect(sceneManager.hitTest({ x: 10, y: 10 })).toBeNull();
      expect(sceneManager.hitTest({ x: 510, y: 510 })?.id).toBe('card-1');
    });

    it('skips cards in the hand', () => {
      const card = createCardEntity('card-1', 'A♠', { x: 0, y: 0 });
      sceneManager.addEntity(card);

      card.inHand = true;
      sceneManager.reindex(card.id);

      expect(sceneManager.hitTest({ x: 10, y: 10 })).toBeNull();
    });
  });

  describe('queryRect', () => {
    it('finds strict overlaps, topmost first, minus exclusions', () => {
      sceneManager.addEntity(createCardEntity('a', 'A♠', { x: 0, y: 0 }));
      sceneManager.addEntity(createCardEntity('b', 'A♠', { x: 40, y: 0 }));
      sceneManager.addEntity(createCardEntity('edge', 'A♠', { x: 190, y: 0 }));

      const rect = { x: 50, y: 10, width: 90, height: 132 };
      expect(sceneManager.queryRect(rect).map((e) => e.id)).toEqual(['b', 'a']);
      expect(sceneManager.queryRect(rect, new Set(['b'])).map((e) => e.id)).toEqual([
        'a',
      ]);
    });
  });

  describe('setEntityScale', () => {
    it('rescales around the top-left and updates the index', () => {
      sceneManager.addEntity(createCardEntity('card-1', 'A♠', { x: 0, y: 0 }));

      expect(sceneManager.setEntityScale('card-1', 2)).toBe(true);

      const card = sceneManager.getCard('card-1');
      expect(card?.size).toEqual({ width: 180, height: 264 });
      expect(card?.pos).toEqual({ x: 0, y: 0 });
      expect(sceneManager.hitTest({ x: 170, y: 250 })?.id).toBe('card-1');
    });
  });

  describe('clear', () => {
    it('empties the scene', () => {
      sceneManager.addEntity(createCardEntity('card-1', 'A♠', { x: 0, y: 0 }));
      sceneManager.clear();

      expect(sceneManager.size).toBe(0);
      expect(sceneManager.hitTest({ x: 10, y: 10 })).toBeNull();
    });
  });
});
