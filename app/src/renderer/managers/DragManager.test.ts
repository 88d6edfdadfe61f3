import { describe, it, expect, beforeEach } from 'vitest';
import { DragManager } from './DragManager';
import { GroupManager } from './GroupManager';
import { SceneManager } from '../SceneManager';
import { createCardEntity } from '../objects/card/utils';
import { DRAG_LIFT_SCALE } from '../constants';

describe('DragManager', () => {
  let scene: SceneManager;
  let groups: GroupManager;
  let drag: DragManager;

  beforeEach(() => {
    scene = new SceneManager();
    groups = new GroupManager();
    drag = new DragManager();
    scene.addEntity(createCardEntity('a', 'A♠', { x: 3, y: 6 }));
    scene.addEntity(createCardEntity('b', 'K♥', { x: 99, y: 6 }));
    scene.addEntity(createCardEntity('c', '7♦', { x: 195, y: 6 }));
  });

  describe('single entity', () => {
    it('records offset and origin, raises and lifts the entity', () => {
      expect(drag.startEntityDrag(scene, 'a', { x: 20, y: 30 })).toBe(true);

      const session = drag.getSession();
      expect(session?.target).toEqual({ kind: 'entity', id: 'a' });
      expect(session?.offset).toEqual({ x: 17, y: 24 });
      expect(session?.origins.get('a')).toEqual({ x: 3, y: 6 });
      expect(scene.getZIndex('a')).toBe(2);
      expect(scene.getCard('a')?.scale).toBe(DRAG_LIFT_SCALE);
    });

    it('keeps the grab offset while following the pointer', () => {
      drag.startEntityDrag(scene, 'a', { x: 20, y: 30 });

      drag.updateDrag(scene, groups, { x: 120, y: 80 }, 0);

      expect(scene.getCard('a')?.pos).toEqual({ x: 103, y: 56 });
    });

    it('leaves a shadow sample once the entity has travelled', () => {
      drag.startEntityDrag(scene, 'a', { x: 20, y: 30 });

      drag.updateDrag(scene, groups, { x: 120, y: 80 }, 0);
      drag.updateDrag(scene, groups, { x: 122, y: 80 }, 10);

      // the second move is under the minimum distance
      expect(scene.getCard('a')?.trail).toHaveLength(1);
    });

    it('refuses a missing entity', () => {
      expect(drag.startEntityDrag(scene, 'missing', { x: 0, y: 0 })).toBe(false);
      expect(drag.isDragging()).toBe(false);
    });
  });

  describe('groups', () => {
    it('carries every member with the anchor', () => {
      const group = groups.createGroup(scene, ['a', 'b']);
      if (!group) throw new Error('group not created');

      drag.startGroupDrag(scene, groups, group.id, { x: 10, y: 10 });
      drag.updateDrag(scene, groups, { x: 110, y: 60 }, 0);

      expect(Array.from(drag.getSession()?.origins.keys() ?? [])).toEqual([
        'a',
        'b',
      ]);
      expect(scene.getCard('a')?.pos).toEqual({ x: 103, y: 56 });
      expect(scene.getCard('b')?.pos).toEqual({ x: 103, y: 56 });
      expect(scene.getCard('b')?.scale).toBe(DRAG_LIFT_SCALE);
    });

    it('remembers where each member started', () => {
      const group = groups.createGroup(scene, ['a', 'b']);
      if (!group) throw new Error('group not created');
      // move b off the anchor to see its own origin
      scene.moveEntity('b', { x: 50, y: 50 });

      drag.startGroupDrag(scene, groups, group.id, { x: 10, y: 10 });

      const origins = drag.getSession()?.origins;
      expect(origins?.get('a')).toEqual({ x: 3, y: 6 });
      // lifting re-stacks members on the anchor, after origins are taken
      expect(origins?.get('b')).toEqual({ x: 50, y: 50 });
    });

    it('refuses an unknown group', () => {
      expect(drag.startGroupDrag(scene, groups, 'amarre-9', { x: 0, y: 0 })).toBe(false);
    });
  });

  it('ends the session when the carried entity disappears', () => {
    drag.startEntityDrag(scene, 'c', { x: 200, y: 10 });
    scene.removeEntity('c');

    expect(drag.updateDrag(scene, groups, { x: 0, y: 0 }, 0)).toBe(false);
    expect(drag.isDragging()).toBe(false);
  });

  it('endDrag hands back the session once', () => {
    drag.startEntityDrag(scene, 'a', { x: 20, y: 30 });

    expect(drag.endDrag()?.target).toEqual({ kind: 'entity', id: 'a' });
    expect(drag.endDrag()).toBeNull();
  });
});
