import { describe, it, expect } from 'vitest';
import {
  handlePointerDown,
  handlePointerLeave,
  handlePointerMove,
  handlePointerUp,
} from './pointer';
import { populateInitialScene } from '../initialScene';
import { createCardEntity } from '../objects/card/utils';
import { createDeckEntity } from '../objects/deck/utils';
import {
  createTestContext,
  pointerDown,
  pointerMove,
  pointerUp,
  postedOfType,
} from '../../test/rendererFixtures';

// At zoom 1 with the camera on the origin, screen = world + (400, 300).

describe('pointer handlers', () => {
  describe('drawing from the deck', () => {
    it('draws on a repeated ctrl-click and carries the new card', () => {
      const { context, clock, postResponse } = createTestContext();
      populateInitialScene(context);

      // deck sits at (3,-42); its center (48,24) is screen (448,324)
      handlePointerDown(pointerDown(448, 324, { ctrlKey: true }), context);
      handlePointerUp(pointerUp(448, 324, { ctrlKey: true }), context);
      expect(postedOfType(postResponse, 'drop-resolved')[0]).toEqual({
        type: 'drop-resolved',
        outcome: 'snapped',
        ids: ['deck-1'],
      });

      clock.now = 200;
      handlePointerDown(pointerDown(448, 324, { ctrlKey: true }), context);

      const card = context.sceneManager.getCard('card-2');
      expect(card?.pos).toEqual({ x: 99, y: -42 });
      expect(context.sceneManager.getDeck()?.cards).toHaveLength(53);
      expect(postedOfType(postResponse, 'card-drawn')).toEqual([
        { type: 'card-drawn', id: 'card-2', label: card?.label },
      ]);
      expect(context.drag.getSession()?.target).toEqual({
        kind: 'entity',
        id: 'card-2',
      });

      clock.now = 250;
      handlePointerMove(pointerMove(600, 324, { ctrlKey: true }), context);
      clock.now = 300;
      handlePointerUp(pointerUp(600, 324), context);

      expect(context.sceneManager.getCard('card-2')?.pos).toEqual({ x: 243, y: -42 });
      expect(postedOfType(postResponse, 'drop-resolved')[1]).toEqual({
        type: 'drop-resolved',
        outcome: 'snapped',
        ids: ['card-2'],
      });
    });

    it('only drags the deck when the clicks are too far apart', () => {
      const { context, clock, postResponse } = createTestContext();
      populateInitialScene(context);

      handlePointerDown(pointerDown(448, 324, { ctrlKey: true }), context);
      handlePointerUp(pointerUp(448, 324, { ctrlKey: true }), context);
      clock.now = 401;
      handlePointerDown(pointerDown(448, 324, { ctrlKey: true }), context);

      expect(postedOfType(postResponse, 'card-drawn')).toEqual([]);
      expect(context.drag.getSession()?.target).toEqual({
        kind: 'entity',
        id: 'deck-1',
      });
    });

    it('needs the modifier on the repeat click', () => {
      const { context, clock, postResponse } = createTestContext();
      populateInitialScene(context);

      handlePointerDown(pointerDown(448, 324, { ctrlKey: true }), context);
      handlePointerUp(pointerUp(448, 324), context);
      clock.now = 100;
      handlePointerDown(pointerDown(448, 324), context);

      expect(postedOfType(postResponse, 'card-drawn')).toEqual([]);
    });
  });

  describe('merging', () => {
    it('stacks a dropped card onto the card it lands on', () => {
      const { context, postResponse } = createTestContext();
      context.sceneManager.addEntity(createCardEntity('c1', 'A♠', { x: 3, y: -138 }));
      context.sceneManager.addEntity(createCardEntity('c2', 'K♥', { x: 200, y: -138 }));

      // grab c2 at world (210,-128), release at world (30,-110)
      handlePointerDown(pointerDown(610, 172), context);
      handlePointerMove(pointerMove(430, 190), context);
      handlePointerUp(pointerUp(430, 190), context);

      const [group] = context.groups.getAllGroups();
      expect(group?.cardIds).toEqual(['c1', 'c2']);
      expect(context.sceneManager.getCard('c2')?.pos).toEqual({ x: 3, y: -138 });
      expect(postedOfType(postResponse, 'drop-resolved')[0]?.outcome).toBe('merged');
    });

    it('drags a group as one and snaps it by its anchor', () => {
      const { context, postResponse } = createTestContext();
      context.sceneManager.addEntity(createCardEntity('c1', 'A♠', { x: 3, y: -138 }));
      context.sceneManager.addEntity(createCardEntity('c2', 'K♥', { x: 200, y: -138 }));
      handlePointerDown(pointerDown(610, 172), context);
      handlePointerMove(pointerMove(430, 190), context);
      handlePointerUp(pointerUp(430, 190), context);

      // grab the stack at world (10,-130), release at world (107,-130)
      handlePointerDown(pointerDown(410, 170), context);
      expect(context.drag.getSession()?.target).toEqual({
        kind: 'group',
        groupId: 'amarre-1',
        anchorId: 'c1',
      });
      handlePointerMove(pointerMove(507, 170), context);
      handlePointerUp(pointerUp(507, 170), context);

      expect(context.sceneManager.getCard('c1')?.pos).toEqual({ x: 99, y: -138 });
      expect(context.sceneManager.getCard('c2')?.pos).toEqual({ x: 99, y: -138 });
      expect(context.groups.getGroup('amarre-1')?.cardIds).toEqual(['c1', 'c2']);
      expect(context.sceneManager.getCard('c2')?.scale).toBe(1);
      expect(postedOfType(postResponse, 'drop-resolved')[1]?.outcome).toBe('snapped');
    });

    it('pulls a single card out of a group with the modifier', () => {
      const { context } = createTestContext();
      context.sceneManager.addEntity(createCardEntity('c1', 'A♠', { x: 3, y: -138 }));
      context.sceneManager.addEntity(createCardEntity('c2', 'K♥', { x: 3, y: -138 }));
      context.groups.createGroup(context.sceneManager, ['c1', 'c2']);

      handlePointerDown(pointerDown(410, 170, { ctrlKey: true }), context);

      expect(context.drag.getSession()?.target).toEqual({ kind: 'entity', id: 'c2' });
      expect(context.groups.count).toBe(0);
      expect(context.sceneManager.getCard('c2')?.groupId).toBeNull();
    });
  });

  describe('keeping the deck clear', () => {
    const SLOTS = [
      { x: 99, y: 6 },
      { x: -93, y: 6 },
      { x: 3, y: -138 },
      { x: 3, y: 150 },
      { x: 99, y: -138 },
      { x: 99, y: 150 },
      { x: -93, y: -138 },
      { x: -93, y: 150 },
    ];

    function setUpTable(filled: number) {
      const fixture = createTestContext();
      const { sceneManager } = fixture.context;
      sceneManager.addEntity(createDeckEntity('deck-1', { x: 3, y: 6 }, ['2♣']));
      SLOTS.slice(0, filled).forEach((pos, i) => {
        sceneManager.addEntity(createCardEntity(`s${i}`, '5♦', pos));
      });
      sceneManager.addEntity(createCardEntity('x', 'Q♣', { x: 291, y: 6 }));
      return fixture;
    }

    it('reverts a card dropped on a fully surrounded deck', () => {
      const { context, postResponse } = setUpTable(8);

      // grab x at world (300,10), release at world (17,14)
      handlePointerDown(pointerDown(700, 310), context);
      handlePointerMove(pointerMove(417, 314), context);
      handlePointerUp(pointerUp(417, 314), context);

      expect(context.sceneManager.getCard('x')?.pos).toEqual({ x: 291, y: 6 });
      expect(postedOfType(postResponse, 'drop-resolved')[0]?.outcome).toBe('reverted');
    });

    it('moves a card dropped on the deck to the first free neighbor', () => {
      const { context, postResponse } = setUpTable(3);

      handlePointerDown(pointerDown(700, 310), context);
      handlePointerMove(pointerMove(417, 314), context);
      handlePointerUp(pointerUp(417, 314), context);

      expect(context.sceneManager.getCard('x')?.pos).toEqual({ x: 3, y: 150 });
      expect(postedOfType(postResponse, 'drop-resolved')[0]?.outcome).toBe('snapped');
    });

    it('shuffles a card back into the deck on a modifier release', () => {
      const { context, postResponse } = createTestContext({ random: () => 0 });
      context.sceneManager.addEntity(createDeckEntity('deck-1', { x: 3, y: 6 }, ['2♣']));
      context.sceneManager.addEntity(createCardEntity('k', 'K♠', { x: 195, y: 6 }));

      // grab at world (200,10), release at world (20,10): card at (15,6)
      handlePointerDown(pointerDown(600, 310), context);
      handlePointerMove(pointerMove(420, 310, { ctrlKey: true }), context);
      handlePointerUp(pointerUp(420, 310, { ctrlKey: true }), context);

      expect(context.sceneManager.has('k')).toBe(false);
      expect(context.sceneManager.getDeck()?.cards).toEqual(['K♠', '2♣']);
      expect(postedOfType(postResponse, 'drop-resolved')[0]).toEqual({
        type: 'drop-resolved',
        outcome: 'returned-to-deck',
        ids: ['k'],
      });
    });
  });

  describe('hand', () => {
    it('docks a card released over the bottom band', () => {
      const { context, postResponse } = createTestContext();
      context.sceneManager.addEntity(createCardEntity('c1', 'A♠', { x: 3, y: 6 }));

      handlePointerDown(pointerDown(410, 310), context);
      handlePointerMove(pointerMove(410, 560), context);
      handlePointerUp(pointerUp(410, 560), context);

      expect(context.hand.getCardIds()).toEqual(['c1']);
      expect(context.sceneManager.getCard('c1')?.inHand).toBe(true);
      expect(context.sceneManager.hitTest({ x: 10, y: 260 })).toBeNull();
      expect(postedOfType(postResponse, 'drop-resolved')[0]?.outcome).toBe('handed');
    });

    it('picks a hand card up centered under the pointer', () => {
      const { context } = createTestContext();
      context.sceneManager.addEntity(createCardEntity('c1', 'A♠', { x: 3, y: 6 }));
      handlePointerDown(pointerDown(410, 310), context);
      handlePointerMove(pointerMove(410, 560), context);
      handlePointerUp(pointerUp(410, 560), context);

      // world (0,100)
      handlePointerDown(pointerDown(400, 400), context);

      const card = context.sceneManager.getCard('c1');
      expect(context.hand.count).toBe(0);
      expect(card?.inHand).toBe(false);
      expect(card?.pos).toEqual({ x: -45, y: 34 });
      expect(context.drag.getSession()?.offset).toEqual({ x: 45, y: 66 });
    });

    it('never docks a group', () => {
      const { context, postResponse } = createTestContext();
      context.sceneManager.addEntity(createCardEntity('c1', 'A♠', { x: 3, y: 6 }));
      context.sceneManager.addEntity(createCardEntity('c2', 'K♥', { x: 3, y: 6 }));
      context.groups.createGroup(context.sceneManager, ['c1', 'c2']);

      handlePointerDown(pointerDown(410, 310), context);
      handlePointerMove(pointerMove(410, 560), context);
      handlePointerUp(pointerUp(410, 560), context);

      expect(context.hand.count).toBe(0);
      expect(postedOfType(postResponse, 'drop-resolved')[0]?.outcome).toBe('snapped');
    });
  });

  describe('panning', () => {
    it('pans when the press lands on empty table', () => {
      const { context } = createTestContext();

      handlePointerDown(pointerDown(100, 100), context);
      handlePointerMove(pointerMove(150, 80), context);

      expect(context.camera.getCenter()).toEqual({ x: -50, y: 20 });

      handlePointerUp(pointerUp(150, 80), context);
      expect(context.camera.isPanningActive()).toBe(false);
    });
  });

  it('ignores secondary buttons', () => {
    const { context } = createTestContext();
    context.sceneManager.addEntity(createCardEntity('c1', 'A♠', { x: 3, y: 6 }));

    handlePointerDown(pointerDown(410, 310, { button: 2 }), context);

    expect(context.drag.isDragging()).toBe(false);
  });

  it('settles a drag whose release was missed before the next press', () => {
    const { context, postResponse } = createTestContext();
    context.sceneManager.addEntity(createCardEntity('c1', 'A♠', { x: 3, y: 6 }));

    handlePointerDown(pointerDown(410, 310), context);
    handlePointerDown(pointerDown(100, 100), context);

    expect(postedOfType(postResponse, 'drop-resolved')).toHaveLength(1);
    expect(context.camera.isPanningActive()).toBe(true);
  });

  it('forgets the pointer when it leaves the canvas', () => {
    const { context } = createTestContext();
    handlePointerMove(pointerMove(10, 10), context);

    handlePointerLeave({ type: 'pointer-leave' }, context);

    expect(context.gestures.getPointer()).toBeNull();
  });
});
