import type { RendererContext } from './RendererContext';
import { INITIAL_CARD_LABEL, INITIAL_SCENE_GAP } from './constants';
import { createCardEntity } from './objects/card/utils';
import { CARD_WIDTH, CARD_HEIGHT } from './objects/card/constants';
import { buildStandardDeck, createDeckEntity } from './objects/deck/utils';

/**
 * Lay out the opening table: one face card left of the origin and a full
 * shuffled deck to its right, both snapped to the grid.
 */
export function populateInitialScene(context: RendererContext): void {
  const { sceneManager, gridSnap } = context;

  const deck = createDeckEntity(
    sceneManager.nextId('deck'),
    { x: INITIAL_SCENE_GAP, y: -CARD_HEIGHT / 2 },
    buildStandardDeck(context.random),
  );
  const card = createCardEntity(sceneManager.nextId('card'), INITIAL_CARD_LABEL, {
    x: -CARD_WIDTH - INITIAL_SCENE_GAP,
    y: -CARD_HEIGHT / 2,
  });

  sceneManager.addEntity(deck);
  sceneManager.addEntity(card);
  gridSnap.snapEntity(sceneManager, deck.id);
  gridSnap.snapEntity(sceneManager, card.id);
}
