/**
 * Deck actions
 *
 * Drawing a card spawns it next to the deck and hands it straight to the
 * pointer. An emptied deck leaves the table.
 */

import {
  EntityKind,
  type CardEntity,
  type DeckEntity,
  type Point,
} from '@amarre/shared';
import type { RendererContext } from '../RendererContext';
import { createCardEntity } from '../objects/card/utils';
import { drawCard, isDeckEmpty, returnToTop } from '../objects/deck/utils';
import { DECK_EXHAUSTED, DECK_SPAWN_NO_SLOT } from '../../constants/errorIds';
import { DEBUG } from '../../utils/debug';

/**
 * Draw the top card into the first free slot around the deck and start
 * dragging it. Returns the spawned card, or null if nothing spawned.
 */
export function drawCardFromDeck(
  context: RendererContext,
  deckId: string,
  pointerWorld: Point,
): CardEntity | null {
  const { sceneManager } = context;
  const deck = sceneManager.getEntity(deckId);
  if (!deck || deck.kind !== EntityKind.Deck) return null;

  const label = drawCard(deck);
  if (label === null) {
    removeExhaustedDeck(context, deck);
    return null;
  }

  const card = createCardEntity(sceneManager.nextId('card'), label, deck.pos);
  const slot = context.gridSnap.findFreeSlot(sceneManager, deck, card);
  if (!slot) {
    returnToTop(deck, label);
    console.warn('[deck] No free slot around the deck, draw cancelled', {
      errorId: DECK_SPAWN_NO_SLOT,
      deckId,
    });
    context.postResponse({
      type: 'warning',
      message: 'No room around the deck to draw a card',
    });
    return null;
  }

  card.pos = slot;
  sceneManager.addEntity(card);
  context.postResponse({ type: 'card-drawn', id: card.id, label });
  if (DEBUG.TABLE_ACTIONS) {
    console.log('[deck] Drew card', { cardId: card.id, label, left: deck.cards.length });
  }

  if (isDeckEmpty(deck)) {
    removeExhaustedDeck(context, deck);
  }

  context.drag.startEntityDrag(sceneManager, card.id, pointerWorld);
  return card;
}

/**
 * Take an empty deck off the table
 */
export function removeExhaustedDeck(
  context: RendererContext,
  deck: DeckEntity,
): void {
  if (DEBUG.TABLE_ACTIONS) {
    console.log('[deck] Deck exhausted, removing', {
      errorId: DECK_EXHAUSTED,
      deckId: deck.id,
    });
  }
  context.sceneManager.removeEntity(deck.id);
  context.postResponse({ type: 'deck-exhausted' });
}
