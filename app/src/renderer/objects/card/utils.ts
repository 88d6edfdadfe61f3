import { EntityKind, type CardEntity, type Point } from '@amarre/shared';
import standardDeck from '../deck/standardDeck.json';
import { createEntityBase } from '../base/entity';
import {
  CARD_WIDTH,
  CARD_HEIGHT,
  CARD_GRID_SPAN,
  CARD_DEFAULT_INK,
} from './constants';

const SUIT_INK = new Map<string, number>(
  standardDeck.suits.map((suit) => [suit.symbol, suit.ink]),
);

export function createCardEntity(
  id: string,
  label: string,
  pos: Point,
): CardEntity {
  return {
    ...createEntityBase(
      id,
      EntityKind.Card,
      pos,
      { width: CARD_WIDTH, height: CARD_HEIGHT },
      CARD_GRID_SPAN,
    ),
    label,
    groupId: null,
    inHand: false,
    handRect: null,
    handHovered: false,
  };
}

/**
 * Split a label into value and suit ("10♥" -> "10", "♥").
 * Labels that do not end in a suit are returned whole as the value.
 * A bare suit uses the suit as its value.
 */
export function splitCardLabel(label: string): { value: string; suit: string } {
  if (!label) {
    return { value: '', suit: '' };
  }
  const suit = label.slice(-1);
  if (SUIT_INK.has(suit)) {
    return { value: label.slice(0, -1) || suit, suit };
  }
  return { value: label, suit: '' };
}

/** Ink color for a suit; labels without a suit use the default ink */
export function getSuitInk(suit: string): number {
  return SUIT_INK.get(suit) ?? CARD_DEFAULT_INK;
}
