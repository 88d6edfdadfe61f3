import { EntityKind, type DeckEntity, type Point } from '@amarre/shared';
import standardDeck from './standardDeck.json';
import { createEntityBase } from '../base/entity';
import {
  DECK_WIDTH,
  DECK_HEIGHT,
  DECK_GRID_SPAN,
  DECK_CARDS_PER_EDGE,
  DECK_MAX_EDGES,
} from './constants';
import type { RandomSource } from './types';

/** Number of edge stripes drawn for a deck holding `count` cards */
export function getDeckThickness(count: number): number {
  if (count <= 0) return 0;
  return Math.min(DECK_MAX_EDGES, Math.ceil(count / DECK_CARDS_PER_EDGE));
}

export function createDeckEntity(
  id: string,
  pos: Point,
  labels: string[],
): DeckEntity {
  return {
    ...createEntityBase(
      id,
      EntityKind.Deck,
      pos,
      { width: DECK_WIDTH, height: DECK_HEIGHT },
      DECK_GRID_SPAN,
    ),
    cards: [...labels],
    thickness: getDeckThickness(labels.length),
  };
}

/** Fisher-Yates shuffle in place */
export function shuffleLabels(labels: string[], random: RandomSource): string[] {
  for (let i = labels.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [labels[i], labels[j]] = [labels[j], labels[i]];
  }
  return labels;
}

/** Every rank of every suit plus the jokers, shuffled */
export function buildStandardDeck(random: RandomSource): string[] {
  const labels: string[] = [];
  for (const suit of standardDeck.suits) {
    for (const rank of standardDeck.ranks) {
      labels.push(`${rank}${suit.symbol}`);
    }
  }
  labels.push(...standardDeck.jokers);
  return shuffleLabels(labels, random);
}

export function isDeckEmpty(deck: DeckEntity): boolean {
  return deck.cards.length === 0;
}

/**
 * Take the top card (end of the sequence).
 * Returns null on an empty deck; the caller removes the deck.
 */
export function drawCard(deck: DeckEntity): string | null {
  const label = deck.cards.pop();
  deck.thickness = getDeckThickness(deck.cards.length);
  return label ?? null;
}

/** Put a card back on top, used when a drawn card has nowhere to go */
export function returnToTop(deck: DeckEntity, label: string): void {
  deck.cards.push(label);
  deck.thickness = getDeckThickness(deck.cards.length);
}

/**
 * Insert a label at a uniformly random index in [0, length].
 * Returns the index used.
 */
export function shuffleIn(
  deck: DeckEntity,
  label: string,
  random: RandomSource,
): number {
  const index =
    deck.cards.length === 0
      ? 0
      : Math.min(
          deck.cards.length,
          Math.floor(random() * (deck.cards.length + 1)),
        );
  deck.cards.splice(index, 0, label);
  deck.thickness = getDeckThickness(deck.cards.length);
  return index;
}
