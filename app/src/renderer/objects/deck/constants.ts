import type { GridSpan } from '@amarre/shared';
import { CARD_WIDTH, CARD_HEIGHT } from '../card/constants';

/** The deck occupies the same footprint as a card */
export const DECK_WIDTH = CARD_WIDTH;
export const DECK_HEIGHT = CARD_HEIGHT;
export const DECK_GRID_SPAN: GridSpan = { cols: 2, rows: 3 };

export const DECK_BORDER_RADIUS = 16;
export const DECK_BACK_COLOR = 0x780000;
export const DECK_INNER_COLOR = 0xb43232;
export const DECK_BORDER_COLOR = 0x1e0000;

/** Edge stripes: one per DECK_CARDS_PER_EDGE cards, capped */
export const DECK_CARDS_PER_EDGE = 14;
export const DECK_MAX_EDGES = 4;
export const DECK_EDGE_COLOR = 0xa01e1e;
export const DECK_EDGE_SPACING = 6;
export const DECK_EDGE_HEIGHT = 3;

export const DECK_COUNT_FONT_SIZE = 14;
export const DECK_COUNT_COLOR = 0xffffff;
