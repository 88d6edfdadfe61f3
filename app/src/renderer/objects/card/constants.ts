import type { GridSpan } from '@amarre/shared';

/** Card face size in world units */
export const CARD_WIDTH = 90;
export const CARD_HEIGHT = 132;

/** Cards reserve a 2x3 block of grid cells */
export const CARD_GRID_SPAN: GridSpan = { cols: 2, rows: 3 };

export const CARD_PADDING = 6;
export const CARD_BORDER_RADIUS = 12;

export const CARD_FACE_COLOR = 0xfafafa;
export const CARD_BORDER_COLOR = 0x2d3436;
export const CARD_DEFAULT_INK = 0x141414;

export const CARD_VALUE_FONT_SIZE = 18;
export const CARD_SUIT_FONT_SIZE = 42;
export const CARD_LITERAL_FONT_SIZE = 16;

/** Outline drawn around members of an amarre */
export const CARD_GROUP_OUTLINE_COLOR = 0xf1c40f;
