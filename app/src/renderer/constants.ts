/**
 * Scene constants for the table.
 */

// Grid
export const GRID_CELL_SIZE = 48;
export const GRID_DASH_LENGTH = 10;
export const GRID_GAP_LENGTH = 6;
export const GRID_LINE_WIDTH = 1;

// Camera
export const DEFAULT_ZOOM = 1.0;
export const MIN_ZOOM = 0.25;
export const MAX_ZOOM = 2.0;
export const ZOOM_STEP_FACTOR = 1.2;
export const ZOOM_EPSILON = 1e-6;

// Drag
export const DRAG_LIFT_SCALE = 1.15;
export const MIN_ENTITY_SCALE = 0.01;
export const SCALE_EPSILON = 1e-3;

/**
 * Shadow trail left behind a dragged entity.
 * A new sample is recorded only after the entity travels MIN_DISTANCE
 * from the previous one; samples expire after LIFETIME_MS.
 */
export const SHADOW_TRAIL_LIFETIME_MS = 250;
export const SHADOW_TRAIL_MIN_DISTANCE = 8;

// Gesture windows (ms)
export const DOUBLE_CLICK_WINDOW_MS = 400;
export const ESCAPE_DOUBLE_PRESS_WINDOW_MS = 500;

/**
 * Hand zone layout. Ratios are fractions of the viewport width (margin)
 * or height (everything else); HANG_DEPTH is a fraction of card height
 * left below the bottom edge.
 */
export const HAND_MARGIN_RATIO = 0.08;
export const HAND_BOTTOM_MARGIN_RATIO = 0.0;
export const HAND_ARC_HEIGHT_RATIO = 0.15;
export const HAND_HOVER_LIFT_RATIO = 0.2;
export const HAND_ZONE_HEIGHT_RATIO = 0.25;
export const HAND_MAX_SCALE = 1.5;
export const HAND_MIN_SCALE = 0.1;
export const HAND_HOVER_SCALE_MULTIPLIER = 1.5;
export const HAND_HANG_DEPTH_RATIO = 0.4;

// Initial scene
export const INITIAL_SCENE_GAP = 12;
export const INITIAL_CARD_LABEL = 'A♠';
