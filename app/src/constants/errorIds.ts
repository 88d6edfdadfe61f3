/**
 * Error IDs for log filtering and debugging
 *
 * Grouped by feature/module for easy tracking.
 * Format: <MODULE>_<ERROR_TYPE>_<SPECIFIC_CASE>
 *
 * Usage:
 * ```typescript
 * import { DRAG_STALE_ENTITY } from '../constants/errorIds';
 *
 * console.warn('[DragManager] Dragged entity no longer in scene', {
 *   errorId: DRAG_STALE_ENTITY,
 *   entityId,
 * });
 * ```
 */

// Drag and drop
export const DRAG_STALE_ENTITY = 'DRAG_STALE_ENTITY';
export const DROP_STALE_ENTITY = 'DROP_STALE_ENTITY';
export const DROP_RELOCATE_NO_SLOT = 'DROP_RELOCATE_NO_SLOT';

// Deck
export const DECK_SPAWN_NO_SLOT = 'DECK_SPAWN_NO_SLOT';
export const DECK_EXHAUSTED = 'DECK_EXHAUSTED';

// Hand zone
export const HAND_STALE_CARD = 'HAND_STALE_CARD';

// Rendering
export const RENDER_INIT_FAILED = 'RENDER_INIT_FAILED';
export const RENDER_VISUAL_FAILED = 'RENDER_VISUAL_FAILED';
