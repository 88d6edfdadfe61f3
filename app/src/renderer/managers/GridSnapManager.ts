import type { GridSpan, Point, SceneEntity, Size } from '@amarre/shared';
import type { SceneManager } from '../SceneManager';
import { getNeighborSlots, snapToGrid } from '../../utils/gridSnap';

/**
 * GridSnapManager - Grid placement against the live scene.
 *
 * Handles:
 * - Snapping entities onto the grid (through SceneManager so the spatial
 *   index follows)
 * - Free-slot search around an anchor entity for spawns and relocations
 */
export class GridSnapManager {
  /**
   * Snap an entity in place. Returns the new position, or null if the
   * entity is gone.
   */
  snapEntity(sceneManager: SceneManager, id: string): Point | null {
    const entity = sceneManager.getEntity(id);
    if (!entity) return null;

    const snapped = snapToGrid(entity);
    sceneManager.moveEntity(id, snapped);
    return snapped;
  }

  /**
   * First free neighbor slot around `anchor` for an entity of the given
   * size/span. Slots overlapping any world entity other than the anchor and
   * `ignoreIds` are occupied. Returns null when all eight are taken.
   */
  findFreeSlot(
    sceneManager: SceneManager,
    anchor: SceneEntity,
    footprint: { size: Size; span: GridSpan },
    ignoreIds: ReadonlySet<string> = new Set(),
  ): Point | null {
    const exclude = new Set(ignoreIds);
    exclude.add(anchor.id);

    const slots = getNeighborSlots(anchor, footprint.size, footprint.span);
    for (const slot of slots) {
      if (sceneManager.queryRect(slot, exclude).length === 0) {
        return { x: slot.x, y: slot.y };
      }
    }
    return null;
  }
}
