/**
 * Grid snapping utilities for entity placement.
 *
 * Entities reserve a block of `span` cells. A sprite smaller than its block
 * is centered inside it, so snapping works on the block origin
 * (top-left minus margin) rather than the sprite's own corner.
 */

import type { GridSpan, Point, Rect, Size } from '@amarre/shared';
import { GRID_CELL_SIZE } from '../renderer/constants';

/** Anything that occupies grid cells */
export interface GridFootprint {
  pos: Point;
  size: Size;
  span: GridSpan;
}

/** Offset between a sprite's top-left and its block's top-left */
export function getSnapMargin(
  size: Size,
  span: GridSpan,
  cellSize: number = GRID_CELL_SIZE,
): Point {
  return {
    x: Math.max(0, (span.cols * cellSize - size.width) / 2),
    y: Math.max(0, (span.rows * cellSize - size.height) / 2),
  };
}

/**
 * Grid cell holding the block origin of a footprint (nearest cell).
 * Half-cell ties go toward +infinity, so -1.5 lands on -1.
 */
export function gridCellOf(
  footprint: GridFootprint,
  cellSize: number = GRID_CELL_SIZE,
): Point {
  const margin = getSnapMargin(footprint.size, footprint.span, cellSize);
  return {
    x: Math.round((footprint.pos.x - margin.x) / cellSize),
    y: Math.round((footprint.pos.y - margin.y) / cellSize),
  };
}

/**
 * Top-left pixel position of a sprite whose block starts at `cell`
 */
export function cellToPosition(
  cell: Point,
  size: Size,
  span: GridSpan,
  cellSize: number = GRID_CELL_SIZE,
): Point {
  const margin = getSnapMargin(size, span, cellSize);
  return {
    x: Math.round(cell.x * cellSize + margin.x),
    y: Math.round(cell.y * cellSize + margin.y),
  };
}

/**
 * Snapped top-left position for a footprint. Idempotent.
 */
export function snapToGrid(
  footprint: GridFootprint,
  cellSize: number = GRID_CELL_SIZE,
): Point {
  return cellToPosition(
    gridCellOf(footprint, cellSize),
    footprint.size,
    footprint.span,
    cellSize,
  );
}

/**
 * Neighbor probe order, in units of the new entity's span:
 * right, left, up, down, upper-right, lower-right, upper-left, lower-left.
 */
export const NEIGHBOR_OFFSETS: ReadonlyArray<Point> = [
  { x: 1, y: 0 },
  { x: -1, y: 0 },
  { x: 0, y: -1 },
  { x: 0, y: 1 },
  { x: 1, y: -1 },
  { x: 1, y: 1 },
  { x: -1, y: -1 },
  { x: -1, y: 1 },
];

/**
 * Candidate rects for placing an entity of `size`/`span` around an anchor,
 * in probe order.
 */
export function getNeighborSlots(
  anchor: GridFootprint,
  size: Size,
  span: GridSpan,
  cellSize: number = GRID_CELL_SIZE,
): Rect[] {
  const anchorCell = gridCellOf(anchor, cellSize);
  return NEIGHBOR_OFFSETS.map((offset) => {
    const pos = cellToPosition(
      {
        x: anchorCell.x + offset.x * span.cols,
        y: anchorCell.y + offset.y * span.rows,
      },
      size,
      span,
      cellSize,
    );
    return { ...pos, width: size.width, height: size.height };
  });
}

/**
 * World coordinates of the grid lines crossing a world rect, as multiples
 * of the cell size.
 */
export function getGridLines(
  bounds: Rect,
  cellSize: number = GRID_CELL_SIZE,
): { xs: number[]; ys: number[] } {
  const lines = (from: number, to: number): number[] => {
    const result: number[] = [];
    for (let k = Math.ceil(from / cellSize); k * cellSize <= to; k++) {
      result.push(k * cellSize);
    }
    return result;
  };
  return {
    xs: lines(bounds.x, bounds.x + bounds.width),
    ys: lines(bounds.y, bounds.y + bounds.height),
  };
}
