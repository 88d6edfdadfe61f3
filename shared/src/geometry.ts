// Geometry primitives shared by the scene model and the renderer.

export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

// Axis-aligned rectangle; (x, y) is the top-left corner
export interface Rect extends Point, Size {}

// Footprint of an entity in grid cells
export interface GridSpan {
  cols: number;
  rows: number;
}
