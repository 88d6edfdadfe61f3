/**
 * Managers Index
 *
 * Manager responsibilities:
 * - CameraManager: World/screen mapping, zoom and pan
 * - DragManager: Entity and group dragging, lift, shadow sampling
 * - GestureRecognizer: Pointer position, double-click and double-Escape
 * - GridSnapManager: Snapping and free-slot search against the scene
 * - GroupManager: The amarre table (create, absorb, union, detach)
 * - HandZoneManager: Screen-anchored hand layout and hover
 *
 * VisualManager is imported directly by the orchestrator; it is the only
 * manager that touches pixi.
 */

export { CameraManager } from './CameraManager';
export { DragManager } from './DragManager';
export { GestureRecognizer } from './GestureRecognizer';
export { GridSnapManager } from './GridSnapManager';
export { GroupManager } from './GroupManager';
export { HandZoneManager } from './HandZoneManager';
