import type {
  RendererToMainMessage,
  SceneStatus,
  Size,
} from '@amarre/shared';
import {
  CameraManager,
  DragManager,
  GestureRecognizer,
  GridSnapManager,
  GroupManager,
  HandZoneManager,
} from './managers';
import { SceneManager } from './SceneManager';
import type { RandomSource } from './objects/deck/types';

/**
 * Context passed to all message handlers
 *
 * Provides access to:
 * - The scene (entities in z-order) and the amarre table
 * - Camera, hand zone, drag and gesture state
 * - Clock and random source (injectable for tests)
 * - Communication channel (postResponse)
 * - Mutable loop state
 *
 * Handlers are pure functions over this object; there is no module-level
 * scene state. Nothing here depends on pixi, so the whole interaction model
 * runs in tests without a renderer.
 *
 * @example
 * ```typescript
 * export function handleWheel(
 *   message: Extract<MainToRendererMessage, { type: 'wheel' }>,
 *   context: RendererContext,
 * ): void {
 *   const { steps, clientX, clientY } = message.event;
 *   context.camera.adjustZoom(steps, { x: clientX, y: clientY });
 * }
 * ```
 */
export interface RendererContext {
  // Scene
  sceneManager: SceneManager;
  groups: GroupManager;

  // Managers
  camera: CameraManager;
  gridSnap: GridSnapManager;
  drag: DragManager;
  hand: HandZoneManager;
  gestures: GestureRecognizer;

  // Time and randomness
  clock: () => number; // monotonic ms
  random: RandomSource;

  // Communication
  postResponse: (message: RendererToMainMessage) => void;

  // Mutable state (handlers can update)
  running: boolean;
  lastStatus: SceneStatus | null;
}

export interface RendererContextOptions {
  viewport: Size;
  clock?: () => number;
  random?: RandomSource;
  postResponse?: (message: RendererToMainMessage) => void;
}

export function createRendererContext(
  options: RendererContextOptions,
): RendererContext {
  return {
    sceneManager: new SceneManager(),
    groups: new GroupManager(),
    camera: new CameraManager(options.viewport),
    gridSnap: new GridSnapManager(),
    drag: new DragManager(),
    hand: new HandZoneManager(),
    gestures: new GestureRecognizer(),
    clock: options.clock ?? (() => performance.now()),
    random: options.random ?? Math.random,
    postResponse: options.postResponse ?? (() => undefined),
    running: true,
    lastStatus: null,
  };
}
