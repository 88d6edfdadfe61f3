// Types shared between the table renderer and the React shell

import type { GridSpan, Point, Rect, Size } from './geometry';

export type { GridSpan, Point, Rect, Size } from './geometry';

export const AMARRE_VERSION = '1.0.0';

// Entity kinds on the table
// Enum for type-safe comparisons and behavior lookup
export enum EntityKind {
  Card = 'card',
  Deck = 'deck',
}

// One recorded position of the shadow trail
export interface ShadowSample {
  x: number;
  y: number;
  scale: number;
  time: number; // monotonic ms at capture
}

// Fields every drawable/draggable entity carries
export interface EntityBase {
  id: string;
  kind: EntityKind;
  pos: Point; // top-left in world coordinates
  baseSize: Size;
  size: Size; // always max(1, round(baseSize * scale)) per axis
  scale: number;
  span: GridSpan;
  trail: ShadowSample[];
  lastTrailSample: Point | null;
}

export interface CardEntity extends EntityBase {
  kind: EntityKind.Card;
  label: string;
  groupId: string | null; // handle into the group table, never owning
  inHand: boolean;
  handRect: Rect | null; // screen rect while docked in the hand
  handHovered: boolean;
}

export interface DeckEntity extends EntityBase {
  kind: EntityKind.Deck;
  cards: string[]; // labels; the end of the array is the top
  thickness: number;
}

export type SceneEntity = CardEntity | DeckEntity;

// Stack of cards that move and scale together ("amarre")
export interface Amarre {
  id: string;
  cardIds: string[]; // insertion order; cardIds[0] is the anchor
  scale: number;
}

// ============================================================================
// Display configuration
// ============================================================================

export interface DisplayConfig {
  width: number;
  height: number;
  frameRate: number;
  fullscreen: boolean;
  caption: string;
}

// ============================================================================
// Renderer Message Types
// ============================================================================

// Pointer event data, coordinates relative to the canvas
export interface PointerEventData {
  pointerId: number;
  pointerType: 'mouse' | 'pen' | 'touch';
  clientX: number;
  clientY: number;
  button?: number;
  buttons?: number;
  isPrimary: boolean;
  metaKey: boolean;
  ctrlKey: boolean;
  shiftKey: boolean;
}

// Wheel event data; positive steps zoom in
export interface WheelEventData {
  steps: number;
  clientX: number;
  clientY: number;
}

export interface KeyEventData {
  key: string;
  metaKey: boolean;
  ctrlKey: boolean;
  shiftKey: boolean;
}

export type DropOutcome =
  | 'snapped'
  | 'merged'
  | 'reverted'
  | 'handed'
  | 'returned-to-deck';

export interface SceneStatus {
  deckCount: number | null; // null once the deck is gone
  handCount: number;
  groupCount: number;
  zoom: number;
}

// Messages sent from the React shell to the renderer
export type MainToRendererMessage =
  | {
      type: 'init';
      canvas: HTMLCanvasElement;
      width: number;
      height: number;
      dpr: number;
      config: DisplayConfig;
    }
  | { type: 'resize'; width: number; height: number; dpr: number }
  | { type: 'pointer-down'; event: PointerEventData }
  | { type: 'pointer-move'; event: PointerEventData }
  | { type: 'pointer-up'; event: PointerEventData }
  | { type: 'pointer-leave' }
  | { type: 'wheel'; event: WheelEventData }
  | { type: 'key-down'; event: KeyEventData }
  | { type: 'tick'; now: number }
  | { type: 'quit' };

// Messages sent from the renderer back to the React shell
export type RendererToMainMessage =
  | { type: 'ready' }
  | { type: 'initialized' }
  | { type: 'error'; error: string; context?: string }
  | { type: 'warning'; message: string }
  | { type: 'card-drawn'; id: string; label: string }
  | { type: 'deck-exhausted' }
  | { type: 'drop-resolved'; outcome: DropOutcome; ids: string[] }
  | { type: 'scene-status'; status: SceneStatus }
  | { type: 'stopped' };
