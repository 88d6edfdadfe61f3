import type { Container, Text, TextOptions } from 'pixi.js';
import type {
  CardEntity,
  DeckEntity,
  EntityKind,
  SceneEntity,
} from '@amarre/shared';

// Render context provides extra info during rendering
export interface RenderContext {
  createText: (options: TextOptions) => Text; // Sized for the current zoom
}

// Behavior interfaces
export type RenderBehavior<T extends SceneEntity> = (
  entity: T,
  ctx: RenderContext,
) => Container;

// Visuals are rebuilt only when this key changes
export type RenderKeyBehavior<T extends SceneEntity> = (entity: T) => string;

export interface EntityBehaviors<T extends SceneEntity> {
  render: RenderBehavior<T>;
  getRenderKey: RenderKeyBehavior<T>;
}

// One behaviors entry per entity kind
export type BehaviorTable = {
  [EntityKind.Card]: EntityBehaviors<CardEntity>;
  [EntityKind.Deck]: EntityBehaviors<DeckEntity>;
};
