import type { Container } from 'pixi.js';
import { EntityKind, type SceneEntity } from '@amarre/shared';
import type { BehaviorTable, RenderContext } from './types';
import { CardBehaviors } from './card';
import { DeckBehaviors } from './deck';

// Behavior registry
export const behaviorRegistry: BehaviorTable = {
  [EntityKind.Card]: CardBehaviors,
  [EntityKind.Deck]: DeckBehaviors,
};

// Dispatch on the entity's kind tag
export function renderEntity(
  entity: SceneEntity,
  ctx: RenderContext,
): Container {
  switch (entity.kind) {
    case EntityKind.Card:
      return behaviorRegistry[EntityKind.Card].render(entity, ctx);
    case EntityKind.Deck:
      return behaviorRegistry[EntityKind.Deck].render(entity, ctx);
  }
}

export function getRenderKey(entity: SceneEntity): string {
  switch (entity.kind) {
    case EntityKind.Card:
      return behaviorRegistry[EntityKind.Card].getRenderKey(entity);
    case EntityKind.Deck:
      return behaviorRegistry[EntityKind.Deck].getRenderKey(entity);
  }
}

// Re-export types for convenience
export * from './types';
