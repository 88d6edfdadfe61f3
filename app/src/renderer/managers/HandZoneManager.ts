import type { CardEntity, Point, Rect, Size } from '@amarre/shared';
import type { SceneManager } from '../SceneManager';
import type { GroupManager } from './GroupManager';
import {
  HAND_MARGIN_RATIO,
  HAND_BOTTOM_MARGIN_RATIO,
  HAND_ARC_HEIGHT_RATIO,
  HAND_HOVER_LIFT_RATIO,
  HAND_ZONE_HEIGHT_RATIO,
  HAND_MAX_SCALE,
  HAND_MIN_SCALE,
  HAND_HOVER_SCALE_MULTIPLIER,
  HAND_HANG_DEPTH_RATIO,
} from '../constants';
import { CARD_WIDTH, CARD_HEIGHT } from '../objects/card/constants';
import { clearShadowTrail } from '../objects/base/entity';
import { rectContainsPointInclusive } from '../../utils/geometry';
import { HAND_STALE_CARD } from '../../constants/errorIds';

/**
 * Screen placement of one hand card.
 */
export interface HandSlot {
  rect: Rect;
  scale: number;
}

/**
 * Base scale for `count` cards: shrink to fit between the margins, never
 * above HAND_MAX_SCALE or below HAND_MIN_SCALE.
 */
export function getHandBaseScale(count: number, viewport: Size): number {
  if (count <= 0) return HAND_MAX_SCALE;
  const usable = Math.max(0, viewport.width - 2 * viewport.width * HAND_MARGIN_RATIO);
  return Math.max(
    HAND_MIN_SCALE,
    Math.min(HAND_MAX_SCALE, usable / (CARD_WIDTH * count)),
  );
}

/**
 * Arc layout for card `index` of `count`.
 *
 * Centers are spread evenly across [margin, width - margin] (a single card
 * sits in the middle). Lift follows arcHeight * (1 - n^2) with n running
 * -1..1 across the row. A hovered card grows by HAND_HOVER_SCALE_MULTIPLIER
 * and rises to at least the hover lift.
 */
export function getHandSlot(
  index: number,
  count: number,
  viewport: Size,
  hovered: boolean,
): HandSlot {
  const { width, height } = viewport;
  const margin = width * HAND_MARGIN_RATIO;
  const available = Math.max(0, width - 2 * margin);
  const bottomMargin = height * HAND_BOTTOM_MARGIN_RATIO;
  const arcHeight = height * HAND_ARC_HEIGHT_RATIO;
  const hoverLift = height * HAND_HOVER_LIFT_RATIO;

  const baseScale = getHandBaseScale(count, viewport);
  const cardWidth = CARD_WIDTH * baseScale;

  let center = width / 2;
  if (count > 1) {
    const step = Math.max(0, available - cardWidth) / (count - 1);
    center = margin + cardWidth / 2 + step * index;
  }

  const normalized = count <= 1 ? 0 : (index / (count - 1)) * 2 - 1;
  const offset = arcHeight * (1 - normalized * normalized);

  const scale = hovered ? baseScale * HAND_HOVER_SCALE_MULTIPLIER : baseScale;
  const lift = hovered ? Math.max(offset, hoverLift) : offset;

  return {
    rect: {
      x: center - (CARD_WIDTH * scale) / 2,
      y:
        height +
        CARD_HEIGHT * HAND_HANG_DEPTH_RATIO -
        CARD_HEIGHT * scale -
        lift -
        bottomMargin,
      width: CARD_WIDTH * scale,
      height: CARD_HEIGHT * scale,
    },
    scale,
  };
}

/**
 * Which card is hovered, or -1.
 *
 * The current hover sticks while the pointer stays inside its enlarged
 * rect; otherwise the first card (by index) whose resting rect contains the
 * pointer wins.
 */
export function resolveHandHover(
  count: number,
  viewport: Size,
  pointer: Point | null,
  currentIndex: number,
): number {
  if (!pointer || count === 0) return -1;

  if (
    currentIndex >= 0 &&
    currentIndex < count &&
    rectContainsPointInclusive(
      getHandSlot(currentIndex, count, viewport, true).rect,
      pointer,
    )
  ) {
    return currentIndex;
  }

  for (let i = 0; i < count; i++) {
    if (rectContainsPointInclusive(getHandSlot(i, count, viewport, false).rect, pointer)) {
      return i;
    }
  }
  return -1;
}

/** Screen Y at which the hand's drop band starts */
export function getHandZoneTop(viewport: Size): number {
  return viewport.height * (1 - HAND_ZONE_HEIGHT_RATIO);
}

/**
 * HandZoneManager - Cards docked at the bottom of the screen.
 *
 * Hand cards stay in the SceneManager (flagged `inHand`, out of the spatial
 * index) while this manager keeps their order, hover state and cached
 * screen rects. Membership in the hand and in a group are exclusive.
 */
export class HandZoneManager {
  private cardIds: string[] = [];
  private hoveredId: string | null = null;

  getCardIds(): string[] {
    return [...this.cardIds];
  }

  get count(): number {
    return this.cardIds.length;
  }

  hasCard(cardId: string): boolean {
    return this.cardIds.includes(cardId);
  }

  getHoveredId(): string | null {
    return this.hoveredId;
  }

  /**
   * Whether a released card should dock: the pointer or the card's bottom
   * edge reached the drop band. Grouped cards never dock.
   */
  canAccept(
    card: CardEntity,
    pointerScreen: Point,
    cardScreenRect: Rect,
    viewport: Size,
  ): boolean {
    if (card.groupId !== null || card.inHand) return false;
    const zoneTop = getHandZoneTop(viewport);
    return (
      pointerScreen.y >= zoneTop ||
      cardScreenRect.y + cardScreenRect.height >= zoneTop
    );
  }

  /**
   * Dock a released card if it qualifies. Returns true when accepted.
   */
  handleDrop(
    sceneManager: SceneManager,
    groups: GroupManager,
    card: CardEntity,
    pointerScreen: Point,
    cardScreenRect: Rect,
    viewport: Size,
  ): boolean {
    if (!this.canAccept(card, pointerScreen, cardScreenRect, viewport)) {
      return false;
    }
    return this.addCard(sceneManager, groups, card.id);
  }

  /**
   * Move a card into the hand (appended on the right). Detaches it from
   * any group first.
   */
  addCard(sceneManager: SceneManager, groups: GroupManager, cardId: string): boolean {
    const card = sceneManager.getCard(cardId);
    if (!card) {
      console.warn('[HandZoneManager] Cannot add missing card', {
        errorId: HAND_STALE_CARD,
        cardId,
      });
      return false;
    }
    if (card.inHand) return false;

    if (card.groupId !== null) {
      groups.detachCard(sceneManager, card.id);
    }

    card.inHand = true;
    card.handHovered = false;
    clearShadowTrail(card);
    sceneManager.reindex(card.id);
    this.cardIds.push(card.id);
    return true;
  }

  /**
   * Take a card out of the hand and back into world space at scale 1.
   * The caller decides where it goes.
   */
  removeCard(sceneManager: SceneManager, cardId: string): CardEntity | null {
    const index = this.cardIds.indexOf(cardId);
    if (index < 0) return null;

    this.cardIds.splice(index, 1);
    if (this.hoveredId === cardId) {
      this.hoveredId = null;
    }

    const card = sceneManager.getCard(cardId);
    if (!card) return null;

    card.inHand = false;
    card.handRect = null;
    card.handHovered = false;
    sceneManager.setEntityScale(card.id, 1.0);
    sceneManager.reindex(card.id);
    return card;
  }

  /**
   * Recompute hover and every card's screen rect and scale.
   */
  layout(sceneManager: SceneManager, viewport: Size, pointer: Point | null): void {
    this.cardIds = this.cardIds.filter((id) => sceneManager.getCard(id)?.inHand);

    const count = this.cardIds.length;
    const currentIndex = this.hoveredId ? this.cardIds.indexOf(this.hoveredId) : -1;
    const hoveredIndex = resolveHandHover(count, viewport, pointer, currentIndex);
    this.hoveredId = hoveredIndex >= 0 ? this.cardIds[hoveredIndex] : null;

    this.cardIds.forEach((id, index) => {
      const card = sceneManager.getCard(id);
      if (!card) return;
      const hovered = index === hoveredIndex;
      const slot = getHandSlot(index, count, viewport, hovered);
      card.handRect = slot.rect;
      card.handHovered = hovered;
      sceneManager.setEntityScale(id, slot.scale);
    });
  }

  /**
   * Topmost hand card under a screen point, using the rects from the last
   * layout. The hovered card is drawn above the rest.
   */
  hitTest(sceneManager: SceneManager, pointer: Point): CardEntity | null {
    for (const id of this.getRenderOrder().reverse()) {
      const card = sceneManager.getCard(id);
      if (card?.handRect && rectContainsPointInclusive(card.handRect, pointer)) {
        return card;
      }
    }
    return null;
  }

  /**
   * Back-to-front draw order: hand order with the hovered card last.
   */
  getRenderOrder(): string[] {
    if (!this.hoveredId) return [...this.cardIds];
    return [
      ...this.cardIds.filter((id) => id !== this.hoveredId),
      this.hoveredId,
    ];
  }

  clear(): void {
    this.cardIds = [];
    this.hoveredId = null;
  }
}
