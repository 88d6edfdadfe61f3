import type { Amarre, CardEntity, Point } from '@amarre/shared';
import type { SceneManager } from '../SceneManager';

/** What a merge did to the group table */
export type MergeResult = 'created' | 'absorbed' | 'joined' | 'united' | 'none';

/**
 * GroupManager - The amarre table.
 *
 * Groups hold ordered card ids; cards point back with `groupId`. Neither
 * side owns the other: cards belong to the SceneManager and groups to this
 * table. The first live member is the anchor, and every member mirrors the
 * anchor's position and the group's scale.
 *
 * Invariant after every public call: each group has >= 2 members and every
 * `card.groupId` names a group in the table.
 */
export class GroupManager {
  private groups: Map<string, Amarre> = new Map();
  private nextGroupNumber = 1;

  getGroup(id: string): Amarre | undefined {
    return this.groups.get(id);
  }

  /**
   * Groups in creation order
   */
  getAllGroups(): Amarre[] {
    return Array.from(this.groups.values());
  }

  get count(): number {
    return this.groups.size;
  }

  /**
   * Ids that move with this card: the card's group, or just the card
   */
  getMemberIds(card: CardEntity): string[] {
    const group = card.groupId ? this.groups.get(card.groupId) : undefined;
    return group ? [...group.cardIds] : [card.id];
  }

  /**
   * Form a new group. The first id becomes the anchor.
   * Returns null (and changes nothing) unless at least two of the ids are
   * independent world cards.
   */
  createGroup(sceneManager: SceneManager, cardIds: string[]): Amarre | null {
    const members = cardIds
      .map((id) => sceneManager.getCard(id))
      .filter(
        (card): card is CardEntity =>
          card !== undefined && !card.inHand && card.groupId === null,
      );
    if (members.length < 2) {
      console.warn('[GroupManager] Need two independent cards to group', {
        cardIds,
      });
      return null;
    }

    const group: Amarre = {
      id: `amarre-${this.nextGroupNumber++}`,
      cardIds: members.map((card) => card.id),
      scale: 1.0,
    };
    this.groups.set(group.id, group);
    for (const card of members) {
      card.groupId = group.id;
    }
    this.updateAnchor(sceneManager, group.id);
    return group;
  }

  /**
   * Add an independent world card to an existing group
   */
  addCard(sceneManager: SceneManager, groupId: string, cardId: string): void {
    const group = this.groups.get(groupId);
    const card = sceneManager.getCard(cardId);
    if (!group || !card || card.inHand || card.groupId !== null) return;

    group.cardIds.push(card.id);
    card.groupId = group.id;
    this.updateAnchor(sceneManager, group.id);
  }

  /**
   * Move every member of `absorbedId` into `survivorId` and drop the
   * absorbed group.
   */
  union(sceneManager: SceneManager, survivorId: string, absorbedId: string): void {
    if (survivorId === absorbedId) return;
    const survivor = this.groups.get(survivorId);
    const absorbed = this.groups.get(absorbedId);
    if (!survivor || !absorbed) return;

    for (const id of absorbed.cardIds) {
      const card = sceneManager.getCard(id);
      if (!card) continue;
      card.groupId = survivor.id;
      survivor.cardIds.push(id);
    }
    this.groups.delete(absorbed.id);
    this.updateAnchor(sceneManager, survivor.id);
  }

  /**
   * Merge a released card with the card it landed on.
   *
   * - neither grouped: new group, `other` anchors
   * - one grouped: the loose card joins that group
   * - two groups: the released card's group survives
   */
  merge(sceneManager: SceneManager, cardId: string, otherId: string): MergeResult {
    const card = sceneManager.getCard(cardId);
    const other = sceneManager.getCard(otherId);
    if (!card || !other || card.id === other.id) return 'none';
    if (card.inHand || other.inHand) return 'none';

    const cardGroup = card.groupId;
    const otherGroup = other.groupId;

    if (cardGroup === null && otherGroup === null) {
      return this.createGroup(sceneManager, [other.id, card.id])
        ? 'created'
        : 'none';
    }
    if (cardGroup !== null && otherGroup === null) {
      this.addCard(sceneManager, cardGroup, other.id);
      return 'absorbed';
    }
    if (cardGroup === null && otherGroup !== null) {
      this.addCard(sceneManager, otherGroup, card.id);
      return 'joined';
    }
    if (cardGroup !== null && otherGroup !== null && cardGroup !== otherGroup) {
      this.union(sceneManager, cardGroup, otherGroup);
      return 'united';
    }
    return 'none';
  }

  /**
   * Pull a card out of its group. The card keeps its position at scale 1.
   * A group left with fewer than two members is dissolved.
   */
  detachCard(sceneManager: SceneManager, cardId: string): void {
    const card = sceneManager.getCard(cardId);
    const groupId = card?.groupId ?? this.findGroupContaining(cardId);
    if (!groupId) return;

    const group = this.groups.get(groupId);
    if (group) {
      group.cardIds = group.cardIds.filter((id) => id !== cardId);
    }
    if (card) {
      card.groupId = null;
      sceneManager.setEntityScale(card.id, 1.0);
    }

    if (group) {
      this.pruneMissing(sceneManager, group);
      if (group.cardIds.length < 2) {
        this.dissolve(sceneManager, group.id);
      } else {
        this.updateAnchor(sceneManager, group.id);
      }
    }
  }

  /**
   * Break a group up; members become independent at scale 1
   */
  dissolve(sceneManager: SceneManager, groupId: string): void {
    const group = this.groups.get(groupId);
    if (!group) return;

    for (const id of group.cardIds) {
      const card = sceneManager.getCard(id);
      if (!card || card.groupId !== group.id) continue;
      card.groupId = null;
      sceneManager.setEntityScale(card.id, 1.0);
    }
    this.groups.delete(group.id);
  }

  /**
   * Dissolve every group that lost members (removed cards, stale ids).
   * Returns the number of groups dissolved.
   */
  dissolveUndersized(sceneManager: SceneManager): number {
    let dissolved = 0;
    for (const group of this.getAllGroups()) {
      this.pruneMissing(sceneManager, group);
      if (group.cardIds.length < 2) {
        this.dissolve(sceneManager, group.id);
        dissolved++;
      }
    }
    return dissolved;
  }

  /**
   * Snap every member onto the anchor's position and the group scale
   */
  updateAnchor(sceneManager: SceneManager, groupId: string): void {
    const group = this.groups.get(groupId);
    if (!group) return;
    this.pruneMissing(sceneManager, group);

    const anchor = sceneManager.getCard(group.cardIds[0] ?? '');
    if (!anchor) return;

    for (const id of group.cardIds) {
      sceneManager.setEntityScale(id, group.scale);
      if (id !== anchor.id) {
        sceneManager.moveEntity(id, anchor.pos);
      }
    }
  }

  setGroupScale(sceneManager: SceneManager, groupId: string, scale: number): void {
    const group = this.groups.get(groupId);
    if (!group) return;
    group.scale = scale;
    this.updateAnchor(sceneManager, groupId);
  }

  /**
   * Move the whole group by placing its anchor at `pos`
   */
  moveGroup(sceneManager: SceneManager, groupId: string, pos: Point): void {
    const group = this.groups.get(groupId);
    if (!group) return;
    for (const id of group.cardIds) {
      sceneManager.moveEntity(id, pos);
    }
  }

  getAnchorId(groupId: string): string | null {
    return this.groups.get(groupId)?.cardIds[0] ?? null;
  }

  clear(): void {
    this.groups.clear();
  }

  private findGroupContaining(cardId: string): string | null {
    for (const group of this.groups.values()) {
      if (group.cardIds.includes(cardId)) return group.id;
    }
    return null;
  }

  // Forget ids that no longer name a card of this group
  private pruneMissing(sceneManager: SceneManager, group: Amarre): void {
    group.cardIds = group.cardIds.filter((id) => {
      const card = sceneManager.getCard(id);
      return card !== undefined && card.groupId === group.id;
    });
  }
}
