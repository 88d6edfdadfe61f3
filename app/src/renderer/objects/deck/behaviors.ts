import { Container, Graphics } from 'pixi.js';
import type { DeckEntity } from '@amarre/shared';
import type { EntityBehaviors, RenderContext } from '../types';
import { CARD_PADDING } from '../card/constants';
import {
  DECK_WIDTH,
  DECK_HEIGHT,
  DECK_BORDER_RADIUS,
  DECK_BACK_COLOR,
  DECK_INNER_COLOR,
  DECK_BORDER_COLOR,
  DECK_EDGE_COLOR,
  DECK_EDGE_SPACING,
  DECK_EDGE_HEIGHT,
  DECK_COUNT_FONT_SIZE,
  DECK_COUNT_COLOR,
} from './constants';

export const DeckBehaviors: EntityBehaviors<DeckEntity> = {
  render(deck: DeckEntity, ctx: RenderContext): Container {
    const container = new Container();
    const left = CARD_PADDING;
    const top = CARD_PADDING;
    const width = DECK_WIDTH - 2 * CARD_PADDING;
    const height = DECK_HEIGHT - 2 * CARD_PADDING;

    const back = new Graphics();
    back.roundRect(left, top, width, height, DECK_BORDER_RADIUS);
    back.fill(DECK_BACK_COLOR);
    back.stroke({ width: 2, color: DECK_BORDER_COLOR });

    // Edge stripes along the top show how much is left
    for (let i = 1; i <= deck.thickness; i++) {
      back.rect(
        left + 8,
        top + i * DECK_EDGE_SPACING,
        width - 16,
        DECK_EDGE_HEIGHT,
      );
      back.fill(DECK_EDGE_COLOR);
    }

    const innerInset = 9 + (deck.thickness + 1) * DECK_EDGE_SPACING;
    back.roundRect(
      left + 9,
      top + innerInset,
      width - 18,
      Math.max(0, height - innerInset - 9),
      DECK_BORDER_RADIUS / 2,
    );
    back.fill(DECK_INNER_COLOR);
    container.addChild(back);

    const count = ctx.createText({
      text: `Deck (${deck.cards.length})`,
      style: {
        fontSize: DECK_COUNT_FONT_SIZE,
        fill: DECK_COUNT_COLOR,
        fontWeight: 'bold',
      },
    });
    count.anchor.set(0.5);
    count.position.set(DECK_WIDTH / 2, DECK_HEIGHT - CARD_PADDING * 4);
    container.addChild(count);

    return container;
  },

  getRenderKey(deck: DeckEntity): string {
    return `${deck.cards.length}`;
  },
};
