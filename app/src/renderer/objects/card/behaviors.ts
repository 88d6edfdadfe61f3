import { Container, Graphics } from 'pixi.js';
import type { CardEntity } from '@amarre/shared';
import type { EntityBehaviors, RenderContext } from '../types';
import {
  CARD_WIDTH,
  CARD_HEIGHT,
  CARD_PADDING,
  CARD_BORDER_RADIUS,
  CARD_FACE_COLOR,
  CARD_BORDER_COLOR,
  CARD_VALUE_FONT_SIZE,
  CARD_SUIT_FONT_SIZE,
  CARD_LITERAL_FONT_SIZE,
  CARD_GROUP_OUTLINE_COLOR,
} from './constants';
import { splitCardLabel, getSuitInk } from './utils';

export const CardBehaviors: EntityBehaviors<CardEntity> = {
  render(card: CardEntity, ctx: RenderContext): Container {
    const container = new Container();

    const face = new Graphics();
    face.roundRect(
      CARD_PADDING,
      CARD_PADDING,
      CARD_WIDTH - 2 * CARD_PADDING,
      CARD_HEIGHT - 2 * CARD_PADDING,
      CARD_BORDER_RADIUS,
    );
    face.fill(CARD_FACE_COLOR);
    face.stroke({
      width: 2,
      color: card.groupId ? CARD_GROUP_OUTLINE_COLOR : CARD_BORDER_COLOR,
    });
    container.addChild(face);

    const { value, suit } = splitCardLabel(card.label);
    const ink = getSuitInk(suit);

    if (!suit) {
      // Literal label (e.g. "Joker"), centered
      const text = ctx.createText({
        text: value,
        style: {
          fontSize: CARD_LITERAL_FONT_SIZE,
          fill: ink,
          fontWeight: 'bold',
        },
      });
      text.anchor.set(0.5);
      text.position.set(CARD_WIDTH / 2, CARD_HEIGHT / 2);
      container.addChild(text);
      return container;
    }

    const corner = ctx.createText({
      text: value,
      style: { fontSize: CARD_VALUE_FONT_SIZE, fill: ink, fontWeight: 'bold' },
    });
    corner.position.set(CARD_PADDING * 2, CARD_PADDING * 2);
    container.addChild(corner);

    const pip = ctx.createText({
      text: suit,
      style: { fontSize: CARD_SUIT_FONT_SIZE, fill: ink },
    });
    pip.anchor.set(0.5);
    pip.position.set(CARD_WIDTH / 2, CARD_HEIGHT / 2);
    container.addChild(pip);

    return container;
  },

  getRenderKey(card: CardEntity): string {
    return `${card.label}|${card.groupId ? 'grouped' : 'single'}`;
  },
};
