export { DeckBehaviors } from './behaviors';
export * from './constants';
export * from './types';
export * from './utils';
