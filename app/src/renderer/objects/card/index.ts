export { CardBehaviors } from './behaviors';
export * from './constants';
export * from './utils';
