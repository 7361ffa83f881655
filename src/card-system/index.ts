/**
 * Card System Module
 *
 * Memory cards, their persisted form, and the pair-deck operations
 * used to deal a board.
 */
export const CARD_SYSTEM_VERSION = '0.1.0';

export type { CardState, FlipState } from './Card';
export { MemoryCard, createCardFromState } from './Card';

export { shuffle, pairedCardCount, createPairedTypeIds } from './Deck';
