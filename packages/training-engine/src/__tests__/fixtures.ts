import { SUITS, type Card, type HoleCards, type Rank } from '../types.js';

const RANK_OF: Record<string, Rank> = {
  '2': 2,
  '3': 3,
  '4': 4,
  '5': 5,
  '6': 6,
  '7': 7,
  '8': 8,
  '9': 9,
  T: 10,
  J: 11,
  Q: 12,
  K: 13,
  A: 14,
};

/** `c('Ah')` → ace of hearts. */
export function c(text: string): Card {
  const rank = RANK_OF[text.charAt(0)];
  const suit = SUITS.find((s) => s === text.charAt(1));
  if (rank === undefined || suit === undefined || text.length !== 2) {
    throw new Error(`Bad card literal: ${text}`);
  }
  return { rank, suit };
}

export function hole(a: string, b: string): HoleCards {
  return [c(a), c(b)];
}

/** `board('9h 8h 2c')` */
export function board(text: string): Card[] {
  return text.split(' ').map(c);
}
