import {
  type Card,
  RANKS,
  SUITS,
  type RngFn,
  TrainingError,
  TrainingErrorCode,
} from './types.js';

/** Build a fresh 52-card deck in canonical order. */
export function createDeck(): Card[] {
  const deck: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      deck.push({ rank, suit });
    }
  }
  return deck;
}

/**
 * Fisher-Yates shuffle using injected RNG for determinism.
 * Returns a new array (does not mutate input).
 */
export function shuffleDeck(deck: readonly Card[], rng: RngFn): Card[] {
  const shuffled = [...deck];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const tmp = shuffled[i]!;
    shuffled[i] = shuffled[j]!;
    shuffled[j] = tmp;
  }
  return shuffled;
}

/**
 * A shuffled deck dealt front to back. One per scenario; never reused.
 */
export class Deck {
  private cursor = 0;

  private constructor(private readonly cards: readonly Card[]) {}

  static shuffled(rng: RngFn): Deck {
    return new Deck(shuffleDeck(createDeck(), rng));
  }

  get remaining(): number {
    return this.cards.length - this.cursor;
  }

  deal(): Card {
    const card = this.cards[this.cursor];
    if (!card) throw new TrainingError(TrainingErrorCode.DECK_EXHAUSTED, 'Deck exhausted');
    this.cursor++;
    return card;
  }

  dealN(count: number): Card[] {
    const cards: Card[] = [];
    for (let i = 0; i < count; i++) {
      cards.push(this.deal());
    }
    return cards;
  }
}
