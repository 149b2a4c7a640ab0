import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { Deck, createDeck, shuffleDeck } from '../deck.js';
import { cardToString } from '../models.js';
import { createSeededRng, foldSeed, randBool, randInt, randU32 } from '../rng.js';
import { TrainingError, TrainingErrorCode } from '../types.js';

describe('createDeck', () => {
  it('has 52 distinct cards', () => {
    const deck = createDeck();
    expect(deck).toHaveLength(52);
    expect(new Set(deck.map(cardToString)).size).toBe(52);
  });
});

describe('shuffleDeck', () => {
  it('is a permutation and leaves its input alone', () => {
    const deck = createDeck();
    const before = deck.map(cardToString);
    const shuffled = shuffleDeck(deck, createSeededRng(42));
    expect(deck.map(cardToString)).toEqual(before);
    expect(shuffled.map(cardToString).sort()).toEqual([...before].sort());
  });

  it('is deterministic for a seed', () => {
    const a = shuffleDeck(createDeck(), createSeededRng(7)).map(cardToString);
    const b = shuffleDeck(createDeck(), createSeededRng(7)).map(cardToString);
    const other = shuffleDeck(createDeck(), createSeededRng(8)).map(cardToString);
    expect(a).toEqual(b);
    expect(a).not.toEqual(other);
  });
});

describe('Deck', () => {
  it('deals front to back and counts down', () => {
    const deck = Deck.shuffled(createSeededRng(1));
    expect(deck.remaining).toBe(52);
    const first = deck.dealN(5);
    expect(first).toHaveLength(5);
    expect(deck.remaining).toBe(47);
  });

  it('throws DECK_EXHAUSTED past 52 cards', () => {
    const deck = Deck.shuffled(createSeededRng(1));
    deck.dealN(52);
    expect(deck.remaining).toBe(0);
    try {
      deck.deal();
      expect.unreachable('deal should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(TrainingError);
      expect(err instanceof TrainingError && err.code).toBe(TrainingErrorCode.DECK_EXHAUSTED);
    }
  });
});

describe('seeded RNG', () => {
  it('replays the same sequence for the same seed', () => {
    const a = createSeededRng(123);
    const b = createSeededRng(123);
    for (let i = 0; i < 20; i++) expect(a()).toBe(b());
  });

  it('treats a number seed and the equal bigint seed alike', () => {
    const a = createSeededRng(99);
    const b = createSeededRng(99n);
    expect([a(), a(), a()]).toEqual([b(), b(), b()]);
  });

  it('stays within [0, 1)', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 0xffffffff }), (seed) => {
        const rng = createSeededRng(seed);
        for (let i = 0; i < 10; i++) {
          const x = rng();
          if (x < 0 || x >= 1) return false;
        }
        return true;
      }),
    );
  });
});

describe('foldSeed', () => {
  it('xors the high word into the low word', () => {
    expect(foldSeed(5)).toBe(5);
    expect(foldSeed((1n << 32n) + 5n)).toBe(4);
    expect(foldSeed((1n << 64n) - 1n)).toBe(0);
  });

  it.each([-1, 1.5, Number.NaN, 2 ** 60])('rejects %s', (seed) => {
    expect(() => foldSeed(seed)).toThrow(TrainingError);
  });

  it('rejects bigints outside u64', () => {
    expect(() => foldSeed(1n << 64n)).toThrow(TrainingError);
    expect(() => foldSeed(-1n)).toThrow(TrainingError);
  });
});

describe('draw helpers', () => {
  it('randInt stays inside the inclusive range', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 1000 }), fc.integer({ min: -50, max: 50 }), fc.nat(40), (seed, lo, span) => {
        const rng = createSeededRng(seed);
        const hi = lo + span;
        for (let i = 0; i < 20; i++) {
          const n = randInt(rng, lo, hi);
          if (!Number.isInteger(n) || n < lo || n > hi) return false;
        }
        return true;
      }),
    );
  });

  it('randBool honours the extremes', () => {
    const rng = createSeededRng(3);
    expect(randBool(rng, 0)).toBe(false);
    expect(randBool(rng, 1)).toBe(true);
  });

  it('randU32 yields 32-bit unsigned integers', () => {
    const rng = createSeededRng(11);
    for (let i = 0; i < 50; i++) {
      const n = randU32(rng);
      expect(Number.isInteger(n)).toBe(true);
      expect(n).toBeGreaterThanOrEqual(0);
      expect(n).toBeLessThanOrEqual(0xffffffff);
    }
  });
});
