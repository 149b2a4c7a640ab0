/**
 * Situation classifiers shared by every topic generator.
 *
 * All functions are pure: no RNG, no mutation. Equity figures are fixed
 * heuristics per draw bucket, not outs-based calculations.
 */

import type { Card, HoleCards, Suit } from './types.js';

// ── Hand categories ─────────────────────────────────────────

export enum HandCategory {
  Premium = 'Premium',
  Strong = 'Strong',
  Playable = 'Playable',
  Marginal = 'Marginal',
  Trash = 'Trash',
}

export const HAND_CATEGORY_LABELS: Record<HandCategory, string> = {
  [HandCategory.Premium]: 'premium',
  [HandCategory.Strong]: 'strong',
  [HandCategory.Playable]: 'playable',
  [HandCategory.Marginal]: 'marginal',
  [HandCategory.Trash]: 'trash',
};

/**
 * Preflop bucket for two hole cards. The non-pair table is a fixed lookup
 * on (high, low, suited):
 *
 *   AKs                         Premium
 *   AKo, AQs, AQo               Strong
 *   AJs, ATs+ (A9s and up)      Playable
 *   KQs                         Playable
 *   KQo                         Marginal
 *   suited connectors 9-high+   Playable
 *   high card 9 or lower        Trash
 *   anything else               Marginal
 */
export function classifyHand(hand: HoleCards): HandCategory {
  const [a, b] = hand;
  const high = Math.max(a.rank, b.rank);
  const low = Math.min(a.rank, b.rank);
  const suited = a.suit === b.suit;

  if (high === low) {
    if (high >= 12) return HandCategory.Premium;
    if (high >= 10) return HandCategory.Strong;
    if (high >= 7) return HandCategory.Playable;
    return HandCategory.Marginal;
  }

  if (high === 14) {
    if (low === 13) return suited ? HandCategory.Premium : HandCategory.Strong;
    if (low === 12) return HandCategory.Strong;
    if (suited && low >= 9) return HandCategory.Playable;
  }
  if (high === 13 && low === 12) {
    return suited ? HandCategory.Playable : HandCategory.Marginal;
  }
  if (suited && high >= 9 && high - low === 1) return HandCategory.Playable;
  if (high <= 9) return HandCategory.Trash;
  return HandCategory.Marginal;
}

// ── Board texture ───────────────────────────────────────────

export enum BoardTexture {
  Dry = 'Dry',
  SemiWet = 'SemiWet',
  Wet = 'Wet',
}

export const BOARD_TEXTURE_LABELS: Record<BoardTexture, string> = {
  [BoardTexture.Dry]: 'dry',
  [BoardTexture.SemiWet]: 'semi-wet',
  [BoardTexture.Wet]: 'wet',
};

function suitCounts(cards: readonly Card[]): Map<Suit, number> {
  const counts = new Map<Suit, number>();
  for (const c of cards) counts.set(c.suit, (counts.get(c.suit) ?? 0) + 1);
  return counts;
}

function uniqueSortedRanks(cards: readonly Card[]): number[] {
  return [...new Set(cards.map((c) => c.rank))].sort((x, y) => x - y);
}

/** True if some `size`-rank window of the sorted distinct ranks spans at most 4. */
function hasTightWindow(ranks: readonly number[], size: number): boolean {
  for (let i = 0; i + size - 1 < ranks.length; i++) {
    const lo = ranks[i];
    const hi = ranks[i + size - 1];
    if (lo !== undefined && hi !== undefined && hi - lo <= 4) return true;
  }
  return false;
}

/** Two or more board cards share a suit. */
export function boardHasFlushDraw(board: readonly Card[]): boolean {
  for (const n of suitCounts(board).values()) {
    if (n >= 2) return true;
  }
  return false;
}

/** Two distinct ranks exactly one apart, or any 3-rank window spanning at most 4. */
export function boardHasStraightDraw(board: readonly Card[]): boolean {
  const ranks = uniqueSortedRanks(board);
  for (let i = 1; i < ranks.length; i++) {
    const prev = ranks[i - 1];
    const cur = ranks[i];
    if (prev !== undefined && cur !== undefined && cur - prev === 1) return true;
  }
  return hasTightWindow(ranks, 3);
}

export function boardTexture(board: readonly Card[]): BoardTexture {
  if (board.length === 0) return BoardTexture.Dry;
  const flush = boardHasFlushDraw(board);
  const straight = boardHasStraightDraw(board);
  if (flush && straight) return BoardTexture.Wet;
  if (flush || straight) return BoardTexture.SemiWet;
  return BoardTexture.Dry;
}

// ── Draws ───────────────────────────────────────────────────

export enum DrawType {
  FlushDraw = 'FlushDraw',
  OESD = 'OESD',
  ComboDraw = 'ComboDraw',
  /** Catch-all "no clean draw" bucket, not a true gutshot detector. */
  GutShot = 'GutShot',
}

export const DRAW_TYPE_LABELS: Record<DrawType, string> = {
  [DrawType.FlushDraw]: 'flush draw',
  [DrawType.OESD]: 'open-ended straight draw',
  [DrawType.ComboDraw]: 'combo draw (flush + straight)',
  [DrawType.GutShot]: 'gutshot straight draw',
};

export function classifyDraw(board: readonly Card[]): DrawType {
  const flush = boardHasFlushDraw(board);
  const straight = boardHasStraightDraw(board);
  if (flush && straight) return DrawType.ComboDraw;
  if (flush) return DrawType.FlushDraw;
  if (straight) return DrawType.OESD;
  return DrawType.GutShot;
}

const DRAW_EQUITY: Record<DrawType, { twoStreets: number; oneStreet: number }> = {
  [DrawType.FlushDraw]: { twoStreets: 0.35, oneStreet: 0.2 },
  [DrawType.OESD]: { twoStreets: 0.32, oneStreet: 0.17 },
  [DrawType.ComboDraw]: { twoStreets: 0.54, oneStreet: 0.3 },
  [DrawType.GutShot]: { twoStreets: 0.17, oneStreet: 0.09 },
};

/** Heuristic equity with one or two cards to come. */
export function drawEquity(draw: DrawType, streetsToCome: 1 | 2): number {
  const entry = DRAW_EQUITY[draw];
  return streetsToCome === 2 ? entry.twoStreets : entry.oneStreet;
}

/** call / (pot + call); 0 when both are zero. */
export function requiredEquity(callAmount: number, potBeforeCall: number): number {
  const total = potBeforeCall + callAmount;
  return total === 0 ? 0 : callAmount / total;
}

/** A hole card's suit already appears twice or more on the board. */
export function heroHasFlushDraw(hand: HoleCards, board: readonly Card[]): boolean {
  const counts = suitCounts(board);
  return hand.some((c) => (counts.get(c.suit) ?? 0) >= 2);
}

/** Board carries a straight draw and a hole card sits within 3 ranks of a board card. */
export function heroHasStraightDraw(hand: HoleCards, board: readonly Card[]): boolean {
  if (!boardHasStraightDraw(board)) return false;
  return hand.some((h) => board.some((b) => Math.abs(h.rank - b.rank) <= 3));
}

// ── Turn cards ──────────────────────────────────────────────

export enum TurnCardType {
  Blank = 'Blank',
  Scare = 'Scare',
}

function completesStraight(flop: readonly Card[], turn: Card): boolean {
  return hasTightWindow(uniqueSortedRanks([...flop, turn]), 4);
}

function completesFlush(flop: readonly Card[], turn: Card): boolean {
  return flop.filter((c) => c.suit === turn.suit).length >= 2;
}

/**
 * Scare if the turn is an overcard to the flop, the third card of a suit,
 * or leaves four distinct ranks inside a five-rank window.
 */
export function classifyTurnCard(flop: readonly Card[], turn: Card): TurnCardType {
  const flopMax = Math.max(...flop.map((c) => c.rank));
  if (turn.rank > flopMax) return TurnCardType.Scare;
  if (completesFlush(flop, turn)) return TurnCardType.Scare;
  if (completesStraight(flop, turn)) return TurnCardType.Scare;
  return TurnCardType.Blank;
}

export enum BarrelTurnType {
  DrawComplete = 'DrawComplete',
  ScareBroadway = 'ScareBroadway',
  Blank = 'Blank',
}

export function classifyBarrelTurn(flop: readonly Card[], turn: Card): BarrelTurnType {
  if (completesFlush(flop, turn)) return BarrelTurnType.DrawComplete;
  if (completesStraight(flop, turn)) return BarrelTurnType.DrawComplete;
  if (turn.rank >= 10) return BarrelTurnType.ScareBroadway;
  return BarrelTurnType.Blank;
}

// ── Made-hand strength on the turn ──────────────────────────

export enum HandStrength {
  Strong = 'Strong',
  Medium = 'Medium',
  Weak = 'Weak',
}

/**
 * Sets, overpairs, two pair and top pair with a jack-or-better kicker are Strong;
 * other pairs are Medium; no pair is Weak.
 */
export function classifyTurnStrength(hand: HoleCards, board: readonly Card[]): HandStrength {
  const [a, b] = hand;
  const boardMax = Math.max(...board.map((c) => c.rank));
  const onBoard = (rank: number) => board.some((c) => c.rank === rank);

  if (a.rank === b.rank) {
    if (onBoard(a.rank)) return HandStrength.Strong;
    if (a.rank > boardMax) return HandStrength.Strong;
    return HandStrength.Medium;
  }

  const aHits = onBoard(a.rank);
  const bHits = onBoard(b.rank);
  if (aHits && bHits) return HandStrength.Strong;
  if (aHits || bHits) {
    const [paired, kicker] = aHits ? [a, b] : [b, a];
    if (paired.rank === boardMax) {
      return kicker.rank >= 11 ? HandStrength.Strong : HandStrength.Medium;
    }
    return HandStrength.Medium;
  }
  return HandStrength.Weak;
}
