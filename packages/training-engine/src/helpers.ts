/**
 * Builders shared by the topic generators: dealing, prose selection,
 * answer options, player lists and final scenario assembly.
 *
 * `dealHand()` shuffles then deals hero + board in one go. Topics that draw
 * from the RNG before shuffling build their own `Deck` to keep that order.
 */

import { Deck } from './deck.js';
import {
  type AnswerOption,
  type Card,
  type DifficultyLevel,
  type GameType,
  type HoleCards,
  type PlayerState,
  type Position,
  type RngFn,
  TextStyle,
  type TrainingScenario,
  type TrainingTopic,
  assertNever,
} from './types.js';
import { randInt } from './rng.js';

export interface DealtCards {
  hand: HoleCards;
  board: Card[];
}

export function dealFrom(deck: Deck, boardCards: number): DealtCards {
  const hand: HoleCards = [deck.deal(), deck.deal()];
  return { hand, board: deck.dealN(boardCards) };
}

/** Fresh shuffled deck, hero's two cards, then `boardCards` community cards. */
export function dealHand(rng: RngFn, boardCards: number): DealtCards {
  return dealFrom(Deck.shuffled(rng), boardCards);
}

export function styled(style: TextStyle, simple: string, technical: string): string {
  switch (style) {
    case TextStyle.Simple:
      return simple;
    case TextStyle.Technical:
      return technical;
    default:
      return assertNever(style);
  }
}

/** One answer option; `is_correct` is `id === correctId`. */
export function answer(
  id: string,
  text: string,
  correctId: string,
  style: TextStyle,
  simple: string,
  technical: string,
): AnswerOption {
  return {
    id,
    text,
    is_correct: id === correctId,
    explanation: styled(style, simple, technical),
  };
}

/** Villain in seat 1, hero in seat 2. */
export function headsUp(
  heroPosition: Position,
  villainPosition: Position,
  heroStack: number,
  villainStack: number,
): PlayerState[] {
  return [
    { seat: 1, position: villainPosition, stack: villainStack, is_hero: false, is_active: true },
    { seat: 2, position: heroPosition, stack: heroStack, is_hero: true, is_active: true },
  ];
}

/** Inclusive integer range; `[n, n]` is a constant and draws nothing. */
export type Range = readonly [lo: number, hi: number];

export type DifficultyRanges = Readonly<Record<DifficultyLevel, Range>>;

export function rollRange(rng: RngFn, range: Range): number {
  const [lo, hi] = range;
  return lo === hi ? lo : randInt(rng, lo, hi);
}

export function rollFor(rng: RngFn, difficulty: DifficultyLevel, ranges: DifficultyRanges): number {
  return rollRange(rng, ranges[difficulty]);
}

/** Uniform pick; one draw. */
export function pick<T>(rng: RngFn, items: readonly T[]): T {
  const item = items[randInt(rng, 0, items.length - 1)];
  if (item === undefined) throw new Error('Cannot pick from an empty list');
  return item;
}

/** Chips to whole big blinds, floored. */
export function toBb(chips: number, bigBlind: number): number {
  return Math.floor(chips / bigBlind);
}

export function percent(fraction: number): string {
  return `${Math.round(fraction * 100)}%`;
}

export interface ScenarioParts {
  scenarioId: string;
  topic: TrainingTopic;
  branchKey: string;
  gameType: GameType;
  heroPosition: Position;
  hand: HoleCards;
  board: Card[];
  players: PlayerState[];
  pot: number;
  currentBet: number;
  question: string;
  answers: AnswerOption[];
}

/** Last call of every generator. */
export function buildScenario(parts: ScenarioParts): TrainingScenario {
  return {
    scenario_id: parts.scenarioId,
    topic: parts.topic,
    branch_key: parts.branchKey,
    table_setup: {
      game_type: parts.gameType,
      hero_position: parts.heroPosition,
      hero_hand: parts.hand,
      board: parts.board,
      players: parts.players,
      pot_size: parts.pot,
      current_bet: parts.currentBet,
    },
    question: parts.question,
    answers: parts.answers,
  };
}
