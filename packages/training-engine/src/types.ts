// ── Card types ──────────────────────────────────────────────
export const SUITS = ['c', 'd', 'h', 's'] as const;
export type Suit = (typeof SUITS)[number];

/** Numeric ranks, 14 = Ace. */
export const RANKS = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14] as const;
export type Rank = (typeof RANKS)[number];

export const RANK_SYMBOLS: Record<Rank, string> = {
  2: '2',
  3: '3',
  4: '4',
  5: '5',
  6: '6',
  7: '7',
  8: '8',
  9: '9',
  10: 'T',
  11: 'J',
  12: 'Q',
  13: 'K',
  14: 'A',
};

export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
}

export type HoleCards = readonly [Card, Card];

// ── Table metadata ──────────────────────────────────────────
export enum GameType {
  CashGame = 'CashGame',
  Tournament = 'Tournament',
}

export enum Position {
  UTG = 'UTG',
  UTG1 = 'UTG1',
  UTG2 = 'UTG2',
  LJ = 'LJ',
  HJ = 'HJ',
  CO = 'CO',
  BTN = 'BTN',
  SB = 'SB',
  BB = 'BB',
}

export interface PlayerState {
  seat: number;
  position: Position;
  stack: number;
  is_hero: boolean;
  is_active: boolean;
}

// ── Request ─────────────────────────────────────────────────
export enum Street {
  Preflop = 'Preflop',
  Flop = 'Flop',
  Turn = 'Turn',
  River = 'River',
}

export enum TrainingTopic {
  PreflopDecision = 'PreflopDecision',
  PostflopContinuationBet = 'PostflopContinuationBet',
  PotOddsAndEquity = 'PotOddsAndEquity',
  BluffSpot = 'BluffSpot',
  ICMAndTournamentDecision = 'ICMAndTournamentDecision',
  TurnBarrelDecision = 'TurnBarrelDecision',
  CheckRaiseSpot = 'CheckRaiseSpot',
  SemiBluffDecision = 'SemiBluffDecision',
  AntiLimperIsolation = 'AntiLimperIsolation',
  RiverValueBet = 'RiverValueBet',
  SqueezePlay = 'SqueezePlay',
  BigBlindDefense = 'BigBlindDefense',
  ThreeBetPotCbet = 'ThreeBetPotCbet',
  RiverCallOrFold = 'RiverCallOrFold',
  TurnProbeBet = 'TurnProbeBet',
  DelayedCbet = 'DelayedCbet',
}

export enum DifficultyLevel {
  Beginner = 'Beginner',
  Intermediate = 'Intermediate',
  Advanced = 'Advanced',
}

export enum TextStyle {
  /** Plain language, no jargon. */
  Simple = 'Simple',
  /** Poker terminology plus derived numbers (pot odds, SPR, fold equity). */
  Technical = 'Technical',
}

export type TopicSelector =
  | { kind: 'topic'; topic: TrainingTopic }
  | { kind: 'street'; street: Street };

export interface TrainingRequest {
  topic: TopicSelector;
  difficulty: DifficultyLevel;
  /** Omit for a non-deterministic scenario. Up to 2^64 - 1. */
  rngSeed?: number | bigint;
  textStyle: TextStyle;
}

// ── Scenario ────────────────────────────────────────────────
// Field names are the wire contract consumed by clients, hence snake_case.

export interface TableSetup {
  game_type: GameType;
  hero_position: Position;
  hero_hand: HoleCards;
  board: Card[];
  players: PlayerState[];
  pot_size: number;
  /** Amount hero must call, 0 when unopened. */
  current_bet: number;
}

export interface AnswerOption {
  id: string;
  text: string;
  is_correct: boolean;
  explanation: string;
}

export interface TrainingScenario {
  scenario_id: string;
  topic: TrainingTopic;
  branch_key: string;
  table_setup: TableSetup;
  question: string;
  answers: AnswerOption[];
}

// ── Errors ──────────────────────────────────────────────────
export enum TrainingErrorCode {
  DECK_EXHAUSTED = 'DECK_EXHAUSTED',
  INVALID_SEED = 'INVALID_SEED',
  INVALID_DIFFICULTY = 'INVALID_DIFFICULTY',
  INVALID_TEXT_STYLE = 'INVALID_TEXT_STYLE',
}

export class TrainingError extends Error {
  constructor(
    public readonly code: TrainingErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'TrainingError';
  }
}

// ── RNG interface (injected for determinism) ────────────────
export type RngFn = () => number;

export function assertNever(value: never): never {
  throw new Error(`Unhandled case: ${String(value)}`);
}
