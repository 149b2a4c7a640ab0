import {
  type Card,
  type HoleCards,
  RANK_SYMBOLS,
  DifficultyLevel,
  GameType,
  Position,
  Street,
  TextStyle,
  TrainingTopic,
  type TopicSelector,
  type TrainingRequest,
} from './types.js';

export function cardToString(card: Card): string {
  return `${RANK_SYMBOLS[card.rank]}${card.suit}`;
}

export function cardsEqual(a: Card, b: Card): boolean {
  return a.rank === b.rank && a.suit === b.suit;
}

/** Hole cards without a separator, e.g. "AhKd". */
export function handToString(hand: HoleCards): string {
  return hand.map(cardToString).join('');
}

/** "Qc 7d 3h" */
export function boardToString(board: readonly Card[]): string {
  return board.map(cardToString).join(' ');
}

// ── Positions ───────────────────────────────────────────────

export const POSITION_NAMES: Record<Position, string> = {
  [Position.UTG]: 'UTG',
  [Position.UTG1]: 'UTG+1',
  [Position.UTG2]: 'UTG+2',
  [Position.LJ]: 'Lojack',
  [Position.HJ]: 'Hijack',
  [Position.CO]: 'Cutoff',
  [Position.BTN]: 'Button',
  [Position.SB]: 'Small Blind',
  [Position.BB]: 'Big Blind',
};

/** CO and BTN act last postflop. */
export function isLatePosition(position: Position): boolean {
  return position === Position.CO || position === Position.BTN;
}

export const GAME_TYPE_NAMES: Record<GameType, string> = {
  [GameType.CashGame]: 'Cash Game',
  [GameType.Tournament]: 'Tournament',
};

// ── Topics ──────────────────────────────────────────────────

export interface TopicInfo {
  prefix: string;
  name: string;
  street: Street;
}

export const TOPIC_INFO: Record<TrainingTopic, TopicInfo> = {
  [TrainingTopic.PreflopDecision]: { prefix: 'PF', name: 'Preflop Decision', street: Street.Preflop },
  [TrainingTopic.PostflopContinuationBet]: {
    prefix: 'CB',
    name: 'Postflop Continuation Bet',
    street: Street.Flop,
  },
  [TrainingTopic.PotOddsAndEquity]: { prefix: 'PO', name: 'Pot Odds & Equity', street: Street.Flop },
  [TrainingTopic.BluffSpot]: { prefix: 'BL', name: 'Bluff Spot', street: Street.River },
  [TrainingTopic.ICMAndTournamentDecision]: {
    prefix: 'IC',
    name: 'ICM & Tournament Decision',
    street: Street.Preflop,
  },
  [TrainingTopic.TurnBarrelDecision]: { prefix: 'TB', name: 'Turn Barrel Decision', street: Street.Turn },
  [TrainingTopic.CheckRaiseSpot]: { prefix: 'CR', name: 'Check-Raise Spot', street: Street.Flop },
  [TrainingTopic.SemiBluffDecision]: { prefix: 'SB', name: 'Semi-Bluff Decision', street: Street.Flop },
  [TrainingTopic.AntiLimperIsolation]: {
    prefix: 'AL',
    name: 'Anti-Limper Isolation',
    street: Street.Preflop,
  },
  [TrainingTopic.RiverValueBet]: { prefix: 'RV', name: 'River Value Bet', street: Street.River },
  [TrainingTopic.SqueezePlay]: { prefix: 'SQ', name: 'Squeeze Play', street: Street.Preflop },
  [TrainingTopic.BigBlindDefense]: { prefix: 'BD', name: 'Big Blind Defense', street: Street.Preflop },
  [TrainingTopic.ThreeBetPotCbet]: { prefix: '3B', name: '3-Bet Pot C-Bet', street: Street.Flop },
  [TrainingTopic.RiverCallOrFold]: { prefix: 'RF', name: 'River Call or Fold', street: Street.River },
  [TrainingTopic.TurnProbeBet]: { prefix: 'PB', name: 'Turn Probe Bet', street: Street.Turn },
  [TrainingTopic.DelayedCbet]: { prefix: 'DC', name: 'Delayed C-Bet', street: Street.Turn },
};

export const ALL_TOPICS: readonly TrainingTopic[] = Object.values(TrainingTopic);
export const ALL_STREETS: readonly Street[] = Object.values(Street);
export const ALL_DIFFICULTIES: readonly DifficultyLevel[] = Object.values(DifficultyLevel);

/** Topics drilled on each street, in selection order. */
const STREET_TOPICS: Record<Street, readonly TrainingTopic[]> = {
  [Street.Preflop]: [
    TrainingTopic.PreflopDecision,
    TrainingTopic.ICMAndTournamentDecision,
    TrainingTopic.AntiLimperIsolation,
    TrainingTopic.SqueezePlay,
    TrainingTopic.BigBlindDefense,
  ],
  [Street.Flop]: [
    TrainingTopic.PostflopContinuationBet,
    TrainingTopic.PotOddsAndEquity,
    TrainingTopic.CheckRaiseSpot,
    TrainingTopic.SemiBluffDecision,
    TrainingTopic.ThreeBetPotCbet,
  ],
  [Street.Turn]: [TrainingTopic.TurnBarrelDecision, TrainingTopic.TurnProbeBet, TrainingTopic.DelayedCbet],
  [Street.River]: [TrainingTopic.BluffSpot, TrainingTopic.RiverValueBet, TrainingTopic.RiverCallOrFold],
};

export function topicsForStreet(street: Street): readonly TrainingTopic[] {
  return STREET_TOPICS[street];
}

export function streetOfTopic(topic: TrainingTopic): Street {
  return TOPIC_INFO[topic].street;
}

export function isTrainingTopic(value: string): value is TrainingTopic {
  return ALL_TOPICS.some((t) => t === value);
}

export function isStreet(value: string): value is Street {
  return ALL_STREETS.some((s) => s === value);
}

export function isDifficultyLevel(value: string): value is DifficultyLevel {
  return ALL_DIFFICULTIES.some((d) => d === value);
}

export function isTextStyle(value: string): value is TextStyle {
  return Object.values(TextStyle).some((s) => s === value);
}

// ── Requests ────────────────────────────────────────────────

export interface TrainingRequestOptions {
  difficulty?: DifficultyLevel;
  rngSeed?: number | bigint;
  textStyle?: TextStyle;
}

/**
 * Build a request for a specific topic, or for a random topic of a street.
 * Defaults: Beginner, entropy-seeded, Simple prose.
 */
export function createTrainingRequest(
  target: TrainingTopic | Street,
  options: TrainingRequestOptions = {},
): TrainingRequest {
  const topic: TopicSelector = isStreet(target)
    ? { kind: 'street', street: target }
    : { kind: 'topic', topic: target };
  const request: TrainingRequest = {
    topic,
    difficulty: options.difficulty ?? DifficultyLevel.Beginner,
    textStyle: options.textStyle ?? TextStyle.Simple,
  };
  if (options.rngSeed !== undefined) request.rngSeed = options.rngSeed;
  return request;
}
