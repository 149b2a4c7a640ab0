/**
 * Preflop topics: open/facing-open/3-bet pot decisions, ICM push/fold,
 * limper isolation, squeezes and big blind defense. The board is always empty.
 */

import { Deck } from '../deck.js';
import { HAND_CATEGORY_LABELS, HandCategory, classifyHand } from '../evaluate.js';
import {
  answer,
  buildScenario,
  dealFrom,
  dealHand,
  headsUp,
  pick,
  rollFor,
  styled,
  toBb,
  type DifficultyRanges,
} from '../helpers.js';
import { POSITION_NAMES, handToString, isLatePosition } from '../models.js';
import { randBool, randInt } from '../rng.js';
import {
  type AnswerOption,
  DifficultyLevel,
  GameType,
  type HoleCards,
  type PlayerState,
  Position,
  type RngFn,
  type TextStyle,
  type TrainingScenario,
  TrainingTopic,
  assertNever,
} from '../types.js';

const BB = 2;

// ══════════════════════════════════════════════════════════════
// Preflop Decision (PF)
// ══════════════════════════════════════════════════════════════

enum PreflopSpot {
  OpenRaise = 'OpenRaise',
  FacingOpen = 'FacingOpen',
  ThreeBetPot = 'ThreeBetPot',
}

const PREFLOP_SPOTS = [PreflopSpot.OpenRaise, PreflopSpot.FacingOpen, PreflopSpot.ThreeBetPot] as const;

const POSITIONS_6MAX: readonly Position[] = [
  Position.UTG,
  Position.HJ,
  Position.CO,
  Position.BTN,
  Position.SB,
  Position.BB,
];

const POSITIONS_9MAX: readonly Position[] = [
  Position.UTG,
  Position.UTG1,
  Position.UTG2,
  Position.LJ,
  Position.HJ,
  Position.CO,
  Position.BTN,
  Position.SB,
  Position.BB,
];

/** Stacks in chips. */
const PREFLOP_STACKS: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [80, 120],
  [DifficultyLevel.Intermediate]: [40, 150],
  [DifficultyLevel.Advanced]: [15, 300],
};

interface PreflopContext {
  hand: string;
  position: string;
  category: string;
  stackBb: number;
  tableSize: number;
  style: TextStyle;
}

interface SpotResult {
  pot: number;
  currentBet: number;
  question: string;
  answers: AnswerOption[];
}

/**
 * RNG order: 6-max flag, spot, hero position, hero stack, shuffle + 2 hole
 * cards, then one stack per remaining seat in table order.
 */
export function generatePreflopDecision(
  rng: RngFn,
  difficulty: DifficultyLevel,
  scenarioId: string,
  style: TextStyle,
): TrainingScenario {
  const is6Max = randBool(rng);
  const spot = pick(rng, PREFLOP_SPOTS);
  const pool = is6Max ? POSITIONS_6MAX : POSITIONS_9MAX;
  const heroPosition = pick(rng, pool);
  const effectiveStack = rollFor(rng, difficulty, PREFLOP_STACKS);

  const { hand } = dealFrom(Deck.shuffled(rng), 0);
  const category = classifyHand(hand);
  const categoryLabel = HAND_CATEGORY_LABELS[category];
  const late = isLatePosition(heroPosition);

  let branchKey: string;
  switch (spot) {
    case PreflopSpot.OpenRaise:
    case PreflopSpot.FacingOpen:
      branchKey = `${spot}:${categoryLabel}:${late ? 'IP' : 'OOP'}`;
      break;
    case PreflopSpot.ThreeBetPot:
      branchKey = `${spot}:${categoryLabel}`;
      break;
    default:
      return assertNever(spot);
  }

  const players: PlayerState[] = pool.map((position, i) => ({
    seat: i + 1,
    position,
    stack: position === heroPosition ? effectiveStack : rollFor(rng, difficulty, PREFLOP_STACKS),
    is_hero: position === heroPosition,
    is_active: true,
  }));

  const ctx: PreflopContext = {
    hand: handToString(hand),
    position: POSITION_NAMES[heroPosition],
    category: categoryLabel,
    stackBb: toBb(effectiveStack, BB),
    tableSize: is6Max ? 6 : 9,
    style,
  };

  let result: SpotResult;
  switch (spot) {
    case PreflopSpot.OpenRaise:
      result = openRaiseSpot(ctx, category, late);
      break;
    case PreflopSpot.FacingOpen:
      result = facingOpenSpot(ctx, category, late);
      break;
    case PreflopSpot.ThreeBetPot:
      result = threeBetPotSpot(ctx, category);
      break;
    default:
      return assertNever(spot);
  }

  return buildScenario({
    scenarioId,
    topic: TrainingTopic.PreflopDecision,
    branchKey,
    gameType: GameType.CashGame,
    heroPosition,
    hand,
    board: [],
    players,
    pot: result.pot,
    currentBet: result.currentBet,
    question: result.question,
    answers: result.answers,
  });
}

function openRaiseSpot(ctx: PreflopContext, category: HandCategory, late: boolean): SpotResult {
  const { hand, position, category: cat, stackBb, tableSize, style } = ctx;
  const pot = BB + BB / 2;
  const openSize = stackBb >= 40 ? BB * 3 : BB * 2;
  const openBb = openSize / BB;

  const shouldRaise =
    category === HandCategory.Premium ||
    category === HandCategory.Strong ||
    (late && (category === HandCategory.Playable || category === HandCategory.Marginal));
  const correct = shouldRaise ? 'B' : 'A';

  const question = styled(
    style,
    `You have ${hand} in ${position} at a ${tableSize}-player table with ${stackBb} big blinds. ` +
      `Everybody before you folded. What do you do?`,
    `${tableSize}-max, ${stackBb} BB effective. Folds to you in ${position} holding ${hand} (${cat}). ` +
      `Unopened pot of ${pot} chips. Your action?`,
  );

  const answers = [
    answer(
      'A',
      'Fold',
      correct,
      style,
      shouldRaise
        ? `Too careful. ${hand} is good enough to play from ${position}, so folding gives up a profitable open.`
        : `Correct. ${hand} is too weak to play from ${position}. Keep your chips for a better hand.`,
      shouldRaise
        ? `Over-folding: a ${cat} holding from ${position} is a standard open at ${stackBb} BB.`
        : `Correct. A ${cat} holding from ${position} cannot open profitably into the players left to act.`,
    ),
    answer(
      'B',
      `Raise to ${openBb} BB`,
      correct,
      style,
      shouldRaise
        ? `Correct. Raise to ${openSize} chips. ${hand} is strong enough from ${position} to take the lead.`
        : `Raising with ${hand} from ${position} puts chips in with a hand that usually loses. Fold instead.`,
      shouldRaise
        ? `Correct. A ${openBb} BB open with a ${cat} hand from ${position} builds the pot with an edge and takes the initiative.`
        : `Opening a ${cat} hand from ${position} is -EV: too many players behind can wake up with better.`,
    ),
    answer(
      'C',
      'Call',
      correct,
      style,
      `Just calling the big blind lets everybody in cheaply and you lose control. Raise or fold.`,
      `Open-limping is a leak: no fold equity, no initiative, and it invites an isolation raise or a multiway pot.`,
    ),
  ];

  return { pot, currentBet: 0, question, answers };
}

function facingOpenSpot(ctx: PreflopContext, category: HandCategory, late: boolean): SpotResult {
  const { hand, position, category: cat, stackBb, style } = ctx;
  const raiseSize = stackBb >= 40 ? BB * 3 : BB * 2;
  const pot = BB / 2 + BB + raiseSize;
  const threeBet = raiseSize * 3;

  let correct: 'A' | 'B' | 'C';
  switch (category) {
    case HandCategory.Premium:
    case HandCategory.Strong:
      correct = 'C';
      break;
    case HandCategory.Playable:
      correct = late ? 'C' : 'B';
      break;
    case HandCategory.Marginal:
    case HandCategory.Trash:
      correct = 'A';
      break;
    default:
      return assertNever(category);
  }

  const question = styled(
    style,
    `You have ${hand} in ${position} with ${stackBb} big blinds. Another player raised to ` +
      `${raiseSize / BB} big blinds. What do you do?`,
    `${hand} (${cat}) in ${position}, ${stackBb} BB deep. Facing a ${raiseSize / BB} BB open; ` +
      `pot is ${pot} chips. Your action?`,
  );

  const answers = [
    answer(
      'A',
      'Fold',
      correct,
      style,
      correct === 'A'
        ? `Correct. ${hand} is not strong enough to continue against a raise. Let it go.`
        : `Folding is too cautious. ${hand} is good enough to keep playing here.`,
      correct === 'A'
        ? `Correct. A ${cat} hand is dominated too often by an opening range to continue.`
        : `Over-folding: a ${cat} hand has enough equity against a single open to continue from ${position}.`,
    ),
    answer(
      'B',
      'Call',
      correct,
      style,
      correct === 'B'
        ? `Correct. Calling with ${hand} keeps the pot small and lets you see a flop with a decent hand.`
        : correct === 'A'
          ? `Calling with ${hand} costs chips with a hand that rarely wins against a raiser. Fold.`
          : `Calling is too passive. Re-raise with ${hand} while you have the better hand.`,
      correct === 'B'
        ? `Correct. Flatting keeps a ${cat} hand in the pot at a fair price without bloating it out of position.`
        : correct === 'A'
          ? `Flatting a ${cat} hand invests ${raiseSize} chips with poor equity realisation.`
          : `Flatting a ${cat} hand forgoes the value and fold equity of a 3-bet to ${threeBet / BB} BB.`,
    ),
    answer(
      'C',
      `Raise to ${threeBet / BB} BB`,
      correct,
      style,
      correct === 'C'
        ? `Correct. Re-raise to ${threeBet} chips. ${hand} is strong enough to grow the pot now.`
        : `Re-raising with ${hand} risks a lot of chips with a hand that is not strong enough.`,
      correct === 'C'
        ? `Correct. A 3-bet to ${threeBet / BB} BB with a ${cat} hand from ${position} gets value from worse and denies equity.`
        : `3-betting a ${cat} hand from ${position} gets called or 4-bet mostly by hands that dominate it.`,
    ),
  ];

  return { pot, currentBet: raiseSize, question, answers };
}

function threeBetPotSpot(ctx: PreflopContext, category: HandCategory): SpotResult {
  const { hand, position, category: cat, stackBb, style } = ctx;
  const heroOpen = BB * 3;
  const threeBet = heroOpen * 3;
  const pot = BB / 2 + BB + heroOpen + threeBet;
  const fourBet = threeBet * 3;

  let correct: 'A' | 'B' | 'C';
  switch (category) {
    case HandCategory.Premium:
      correct = 'C';
      break;
    case HandCategory.Strong:
    case HandCategory.Playable:
      correct = 'B';
      break;
    case HandCategory.Marginal:
    case HandCategory.Trash:
      correct = 'A';
      break;
    default:
      return assertNever(category);
  }

  const question = styled(
    style,
    `You raised to ${heroOpen / BB} big blinds with ${hand} from ${position} (${stackBb} big blinds). ` +
      `An opponent re-raised to ${threeBet / BB} big blinds. What do you do?`,
    `You open ${heroOpen / BB} BB from ${position} with ${hand} (${cat}), ${stackBb} BB deep, ` +
      `and face a 3-bet to ${threeBet / BB} BB. Pot is ${pot} chips. Your action?`,
  );

  const answers = [
    answer(
      'A',
      'Fold',
      correct,
      style,
      correct === 'A'
        ? `Correct. ${hand} does not do well against a re-raise. Fold and move on.`
        : `Folding gives up too much. ${hand} is strong enough to continue.`,
      correct === 'A'
        ? `Correct. A ${cat} hand realises too little equity against a 3-bet range to continue.`
        : `Over-folding to 3-bets lets the opponent profit with any two cards.`,
    ),
    answer(
      'B',
      'Call',
      correct,
      style,
      correct === 'B'
        ? `Correct. Call and see a flop. ${hand} plays well and the pot stays manageable.`
        : correct === 'A'
          ? `Calling puts more chips in with a hand that is usually behind. Fold.`
          : `Just calling wastes a great hand. Re-raise again to build the pot.`,
      correct === 'B'
        ? `Correct. Calling keeps dominated hands in and avoids stacking off preflop with a ${cat} hand.`
        : correct === 'A'
          ? `Calling a 3-bet with a ${cat} hand leads to large pots played with poor equity.`
          : `Flatting a premium forfeits the value of a 4-bet against the 3-bettor's range.`,
    ),
    answer(
      'C',
      `Raise to ${fourBet / BB} BB`,
      correct,
      style,
      correct === 'C'
        ? `Correct. Re-raise again. ${hand} is one of the best starting hands, so build the pot.`
        : `Re-raising again with ${hand} risks your stack with a hand that is not good enough.`,
      correct === 'C'
        ? `Correct. 4-bet to ${fourBet / BB} BB for value: a premium is ahead of nearly all of the 3-bet range.`
        : `4-betting a ${cat} hand turns it into a bluff that only gets continued on by better hands.`,
    ),
  ];

  return { pot, currentBet: threeBet, question, answers };
}

// ══════════════════════════════════════════════════════════════
// ICM & Tournament Decision (IC)
// ══════════════════════════════════════════════════════════════

export enum TournamentStage {
  EarlyLevels = 'EarlyLevels',
  MiddleStages = 'MiddleStages',
  Bubble = 'Bubble',
  FinalTable = 'FinalTable',
}

const TOURNAMENT_STAGES = [
  TournamentStage.EarlyLevels,
  TournamentStage.MiddleStages,
  TournamentStage.Bubble,
  TournamentStage.FinalTable,
] as const;

interface StageInfo {
  name: string;
  key: string;
  players: readonly [number, number];
  pushBase: number;
  riskPremium: number;
}

const STAGE_INFO: Record<TournamentStage, StageInfo> = {
  [TournamentStage.EarlyLevels]: { name: 'Early Levels', key: 'Early', players: [60, 120], pushBase: 20, riskPremium: 3 },
  [TournamentStage.MiddleStages]: { name: 'Middle Stages', key: 'Middle', players: [25, 60], pushBase: 15, riskPremium: 8 },
  [TournamentStage.Bubble]: { name: 'Bubble', key: 'Bubble', players: [10, 18], pushBase: 10, riskPremium: 20 },
  [TournamentStage.FinalTable]: { name: 'Final Table', key: 'FinalTable', players: [3, 9], pushBase: 12, riskPremium: 15 },
};

export enum PushTier {
  Premium = 'Premium',
  Strong = 'Strong',
  Playable = 'Playable',
  Weak = 'Weak',
}

export function classifyPushTier(hand: HoleCards): PushTier {
  const [a, b] = hand;
  const high = Math.max(a.rank, b.rank);
  const low = Math.min(a.rank, b.rank);
  const suited = a.suit === b.suit;
  const pair = high === low;

  if (pair && high >= 12) return PushTier.Premium;
  if (high === 14 && low === 13 && suited) return PushTier.Premium;
  if (pair && high >= 10) return PushTier.Strong;
  if (high === 14 && low >= 12) return PushTier.Strong;
  if (pair && high >= 7) return PushTier.Playable;
  if (high === 14 && low >= 10 && suited) return PushTier.Playable;
  if (high >= 12 && low >= 11 && suited) return PushTier.Playable;
  return PushTier.Weak;
}

/** Deepest stack, in big blinds, that still shoves this tier at this stage. */
export function pushThresholdBb(stage: TournamentStage, tier: PushTier): number {
  const base = STAGE_INFO[stage].pushBase;
  switch (tier) {
    case PushTier.Premium:
      return base + 8;
    case PushTier.Strong:
      return base + 3;
    case PushTier.Playable:
      return base;
    case PushTier.Weak:
      return Math.max(base - 4, 0);
    default:
      return assertNever(tier);
  }
}

const ICM_HERO_STACKS: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [6, 18],
  [DifficultyLevel.Intermediate]: [4, 25],
  [DifficultyLevel.Advanced]: [3, 30],
};

/**
 * RNG order: stage, hero stack (BB), villain stack (BB), players remaining,
 * then shuffle + 2 hole cards. One big blind is 100 chips here.
 */
export function generateIcmDecision(
  rng: RngFn,
  difficulty: DifficultyLevel,
  scenarioId: string,
  style: TextStyle,
): TrainingScenario {
  const bb = 100;
  const stage = pick(rng, TOURNAMENT_STAGES);
  const info = STAGE_INFO[stage];
  const heroStackBb = rollFor(rng, difficulty, ICM_HERO_STACKS);
  const villainStackBb = randInt(rng, 20, 60);
  const playersRemaining = randInt(rng, info.players[0], info.players[1]);
  const paidSpots = Math.ceil(playersRemaining * 0.15);

  const { hand } = dealFrom(Deck.shuffled(rng), 0);
  const heroPosition = Position.BTN;
  const handStr = handToString(hand);
  const tier = classifyPushTier(hand);
  const threshold = pushThresholdBb(stage, tier);
  const shouldPush = heroStackBb <= threshold;
  const correct = shouldPush ? 'A' : 'B';
  const pot = bb + bb / 2;
  const premium = info.riskPremium;
  const orbitCost = Math.round(150 / heroStackBb);

  const question = styled(
    style,
    `Tournament, ${info.name}: ${playersRemaining} players left and the top ${paidSpots} get paid. ` +
      `You have ${handStr} on the Button with ${heroStackBb} big blinds. The Big Blind has ` +
      `${villainStackBb} big blinds. Everyone else folded. All-in or fold?`,
    `MTT ${info.name}, ${playersRemaining} left, ${paidSpots} paid. ${handStr} on the BTN, ` +
      `${heroStackBb} BB effective vs a ${villainStackBb} BB big blind. Folds to you. Shove or fold?`,
  );

  const answers = [
    answer(
      'A',
      'All-in',
      correct,
      style,
      shouldPush
        ? `Correct. With only ${heroStackBb} big blinds your stack is shrinking fast. ${handStr} is good enough to move all-in now.`
        : `Too early for this. ${heroStackBb} big blinds is enough to wait for a better hand than ${handStr}.`,
      shouldPush
        ? `Correct. At ${heroStackBb} BB the blinds cost you about ${orbitCost}% of your stack per orbit. ` +
            `Even with a ~${premium}% ICM risk premium at this stage the shove beats folding (threshold ${threshold} BB).`
        : `Shoving ${heroStackBb} BB with ${handStr} exceeds the ${threshold} BB threshold for this hand at ${info.name}; ` +
            `the ~${premium}% ICM risk premium makes the call-off range too strong.`,
    ),
    answer(
      'B',
      'Fold',
      correct,
      style,
      shouldPush
        ? `Folding is a mistake. With ${heroStackBb} big blinds you need chips, and this is a good spot to get them.`
        : `Correct. Fold and wait. You have enough chips (${heroStackBb} big blinds) to avoid risking your tournament here.`,
      shouldPush
        ? `Folding bleeds blinds: at ${heroStackBb} BB your fold equity only shrinks and the next spot will be worse.`
        : `Correct. Above the ${threshold} BB push threshold, preserving tournament equity outweighs the ${pot}-chip pot.`,
    ),
  ];

  return buildScenario({
    scenarioId,
    topic: TrainingTopic.ICMAndTournamentDecision,
    branchKey: `${info.key}:${shouldPush ? 'Push' : 'Fold'}`,
    gameType: GameType.Tournament,
    heroPosition,
    hand,
    board: [],
    players: headsUp(heroPosition, Position.BB, heroStackBb * bb, villainStackBb * bb),
    pot,
    currentBet: 0,
    question,
    answers,
  });
}

// ══════════════════════════════════════════════════════════════
// Anti-Limper Isolation (AL)
// ══════════════════════════════════════════════════════════════

const ISOLATION_POSITIONS = [Position.CO, Position.BTN, Position.SB] as const;

const ISOLATION_STACKS: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [60, 120],
  [DifficultyLevel.Intermediate]: [30, 150],
  [DifficultyLevel.Advanced]: [15, 200],
};

/** 3 BB plus one per limper. */
function isolationRaiseBb(limpers: number): number {
  return 3 + limpers;
}

/** RNG order: shuffle + 2 hole cards, hero position, limper count, stack (BB). */
export function generateAntiLimper(
  rng: RngFn,
  difficulty: DifficultyLevel,
  scenarioId: string,
  style: TextStyle,
): TrainingScenario {
  const { hand } = dealHand(rng, 0);
  const heroPosition = pick(rng, ISOLATION_POSITIONS);
  const limpers = randInt(rng, 1, 3);
  const stackBb = rollFor(rng, difficulty, ISOLATION_STACKS);
  const stack = stackBb * BB;
  const pot = BB + BB / 2 + BB * limpers;
  const isoBb = isolationRaiseBb(limpers);
  const isoChips = isoBb * BB;

  const category = classifyHand(hand);
  const cat = HAND_CATEGORY_LABELS[category];
  const ip = isLatePosition(heroPosition);
  const handStr = handToString(hand);
  const position = POSITION_NAMES[heroPosition];
  const limperWord = limpers === 1 ? 'limper' : 'limpers';

  let correct: 'A' | 'B' | 'C';
  let branchKey: string;
  switch (category) {
    case HandCategory.Premium:
    case HandCategory.Strong:
      correct = 'C';
      branchKey = category;
      break;
    case HandCategory.Playable:
      correct = ip ? 'C' : 'B';
      branchKey = `Playable:${ip ? 'IP' : 'OOP'}`;
      break;
    case HandCategory.Marginal:
    case HandCategory.Trash:
      correct = 'A';
      branchKey = category;
      break;
    default:
      return assertNever(category);
  }

  const question = styled(
    style,
    `You have ${handStr} in the ${position} with ${stackBb} big blinds. ${limpers} ${limperWord} ` +
      `called the big blind without raising. The pot is ${pot} chips. What do you do?`,
    `${handStr} (${cat}) in the ${position}, ${ip ? 'in position' : 'out of position'}, ${stackBb} BB deep. ` +
      `${limpers} ${limperWord} in front; pot ${pot} chips. Your action?`,
  );

  const answers = [
    answer(
      'A',
      'Fold',
      correct,
      style,
      correct === 'A'
        ? `Correct. ${handStr} is too weak even against players who only called. Wait for a better hand.`
        : `Folding is too cautious. Limpers are usually weak, and ${handStr} is good enough to attack them.`,
      correct === 'A'
        ? `Correct. A ${cat} hand has no edge over limping ranges and no reason to bloat a multiway pot.`
        : `Over-folding: a ${cat} hand ${ip ? 'in position ' : ''}profits against capped limping ranges.`,
    ),
    answer(
      'B',
      'Call (overlimp)',
      correct,
      style,
      correct === 'B'
        ? `Correct. Just call. From the Small Blind you act first after the flop, so see a cheap flop with ${handStr}.`
        : ip
          ? `Just calling wastes your position. You act last after the flop, so raise and play against one opponent.`
          : `Just calling is too passive with ${handStr}. Raise and take control of the pot.`,
      correct === 'B'
        ? `Correct. Out of position a ${cat} hand realises equity poorly in a bloated pot; overlimping for ${BB / 2} more chip keeps it cheap.`
        : `Overlimping a ${cat} hand cedes the initiative and invites a multiway pot where it under-realises.`,
    ),
    answer(
      'C',
      `Raise to ${isoBb} BB`,
      correct,
      style,
      correct === 'C'
        ? `Correct. Raise to ${isoChips} chips. You make the limpers pay to see a flop and often play against just one of them.`
        : `Raising builds a big pot you will play from a bad seat or with a weak hand. Avoid it here.`,
      correct === 'C'
        ? `Correct. An isolation raise to ${isoBb} BB (3 BB + 1 per limper) with a ${cat} hand wins the dead money often ` +
            `and sets up a heads-up pot with the initiative.`
        : `Iso-raising a ${cat} hand ${ip ? '' : 'out of position '}builds a pot that is -EV to play postflop.`,
    ),
  ];

  return buildScenario({
    scenarioId,
    topic: TrainingTopic.AntiLimperIsolation,
    branchKey,
    gameType: GameType.CashGame,
    heroPosition,
    hand,
    board: [],
    players: headsUp(heroPosition, Position.UTG, stack, stack),
    pot,
    currentBet: BB,
    question,
    answers,
  });
}

// ══════════════════════════════════════════════════════════════
// Squeeze Play (SQ)
// ══════════════════════════════════════════════════════════════

enum SqueezeStrength {
  Premium = 'Premium',
  Speculative = 'Speculative',
  Weak = 'Weak',
}

const SQUEEZE_STRENGTHS = [SqueezeStrength.Premium, SqueezeStrength.Speculative, SqueezeStrength.Weak] as const;

const SQUEEZE_CALLERS: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [1, 1],
  [DifficultyLevel.Intermediate]: [1, 2],
  [DifficultyLevel.Advanced]: [1, 3],
};

const OPEN_SIZES_BB: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [3, 3],
  [DifficultyLevel.Intermediate]: [2, 4],
  [DifficultyLevel.Advanced]: [2, 5],
};

const FACING_RAISE_STACKS_BB: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [100, 100],
  [DifficultyLevel.Intermediate]: [60, 120],
  [DifficultyLevel.Advanced]: [25, 150],
};

/**
 * RNG order: shuffle + 2 hole cards, strength bucket, caller count,
 * open size (BB), stack (BB). The bucket is drawn, not read off the cards.
 */
export function generateSqueeze(
  rng: RngFn,
  difficulty: DifficultyLevel,
  scenarioId: string,
  style: TextStyle,
): TrainingScenario {
  const { hand } = dealHand(rng, 0);
  const strength = pick(rng, SQUEEZE_STRENGTHS);
  const callers = rollFor(rng, difficulty, SQUEEZE_CALLERS);
  const openBb = rollFor(rng, difficulty, OPEN_SIZES_BB);
  const stackBb = rollFor(rng, difficulty, FACING_RAISE_STACKS_BB);

  const potBb = openBb + callers * openBb + 1;
  const squeezeBb = openBb * 3 + callers * openBb;
  const squeeze = squeezeBb * BB;
  const handStr = handToString(hand);
  const callerText = callers === 1 ? '1 caller' : `${callers} callers`;
  const strengthText = strength.toLowerCase();

  let correct: 'A' | 'B' | 'C';
  let branchKey: string;
  switch (strength) {
    case SqueezeStrength.Premium:
      correct = 'C';
      branchKey = 'Premium:Squeeze';
      break;
    case SqueezeStrength.Speculative:
      correct = 'B';
      branchKey = 'Speculative:Call';
      break;
    case SqueezeStrength.Weak:
      correct = 'A';
      branchKey = 'Weak:Fold';
      break;
    default:
      return assertNever(strength);
  }

  const question = styled(
    style,
    `You are on the Button with ${handStr} (${stackBb} big blinds). UTG raised to ${openBb} big blinds ` +
      `and ${callerText} called. There are ${potBb} big blinds in the pot. What do you do?`,
    `BTN, ${stackBb} BB deep, holding ${handStr} (${strengthText} for this spot). UTG opens ${openBb} BB ` +
      `with ${callerText}; ${potBb} BB in the middle. Your action?`,
  );

  const answers = [
    answer(
      'A',
      'Fold',
      correct,
      style,
      correct === 'A'
        ? `Correct. With a raiser and ${callerText} already in, ${handStr} is too weak. Fold.`
        : `Folding throws away a good spot. ${handStr} is worth playing here.`,
      correct === 'A'
        ? `Correct. A weak holding is dominated by the opener's range and has no implied odds to call or fold equity to squeeze.`
        : `Over-folding: a ${strengthText} holding has a profitable continue against an open plus ${callerText}.`,
    ),
    answer(
      'B',
      `Call (${openBb} BB)`,
      correct,
      style,
      correct === 'B'
        ? `Correct. Call and see the flop. With several players in, a hit with ${handStr} can win a big pot.`
        : correct === 'A'
          ? `Calling gets you into a crowded pot with a hand that rarely wins. Fold.`
          : `Calling lets everybody in cheaply. With a hand this strong you want to raise and thin the field.`,
      correct === 'B'
        ? `Correct. A speculative hand realises its equity multiway: ${openBb} BB to win ${potBb} BB with strong implied odds.`
        : correct === 'A'
          ? `Flatting a weak hand multiway leads to reverse implied odds.`
          : `Flatting a premium multiway gives up the dead money and lets ${callers + 1} players realise equity cheaply.`,
    ),
    answer(
      'C',
      `Squeeze to ${squeeze} chips (${squeezeBb} BB)`,
      correct,
      style,
      correct === 'C'
        ? `Correct. Re-raise big. The callers are usually not strong, so you often win ${potBb} big blinds right away or play a big pot with the best hand.`
        : `Re-raising this big with ${handStr} is too risky. Someone behind will often have a better hand.`,
      correct === 'C'
        ? `Correct. Squeeze to ${squeezeBb} BB (3x the open plus one open per caller): the callers are capped ` +
            `and the opener must continue out of position.`
        : `Squeezing a ${strengthText} holding to ${squeezeBb} BB risks a 4-bet or a call from hands that dominate it.`,
    ),
  ];

  return buildScenario({
    scenarioId,
    topic: TrainingTopic.SqueezePlay,
    branchKey,
    gameType: GameType.CashGame,
    heroPosition: Position.BTN,
    hand,
    board: [],
    players: headsUp(Position.BTN, Position.UTG, stackBb * BB, stackBb * BB),
    pot: potBb * BB,
    currentBet: openBb * BB,
    question,
    answers,
  });
}

// ══════════════════════════════════════════════════════════════
// Big Blind Defense (BD)
// ══════════════════════════════════════════════════════════════

enum DefenseStrength {
  Strong = 'Strong',
  Playable = 'Playable',
  Weak = 'Weak',
}

const DEFENSE_STRENGTHS = [DefenseStrength.Strong, DefenseStrength.Playable, DefenseStrength.Weak] as const;
const RAISER_POSITIONS = [Position.UTG, Position.CO, Position.BTN] as const;

/**
 * RNG order: shuffle + 2 hole cards, strength bucket, raiser position,
 * raise size (BB), stack (BB).
 */
export function generateBigBlindDefense(
  rng: RngFn,
  difficulty: DifficultyLevel,
  scenarioId: string,
  style: TextStyle,
): TrainingScenario {
  const { hand } = dealHand(rng, 0);
  const strength = pick(rng, DEFENSE_STRENGTHS);
  const villainPosition = pick(rng, RAISER_POSITIONS);
  const raiseBb = rollFor(rng, difficulty, OPEN_SIZES_BB);
  const stackBb = rollFor(rng, difficulty, FACING_RAISE_STACKS_BB);

  const potBb = raiseBb + 1;
  const threeBetBb = raiseBb * 3 + 1;
  const threeBet = threeBetBb * BB;
  const toCall = raiseBb - 1;
  const handStr = handToString(hand);
  const villain = POSITION_NAMES[villainPosition];
  const strengthText = strength.toLowerCase();
  const priceNeeded = Math.round((toCall / (potBb + toCall)) * 100);

  let correct: 'A' | 'B' | 'C';
  let branchKey: string;
  switch (strength) {
    case DefenseStrength.Strong:
      correct = 'C';
      branchKey = 'Strong:ThreeBet';
      break;
    case DefenseStrength.Playable:
      correct = 'B';
      branchKey = 'Playable:Call';
      break;
    case DefenseStrength.Weak:
      correct = 'A';
      branchKey = 'Weak:Fold';
      break;
    default:
      return assertNever(strength);
  }

  const question = styled(
    style,
    `You are in the Big Blind with ${handStr} (${stackBb} big blinds). The ${villain} raised to ` +
      `${raiseBb} big blinds and everyone else folded. What do you do?`,
    `BB defense: ${handStr} (${strengthText} for this spot), ${stackBb} BB deep. ${villain} opens to ` +
      `${raiseBb} BB, folds to you. Pot ${potBb} BB. Your action?`,
  );

  const answers = [
    answer(
      'A',
      'Fold',
      correct,
      style,
      correct === 'A'
        ? `Correct. Even with your big blind already in, ${handStr} is too weak to continue.`
        : `Folding is too tight. You already have a big blind in the pot, and ${handStr} is worth defending.`,
      correct === 'A'
        ? `Correct. Despite needing only ~${priceNeeded}% equity, a weak holding under-realises out of position.`
        : `Over-folding the BB: you need only ~${priceNeeded}% equity and a ${strengthText} hand clears that.`,
    ),
    answer(
      'B',
      `Call (${raiseBb} BB)`,
      correct,
      style,
      correct === 'B'
        ? `Correct. Call. You get a good price because your big blind is already in, and ${handStr} plays well after the flop.`
        : correct === 'A'
          ? `Calling here just loses chips slowly. ${handStr} will rarely win this pot.`
          : `Calling is too passive. ${handStr} is strong enough to re-raise.`,
      correct === 'B'
        ? `Correct. Closing the action at ~${priceNeeded}% required equity is profitable with a playable hand.`
        : correct === 'A'
          ? `Flatting a weak hand out of position leads to difficult, losing spots postflop.`
          : `Flatting a strong hand under-values it against the ${villain}'s opening range; 3-bet for value.`,
    ),
    answer(
      'C',
      `3-bet to ${threeBet} chips (${threeBetBb} BB)`,
      correct,
      style,
      correct === 'C'
        ? `Correct. Re-raise to ${threeBetBb} big blinds. ${handStr} is ahead of most hands that raise from the ${villain}.`
        : `Re-raising with ${handStr} puts a lot of chips in with a hand that is not strong enough.`,
      correct === 'C'
        ? `Correct. A 3-bet to ${threeBetBb} BB (3x the open plus one) charges the ${villain}'s range and builds a pot you are ahead in.`
        : `3-betting a ${strengthText} hand from the BB gets called or 4-bet by the part of the range that beats you.`,
    ),
  ];

  return buildScenario({
    scenarioId,
    topic: TrainingTopic.BigBlindDefense,
    branchKey,
    gameType: GameType.CashGame,
    heroPosition: Position.BB,
    hand,
    board: [],
    players: headsUp(Position.BB, villainPosition, stackBb * BB, stackBb * BB),
    pot: potBb * BB,
    currentBet: raiseBb * BB,
    question,
    answers,
  });
}
