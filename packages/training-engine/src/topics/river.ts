/**
 * River topics: bluffing, value-bet sizing and calling down against a bet.
 * Full five-card board; hero is always on the Button against the Big Blind.
 */

import { answer, buildScenario, dealHand, headsUp, pick, rollFor, styled, type DifficultyRanges } from '../helpers.js';
import { boardToString, handToString } from '../models.js';
import {
  DifficultyLevel,
  GameType,
  Position,
  type RngFn,
  type TextStyle,
  type TrainingScenario,
  TrainingTopic,
  assertNever,
} from '../types.js';

const BB = 2;

// ══════════════════════════════════════════════════════════════
// Bluff Spot (BL)
// ══════════════════════════════════════════════════════════════

export enum BluffType {
  MissedFlushDraw = 'MissedFlushDraw',
  CappedRange = 'CappedRange',
  OvercardBrick = 'OvercardBrick',
}

const BLUFF_TYPES = [BluffType.MissedFlushDraw, BluffType.CappedRange, BluffType.OvercardBrick] as const;

const BLUFF_POTS_BB: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [10, 16],
  [DifficultyLevel.Intermediate]: [8, 24],
  [DifficultyLevel.Advanced]: [6, 40],
};

const BLUFF_STACKS_BB: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [50, 50],
  [DifficultyLevel.Intermediate]: [30, 80],
  [DifficultyLevel.Advanced]: [15, 150],
};

/** Below this stack-to-pot ratio a bluff has too little room to work. */
const LOW_SPR = 2;

/** RNG order: shuffle + hand + 5-card board, bluff type, pot (BB), stack (BB). */
export function generateBluff(
  rng: RngFn,
  difficulty: DifficultyLevel,
  scenarioId: string,
  style: TextStyle,
): TrainingScenario {
  const { hand, board } = dealHand(rng, 5);
  const bluffType = pick(rng, BLUFF_TYPES);
  const potBb = rollFor(rng, difficulty, BLUFF_POTS_BB);
  const stackBb = rollFor(rng, difficulty, BLUFF_STACKS_BB);
  const pot = potBb * BB;
  const stack = stackBb * BB;
  const spr = stack / pot;
  const lowSpr = spr < LOW_SPR;

  const small = Math.round(pot * 0.4);
  const large = Math.round(pot * 0.75);
  const shove = stack;

  const branchKey =
    bluffType === BluffType.CappedRange ? bluffType : `${bluffType}:${lowSpr ? 'LowSPR' : 'HighSPR'}`;
  const correct = bluffType === BluffType.CappedRange || lowSpr ? 'A' : 'C';

  const handStr = handToString(hand);
  const boardStr = boardToString(board);
  const sprText = spr.toFixed(1);

  let storySimple: string;
  let storyTech: string;
  switch (bluffType) {
    case BluffType.MissedFlushDraw:
      storySimple = 'You were chasing a flush and it never came.';
      storyTech = 'Your flush draw bricked.';
      break;
    case BluffType.CappedRange:
      storySimple = 'Your earlier actions made your hand look weak, and your opponent knows it.';
      storyTech = 'Your line caps your range; villain knows you rarely hold the nuts.';
      break;
    case BluffType.OvercardBrick:
      storySimple = 'You had two high cards and never paired them.';
      storyTech = 'Your overcards missed on every street.';
      break;
    default:
      return assertNever(bluffType);
  }

  const question = styled(
    style,
    `Last card is out. You have ${handStr} on the Button and the board is ${boardStr}. ${storySimple} ` +
      `Your opponent checks. Pot: ${pot} chips, your stack: ${stack} chips. What do you do?`,
    `River, BTN vs BB. ${handStr} on ${boardStr}. ${storyTech} BB checks. ` +
      `Pot ${pot} chips, ${stackBb} BB behind, SPR ${sprText}. Your action?`,
  );

  const answers = [
    answer(
      'A',
      'Check',
      correct,
      style,
      correct === 'A'
        ? bluffType === BluffType.CappedRange
          ? `Correct. Your opponent will not believe a bet here. Give up and check.`
          : `Correct. You have too few chips behind for a bluff to scare anyone. Check.`
        : `Checking means you lose the pot at showdown. A bet can still win it.`,
      correct === 'A'
        ? bluffType === BluffType.CappedRange
          ? `Correct. A capped range has no credible value region on this river; villain's bluff-catchers call profitably.`
          : `Correct. At SPR ${sprText} any bet is close to committing and villain's pot odds make folding rare.`
        : `Checking concedes a pot your hand cannot win at showdown; a polar bet has positive fold equity at SPR ${sprText}.`,
    ),
    answer(
      'B',
      `Bet small (${small} chips ~40%)`,
      correct,
      style,
      `A small bet does not scare your opponent. They will call it with almost anything.`,
      `A 40% bluff offers villain ${Math.round((small / (pot + 2 * small)) * 100)}% pot odds; too many bluff-catchers call.`,
    ),
    answer(
      'C',
      `Bet large (${large} chips ~75%)`,
      correct,
      style,
      correct === 'C'
        ? `Correct. A big bet tells a strong story and gets many better hands to fold.`
        : `A big bet here is not believable and costs you ${large} chips when called.`,
      correct === 'C'
        ? `Correct. A 75% bluff only needs ${Math.round((large / (pot + large)) * 100)}% folds and you have stack depth to tell a credible value story.`
        : `A 75% bluff with ${bluffType === BluffType.CappedRange ? 'a capped range' : `SPR ${sprText}`} lacks credibility and loses ${large} when called.`,
    ),
    answer(
      'D',
      `All-in (${shove} chips)`,
      correct,
      style,
      `Going all-in risks everything. A well-sized big bet does the same job for less.`,
      `Shoving ${shove} risks the stack to win ${pot}; a 75% sizing achieves comparable fold equity at lower risk.`,
    ),
  ];

  return buildScenario({
    scenarioId,
    topic: TrainingTopic.BluffSpot,
    branchKey,
    gameType: GameType.CashGame,
    heroPosition: Position.BTN,
    hand,
    board,
    players: headsUp(Position.BTN, Position.BB, stack, stack),
    pot,
    currentBet: 0,
    question,
    answers,
  });
}

// ══════════════════════════════════════════════════════════════
// River Value Bet (RV)
// ══════════════════════════════════════════════════════════════

export enum ValueStrength {
  Nuts = 'Nuts',
  Strong = 'Strong',
  Medium = 'Medium',
}

const VALUE_STRENGTHS = [ValueStrength.Nuts, ValueStrength.Strong, ValueStrength.Medium] as const;

const VALUE_POTS_BB: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [10, 18],
  [DifficultyLevel.Intermediate]: [8, 28],
  [DifficultyLevel.Advanced]: [6, 40],
};

const VALUE_STACKS_BB: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [60, 60],
  [DifficultyLevel.Intermediate]: [30, 80],
  [DifficultyLevel.Advanced]: [15, 150],
};

/** RNG order: shuffle + hand + 5-card board, strength, pot (BB), stack (BB). */
export function generateRiverValueBet(
  rng: RngFn,
  difficulty: DifficultyLevel,
  scenarioId: string,
  style: TextStyle,
): TrainingScenario {
  const { hand, board } = dealHand(rng, 5);
  const strength = pick(rng, VALUE_STRENGTHS);
  const potBb = rollFor(rng, difficulty, VALUE_POTS_BB);
  const stackBb = rollFor(rng, difficulty, VALUE_STACKS_BB);
  const pot = potBb * BB;
  const stack = stackBb * BB;

  const small = Math.round(pot * 0.33);
  const large = Math.round(pot * 0.75);
  const over = Math.round(pot * 1.25);

  let correct: 'A' | 'C' | 'D';
  let branchKey: string;
  let strengthText: string;
  switch (strength) {
    case ValueStrength.Nuts:
      correct = 'D';
      branchKey = 'Nuts:Overbet';
      strengthText = 'very strong hand';
      break;
    case ValueStrength.Strong:
      correct = 'C';
      branchKey = 'Strong:LargeBet';
      strengthText = 'strong hand';
      break;
    case ValueStrength.Medium:
      correct = 'A';
      branchKey = 'Medium:Check';
      strengthText = 'medium hand';
      break;
    default:
      return assertNever(strength);
  }

  const handStr = handToString(hand);
  const boardStr = boardToString(board);

  const question = styled(
    style,
    `Last card is out. You have ${handStr} on the Button with a ${strengthText}. The board is ${boardStr}. ` +
      `Your opponent checks. Pot: ${pot} chips, your stack: ${stack} chips. How much do you bet, if at all?`,
    `River, BTN vs BB, ${stackBb} BB behind. ${handStr} (${strengthText}) on ${boardStr}. BB checks into ` +
      `a ${pot}-chip pot. Size for value: check, 33%, 75% or 125%?`,
  );

  const answers = [
    answer(
      'A',
      'Check',
      correct,
      style,
      correct === 'A'
        ? `Correct. Your hand is decent but not great. Betting may only get called by better hands.`
        : `Checking loses chips. Your hand is strong and your opponent is likely to call a bet.`,
      correct === 'A'
        ? `Correct. A medium hand is a bluff-catcher here; betting folds worse and gets called or raised by better.`
        : `Checking back a ${strengthText} forfeits river value from villain's calling range.`,
    ),
    answer(
      'B',
      `Bet small (${small} chips ~33%)`,
      correct,
      style,
      correct === 'A'
        ? `Even a small bet is risky here. Hands that call probably beat you.`
        : `Betting too small leaves money behind. Bet bigger to win more.`,
      correct === 'A'
        ? `A 33% thin value bet is rarely called by worse with a medium hand.`
        : `33% under-sizes a ${strengthText}; villain's calling range supports a larger bet.`,
    ),
    answer(
      'C',
      `Bet large (${large} chips ~75%)`,
      correct,
      style,
      correct === 'C'
        ? `Correct. Bet big. Your opponent is likely to call and you get paid well.`
        : correct === 'D'
          ? `Good, but you can bet even more. Your hand is almost unbeatable.`
          : `A big bet with a medium hand only gets called by better hands.`,
      correct === 'C'
        ? `Correct. 75% extracts maximum value from one-pair and worse two-pair hands without folding them out.`
        : correct === 'D'
          ? `75% leaves value behind with the nuts; a polar overbet targets villain's strongest bluff-catchers.`
          : `75% with a medium hand turns it into a bluff against a calling range that beats it.`,
    ),
    answer(
      'D',
      `Overbet (${over} chips ~125%)`,
      correct,
      style,
      correct === 'D'
        ? `Correct. Go big. You have about the best hand possible, so bet as much as you can.`
        : `Betting this much may scare off hands that would call a normal big bet.`,
      correct === 'D'
        ? `Correct. With the nuts a 125% overbet maximises EV; villain's strong bluff-catchers still call.`
        : `A 125% overbet folds out the hands that pay a standard sizing.`,
    ),
  ];

  return buildScenario({
    scenarioId,
    topic: TrainingTopic.RiverValueBet,
    branchKey,
    gameType: GameType.CashGame,
    heroPosition: Position.BTN,
    hand,
    board,
    players: headsUp(Position.BTN, Position.BB, stack, stack),
    pot,
    currentBet: 0,
    question,
    answers,
  });
}

// ══════════════════════════════════════════════════════════════
// River Call or Fold (RF)
// ══════════════════════════════════════════════════════════════

/** Each caller strength is always faced with one bet size. */
type CallSpot =
  | { strength: 'Strong'; size: 'Small'; fraction: 0.33; correct: 'C'; branchKey: 'Strong:SmallBet:Raise' }
  | { strength: 'Marginal'; size: 'Standard'; fraction: 0.67; correct: 'B'; branchKey: 'Marginal:StdBet:Call' }
  | { strength: 'Weak'; size: 'Large'; fraction: 1; correct: 'A'; branchKey: 'Weak:LargeBet:Fold' };

const CALL_SPOTS: readonly CallSpot[] = [
  { strength: 'Strong', size: 'Small', fraction: 0.33, correct: 'C', branchKey: 'Strong:SmallBet:Raise' },
  { strength: 'Marginal', size: 'Standard', fraction: 0.67, correct: 'B', branchKey: 'Marginal:StdBet:Call' },
  { strength: 'Weak', size: 'Large', fraction: 1, correct: 'A', branchKey: 'Weak:LargeBet:Fold' },
];

const CALL_POTS_BB: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [10, 20],
  [DifficultyLevel.Intermediate]: [8, 28],
  [DifficultyLevel.Advanced]: [6, 40],
};

const CALL_STACKS_BB: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [80, 80],
  [DifficultyLevel.Intermediate]: [30, 100],
  [DifficultyLevel.Advanced]: [15, 150],
};

const CALLER_TEXT: Record<CallSpot['strength'], string> = {
  Strong: 'strong hand',
  Marginal: 'medium hand',
  Weak: 'weak hand',
};

const BET_SIZE_TEXT: Record<CallSpot['size'], string> = {
  Small: 'small bet',
  Standard: 'normal-sized bet',
  Large: 'large bet',
};

/** RNG order: shuffle + hand + 5-card board, spot, pot (BB), stack (BB). */
export function generateRiverCallOrFold(
  rng: RngFn,
  difficulty: DifficultyLevel,
  scenarioId: string,
  style: TextStyle,
): TrainingScenario {
  const { hand, board } = dealHand(rng, 5);
  const spot = pick(rng, CALL_SPOTS);
  const potBb = rollFor(rng, difficulty, CALL_POTS_BB);
  const stackBb = rollFor(rng, difficulty, CALL_STACKS_BB);
  const pot = potBb * BB;
  const stack = stackBb * BB;

  const villainBet = Math.round(pot * spot.fraction);
  const requiredPct = Math.round((villainBet / (pot + villainBet * 2)) * 100);
  const raiseTo = Math.round(villainBet * 2.5);
  const { correct } = spot;

  const handStr = handToString(hand);
  const boardStr = boardToString(board);
  const strengthText = CALLER_TEXT[spot.strength];

  const question = styled(
    style,
    `Last card is out. You have ${handStr} on the Button with a ${strengthText}. The board is ${boardStr}. ` +
      `Your opponent makes a ${BET_SIZE_TEXT[spot.size]} of ${villainBet} chips into ${pot}. What do you do?`,
    `River, BTN vs BB, ${stackBb} BB behind. ${handStr} (${strengthText}) on ${boardStr}. BB bets ` +
      `${villainBet} into ${pot}. You need ${requiredPct}% equity to call. Your action?`,
  );

  const answers = [
    answer(
      'A',
      'Fold',
      correct,
      style,
      correct === 'A'
        ? `Correct. A big bet on the last card usually means a strong hand. Yours is too weak to call.`
        : `Folding gives up a hand that is good often enough here.`,
      correct === 'A'
        ? `Correct. A pot-sized river bet is value-heavy; a weak hand wins far less than the ${requiredPct}% required.`
        : `Folding a ${strengthText} to a ${BET_SIZE_TEXT[spot.size]} over-folds; villain bluffs enough at this sizing.`,
    ),
    answer(
      'B',
      `Call (${villainBet} chips)`,
      correct,
      style,
      correct === 'B'
        ? `Correct. Your hand beats enough of your opponent's bluffs. Call and see.`
        : correct === 'C'
          ? `Calling is fine, but your hand is strong enough to raise for more.`
          : `Calling here loses chips. Your opponent rarely bluffs with a bet this big.`,
      correct === 'B'
        ? `Correct. At ${requiredPct}% required a medium bluff-catcher is a profitable call against a standard sizing.`
        : correct === 'C'
          ? `Flatting leaves value behind; a small bet from villain invites a raise from a strong hand.`
          : `Calling needs ${requiredPct}% and a weak hand falls short against a large, value-weighted bet.`,
    ),
    answer(
      'C',
      `Raise to ${raiseTo} chips`,
      correct,
      style,
      correct === 'C'
        ? `Correct. Your hand is strong and the bet is small. Raise to win a bigger pot.`
        : `Raising here is too risky with this hand.`,
      correct === 'C'
        ? `Correct. Against a small bet a strong hand raises to ${raiseTo} for value; villain's thin value bets call.`
        : `Raising a ${strengthText} turns it into a bluff that only gets called by better.`,
    ),
  ];

  return buildScenario({
    scenarioId,
    topic: TrainingTopic.RiverCallOrFold,
    branchKey: spot.branchKey,
    gameType: GameType.CashGame,
    heroPosition: Position.BTN,
    hand,
    board,
    players: headsUp(Position.BTN, Position.BB, stack, stack),
    pot,
    currentBet: villainBet,
    question,
    answers,
  });
}
