/**
 * Flop topics: continuation bets, pot odds with draws, check-raising from the
 * big blind, semi-bluffs and c-betting in 3-bet pots. Three board cards.
 */

import {
  BOARD_TEXTURE_LABELS,
  BoardTexture,
  DRAW_TYPE_LABELS,
  DrawType,
  boardTexture,
  classifyDraw,
  drawEquity,
  heroHasFlushDraw,
  heroHasStraightDraw,
  requiredEquity,
} from '../evaluate.js';
import { answer, buildScenario, dealHand, headsUp, percent, rollFor, styled, type DifficultyRanges } from '../helpers.js';
import { POSITION_NAMES, boardToString, handToString, isLatePosition } from '../models.js';
import { randBool, randInt } from '../rng.js';
import {
  type Card,
  DifficultyLevel,
  GameType,
  type HoleCards,
  Position,
  type RngFn,
  type TextStyle,
  type TrainingScenario,
  TrainingTopic,
  assertNever,
} from '../types.js';

const BB = 2;

/** Plain-language names for draws. */
const DRAW_SIMPLE_LABELS: Record<DrawType, string> = {
  [DrawType.FlushDraw]: 'flush draw (one more card of the suit makes a flush)',
  [DrawType.OESD]: 'straight draw open at both ends',
  [DrawType.ComboDraw]: 'double draw (flush or straight can come)',
  [DrawType.GutShot]: 'inside straight draw (only one rank completes it)',
};

// ══════════════════════════════════════════════════════════════
// Postflop Continuation Bet (CB)
// ══════════════════════════════════════════════════════════════

const CBET_STACKS_BB: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [100, 100],
  [DifficultyLevel.Intermediate]: [60, 130],
  [DifficultyLevel.Advanced]: [20, 200],
};

const FLOP_POTS_BB: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [8, 14],
  [DifficultyLevel.Intermediate]: [6, 20],
  [DifficultyLevel.Advanced]: [4, 30],
};

/** RNG order: shuffle + hand + 3-card flop, stack (BB), pot (BB), BTN-or-CO flag. */
export function generateContinuationBet(
  rng: RngFn,
  difficulty: DifficultyLevel,
  scenarioId: string,
  style: TextStyle,
): TrainingScenario {
  const { hand, board } = dealHand(rng, 3);
  const texture = boardTexture(board);
  const stackBb = rollFor(rng, difficulty, CBET_STACKS_BB);
  const potBb = rollFor(rng, difficulty, FLOP_POTS_BB);
  const pot = potBb * BB;
  const stack = stackBb * BB;
  const heroPosition = randBool(rng) ? Position.BTN : Position.CO;

  const lowest = Math.min(...board.map((c) => c.rank));
  const rangeAdvantage = isLatePosition(heroPosition) && lowest <= 8;

  const small = Math.floor(pot / 3);
  const large = Math.floor((pot * 3) / 4);
  const over = Math.floor((pot * 5) / 4);

  const handStr = handToString(hand);
  const boardStr = boardToString(board);
  const position = POSITION_NAMES[heroPosition];
  const textureLabel = BOARD_TEXTURE_LABELS[texture];

  let correct: 'A' | 'B' | 'C';
  let branchKey: string;
  switch (texture) {
    case BoardTexture.Dry:
      correct = rangeAdvantage ? 'B' : 'A';
      branchKey = rangeAdvantage ? 'Dry:RangeAdv' : 'Dry:NoRangeAdv';
      break;
    case BoardTexture.SemiWet:
    case BoardTexture.Wet:
      correct = 'C';
      branchKey = texture;
      break;
    default:
      return assertNever(texture);
  }

  const question = styled(
    style,
    `You raised before the flop and your opponent called, then checked to you. You have ${handStr} ` +
      `on the ${position}. The flop is ${boardStr}. Pot: ${pot} chips, your stack: ${stack} chips. ` +
      `Check, bet small (~${small}), bet big (~${large}) or overbet (~${over})?`,
    `SRP, you are the preflop raiser on the ${position} with ${handStr}. Flop ${boardStr} (${textureLabel}). ` +
      `Pot ${pot} chips (${potBb} BB), ${stackBb} BB behind. BB checks. Options: 33% (${small}), ` +
      `75% (${large}) or 125% (${over}). Your action?`,
  );

  const drawHeavy = texture !== BoardTexture.Dry;
  const answers = [
    answer(
      'A',
      'Check',
      correct,
      style,
      correct === 'A'
        ? `Correct. This quiet board suits your opponent's hands as much as yours. Checking keeps the pot small.`
        : drawHeavy
          ? `Checking gives a free card on a board full of draws. Bet and make them pay.`
          : `Checking wastes your edge. Your range hits this board better, so a small bet wins often.`,
      correct === 'A'
        ? `Correct. Without a range advantage on a dry ${textureLabel} board, checking protects your checking range and avoids bloating the pot.`
        : drawHeavy
          ? `Checking a ${textureLabel} board lets flush and straight draws realise equity for free.`
          : `Checking forgoes a high-frequency small c-bet where your range advantage is strongest.`,
    ),
    answer(
      'B',
      `Bet small (${small} chips)`,
      correct,
      style,
      correct === 'B'
        ? `Correct. A small bet of ${small} chips is enough. Your opponent misses this board most of the time.`
        : drawHeavy
          ? `A small bet gives draws a cheap price to call. Bet bigger on this board.`
          : `Betting here builds a pot on a board that does not favour you. Check instead.`,
      correct === 'B'
        ? `Correct. A 33% c-bet on a dry board with range advantage folds out overcards efficiently and risks little.`
        : drawHeavy
          ? `A 33% bet on a ${textureLabel} board offers draws about ${percent(requiredEquity(small, pot))} required equity, far below what they hold.`
          : `Without range advantage even a small c-bet is called or raised too often here.`,
    ),
    answer(
      'C',
      `Bet large (${large} chips)`,
      correct,
      style,
      correct === 'C'
        ? `Correct. Bet big. There are many draws on this board, so charge your opponent a high price to chase them.`
        : `A big bet on a quiet board only gets called by better hands. Smaller or no bet is better.`,
      correct === 'C'
        ? `Correct. A 75% c-bet on a ${textureLabel} board denies equity; draws need ${percent(requiredEquity(large, pot))} to continue.`
        : `A 75% bet on a dry board isolates you against the stronger part of the defending range.`,
    ),
    answer(
      'D',
      `Overbet (${over} chips)`,
      correct,
      style,
      `An overbet risks too many chips on the flop. Hands that call it usually beat you.`,
      `A 125% overbet is a polar turn/river tool; on the flop it folds out everything you beat.`,
    ),
  ];

  return buildScenario({
    scenarioId,
    topic: TrainingTopic.PostflopContinuationBet,
    branchKey,
    gameType: GameType.CashGame,
    heroPosition,
    hand,
    board,
    players: headsUp(heroPosition, Position.BB, stack, stack),
    pot,
    currentBet: 0,
    question,
    answers,
  });
}

// ══════════════════════════════════════════════════════════════
// Pot Odds & Equity (PO)
// ══════════════════════════════════════════════════════════════

const POT_ODDS_POTS_BB: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [8, 12],
  [DifficultyLevel.Intermediate]: [6, 20],
  [DifficultyLevel.Advanced]: [4, 30],
};

/** Villain bet as a fraction of pot. Beginner is fixed at half pot and draws nothing. */
function rollBetFraction(rng: RngFn, difficulty: DifficultyLevel): number {
  switch (difficulty) {
    case DifficultyLevel.Beginner:
      return 0.5;
    case DifficultyLevel.Intermediate:
      return 0.33 + rng() * (1 - 0.33);
    case DifficultyLevel.Advanced:
      return 0.25 + rng() * (1.5 - 0.25);
    default:
      return assertNever(difficulty);
  }
}

/** RNG order: shuffle + hand + 3-card flop, pot (BB), bet fraction. */
export function generatePotOdds(
  rng: RngFn,
  difficulty: DifficultyLevel,
  scenarioId: string,
  style: TextStyle,
): TrainingScenario {
  const { hand, board } = dealHand(rng, 3);
  const draw = classifyDraw(board);
  const potBb = rollFor(rng, difficulty, POT_ODDS_POTS_BB);
  const fraction = rollBetFraction(rng, difficulty);
  const pot = potBb * BB;
  const bet = Math.round(pot * fraction);

  const needed = requiredEquity(bet, pot);
  const equity = drawEquity(draw, 2);
  const shouldCall = equity >= needed;
  const correct = shouldCall ? 'A' : 'B';

  const handStr = handToString(hand);
  const boardStr = boardToString(board);
  const label = DRAW_TYPE_LABELS[draw];
  const neededPct = (needed * 100).toFixed(1);
  const equityPct = (equity * 100).toFixed(1);

  const question = styled(
    style,
    `You have ${handStr} in the Big Blind and the flop is ${boardStr}. You have a ${DRAW_SIMPLE_LABELS[draw]}. ` +
      `The pot is ${pot} chips and your opponent bets ${bet}. Call or fold?`,
    `BB vs BTN. ${handStr} on ${boardStr}: ${label}, two cards to come. Villain bets ${bet} into ${pot}. ` +
      `Required equity = ${bet}/${pot + bet} = ${neededPct}%. Call or fold?`,
  );

  const answers = [
    answer(
      'A',
      'Call',
      correct,
      style,
      shouldCall
        ? `Correct. The price is good: you win often enough with your draw to make calling ${bet} chips pay off.`
        : `Calling costs too much. Your draw does not come in often enough for a bet this size.`,
      shouldCall
        ? `Correct. ~${equityPct}% equity exceeds the ${neededPct}% break-even, so calling is +EV before any implied odds.`
        : `Calling is -EV: ~${equityPct}% equity is below the ${neededPct}% the ${bet}-chip bet demands.`,
    ),
    answer(
      'B',
      'Fold',
      correct,
      style,
      shouldCall
        ? `Folding is a mistake. You are getting a good enough price to chase your draw.`
        : `Correct. The bet is too big for your draw. Fold and save your chips.`,
      shouldCall
        ? `Folding surrenders a +EV call: ${equityPct}% equity against a ${neededPct}% requirement.`
        : `Correct. At ${neededPct}% required versus ~${equityPct}% equity, folding loses the least.`,
    ),
  ];

  return buildScenario({
    scenarioId,
    topic: TrainingTopic.PotOddsAndEquity,
    branchKey: `${draw}:${shouldCall ? 'Call' : 'Fold'}`,
    gameType: GameType.CashGame,
    heroPosition: Position.BB,
    hand,
    board,
    players: headsUp(Position.BB, Position.BTN, 200, 200),
    pot,
    currentBet: bet,
    question,
    answers,
  });
}

// ══════════════════════════════════════════════════════════════
// Check-Raise Spot (CR)
// ══════════════════════════════════════════════════════════════

export enum BoardFavour {
  BBFav = 'BBFav',
  IPFav = 'IPFav',
}

export enum FlopInteraction {
  Strong = 'Strong',
  Draw = 'Draw',
  Weak = 'Weak',
}

/** Low boards (rank sum 20 or less) connect with the big blind's wide range. */
export function classifyBoardFavour(board: readonly Card[]): BoardFavour {
  const sum = board.reduce((acc, c) => acc + c.rank, 0);
  return sum <= 20 ? BoardFavour.BBFav : BoardFavour.IPFav;
}

export function classifyFlopInteraction(hand: HoleCards, board: readonly Card[]): FlopInteraction {
  if (heroHasFlushDraw(hand, board) || heroHasStraightDraw(hand, board)) return FlopInteraction.Draw;
  const hitsBoard = hand.some((h) => board.some((b) => b.rank === h.rank));
  return hitsBoard ? FlopInteraction.Strong : FlopInteraction.Weak;
}

const CHECK_RAISE_STACKS_BB: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [100, 100],
  [DifficultyLevel.Intermediate]: [50, 130],
  [DifficultyLevel.Advanced]: [20, 200],
};

/** RNG order: shuffle + hand + 3-card flop, stack (BB), pot (BB), villain bet %. */
export function generateCheckRaise(
  rng: RngFn,
  difficulty: DifficultyLevel,
  scenarioId: string,
  style: TextStyle,
): TrainingScenario {
  const { hand, board } = dealHand(rng, 3);
  const favour = classifyBoardFavour(board);
  const interaction = classifyFlopInteraction(hand, board);
  const combo = heroHasFlushDraw(hand, board) && heroHasStraightDraw(hand, board);

  const stackBb = rollFor(rng, difficulty, CHECK_RAISE_STACKS_BB);
  const potBb = rollFor(rng, difficulty, FLOP_POTS_BB);
  const pot = potBb * BB;
  const stack = stackBb * BB;
  const betPct = randInt(rng, 50, 70);
  const villainBet = Math.max(Math.floor((pot * betPct) / 100), BB);
  const raiseTo = Math.floor((villainBet * 5) / 2);
  const raiseBb = Math.floor(raiseTo / BB);

  const interactionKey = interaction === FlopInteraction.Draw && combo ? 'ComboDraw' : interaction;
  const branchKey = `${favour}:${interactionKey}`;

  let correct: 'A' | 'B' | 'C';
  switch (interaction) {
    case FlopInteraction.Strong:
      correct = favour === BoardFavour.BBFav ? 'C' : 'B';
      break;
    case FlopInteraction.Draw:
      correct = combo ? 'C' : 'B';
      break;
    case FlopInteraction.Weak:
      correct = favour === BoardFavour.IPFav ? 'A' : 'B';
      break;
    default:
      return assertNever(interaction);
  }

  const handStr = handToString(hand);
  const boardStr = boardToString(board);
  const favourText = favour === BoardFavour.BBFav ? 'low and connected, good for your range' : 'high, good for the raiser';
  const favourTech = favour === BoardFavour.BBFav ? 'BB-favoured (low, rank sum ≤ 20)' : 'IP-favoured (high cards)';
  const holding: Record<FlopInteraction, string> = {
    [FlopInteraction.Strong]: 'a pair with the board',
    [FlopInteraction.Draw]: combo ? 'a flush draw and a straight draw' : 'a draw',
    [FlopInteraction.Weak]: 'nothing',
  };
  const needed = percent(requiredEquity(villainBet, pot));

  const question = styled(
    style,
    `You called a raise from the Big Blind with ${handStr}. The flop is ${boardStr}, which is ${favourText}. ` +
      `You checked and the Button bet ${villainBet} chips into ${pot}. You have ${holding[interaction]}. What do you do?`,
    `BB vs BTN single-raised pot, ${stackBb} BB deep. ${handStr} on ${boardStr} (${favourTech}). ` +
      `Check, villain c-bets ${villainBet} into ${pot} (${betPct}%). Calling needs ${needed} equity. Your action?`,
  );

  const answers = [
    answer(
      'A',
      'Fold',
      correct,
      style,
      correct === 'A'
        ? `Correct. You missed a board that suits the raiser. Let this one go.`
        : `Folding gives up too easily. You have enough here to keep playing.`,
      correct === 'A'
        ? `Correct. With no pair and no draw on an IP-favoured board you lack the equity to continue at ${needed}.`
        : `Over-folding to a ${betPct}% c-bet lets the Button print money with air.`,
    ),
    answer(
      'B',
      'Call',
      correct,
      style,
      correct === 'B'
        ? `Correct. Just call. You have something worth keeping, but raising is not the best option here.`
        : correct === 'A'
          ? `Calling with nothing on this board just loses ${villainBet} chips. Fold.`
          : `Calling is too passive. Raise now and make your opponent pay.`,
      correct === 'B'
        ? `Correct. Flatting realises equity and keeps the Button's bluffs in without bloating the pot out of position.`
        : correct === 'A'
          ? `Calling without pair or draw on an IP-favoured texture has no path to win at showdown.`
          : `Flatting misses the value and fold equity a check-raise generates here.`,
    ),
    answer(
      'C',
      `Raise to ${raiseBb} BB`,
      correct,
      style,
      correct === 'C'
        ? `Correct. Raise to ${raiseTo} chips. ${combo && interaction === FlopInteraction.Draw ? 'Your big draw wins often even when called.' : 'Your hand is strong on a board that suits you.'}`
        : `Raising here risks a lot of chips with a hand that is not ready for it.`,
      correct === 'C'
        ? combo && interaction === FlopInteraction.Draw
          ? `Correct. A combo draw holds ~54% equity; check-raising to ${raiseTo} adds fold equity on top.`
          : `Correct. On a BB-favoured board a made hand check-raises to ${raiseTo} for value and protection.`
        : `Check-raising without the nut advantage or a strong draw over-commits chips out of position.`,
    ),
  ];

  return buildScenario({
    scenarioId,
    topic: TrainingTopic.CheckRaiseSpot,
    branchKey,
    gameType: GameType.CashGame,
    heroPosition: Position.BB,
    hand,
    board,
    players: [
      { seat: 1, position: Position.BB, stack, is_hero: true, is_active: true },
      { seat: 2, position: Position.BTN, stack, is_hero: false, is_active: true },
    ],
    pot,
    currentBet: villainBet,
    question,
    answers,
  });
}

// ══════════════════════════════════════════════════════════════
// Semi-Bluff Decision (SB)
// ══════════════════════════════════════════════════════════════

const SEMI_BLUFF_STACKS_BB: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [60, 60],
  [DifficultyLevel.Intermediate]: [35, 120],
  [DifficultyLevel.Advanced]: [20, 200],
};

/** RNG order: shuffle + hand + 3-card flop, stack (BB), pot (BB), villain bet %, IP flag. */
export function generateSemiBluff(
  rng: RngFn,
  difficulty: DifficultyLevel,
  scenarioId: string,
  style: TextStyle,
): TrainingScenario {
  const { hand, board } = dealHand(rng, 3);
  const draw = classifyDraw(board);
  const stackBb = rollFor(rng, difficulty, SEMI_BLUFF_STACKS_BB);
  const potBb = rollFor(rng, difficulty, FLOP_POTS_BB);
  const pot = potBb * BB;
  const stack = stackBb * BB;
  const betPct = randInt(rng, 50, 75);
  const villainBet = Math.max(Math.floor((pot * betPct) / 100), BB);
  const raiseTo = Math.floor((villainBet * 5) / 2);
  const heroIp = randBool(rng);
  const heroPosition = heroIp ? Position.BTN : Position.BB;
  const villainPosition = heroIp ? Position.BB : Position.CO;
  const deep = stackBb >= 40;

  let correct: 'A' | 'B' | 'C';
  let branchKey: string;
  switch (draw) {
    case DrawType.ComboDraw:
      correct = 'C';
      branchKey = draw;
      break;
    case DrawType.OESD:
      correct = deep ? 'C' : 'B';
      branchKey = `OESD:${deep ? 'Deep' : 'Short'}`;
      break;
    case DrawType.FlushDraw:
      correct = 'B';
      branchKey = draw;
      break;
    case DrawType.GutShot:
      correct = 'A';
      branchKey = draw;
      break;
    default:
      return assertNever(draw);
  }

  const handStr = handToString(hand);
  const boardStr = boardToString(board);
  const label = DRAW_TYPE_LABELS[draw];
  const equity = drawEquity(draw, 2);
  const equityPct = percent(equity);
  const needed = percent(requiredEquity(villainBet, pot));
  const seat = heroIp ? 'in position' : 'out of position';

  const question = styled(
    style,
    `You have ${handStr} on the ${POSITION_NAMES[heroPosition]} and the flop is ${boardStr}. ` +
      `You have a ${DRAW_SIMPLE_LABELS[draw]}. Your opponent bets ${villainBet} chips into ${pot}. ` +
      `You have ${stackBb} big blinds. What do you do?`,
    `${handStr} on ${boardStr}, ${seat} vs ${POSITION_NAMES[villainPosition]}, ${stackBb} BB deep. ` +
      `Villain bets ${villainBet} into ${pot} (${betPct}%). ${label} with ~${equityPct} equity; ` +
      `calling needs ${needed}. Your action?`,
  );

  const answers = [
    answer(
      'A',
      'Fold',
      correct,
      style,
      correct === 'A'
        ? `Correct. Only a few cards help you. That is not enough to pay ${villainBet} chips.`
        : `Folding throws away a good draw. You have plenty of ways to improve.`,
      correct === 'A'
        ? `Correct. ~${equityPct} equity is short of the ${needed} required and the draw is too thin to raise.`
        : `Over-folding: a ${label} at ~${equityPct} equity continues profitably against a ${betPct}% bet.`,
    ),
    answer(
      'B',
      'Call',
      correct,
      style,
      correct === 'B'
        ? `Correct. Call and see the next card. Your draw is worth the price without raising.`
        : correct === 'A'
          ? `Calling costs too much for a draw this weak. Fold.`
          : `Calling is too passive. Raising lets you win now or improve later.`,
      correct === 'B'
        ? `Correct. Flatting realises ~${equityPct} equity cheaply; ${deep ? 'a raise risks a 3-bet that folds you off the draw' : `at ${stackBb} BB a raise commits you without enough fold equity`}.`
        : correct === 'A'
          ? `Calling with ~${equityPct} versus ${needed} required loses chips every time.`
          : `Flatting forgoes fold equity; with ~${equityPct} equity a semi-bluff raise has two ways to win.`,
    ),
    answer(
      'C',
      `Raise to ${Math.floor(raiseTo / BB)} BB`,
      correct,
      style,
      correct === 'C'
        ? `Correct. Raise to ${raiseTo} chips. Your opponent may fold now, and if they call you still have many ways to win.`
        : `Raising with this draw puts too many chips at risk. ${correct === 'A' ? 'Fold' : 'Just call'} instead.`,
      correct === 'C'
        ? `Correct. Semi-bluff to ${raiseTo}: fold equity plus ~${equityPct} draw equity${deep ? ` with ${stackBb} BB of stack to leverage` : ''}.`
        : `A raise to ${raiseTo} with a ${label} risks a 3-bet shove you cannot call profitably.`,
    ),
  ];

  return buildScenario({
    scenarioId,
    topic: TrainingTopic.SemiBluffDecision,
    branchKey,
    gameType: GameType.CashGame,
    heroPosition,
    hand,
    board,
    players: headsUp(heroPosition, villainPosition, stack, stack),
    pot,
    currentBet: villainBet,
    question,
    answers,
  });
}

// ══════════════════════════════════════════════════════════════
// 3-Bet Pot C-Bet (3B)
// ══════════════════════════════════════════════════════════════

const THREE_BET_POTS_BB: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [10, 14],
  [DifficultyLevel.Intermediate]: [8, 18],
  [DifficultyLevel.Advanced]: [6, 22],
};

const THREE_BET_STACKS_BB: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [100, 100],
  [DifficultyLevel.Intermediate]: [50, 100],
  [DifficultyLevel.Advanced]: [30, 150],
};

/**
 * RNG order: shuffle + hand + 3-card flop, dry/wet flag, strong/weak flag,
 * pot (BB), stack (BB). Texture and strength are drawn, not read off the cards.
 */
export function generateThreeBetPotCbet(
  rng: RngFn,
  difficulty: DifficultyLevel,
  scenarioId: string,
  style: TextStyle,
): TrainingScenario {
  const { hand, board } = dealHand(rng, 3);
  const dry = randBool(rng);
  const strong = randBool(rng);
  const potBb = rollFor(rng, difficulty, THREE_BET_POTS_BB);
  const stackBb = rollFor(rng, difficulty, THREE_BET_STACKS_BB);
  const pot = potBb * BB;
  const stack = stackBb * BB;
  const spr = (stack / pot).toFixed(1);
  const small = Math.round(pot * 0.33);
  const large = Math.round(pot * 0.67);

  const textureKey = dry ? 'Dry' : 'Wet';
  let correct: 'A' | 'B' | 'C';
  let branchKey: string;
  if (strong) {
    correct = dry ? 'B' : 'C';
    branchKey = dry ? 'Dry:Strong:SmallCbet' : 'Wet:Strong:LargeCbet';
  } else {
    correct = 'A';
    branchKey = `${textureKey}:Weak:Check`;
  }

  const handStr = handToString(hand);
  const boardStr = boardToString(board);
  const textureText = dry ? 'dry' : 'wet';
  const strengthText = strong ? 'strong' : 'weak';

  const question = styled(
    style,
    `You re-raised before the flop from the Button with ${handStr} and the Big Blind called. ` +
      `The flop is ${boardStr} (a ${textureText} board) and your hand is ${strengthText} here. ` +
      `They checked. Pot: ${pot} chips, your stack: ${stack} chips. What do you do?`,
    `3-bet pot, BTN vs BB. ${handStr} (${strengthText}) on ${boardStr} (${textureText}). ` +
      `Pot ${pot} chips, ${stackBb} BB behind, SPR ${spr}. BB checks. Your action?`,
  );

  const answers = [
    answer(
      'A',
      'Check back',
      correct,
      style,
      correct === 'A'
        ? `Correct. Your hand is weak here and the pot is already big. Check and keep it small.`
        : `Checking wastes a strong hand. Bet to build the pot while you are ahead.`,
      correct === 'A'
        ? `Correct. At SPR ${spr} any c-bet is a big commitment; a weak hand checks back and keeps its showdown value.`
        : `Checking a strong hand at SPR ${spr} forfeits value and lets the BB realise equity for free.`,
    ),
    answer(
      'B',
      `C-bet small (${small} chips ~33%)`,
      correct,
      style,
      correct === 'B'
        ? `Correct. A small bet of ${small} chips works on a quiet board. Weaker hands will still call.`
        : strong
          ? `A small bet lets your opponent chase their draws cheaply. Bet bigger on this board.`
          : `Betting with a weak hand here puts chips in that you will not get back. Check.`,
      correct === 'B'
        ? `Correct. On a dry board a 33% c-bet gets called by worse and sets up a natural stack-off at SPR ${spr}.`
        : strong
          ? `On a wet board 33% prices draws in at ${percent(requiredEquity(small, pot))}; size up.`
          : `A weak hand gains nothing from a 33% stab at SPR ${spr}: it folds worse and gets called by better.`,
    ),
    answer(
      'C',
      `C-bet large (${large} chips ~67%)`,
      correct,
      style,
      correct === 'C'
        ? `Correct. Bet big. The board has draws and you want your opponent to pay to chase them.`
        : strong
          ? `A big bet on a quiet board scares away hands that would call a smaller one.`
          : `A big bet with a weak hand risks a lot of your stack. Check instead.`,
      correct === 'C'
        ? `Correct. 67% on a wet board denies equity and commits the remaining stack at SPR ${spr}.`
        : strong
          ? `67% on a dry board over-sizes; 33% achieves the same folds and keeps worse hands in.`
          : `A 67% c-bet with a weak hand commits a large share of the stack with poor equity.`,
    ),
  ];

  return buildScenario({
    scenarioId,
    topic: TrainingTopic.ThreeBetPotCbet,
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
