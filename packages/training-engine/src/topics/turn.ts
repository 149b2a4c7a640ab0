/**
 * Turn topics: barrelling after a flop c-bet, probing from the big blind when
 * the flop checks through, and delayed c-bets. Four board cards.
 */

import {
  BOARD_TEXTURE_LABELS,
  BarrelTurnType,
  BoardTexture,
  HandStrength,
  TurnCardType,
  boardTexture,
  classifyBarrelTurn,
  classifyTurnCard,
  classifyTurnStrength,
  requiredEquity,
} from '../evaluate.js';
import {
  answer,
  buildScenario,
  dealHand,
  headsUp,
  percent,
  pick,
  rollFor,
  styled,
  type DifficultyRanges,
} from '../helpers.js';
import { POSITION_NAMES, boardToString, cardToString, handToString } from '../models.js';
import { randBool } from '../rng.js';
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

const STRENGTH_TEXT: Record<HandStrength, string> = {
  [HandStrength.Strong]: 'strong hand',
  [HandStrength.Medium]: 'medium hand',
  [HandStrength.Weak]: 'weak hand',
};

/** Turn pot and stack ranges for spots where the flop was checked through. */
const CHECKED_FLOP_POTS_BB: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [6, 14],
  [DifficultyLevel.Intermediate]: [4, 20],
  [DifficultyLevel.Advanced]: [4, 30],
};

const CHECKED_FLOP_STACKS_BB: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [80, 80],
  [DifficultyLevel.Intermediate]: [40, 100],
  [DifficultyLevel.Advanced]: [20, 150],
};

// ══════════════════════════════════════════════════════════════
// Turn Barrel Decision (TB)
// ══════════════════════════════════════════════════════════════

const BARREL_STACKS_BB: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [100, 100],
  [DifficultyLevel.Intermediate]: [50, 130],
  [DifficultyLevel.Advanced]: [25, 200],
};

const BARREL_POTS_BB: DifficultyRanges = {
  [DifficultyLevel.Beginner]: [14, 22],
  [DifficultyLevel.Intermediate]: [10, 28],
  [DifficultyLevel.Advanced]: [8, 40],
};

/** RNG order: shuffle + hand + flop + turn, stack (BB), pot (BB), BTN-or-CO flag. */
export function generateTurnBarrel(
  rng: RngFn,
  difficulty: DifficultyLevel,
  scenarioId: string,
  style: TextStyle,
): TrainingScenario {
  const { hand, board } = dealHand(rng, 4);
  const flop = board.slice(0, 3);
  const turn = board[3];
  if (turn === undefined) throw new Error('Turn card missing');

  const texture = boardTexture(flop);
  const turnType = classifyBarrelTurn(flop, turn);
  const stackBb = rollFor(rng, difficulty, BARREL_STACKS_BB);
  const potBb = rollFor(rng, difficulty, BARREL_POTS_BB);
  const pot = potBb * BB;
  const stack = stackBb * BB;
  const heroPosition = randBool(rng) ? Position.BTN : Position.CO;

  const medium = Math.floor(pot / 2);
  const large = Math.floor((pot * 4) / 5);
  const flopDrawy = texture !== BoardTexture.Dry;

  let correct: 'A' | 'B' | 'C';
  let branchKey: string;
  switch (turnType) {
    case BarrelTurnType.DrawComplete:
      correct = 'A';
      branchKey = turnType;
      break;
    case BarrelTurnType.ScareBroadway:
      correct = 'C';
      branchKey = turnType;
      break;
    case BarrelTurnType.Blank:
      correct = flopDrawy ? 'B' : 'A';
      branchKey = flopDrawy ? 'Blank:Wet' : 'Blank:Dry';
      break;
    default:
      return assertNever(turnType);
  }

  const handStr = handToString(hand);
  const flopStr = boardToString(flop);
  const turnStr = cardToString(turn);
  const position = POSITION_NAMES[heroPosition];
  const turnSimple: Record<BarrelTurnType, string> = {
    [BarrelTurnType.Blank]: 'a card that helps nobody much',
    [BarrelTurnType.ScareBroadway]: 'a big card (T, J, Q, K or A)',
    [BarrelTurnType.DrawComplete]: 'a card that may complete a draw',
  };
  const turnTech: Record<BarrelTurnType, string> = {
    [BarrelTurnType.Blank]: 'blank',
    [BarrelTurnType.ScareBroadway]: 'Broadway scare card',
    [BarrelTurnType.DrawComplete]: 'draw-completing card',
  };

  const question = styled(
    style,
    `You bet the flop and your opponent called. You have ${handStr} on the ${position}. ` +
      `Flop: ${flopStr}. Turn: ${turnStr}, ${turnSimple[turnType]}. Pot: ${pot} chips, stack: ${stack} chips. ` +
      `They check to you. Check, bet medium (~${medium}) or bet big (~${large})?`,
    `You c-bet the flop from the ${position} with ${handStr} and BB called. Flop ${flopStr} ` +
      `(${BOARD_TEXTURE_LABELS[texture]}), turn ${turnStr} (${turnTech[turnType]}). Pot ${pot} chips (${potBb} BB), ` +
      `${stackBb} BB behind. BB checks. Options: 50% (${medium}) or 80% (${large}). Your action?`,
  );

  const answers = [
    answer(
      'A',
      'Check',
      correct,
      style,
      correct === 'A'
        ? turnType === BarrelTurnType.DrawComplete
          ? `Correct. That card may have finished your opponent's draw. Take the free card.`
          : `Correct. The flop had few draws and this card changes nothing. Your opponent's calls are often real hands now.`
        : turnType === BarrelTurnType.ScareBroadway
          ? `Checking wastes a card that helps your story. Bet big and take the pot.`
          : `Checking gives a free card to the draws that called the flop. Keep betting.`,
      correct === 'A'
        ? turnType === BarrelTurnType.DrawComplete
          ? `Correct. The turn completes flush or straight draws in villain's flop-calling range; barrelling gets check-raised by the hands that got there.`
          : `Correct. A blank on a dry flop leaves villain's calling range capped at showdown value; a second barrel folds out little.`
        : turnType === BarrelTurnType.ScareBroadway
          ? `Checking forfeits the perceived range advantage a Broadway turn hands the preflop raiser.`
          : `Checking lets draws realise ~20% one-card equity for free.`,
    ),
    answer(
      'B',
      'Bet medium',
      correct,
      style,
      correct === 'B'
        ? `Correct. Bet about half the pot (${medium} chips). The draws that called the flop missed and must pay again.`
        : turnType === BarrelTurnType.ScareBroadway
          ? `A medium bet undersells this card. Bet big.`
          : `Betting into a card that may have helped your opponent is risky. Check.`,
      correct === 'B'
        ? `Correct. A 50% barrel charges draws: they need ${percent(requiredEquity(medium, pot))} against ~20% one-card equity.`
        : turnType === BarrelTurnType.ScareBroadway
          ? `50% under-leverages the scare card; 80% maximises fold equity against pairs below it.`
          : `A 50% barrel here is called by the hands that improved and folds the ones you beat.`,
    ),
    answer(
      'C',
      'Bet large',
      correct,
      style,
      correct === 'C'
        ? `Correct. Bet big (${large} chips). This high card looks like it helped you, so your opponent will often fold.`
        : `A big bet here risks too many chips for what it can win.`,
      correct === 'C'
        ? `Correct. The Broadway turn favours the raiser's range; an 80% barrel applies maximum pressure on middle pairs.`
        : `An 80% barrel on this turn over-commits against a range that has either improved or will not fold.`,
    ),
  ];

  return buildScenario({
    scenarioId,
    topic: TrainingTopic.TurnBarrelDecision,
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
// Turn Probe Bet (PB)
// ══════════════════════════════════════════════════════════════

const STRENGTH_ORDER = [HandStrength.Strong, HandStrength.Medium, HandStrength.Weak] as const;

/**
 * RNG order: shuffle + hand + 4 board cards, strength, pot (BB), stack (BB).
 * Strength is drawn rather than read off the cards.
 */
export function generateTurnProbe(
  rng: RngFn,
  difficulty: DifficultyLevel,
  scenarioId: string,
  style: TextStyle,
): TrainingScenario {
  const { hand, board } = dealHand(rng, 4);
  const strength = pick(rng, STRENGTH_ORDER);
  const potBb = rollFor(rng, difficulty, CHECKED_FLOP_POTS_BB);
  const stackBb = rollFor(rng, difficulty, CHECKED_FLOP_STACKS_BB);
  const pot = potBb * BB;
  const stack = stackBb * BB;
  const small = Math.round(pot * 0.4);
  const large = Math.round(pot * 0.7);

  let correct: 'A' | 'B' | 'C';
  let branchKey: string;
  switch (strength) {
    case HandStrength.Strong:
      correct = 'C';
      branchKey = 'Strong:ProbeLarge';
      break;
    case HandStrength.Medium:
      correct = 'B';
      branchKey = 'Medium:ProbeSmall';
      break;
    case HandStrength.Weak:
      correct = 'A';
      branchKey = 'Weak:Check';
      break;
    default:
      return assertNever(strength);
  }

  const handStr = handToString(hand);
  const boardStr = boardToString(board);
  const strengthText = STRENGTH_TEXT[strength];

  const question = styled(
    style,
    `You are in the Big Blind with ${handStr}. Both players checked the flop. Board after the fourth card: ` +
      `${boardStr}. You have a ${strengthText}. Pot: ${pot} chips, stack: ${stack} chips. You act first. What do you do?`,
    `BB vs BTN, flop checked through. ${handStr} (${strengthText}) on ${boardStr}. Pot ${pot} chips, ` +
      `${stackBb} BB behind, OOP on the turn. Probe 40% (${small}), probe 70% (${large}) or check?`,
  );

  const answers = [
    answer(
      'A',
      'Check',
      correct,
      style,
      correct === 'A'
        ? `Correct. Your hand is weak. Check and see what your opponent does.`
        : `Checking misses a chance to win chips. Your opponent showed weakness on the flop.`,
      correct === 'A'
        ? `Correct. The Button's check-back range holds enough medium strength to call or raise a probe; a weak hand checks.`
        : `Checking forfeits value: the Button's flop check caps their range and a probe extracts from it.`,
    ),
    answer(
      'B',
      `Probe small (${small} chips ~40%)`,
      correct,
      style,
      correct === 'B'
        ? `Correct. A small bet wins chips from weaker hands without risking too much.`
        : correct === 'C'
          ? `Too small. Your hand is strong, so bet more.`
          : `Betting with a weak hand here gets called by better hands. Check.`,
      correct === 'B'
        ? `Correct. A 40% probe targets the capped range with a medium hand and keeps the pot controllable.`
        : correct === 'C'
          ? `A 40% probe leaves value behind; strong hands build the pot for the river.`
          : `Probing 40% with air only gets called by the medium hands that beat you.`,
    ),
    answer(
      'C',
      `Probe large (${large} chips ~70%)`,
      correct,
      style,
      correct === 'C'
        ? `Correct. Bet big. Your opponent checked the flop, so they are unlikely to have a hand better than yours.`
        : `A big bet puts too many chips in with this hand.`,
      correct === 'C'
        ? `Correct. A 70% probe builds the pot against a capped range while your hand is strongest.`
        : `A 70% probe over-commits a ${strengthText}; only better hands continue.`,
    ),
  ];

  return buildScenario({
    scenarioId,
    topic: TrainingTopic.TurnProbeBet,
    branchKey,
    gameType: GameType.CashGame,
    heroPosition: Position.BB,
    hand,
    board,
    players: headsUp(Position.BB, Position.BTN, stack, stack),
    pot,
    currentBet: 0,
    question,
    answers,
  });
}

// ══════════════════════════════════════════════════════════════
// Delayed C-Bet (DC)
// ══════════════════════════════════════════════════════════════

/**
 * RNG order: shuffle + hand + 4 board cards, pot (BB), stack (BB).
 * Strength and the turn card are both read off the cards.
 */
export function generateDelayedCbet(
  rng: RngFn,
  difficulty: DifficultyLevel,
  scenarioId: string,
  style: TextStyle,
): TrainingScenario {
  const { hand, board } = dealHand(rng, 4);
  const flop = board.slice(0, 3);
  const turn = board[3];
  if (turn === undefined) throw new Error('Turn card missing');

  const strength = classifyTurnStrength(hand, board);
  const turnType = classifyTurnCard(flop, turn);
  const potBb = rollFor(rng, difficulty, CHECKED_FLOP_POTS_BB);
  const stackBb = rollFor(rng, difficulty, CHECKED_FLOP_STACKS_BB);
  const pot = potBb * BB;
  const stack = stackBb * BB;
  const small = Math.round(pot * 0.33);
  const medium = Math.round(pot * 0.6);

  let correct: 'A' | 'B' | 'C';
  switch (strength) {
    case HandStrength.Strong:
      correct = 'C';
      break;
    case HandStrength.Medium:
      correct = turnType === TurnCardType.Blank ? 'B' : 'A';
      break;
    case HandStrength.Weak:
      correct = 'A';
      break;
    default:
      return assertNever(strength);
  }

  const handStr = handToString(hand);
  const boardStr = boardToString(board);
  const strengthText = STRENGTH_TEXT[strength];
  const scare = turnType === TurnCardType.Scare;

  const question = styled(
    style,
    `You raised before the flop from the Button with ${handStr}, then checked the flop behind. Board after the ` +
      `fourth card: ${boardStr}. The new card ${scare ? 'could change things' : 'looks harmless'}. ` +
      `You have a ${strengthText}. The Big Blind checks again. Pot: ${pot} chips. What do you do?`,
    `BTN vs BB, flop checked through. ${handStr} (${strengthText}) on ${boardStr}; turn ${cardToString(turn)} is a ` +
      `${scare ? 'scare card' : 'blank'}. Pot ${pot} chips, ${stackBb} BB behind. BB checks. ` +
      `Delay 33% (${small}), 60% (${medium}) or check back?`,
  );

  const answers = [
    answer(
      'A',
      'Check back',
      correct,
      style,
      correct === 'A'
        ? scare && strength === HandStrength.Medium
          ? `Correct. That card may have helped your opponent. Check and get to showdown cheaply.`
          : `Correct. Your hand is too weak to bet. Check and see the last card for free.`
        : `Checking again wastes your hand. Bet now to win more.`,
      correct === 'A'
        ? scare && strength === HandStrength.Medium
          ? `Correct. The scare turn strengthens the BB's check-raise range; a medium hand pot-controls.`
          : `Correct. With no made hand a delayed c-bet has little fold equity against a range that checked twice.`
        : `Checking back a ${strengthText} forgoes value from the BB's capped checking range.`,
    ),
    answer(
      'B',
      `Bet small (${small} chips ~33%)`,
      correct,
      style,
      correct === 'B'
        ? `Correct. A small bet gets called by weaker hands on this quiet card.`
        : correct === 'C'
          ? `Too small. Your hand is strong enough to bet more.`
          : `Betting here puts chips in when you are likely behind or facing a raise. Check.`,
      correct === 'B'
        ? `Correct. A 33% delayed c-bet on a blank extracts thin value from worse pairs and keeps the pot manageable.`
        : correct === 'C'
          ? `33% under-values a strong hand; the BB's range has plenty of calls for 60%.`
          : `A 33% stab here is raised by the hands that improved and called by the ones that beat you.`,
    ),
    answer(
      'C',
      `Bet medium (${medium} chips ~60%)`,
      correct,
      style,
      correct === 'C'
        ? `Correct. Bet ${medium} chips. Your hand is strong and your opponent has shown weakness twice.`
        : `A bet this size risks too much with your hand.`,
      correct === 'C'
        ? `Correct. A 60% delayed c-bet builds the pot with a strong hand against a range capped by two checks.`
        : `60% over-commits a ${strengthText}; only better hands continue.`,
    ),
  ];

  return buildScenario({
    scenarioId,
    topic: TrainingTopic.DelayedCbet,
    branchKey: `${strength}:${turnType}`,
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
