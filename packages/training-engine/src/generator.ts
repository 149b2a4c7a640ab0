import { isDifficultyLevel, isTextStyle, TOPIC_INFO, topicsForStreet } from './models.js';
import { createEntropyRng, createSeededRng, randInt, randU32 } from './rng.js';
import {
  generateAntiLimper,
  generateBigBlindDefense,
  generateIcmDecision,
  generatePreflopDecision,
  generateSqueeze,
} from './topics/preflop.js';
import {
  generateCheckRaise,
  generateContinuationBet,
  generatePotOdds,
  generateSemiBluff,
  generateThreeBetPotCbet,
} from './topics/flop.js';
import { generateDelayedCbet, generateTurnBarrel, generateTurnProbe } from './topics/turn.js';
import { generateBluff, generateRiverCallOrFold, generateRiverValueBet } from './topics/river.js';
import {
  type DifficultyLevel,
  type RngFn,
  type TextStyle,
  type TopicSelector,
  type TrainingRequest,
  type TrainingScenario,
  TrainingError,
  TrainingErrorCode,
  TrainingTopic,
  assertNever,
} from './types.js';

/** Two-letter scenario id prefix, e.g. `BL` for BluffSpot. */
export function topicPrefix(topic: TrainingTopic): string {
  return TOPIC_INFO[topic].prefix;
}

/** `{prefix}-{8 uppercase hex digits}`; one u32 draw. */
export function makeScenarioId(topic: TrainingTopic, rng: RngFn): string {
  const hex = randU32(rng).toString(16).toUpperCase().padStart(8, '0');
  return `${topicPrefix(topic)}-${hex}`;
}

/** Street selectors consume one draw; concrete topics consume none. */
export function resolveTopic(selector: TopicSelector, rng: RngFn): TrainingTopic {
  switch (selector.kind) {
    case 'topic':
      return selector.topic;
    case 'street': {
      const topics = topicsForStreet(selector.street);
      const topic = topics[randInt(rng, 0, topics.length - 1)];
      if (topic === undefined) throw new Error(`No topics for street ${selector.street}`);
      return topic;
    }
    default:
      return assertNever(selector);
  }
}

function runGenerator(
  topic: TrainingTopic,
  rng: RngFn,
  difficulty: DifficultyLevel,
  scenarioId: string,
  style: TextStyle,
): TrainingScenario {
  switch (topic) {
    case TrainingTopic.PreflopDecision:
      return generatePreflopDecision(rng, difficulty, scenarioId, style);
    case TrainingTopic.PostflopContinuationBet:
      return generateContinuationBet(rng, difficulty, scenarioId, style);
    case TrainingTopic.PotOddsAndEquity:
      return generatePotOdds(rng, difficulty, scenarioId, style);
    case TrainingTopic.BluffSpot:
      return generateBluff(rng, difficulty, scenarioId, style);
    case TrainingTopic.ICMAndTournamentDecision:
      return generateIcmDecision(rng, difficulty, scenarioId, style);
    case TrainingTopic.TurnBarrelDecision:
      return generateTurnBarrel(rng, difficulty, scenarioId, style);
    case TrainingTopic.CheckRaiseSpot:
      return generateCheckRaise(rng, difficulty, scenarioId, style);
    case TrainingTopic.SemiBluffDecision:
      return generateSemiBluff(rng, difficulty, scenarioId, style);
    case TrainingTopic.AntiLimperIsolation:
      return generateAntiLimper(rng, difficulty, scenarioId, style);
    case TrainingTopic.RiverValueBet:
      return generateRiverValueBet(rng, difficulty, scenarioId, style);
    case TrainingTopic.SqueezePlay:
      return generateSqueeze(rng, difficulty, scenarioId, style);
    case TrainingTopic.BigBlindDefense:
      return generateBigBlindDefense(rng, difficulty, scenarioId, style);
    case TrainingTopic.ThreeBetPotCbet:
      return generateThreeBetPotCbet(rng, difficulty, scenarioId, style);
    case TrainingTopic.RiverCallOrFold:
      return generateRiverCallOrFold(rng, difficulty, scenarioId, style);
    case TrainingTopic.TurnProbeBet:
      return generateTurnProbe(rng, difficulty, scenarioId, style);
    case TrainingTopic.DelayedCbet:
      return generateDelayedCbet(rng, difficulty, scenarioId, style);
    default:
      return assertNever(topic);
  }
}

/**
 * Generate one scenario. Same request with the same seed yields a
 * structurally identical scenario; only the prose depends on `textStyle`.
 *
 * RNG order: [street pick], scenario id, then the topic's own draws.
 */
export function generateTraining(request: TrainingRequest): TrainingScenario {
  if (!isDifficultyLevel(request.difficulty)) {
    throw new TrainingError(
      TrainingErrorCode.INVALID_DIFFICULTY,
      `Unknown difficulty: ${String(request.difficulty)}`,
    );
  }
  if (!isTextStyle(request.textStyle)) {
    throw new TrainingError(TrainingErrorCode.INVALID_TEXT_STYLE, `Unknown text style: ${String(request.textStyle)}`);
  }
  const rng = request.rngSeed === undefined ? createEntropyRng() : createSeededRng(request.rngSeed);
  const topic = resolveTopic(request.topic, rng);
  const scenarioId = makeScenarioId(topic, rng);
  return runGenerator(topic, rng, request.difficulty, scenarioId, request.textStyle);
}
