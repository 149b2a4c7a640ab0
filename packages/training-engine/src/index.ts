export {
  type Card,
  type Suit,
  type Rank,
  type HoleCards,
  SUITS,
  RANKS,
  RANK_SYMBOLS,
  GameType,
  Position,
  type PlayerState,
  Street,
  TrainingTopic,
  DifficultyLevel,
  TextStyle,
  type TopicSelector,
  type TrainingRequest,
  type TableSetup,
  type AnswerOption,
  type TrainingScenario,
  TrainingErrorCode,
  TrainingError,
  type RngFn,
  assertNever,
} from './types.js';

export {
  cardToString,
  cardsEqual,
  handToString,
  boardToString,
  POSITION_NAMES,
  GAME_TYPE_NAMES,
  isLatePosition,
  type TopicInfo,
  TOPIC_INFO,
  ALL_TOPICS,
  ALL_STREETS,
  ALL_DIFFICULTIES,
  topicsForStreet,
  streetOfTopic,
  isTrainingTopic,
  isStreet,
  isDifficultyLevel,
  isTextStyle,
  type TrainingRequestOptions,
  createTrainingRequest,
} from './models.js';

export { createSeededRng, createEntropyRng, foldSeed, randInt, randBool, randU32 } from './rng.js';
export { createDeck, shuffleDeck, Deck } from './deck.js';
export {
  HandCategory,
  classifyHand,
  BoardTexture,
  boardHasFlushDraw,
  boardHasStraightDraw,
  boardTexture,
  DrawType,
  classifyDraw,
  drawEquity,
  requiredEquity,
  heroHasFlushDraw,
  heroHasStraightDraw,
  TurnCardType,
  classifyTurnCard,
  BarrelTurnType,
  classifyBarrelTurn,
  HandStrength,
  classifyTurnStrength,
} from './evaluate.js';
export { generateTraining, resolveTopic, makeScenarioId, topicPrefix } from './generator.js';
export {
  toClientTableState,
  toClientCard,
  gameStateFor,
  type ClientTableState,
  type ClientSeat,
  type ClientCard,
  type ClientGameState,
} from './client-table-state.js';
