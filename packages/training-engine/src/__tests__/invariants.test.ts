import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { generateTraining } from '../generator.js';
import { ALL_DIFFICULTIES, ALL_STREETS, ALL_TOPICS, TOPIC_INFO, cardToString, topicsForStreet } from '../models.js';
import { DifficultyLevel, GameType, Street, TextStyle, type TrainingScenario, TrainingTopic } from '../types.js';

// ── Arbitraries ──────────────────────────────────────────────

const arbSeed = fc.bigInt({ min: 0n, max: (1n << 64n) - 1n });
const arbTopic = fc.constantFrom(...ALL_TOPICS);
const arbStreet = fc.constantFrom(...ALL_STREETS);
const arbDifficulty = fc.constantFrom(...ALL_DIFFICULTIES);
const arbStyle = fc.constantFrom(TextStyle.Simple, TextStyle.Technical);

const BOARD_LENGTH: Record<Street, number> = {
  [Street.Preflop]: 0,
  [Street.Flop]: 3,
  [Street.Turn]: 4,
  [Street.River]: 5,
};

const ANSWER_COUNT: Record<TrainingTopic, number> = {
  [TrainingTopic.PreflopDecision]: 3,
  [TrainingTopic.PostflopContinuationBet]: 4,
  [TrainingTopic.PotOddsAndEquity]: 2,
  [TrainingTopic.BluffSpot]: 4,
  [TrainingTopic.ICMAndTournamentDecision]: 2,
  [TrainingTopic.TurnBarrelDecision]: 3,
  [TrainingTopic.CheckRaiseSpot]: 3,
  [TrainingTopic.SemiBluffDecision]: 3,
  [TrainingTopic.AntiLimperIsolation]: 3,
  [TrainingTopic.RiverValueBet]: 4,
  [TrainingTopic.SqueezePlay]: 3,
  [TrainingTopic.BigBlindDefense]: 3,
  [TrainingTopic.ThreeBetPotCbet]: 3,
  [TrainingTopic.RiverCallOrFold]: 3,
  [TrainingTopic.TurnProbeBet]: 3,
  [TrainingTopic.DelayedCbet]: 3,
};

const FACING_A_BET = new Set<TrainingTopic>([
  TrainingTopic.PotOddsAndEquity,
  TrainingTopic.CheckRaiseSpot,
  TrainingTopic.SemiBluffDecision,
  TrainingTopic.AntiLimperIsolation,
  TrainingTopic.SqueezePlay,
  TrainingTopic.BigBlindDefense,
  TrainingTopic.RiverCallOrFold,
]);

const UNOPENED = new Set<TrainingTopic>([
  TrainingTopic.PostflopContinuationBet,
  TrainingTopic.BluffSpot,
  TrainingTopic.ICMAndTournamentDecision,
  TrainingTopic.TurnBarrelDecision,
  TrainingTopic.RiverValueBet,
  TrainingTopic.ThreeBetPotCbet,
  TrainingTopic.TurnProbeBet,
  TrainingTopic.DelayedCbet,
]);

function expectWellFormed(s: TrainingScenario): void {
  const setup = s.table_setup;
  const info = TOPIC_INFO[s.topic];

  // Identity
  expect(s.scenario_id).toMatch(/^[0-9A-Z]{2}-[0-9A-F]{8}$/);
  expect(s.scenario_id.startsWith(`${info.prefix}-`)).toBe(true);
  expect(s.branch_key.length).toBeGreaterThan(0);
  expect(s.question.length).toBeGreaterThan(0);

  // Answers
  expect(s.answers).toHaveLength(ANSWER_COUNT[s.topic]);
  expect(s.answers.map((a) => a.id)).toEqual(['A', 'B', 'C', 'D'].slice(0, s.answers.length));
  expect(s.answers.filter((a) => a.is_correct)).toHaveLength(1);
  for (const a of s.answers) {
    expect(a.text.length).toBeGreaterThan(0);
    expect(a.explanation.length).toBeGreaterThan(0);
  }

  // Cards
  expect(setup.board).toHaveLength(BOARD_LENGTH[info.street]);
  const dealt = [...setup.hero_hand, ...setup.board].map(cardToString);
  expect(new Set(dealt).size).toBe(dealt.length);

  // Table
  expect(setup.game_type).toBe(
    s.topic === TrainingTopic.ICMAndTournamentDecision ? GameType.Tournament : GameType.CashGame,
  );
  const heroes = setup.players.filter((p) => p.is_hero);
  expect(heroes).toHaveLength(1);
  expect(heroes[0]?.position).toBe(setup.hero_position);
  expect(new Set(setup.players.map((p) => p.seat)).size).toBe(setup.players.length);
  for (const p of setup.players) {
    expect(Number.isInteger(p.stack)).toBe(true);
    expect(p.stack).toBeGreaterThan(0);
  }
  expect(Number.isInteger(setup.pot_size)).toBe(true);
  expect(setup.pot_size).toBeGreaterThan(0);
  expect(Number.isInteger(setup.current_bet)).toBe(true);
  if (FACING_A_BET.has(s.topic)) expect(setup.current_bet).toBeGreaterThan(0);
  if (UNOPENED.has(s.topic)) expect(setup.current_bet).toBe(0);
}

// ══════════════════════════════════════════════════════════════
// Property tests across every topic, difficulty, style and seed
// ══════════════════════════════════════════════════════════════

describe('scenario invariants', () => {
  it('every generated scenario is well formed', () => {
    fc.assert(
      fc.property(arbTopic, arbDifficulty, arbStyle, arbSeed, (topic, difficulty, textStyle, rngSeed) => {
        const s = generateTraining({ topic: { kind: 'topic', topic }, difficulty, textStyle, rngSeed });
        expect(s.topic).toBe(topic);
        expectWellFormed(s);
      }),
      { numRuns: 400 },
    );
  });

  it('street selectors stay on their street', () => {
    fc.assert(
      fc.property(arbStreet, arbDifficulty, arbSeed, (street, difficulty, rngSeed) => {
        const s = generateTraining({
          topic: { kind: 'street', street },
          difficulty,
          textStyle: TextStyle.Simple,
          rngSeed,
        });
        expect(topicsForStreet(street)).toContain(s.topic);
        expectWellFormed(s);
      }),
    );
  });

  it('varies the question across seeds', () => {
    for (const topic of ALL_TOPICS) {
      const questions = new Set(
        Array.from({ length: 12 }, (_, i) =>
          generateTraining({
            topic: { kind: 'topic', topic },
            difficulty: DifficultyLevel.Advanced,
            textStyle: TextStyle.Technical,
            rngSeed: 31 * i + 5,
          }).question,
        ),
      );
      expect(questions.size).toBeGreaterThan(1);
    }
  });

  it('is a pure function of the request', () => {
    fc.assert(
      fc.property(arbTopic, arbDifficulty, arbStyle, arbSeed, (topic, difficulty, textStyle, rngSeed) => {
        const request = { topic: { kind: 'topic', topic } as const, difficulty, textStyle, rngSeed };
        expect(generateTraining(request)).toEqual(generateTraining(request));
      }),
      { numRuns: 100 },
    );
  });

  it('only the prose depends on the text style', () => {
    fc.assert(
      fc.property(arbTopic, arbDifficulty, arbSeed, (topic, difficulty, rngSeed) => {
        const base = { topic: { kind: 'topic', topic } as const, difficulty, rngSeed };
        const simple = generateTraining({ ...base, textStyle: TextStyle.Simple });
        const technical = generateTraining({ ...base, textStyle: TextStyle.Technical });

        expect(technical.scenario_id).toBe(simple.scenario_id);
        expect(technical.branch_key).toBe(simple.branch_key);
        expect(technical.table_setup).toEqual(simple.table_setup);
        expect(technical.answers.map(({ id, text, is_correct }) => ({ id, text, is_correct }))).toEqual(
          simple.answers.map(({ id, text, is_correct }) => ({ id, text, is_correct })),
        );
        expect(technical.question).not.toBe(simple.question);
      }),
      { numRuns: 200 },
    );
  });
});
