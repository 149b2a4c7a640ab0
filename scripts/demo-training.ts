/**
 * Demo: prints generated drills for every topic plus a few street picks.
 * Each scenario shows the table, the question and the answers with the
 * correct one marked.
 *
 * Usage: npx tsx scripts/demo-training.ts
 */

import {
  ALL_TOPICS,
  DifficultyLevel,
  GAME_TYPE_NAMES,
  POSITION_NAMES,
  Street,
  TOPIC_INFO,
  TextStyle,
  type TrainingScenario,
  TrainingTopic,
  boardToString,
  createTrainingRequest,
  generateTraining,
  handToString,
} from '@poker-drills/training-engine';

function printScenario(scenario: TrainingScenario): void {
  const setup = scenario.table_setup;
  const info = TOPIC_INFO[scenario.topic];
  console.log(`\n[${scenario.scenario_id}] ${info.name}  (${scenario.branch_key})`);
  console.log(
    `  ${GAME_TYPE_NAMES[setup.game_type]} | hero ${POSITION_NAMES[setup.hero_position]} | ` +
      `hand ${handToString(setup.hero_hand)} | board ${setup.board.length > 0 ? boardToString(setup.board) : '-'}`,
  );
  console.log(`  pot ${setup.pot_size} | to call ${setup.current_bet}`);
  for (const p of setup.players) {
    console.log(`    seat ${p.seat} ${POSITION_NAMES[p.position]}${p.is_hero ? ' (hero)' : ''}: ${p.stack}`);
  }
  console.log(`  Q: ${scenario.question}`);
  for (const a of scenario.answers) {
    console.log(`   ${a.is_correct ? '*' : ' '} ${a.id}) ${a.text}`);
  }
  const correct = scenario.answers.find((a) => a.is_correct);
  if (correct) console.log(`  -> ${correct.explanation}`);
}

function section(title: string): void {
  console.log(`\n${'═'.repeat(64)}\n${title}\n${'═'.repeat(64)}`);
}

// ── Simple vs Technical ─────────────────────────────────────
section('BluffSpot, seed 4004: Simple vs Technical');
for (const textStyle of [TextStyle.Simple, TextStyle.Technical]) {
  printScenario(
    generateTraining(
      createTrainingRequest(TrainingTopic.BluffSpot, {
        difficulty: DifficultyLevel.Intermediate,
        rngSeed: 4004,
        textStyle,
      }),
    ),
  );
}

// ── One per topic ───────────────────────────────────────────
section('Every topic');
ALL_TOPICS.forEach((topic, i) => {
  // 1001, 2002 .. 9009, then 1010, 1111 .. 1616
  const n = i + 1;
  const seed = n < 10 ? n * 1001 : n * 101;
  printScenario(generateTraining(createTrainingRequest(topic, { difficulty: DifficultyLevel.Intermediate, rngSeed: seed })));
});

// ── Street selectors ────────────────────────────────────────
section('Random topic per street');
[Street.Preflop, Street.Flop, Street.Turn, Street.River].forEach((street, i) => {
  printScenario(
    generateTraining(
      createTrainingRequest(street, {
        difficulty: DifficultyLevel.Advanced,
        rngSeed: 7001 + i,
        textStyle: TextStyle.Technical,
      }),
    ),
  );
});
