import type { FastifyInstance } from 'fastify';
import {
  ALL_DIFFICULTIES,
  ALL_STREETS,
  ALL_TOPICS,
  TOPIC_INFO,
  TextStyle,
  type TopicSelector,
  TrainingError,
  type TrainingScenario,
  generateTraining,
  isDifficultyLevel,
  isStreet,
  isTrainingTopic,
  toClientTableState,
} from '@poker-drills/training-engine';
import { logger } from './logger.js';
import { ScenarioCache } from './scenario-cache.js';
import { AnswerBodySchema, ScenarioQuerySchema, formatZodError } from './schemas.js';

export interface DrillRouteDeps {
  cache?: ScenarioCache;
  /** Player id the client table renders as the viewer. */
  heroPlayerId?: number;
}

function parseTopic(value: string): TopicSelector | undefined {
  if (isTrainingTopic(value)) return { kind: 'topic', topic: value };
  if (isStreet(value)) return { kind: 'street', street: value };
  return undefined;
}

export function registerRoutes(app: FastifyInstance, deps: DrillRouteDeps = {}): void {
  const cache = deps.cache ?? new ScenarioCache();
  const heroPlayerId = deps.heroPlayerId ?? 1;

  // Liveness probe
  app.get('/healthz', async () => ({ status: 'ok' }));

  // ── Catalogue ─────────────────────────────────────────

  app.get('/api/drill/topics', async () => ({
    topics: ALL_TOPICS.map((topic) => ({
      id: topic,
      name: TOPIC_INFO[topic].name,
      prefix: TOPIC_INFO[topic].prefix,
      street: TOPIC_INFO[topic].street,
    })),
    streets: ALL_STREETS,
    difficulties: ALL_DIFFICULTIES,
    styles: Object.values(TextStyle),
  }));

  // ── Scenario ──────────────────────────────────────────

  app.get('/api/drill/scenario', async (req, reply) => {
    const parseResult = ScenarioQuerySchema.safeParse(req.query);
    if (!parseResult.success) {
      return reply.status(400).send(formatZodError(parseResult.error));
    }
    const query = parseResult.data;

    const topic = parseTopic(query.topic);
    if (!topic) return reply.status(400).send({ error: `Unknown topic: ${query.topic}` });
    if (!isDifficultyLevel(query.difficulty)) {
      return reply.status(400).send({ error: `Unknown difficulty: ${query.difficulty}` });
    }

    let scenario: TrainingScenario;
    try {
      scenario = generateTraining({
        topic,
        difficulty: query.difficulty,
        textStyle: query.style,
        ...(query.seed !== undefined ? { rngSeed: query.seed } : {}),
      });
    } catch (err) {
      if (err instanceof TrainingError) {
        return reply.status(400).send({ error: err.message, code: err.code });
      }
      throw err;
    }

    const evicted = cache.set(scenario);
    if (evicted) logger.warn({ evicted, size: cache.size }, 'Scenario cache full, evicted oldest');
    logger.debug(
      { scenarioId: scenario.scenario_id, topic: scenario.topic, branchKey: scenario.branch_key },
      'Scenario generated',
    );

    return {
      table_state: toClientTableState(scenario, heroPlayerId),
      drill: {
        scenario_id: scenario.scenario_id,
        topic: scenario.topic,
        topic_name: TOPIC_INFO[scenario.topic].name,
        branch_key: scenario.branch_key,
        question: scenario.question,
        answers: scenario.answers.map(({ id, text }) => ({ id, text })),
      },
    };
  });

  // ── Answer ────────────────────────────────────────────

  app.post('/api/drill/answer', async (req, reply) => {
    const parseResult = AnswerBodySchema.safeParse(req.body);
    if (!parseResult.success) {
      return reply.status(400).send(formatZodError(parseResult.error));
    }
    const body = parseResult.data;

    const scenario = cache.get(body.scenario_id);
    if (!scenario) return reply.status(404).send({ error: 'Scenario not found or expired' });

    const chosen = scenario.answers.find((a) => a.id === body.answer_id);
    if (!chosen) return reply.status(400).send({ error: `Unknown answer_id: ${body.answer_id}` });
    const correct = scenario.answers.find((a) => a.is_correct);

    logger.info(
      { scenarioId: scenario.scenario_id, answerId: chosen.id, isCorrect: chosen.is_correct },
      'Answer submitted',
    );

    return {
      is_correct: chosen.is_correct,
      explanation: chosen.explanation,
      correct_id: correct?.id ?? '',
    };
  });
}
