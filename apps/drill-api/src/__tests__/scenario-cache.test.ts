import { describe, it, expect } from 'vitest';
import {
  DifficultyLevel,
  TrainingTopic,
  createTrainingRequest,
  generateTraining,
  type TrainingScenario,
} from '@poker-drills/training-engine';
import { ScenarioCache } from '../scenario-cache.js';

function scenario(seed: number): TrainingScenario {
  return generateTraining(
    createTrainingRequest(TrainingTopic.RiverValueBet, { difficulty: DifficultyLevel.Beginner, rngSeed: seed }),
  );
}

function withId(id: string, branchKey = 'Nuts:Overbet'): TrainingScenario {
  return { ...scenario(1), scenario_id: id, branch_key: branchKey };
}

describe('ScenarioCache', () => {
  it('stores and returns scenarios by id', () => {
    const cache = new ScenarioCache(4);
    const s = scenario(11);
    expect(cache.set(s)).toBeUndefined();
    expect(cache.get(s.scenario_id)).toBe(s);
    expect(cache.get('RV-FFFFFFFF')).toBeUndefined();
    expect(cache.size).toBe(1);
  });

  it('evicts the oldest entry once full', () => {
    const cache = new ScenarioCache(2);
    cache.set(withId('RV-00000001'));
    cache.set(withId('RV-00000002'));
    expect(cache.set(withId('RV-00000003'))).toBe('RV-00000001');
    expect(cache.get('RV-00000001')).toBeUndefined();
    expect(cache.get('RV-00000002')).toBeDefined();
    expect(cache.get('RV-00000003')).toBeDefined();
    expect(cache.size).toBe(2);
  });

  it('replaces an existing id in place without evicting', () => {
    const cache = new ScenarioCache(2);
    cache.set(withId('RV-00000001'));
    cache.set(withId('RV-00000002'));
    expect(cache.set(withId('RV-00000001', 'Medium:Check'))).toBeUndefined();
    expect(cache.get('RV-00000001')?.branch_key).toBe('Medium:Check');
    expect(cache.size).toBe(2);

    // Insertion order is kept, so 0001 is still the oldest.
    expect(cache.set(withId('RV-00000003'))).toBe('RV-00000001');
  });

  it('clears', () => {
    const cache = new ScenarioCache();
    cache.set(scenario(5));
    cache.clear();
    expect(cache.size).toBe(0);
  });

  it.each([0, -1, 1.5, Number.NaN])('rejects capacity %s', (capacity) => {
    expect(() => new ScenarioCache(capacity)).toThrow(RangeError);
  });
});
