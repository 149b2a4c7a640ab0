import type { TrainingScenario } from '@poker-drills/training-engine';

/**
 * Served scenarios keyed by id, kept so a later answer can be graded.
 * Bounded; once full, the oldest inserted id is evicted first.
 */
export class ScenarioCache {
  private readonly entries = new Map<string, TrainingScenario>();
  private readonly capacity: number;

  constructor(capacity = 1000) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get(scenarioId: string): TrainingScenario | undefined {
    return this.entries.get(scenarioId);
  }

  /**
   * Store a scenario. Returns the evicted id when room had to be made.
   * Re-storing an existing id replaces it in place.
   */
  set(scenario: TrainingScenario): string | undefined {
    const id = scenario.scenario_id;
    let evicted: string | undefined;
    if (!this.entries.has(id) && this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        evicted = oldest.value;
        this.entries.delete(oldest.value);
      }
    }
    this.entries.set(id, scenario);
    return evicted;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
