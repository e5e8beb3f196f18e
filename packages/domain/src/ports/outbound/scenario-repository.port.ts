import type { Scenario, ScenarioPatch } from '../../entities/scenario.js';

export interface ScenarioRepositoryPort {
  /** Throws `DuplicateKeyError` when the id is taken. */
  insert(scenario: Scenario): Promise<Scenario>;
  findById(id: string): Promise<Scenario | null>;
  /** Applies the whole patch atomically. Throws `RecordNotFoundError` for an unknown id. */
  update(id: string, patch: ScenarioPatch): Promise<Scenario>;
  clear(): Promise<void>;
}
