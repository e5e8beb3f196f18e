import type { Scenario, ScenarioConfig } from '../../entities/scenario.js';
import type { ValidationError } from '../../errors.js';
import type { Outcome } from '../../outcome.js';

export interface CreateScenarioCommand {
  name: string;
  config?: ScenarioConfig | null;
}

export interface ScenarioCommandPort {
  create(cmd: CreateScenarioCommand): Promise<Outcome<Scenario, ValidationError>>;
  /** `null` when no scenario has this id. */
  get(id: string): Promise<Scenario | null>;
}
