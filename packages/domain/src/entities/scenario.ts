import type { ExecutionStatus } from './execution-status.js';

export type ScenarioConfig = Record<string, unknown>;

/** Result document of the placeholder run, stored and served as-is. */
export interface ScenarioResult {
  readonly summary: string;
  readonly input_config: ScenarioConfig;
}

export interface Scenario {
  readonly id: string;
  readonly name: string;
  readonly config: ScenarioConfig | null;
  readonly status: ExecutionStatus;
  readonly result: ScenarioResult | null;
  readonly createdAt: Date;
  readonly startedAt: Date | null;
  readonly finishedAt: Date | null;
}

/** Fields the execution flow may change; name and config are fixed at creation. */
export type ScenarioPatch = Partial<
  Pick<Scenario, 'status' | 'result' | 'startedAt' | 'finishedAt'>
>;
