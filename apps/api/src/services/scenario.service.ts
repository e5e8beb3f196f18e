import { randomUUID } from 'node:crypto';
import { setTimeout as sleep } from 'node:timers/promises';
import {
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
  assertTransition,
  isActiveStatus,
  fail,
  succeed,
} from '@scenario-runner/domain';
import type {
  ClockPort,
  CreateScenarioCommand,
  ExecutionStatus,
  Outcome,
  RecordStorePort,
  Scenario,
  ScenarioCommandPort,
  ScenarioConfig,
  ScenarioPatch,
  ScenarioResult,
} from '@scenario-runner/domain';

export const PLACEHOLDER_SUMMARY = 'demo result';

export interface ScenarioServiceOptions {
  /** Simulated work inside `executePlaceholder`. */
  executionDelayMs: number;
}

export class ScenarioService implements ScenarioCommandPort {
  constructor(
    private readonly store: RecordStorePort,
    private readonly clock: ClockPort,
    private readonly options: ScenarioServiceOptions,
  ) {}

  async create(cmd: CreateScenarioCommand): Promise<Outcome<Scenario, ValidationError>> {
    if (cmd.name.trim().length === 0) {
      return fail(new ValidationError('scenario name must not be empty'));
    }

    const scenario = await this.store.scenarios.insert({
      id: randomUUID(),
      name: cmd.name,
      config: cmd.config ?? null,
      status: 'pending',
      result: null,
      createdAt: this.clock.now(),
      startedAt: null,
      finishedAt: null,
    });
    return succeed(scenario);
  }

  async get(id: string): Promise<Scenario | null> {
    return this.store.scenarios.findById(id);
  }

  /**
   * Stand-in for real scenario work: waits a fixed delay, then echoes the
   * configuration back under a static summary.
   */
  async executePlaceholder(_name: string, config: ScenarioConfig | null): Promise<ScenarioResult> {
    await sleep(this.options.executionDelayMs);
    return { summary: PLACEHOLDER_SUMMARY, input_config: config ?? {} };
  }

  async markRunning(id: string): Promise<Scenario> {
    return this.transition(id, 'running', { startedAt: this.clock.now() });
  }

  async markFinished(id: string, result: ScenarioResult): Promise<Scenario> {
    return this.transition(id, 'finished', { result, finishedAt: this.clock.now() });
  }

  async markFailed(id: string): Promise<Scenario> {
    return this.transition(id, 'failed', { finishedAt: this.clock.now() });
  }

  /**
   * Fails a scenario whose run broke off, whether or not it reached `running`.
   * Only the coordinator's failure path uses this; terminal scenarios are refused.
   */
  async abort(id: string): Promise<Scenario> {
    const current = await this.store.scenarios.findById(id);
    if (!current) throw new NotFoundError('scenario', id);
    if (!isActiveStatus(current.status)) {
      throw new InvalidTransitionError('scenario', id, current.status, 'failed');
    }
    return this.store.scenarios.update(id, { status: 'failed', finishedAt: this.clock.now() });
  }

  private async transition(
    id: string,
    to: ExecutionStatus,
    patch: Omit<ScenarioPatch, 'status'>,
  ): Promise<Scenario> {
    const current = await this.store.scenarios.findById(id);
    if (!current) throw new NotFoundError('scenario', id);
    assertTransition('scenario', id, current.status, to);
    return this.store.scenarios.update(id, { ...patch, status: to });
  }
}
