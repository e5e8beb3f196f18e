import { randomUUID } from 'node:crypto';
import {
  ConflictError,
  NotFoundError,
  RecordNotFoundError,
  assertTransition,
  fail,
  succeed,
} from '@scenario-runner/domain';
import type {
  ClockPort,
  Outcome,
  RecordStorePort,
  Task,
  TaskCommandPort,
  TaskPatch,
} from '@scenario-runner/domain';

export class TaskService implements TaskCommandPort {
  constructor(
    private readonly store: RecordStorePort,
    private readonly clock: ClockPort,
  ) {}

  /**
   * Reserves a new pending task. At most one task may be active per scenario,
   * and a scenario that has left `pending` can never be run again.
   */
  async create(scenarioId: string): Promise<Outcome<Task, NotFoundError | ConflictError>> {
    const reservation = await this.store.reserveRun({
      taskId: randomUUID(),
      scenarioId,
      status: 'pending',
      error: null,
      createdAt: this.clock.now(),
      startedAt: null,
      finishedAt: null,
    });

    switch (reservation.kind) {
      case 'reserved':
        return succeed(reservation.task);
      case 'scenario_missing':
        return fail(new NotFoundError('scenario', scenarioId));
      case 'blocked':
        return fail(new ConflictError(scenarioId, reservation.status));
    }
  }

  async get(taskId: string): Promise<Outcome<Task, NotFoundError>> {
    const task = await this.store.tasks.findById(taskId);
    return task ? succeed(task) : fail(new NotFoundError('task', taskId));
  }

  async update(taskId: string, patch: TaskPatch): Promise<Outcome<Task, NotFoundError>> {
    if (patch.status !== undefined) {
      const current = await this.store.tasks.findById(taskId);
      if (!current) return fail(new NotFoundError('task', taskId));
      assertTransition('task', taskId, current.status, patch.status);
    }

    try {
      return succeed(await this.store.tasks.update(taskId, patch));
    } catch (err) {
      if (err instanceof RecordNotFoundError) return fail(new NotFoundError('task', taskId));
      throw err;
    }
  }

  async listForScenario(scenarioId: string): Promise<Outcome<Task[], NotFoundError>> {
    const scenario = await this.store.scenarios.findById(scenarioId);
    if (!scenario) return fail(new NotFoundError('scenario', scenarioId));
    return succeed(await this.store.tasks.findByScenario(scenarioId));
  }
}
