import type { Task, TaskPatch } from '../../entities/task.js';
import type { ConflictError, NotFoundError } from '../../errors.js';
import type { Outcome } from '../../outcome.js';

export interface TaskCommandPort {
  create(scenarioId: string): Promise<Outcome<Task, NotFoundError | ConflictError>>;
  get(taskId: string): Promise<Outcome<Task, NotFoundError>>;
  update(taskId: string, patch: TaskPatch): Promise<Outcome<Task, NotFoundError>>;
  listForScenario(scenarioId: string): Promise<Outcome<Task[], NotFoundError>>;
}
