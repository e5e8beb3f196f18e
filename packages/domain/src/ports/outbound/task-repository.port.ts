import type { Task, TaskPatch } from '../../entities/task.js';

export interface TaskRepositoryPort {
  /** Throws `DuplicateKeyError` when the task id is taken. */
  insert(task: Task): Promise<Task>;
  findById(taskId: string): Promise<Task | null>;
  /** Oldest first. */
  findByScenario(scenarioId: string): Promise<Task[]>;
  /** Applies the whole patch atomically. Throws `RecordNotFoundError` for an unknown id. */
  update(taskId: string, patch: TaskPatch): Promise<Task>;
  clear(): Promise<void>;
}
