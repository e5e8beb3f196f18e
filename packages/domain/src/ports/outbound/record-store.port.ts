import type { ExecutionStatus } from '../../entities/execution-status.js';
import type { Task } from '../../entities/task.js';
import type { ScenarioRepositoryPort } from './scenario-repository.port.js';
import type { TaskRepositoryPort } from './task-repository.port.js';

export type RunReservation =
  | { readonly kind: 'reserved'; readonly task: Task }
  | { readonly kind: 'scenario_missing' }
  | {
      readonly kind: 'blocked';
      /** Status of the scenario, or of the active task holding it. */
      readonly status: ExecutionStatus;
      readonly activeTaskId?: string;
    };

export interface RecordStorePort {
  readonly scenarios: ScenarioRepositoryPort;
  readonly tasks: TaskRepositoryPort;

  /**
   * Inserts `task` only if its scenario exists, is still pending and has no
   * pending or running task. Check and insert happen as one atomic step.
   */
  reserveRun(task: Task): Promise<RunReservation>;

  init(): Promise<void>;
  close(): Promise<void>;
}
