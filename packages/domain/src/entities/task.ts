import type { ExecutionStatus } from './execution-status.js';

/** One execution attempt of a scenario. */
export interface Task {
  readonly taskId: string;
  readonly scenarioId: string;
  readonly status: ExecutionStatus;
  readonly error: string | null;
  readonly createdAt: Date;
  readonly startedAt: Date | null;
  readonly finishedAt: Date | null;
}

export type TaskPatch = Partial<Pick<Task, 'status' | 'error' | 'startedAt' | 'finishedAt'>>;

export interface RunRequest {
  readonly taskId: string;
  readonly scenarioId: string;
}
