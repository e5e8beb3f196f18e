import type { Scenario, Task } from '@scenario-runner/domain';

/** snake_case wire shapes shared by the HTTP API and the CLI. */

export interface ScenarioResponse {
  id: string;
  name: string;
  config: Scenario['config'];
  status: Scenario['status'];
  result: Scenario['result'];
  created_at: string;
  started_at: string | null;
  finished_at: string | null;
}

export interface TaskResponse {
  task_id: string;
  scenario_id: string;
  status: Task['status'];
  error: string | null;
  created_at: string;
  started_at: string | null;
  finished_at: string | null;
}

export type TaskSummaryResponse = Pick<TaskResponse, 'task_id' | 'scenario_id' | 'status'>;

function iso(ts: Date | null): string | null {
  return ts ? ts.toISOString() : null;
}

export function serializeScenario(scenario: Scenario): ScenarioResponse {
  return {
    id: scenario.id,
    name: scenario.name,
    config: scenario.config,
    status: scenario.status,
    result: scenario.result,
    created_at: scenario.createdAt.toISOString(),
    started_at: iso(scenario.startedAt),
    finished_at: iso(scenario.finishedAt),
  };
}

export function serializeTask(task: Task): TaskResponse {
  return {
    task_id: task.taskId,
    scenario_id: task.scenarioId,
    status: task.status,
    error: task.error,
    created_at: task.createdAt.toISOString(),
    started_at: iso(task.startedAt),
    finished_at: iso(task.finishedAt),
  };
}

export function serializeTaskSummary(task: Task): TaskSummaryResponse {
  return { task_id: task.taskId, scenario_id: task.scenarioId, status: task.status };
}
