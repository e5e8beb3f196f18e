import { z } from 'zod';
import type { Scenario, Task } from '@scenario-runner/domain';

const statusSchema = z.enum(['pending', 'running', 'finished', 'failed']);

const documentSchema = z.record(z.unknown());
const timestampSchema = z.coerce.date();

const scenarioRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  config: documentSchema.nullable(),
  status: statusSchema,
  result: z.object({ summary: z.string(), input_config: documentSchema }).nullable(),
  created_at: timestampSchema,
  started_at: timestampSchema.nullable(),
  finished_at: timestampSchema.nullable(),
});

const taskRowSchema = z.object({
  task_id: z.string(),
  scenario_id: z.string(),
  status: statusSchema,
  error: z.string().nullable(),
  created_at: timestampSchema,
  started_at: timestampSchema.nullable(),
  finished_at: timestampSchema.nullable(),
});

export const statusRowSchema = z.object({ status: statusSchema });
export const activeTaskRowSchema = z.object({ task_id: z.string(), status: statusSchema });

export function mapScenarioRow(row: unknown): Scenario {
  const r = scenarioRowSchema.parse(row);
  return {
    id: r.id,
    name: r.name,
    config: r.config,
    status: r.status,
    result: r.result,
    createdAt: r.created_at,
    startedAt: r.started_at,
    finishedAt: r.finished_at,
  };
}

export function mapTaskRow(row: unknown): Task {
  const r = taskRowSchema.parse(row);
  return {
    taskId: r.task_id,
    scenarioId: r.scenario_id,
    status: r.status,
    error: r.error,
    createdAt: r.created_at,
    startedAt: r.started_at,
    finishedAt: r.finished_at,
  };
}
