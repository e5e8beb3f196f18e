import {
  DuplicateKeyError,
  RecordNotFoundError,
} from '@scenario-runner/domain';
import type { Task, TaskPatch, TaskRepositoryPort } from '@scenario-runner/domain';
import { isUniqueViolation } from './pool.js';
import type { Queryable } from './pool.js';
import { mapTaskRow } from './rows.js';

export class PgTaskRepository implements TaskRepositoryPort {
  constructor(private readonly db: Queryable) {}

  async insert(task: Task): Promise<Task> {
    try {
      const { rows } = await this.db.query(
        `INSERT INTO scenario_tasks
           (task_id, scenario_id, status, error, created_at, started_at, finished_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING *`,
        [
          task.taskId,
          task.scenarioId,
          task.status,
          task.error,
          task.createdAt,
          task.startedAt,
          task.finishedAt,
        ],
      );
      return mapTaskRow(rows[0]);
    } catch (err) {
      if (isUniqueViolation(err)) throw new DuplicateKeyError('task', task.taskId);
      throw err;
    }
  }

  async findById(taskId: string): Promise<Task | null> {
    const { rows } = await this.db.query(`SELECT * FROM scenario_tasks WHERE task_id = $1`, [
      taskId,
    ]);
    return rows[0] ? mapTaskRow(rows[0]) : null;
  }

  async findByScenario(scenarioId: string): Promise<Task[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM scenario_tasks
       WHERE scenario_id = $1
       ORDER BY created_at ASC, task_id ASC`,
      [scenarioId],
    );
    return rows.map(mapTaskRow);
  }

  async update(taskId: string, patch: TaskPatch): Promise<Task> {
    const sets: string[] = [];
    const params: unknown[] = [taskId];
    let idx = 2;

    if (patch.status !== undefined) {
      sets.push(`status = $${idx++}`);
      params.push(patch.status);
    }
    if (patch.error !== undefined) {
      sets.push(`error = $${idx++}`);
      params.push(patch.error);
    }
    if (patch.startedAt !== undefined) {
      sets.push(`started_at = $${idx++}`);
      params.push(patch.startedAt);
    }
    if (patch.finishedAt !== undefined) {
      sets.push(`finished_at = $${idx++}`);
      params.push(patch.finishedAt);
    }

    const { rows } =
      sets.length > 0
        ? await this.db.query(
            `UPDATE scenario_tasks SET ${sets.join(', ')} WHERE task_id = $1 RETURNING *`,
            params,
          )
        : await this.db.query(`SELECT * FROM scenario_tasks WHERE task_id = $1`, params);
    if (!rows[0]) throw new RecordNotFoundError('task', taskId);
    return mapTaskRow(rows[0]);
  }

  async clear(): Promise<void> {
    await this.db.query(`DELETE FROM scenario_tasks`);
  }
}
