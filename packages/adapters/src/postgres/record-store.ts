import type {
  RecordStorePort,
  RunReservation,
  Task,
} from '@scenario-runner/domain';
import { withTransaction } from './pool.js';
import type { TransactionalPool } from './pool.js';
import { activeTaskRowSchema, statusRowSchema } from './rows.js';
import { PgScenarioRepository } from './scenario.repository.js';
import { PgTaskRepository } from './task.repository.js';
import { ensureSchema } from './schema.js';

export class PgRecordStore implements RecordStorePort {
  readonly scenarios: PgScenarioRepository;
  readonly tasks: PgTaskRepository;

  constructor(private readonly pool: TransactionalPool) {
    this.scenarios = new PgScenarioRepository(pool);
    this.tasks = new PgTaskRepository(pool);
  }

  async init(): Promise<void> {
    await ensureSchema(this.pool);
  }

  /**
   * The scenario row lock serializes concurrent reservations for the same
   * scenario until this transaction commits.
   */
  async reserveRun(task: Task): Promise<RunReservation> {
    return withTransaction(this.pool, async (client): Promise<RunReservation> => {
      const scenarioRes = await client.query(
        `SELECT status FROM scenarios WHERE id = $1 FOR UPDATE`,
        [task.scenarioId],
      );
      if (!scenarioRes.rows[0]) return { kind: 'scenario_missing' };

      const { status } = statusRowSchema.parse(scenarioRes.rows[0]);
      if (status !== 'pending') return { kind: 'blocked', status };

      const activeRes = await client.query(
        `SELECT task_id, status FROM scenario_tasks
         WHERE scenario_id = $1 AND status IN ('pending', 'running')
         ORDER BY created_at ASC
         LIMIT 1`,
        [task.scenarioId],
      );
      if (activeRes.rows[0]) {
        const active = activeTaskRowSchema.parse(activeRes.rows[0]);
        return { kind: 'blocked', status: active.status, activeTaskId: active.task_id };
      }

      const created = await new PgTaskRepository(client).insert(task);
      return { kind: 'reserved', task: created };
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
