import {
  DuplicateKeyError,
  RecordNotFoundError,
} from '@scenario-runner/domain';
import type {
  Scenario,
  ScenarioPatch,
  ScenarioRepositoryPort,
} from '@scenario-runner/domain';
import { isUniqueViolation } from './pool.js';
import type { Queryable } from './pool.js';
import { mapScenarioRow } from './rows.js';

export class PgScenarioRepository implements ScenarioRepositoryPort {
  constructor(private readonly db: Queryable) {}

  async insert(scenario: Scenario): Promise<Scenario> {
    try {
      const { rows } = await this.db.query(
        `INSERT INTO scenarios
           (id, name, config, status, result, created_at, started_at, finished_at)
         VALUES ($1, $2, $3::jsonb, $4, $5::jsonb, $6, $7, $8)
         RETURNING *`,
        [
          scenario.id,
          scenario.name,
          toJsonb(scenario.config),
          scenario.status,
          toJsonb(scenario.result),
          scenario.createdAt,
          scenario.startedAt,
          scenario.finishedAt,
        ],
      );
      return mapScenarioRow(rows[0]);
    } catch (err) {
      if (isUniqueViolation(err)) throw new DuplicateKeyError('scenario', scenario.id);
      throw err;
    }
  }

  async findById(id: string): Promise<Scenario | null> {
    const { rows } = await this.db.query(`SELECT * FROM scenarios WHERE id = $1`, [id]);
    return rows[0] ? mapScenarioRow(rows[0]) : null;
  }

  async update(id: string, patch: ScenarioPatch): Promise<Scenario> {
    const sets: string[] = [];
    const params: unknown[] = [id];
    let idx = 2;

    if (patch.status !== undefined) {
      sets.push(`status = $${idx++}`);
      params.push(patch.status);
    }
    if (patch.result !== undefined) {
      sets.push(`result = $${idx++}::jsonb`);
      params.push(toJsonb(patch.result));
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
            `UPDATE scenarios SET ${sets.join(', ')} WHERE id = $1 RETURNING *`,
            params,
          )
        : await this.db.query(`SELECT * FROM scenarios WHERE id = $1`, params);
    if (!rows[0]) throw new RecordNotFoundError('scenario', id);
    return mapScenarioRow(rows[0]);
  }

  async clear(): Promise<void> {
    await this.db.query(`DELETE FROM scenarios`);
  }
}

function toJsonb(value: object | null): string | null {
  return value === null ? null : JSON.stringify(value);
}
