import type { Queryable } from './pool.js';

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS scenarios (
  id           TEXT PRIMARY KEY,
  name         TEXT NOT NULL CHECK (length(name) > 0),
  config       JSONB,
  status       TEXT NOT NULL CHECK (status IN ('pending', 'running', 'finished', 'failed')),
  result       JSONB,
  created_at   TIMESTAMPTZ NOT NULL,
  started_at   TIMESTAMPTZ,
  finished_at  TIMESTAMPTZ
);

CREATE TABLE IF NOT EXISTS scenario_tasks (
  task_id      TEXT PRIMARY KEY,
  scenario_id  TEXT NOT NULL,
  status       TEXT NOT NULL CHECK (status IN ('pending', 'running', 'finished', 'failed')),
  error        TEXT,
  created_at   TIMESTAMPTZ NOT NULL,
  started_at   TIMESTAMPTZ,
  finished_at  TIMESTAMPTZ
);

CREATE INDEX IF NOT EXISTS scenario_tasks_scenario_idx
  ON scenario_tasks (scenario_id, created_at);
`;

/** Idempotent; safe to run on every start. */
export async function ensureSchema(db: Queryable): Promise<void> {
  await db.query(SCHEMA_SQL);
}
