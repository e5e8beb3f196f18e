// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { createPool, withTransaction, isUniqueViolation } from './postgres/pool.js';
export type { Queryable, TransactionalPool } from './postgres/pool.js';
export { ensureSchema, SCHEMA_SQL } from './postgres/schema.js';
export { PgScenarioRepository } from './postgres/scenario.repository.js';
export { PgTaskRepository } from './postgres/task.repository.js';
export { PgRecordStore } from './postgres/record-store.js';

// ─── In-memory Adapter ────────────────────────────────────────────────────────
export { InMemoryRecordStore } from './memory/memory-record-store.js';

// ─── Clock ────────────────────────────────────────────────────────────────────
export { DeterministicClock, SystemClock } from './clock/deterministic-clock.js';
