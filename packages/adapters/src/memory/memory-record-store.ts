import {
  DuplicateKeyError,
  RecordNotFoundError,
  isActiveStatus,
} from '@scenario-runner/domain';
import type {
  RecordStorePort,
  RunReservation,
  Scenario,
  ScenarioPatch,
  ScenarioRepositoryPort,
  Task,
  TaskPatch,
  TaskRepositoryPort,
} from '@scenario-runner/domain';

/**
 * Records are cloned on the way in and out so callers never hold a reference
 * into the store.
 */
class MemoryTable<T extends object> {
  private readonly rows = new Map<string, T>();

  constructor(private readonly entity: string) {}

  has(id: string): boolean {
    return this.rows.has(id);
  }

  insert(id: string, record: T): T {
    if (this.rows.has(id)) throw new DuplicateKeyError(this.entity, id);
    this.rows.set(id, structuredClone(record));
    return structuredClone(record);
  }

  get(id: string): T | null {
    const row = this.rows.get(id);
    return row ? structuredClone(row) : null;
  }

  patch(id: string, patch: Partial<T>): T {
    const row = this.rows.get(id);
    if (!row) throw new RecordNotFoundError(this.entity, id);
    const next = { ...row };
    for (const [key, value] of Object.entries(patch)) {
      if (value !== undefined) Reflect.set(next, key, value);
    }
    this.rows.set(id, structuredClone(next));
    return structuredClone(next);
  }

  values(): T[] {
    return [...this.rows.values()].map((row) => structuredClone(row));
  }

  clear(): void {
    this.rows.clear();
  }
}

class MemoryScenarioRepository implements ScenarioRepositoryPort {
  constructor(private readonly table: MemoryTable<Scenario>) {}

  async insert(scenario: Scenario): Promise<Scenario> {
    return this.table.insert(scenario.id, scenario);
  }

  async findById(id: string): Promise<Scenario | null> {
    return this.table.get(id);
  }

  async update(id: string, patch: ScenarioPatch): Promise<Scenario> {
    return this.table.patch(id, patch);
  }

  async clear(): Promise<void> {
    this.table.clear();
  }
}

class MemoryTaskRepository implements TaskRepositoryPort {
  constructor(private readonly table: MemoryTable<Task>) {}

  async insert(task: Task): Promise<Task> {
    return this.table.insert(task.taskId, task);
  }

  async findById(taskId: string): Promise<Task | null> {
    return this.table.get(taskId);
  }

  async findByScenario(scenarioId: string): Promise<Task[]> {
    // Map iteration follows insertion order, i.e. creation order.
    return this.table.values().filter((task) => task.scenarioId === scenarioId);
  }

  async update(taskId: string, patch: TaskPatch): Promise<Task> {
    return this.table.patch(taskId, patch);
  }

  async clear(): Promise<void> {
    this.table.clear();
  }
}

/** Process-local store for tests, the CLI and single-instance runs. */
export class InMemoryRecordStore implements RecordStorePort {
  private readonly scenarioTable = new MemoryTable<Scenario>('scenario');
  private readonly taskTable = new MemoryTable<Task>('task');

  readonly scenarios: ScenarioRepositoryPort = new MemoryScenarioRepository(this.scenarioTable);
  readonly tasks: TaskRepositoryPort = new MemoryTaskRepository(this.taskTable);

  // No await between check and insert, so no other caller can interleave.
  async reserveRun(task: Task): Promise<RunReservation> {
    const scenario = this.scenarioTable.get(task.scenarioId);
    if (!scenario) return { kind: 'scenario_missing' };
    if (scenario.status !== 'pending') return { kind: 'blocked', status: scenario.status };

    const active = this.taskTable
      .values()
      .find((t) => t.scenarioId === task.scenarioId && isActiveStatus(t.status));
    if (active) return { kind: 'blocked', status: active.status, activeTaskId: active.taskId };

    return { kind: 'reserved', task: this.taskTable.insert(task.taskId, task) };
  }

  async init(): Promise<void> {}

  async close(): Promise<void> {}
}
