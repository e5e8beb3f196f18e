import {
  InMemoryRecordStore,
  PgRecordStore,
  SystemClock,
  createPool,
} from '@scenario-runner/adapters';
import type { ClockPort, RecordStorePort, RunDispatcherPort } from '@scenario-runner/domain';
import type { RuntimeConfig, StoreConfig } from './config/runtime.js';
import { ScenarioService } from './services/scenario.service.js';
import { TaskService } from './services/task.service.js';
import { ExecutionCoordinator } from './services/execution/execution-coordinator.js';
import { InProcessRunDispatcher } from './services/execution/run-dispatcher.js';

export interface Runtime {
  store: RecordStorePort;
  clock: ClockPort;
  scenarios: ScenarioService;
  tasks: TaskService;
  coordinator: ExecutionCoordinator;
  dispatcher: RunDispatcherPort;
}

export interface RuntimeOverrides {
  store?: RecordStorePort;
  clock?: ClockPort;
}

export function createStore(config: StoreConfig): RecordStorePort {
  switch (config.driver) {
    case 'postgres':
      return new PgRecordStore(createPool(config.databaseUrl));
    case 'memory':
      return new InMemoryRecordStore();
  }
}

/** Wires services around one record store handle; nothing here is global. */
export function createRuntime(
  config: Pick<RuntimeConfig, 'store' | 'executionDelayMs'>,
  overrides: RuntimeOverrides = {},
): Runtime {
  const store = overrides.store ?? createStore(config.store);
  const clock = overrides.clock ?? new SystemClock();
  const scenarios = new ScenarioService(store, clock, {
    executionDelayMs: config.executionDelayMs,
  });
  const tasks = new TaskService(store, clock);
  const coordinator = new ExecutionCoordinator(scenarios, tasks, clock);
  const dispatcher = new InProcessRunDispatcher((request) => coordinator.execute(request));
  return { store, clock, scenarios, tasks, coordinator, dispatcher };
}

/** Waits for submitted runs, then releases the store. */
export async function shutdownRuntime(runtime: Runtime): Promise<void> {
  await runtime.dispatcher.drain();
  await runtime.store.close();
}
