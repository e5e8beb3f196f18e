import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { DeterministicClock } from '@scenario-runner/adapters';
import { ConflictError, NotFoundError } from '@scenario-runner/domain';
import type { ScenarioConfig, ScenarioResult, Task } from '@scenario-runner/domain';
import { waitUntil } from '../../__tests__/helpers/poll.js';
import { EPOCH_MS, at, createTestRuntime } from '../../__tests__/helpers/runtime.js';
import type { Runtime } from '../../runtime.js';

let runtime: Runtime;

beforeEach(() => {
  runtime = createTestRuntime({ clock: new DeterministicClock(EPOCH_MS) });
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

async function enqueue(config?: ScenarioConfig): Promise<Task> {
  const scenario = await runtime.scenarios.create({ name: 'demo', config });
  if (!scenario.ok) throw scenario.error;
  const task = await runtime.tasks.create(scenario.value.id);
  if (!task.ok) throw task.error;
  return task.value;
}

describe('ExecutionCoordinator.execute', () => {
  it('finishes both task and scenario with timestamps in step order', async () => {
    const task = await enqueue({ a: 1 });

    const final = await runtime.coordinator.execute(task);

    expect(final).toEqual({
      taskId: task.taskId,
      scenarioId: task.scenarioId,
      status: 'finished',
      error: null,
      createdAt: new Date(at(1)),
      startedAt: new Date(at(2)),
      finishedAt: new Date(at(5)),
    });

    const scenario = await runtime.scenarios.get(task.scenarioId);
    expect(scenario?.status).toBe('finished');
    expect(scenario?.result).toEqual({ summary: 'demo result', input_config: { a: 1 } });
    expect(scenario?.startedAt?.toISOString()).toBe(at(3));
    expect(scenario?.finishedAt?.toISOString()).toBe(at(4));
    expect(console.log).toHaveBeenCalledWith(`[execution] task ${task.taskId} finished`);
  });

  it('passes the stored name and config to the placeholder', async () => {
    const task = await enqueue({ seed: 7 });
    const spy = jest.spyOn(runtime.scenarios, 'executePlaceholder');

    await runtime.coordinator.execute(task);

    expect(spy).toHaveBeenCalledWith('demo', { seed: 7 });
  });

  it('shows the scenario running without a result while the placeholder works', async () => {
    const task = await enqueue();
    let release: (result: ScenarioResult) => void = () => undefined;
    const gate = new Promise<ScenarioResult>((resolve) => {
      release = resolve;
    });
    jest.spyOn(runtime.scenarios, 'executePlaceholder').mockReturnValue(gate);

    const run = runtime.coordinator.execute(task);
    await waitUntil(
      async () => (await runtime.scenarios.get(task.scenarioId))?.status === 'running',
    );

    const midway = await runtime.scenarios.get(task.scenarioId);
    expect(midway?.result).toBeNull();
    const midTask = await runtime.tasks.get(task.taskId);
    expect(midTask.ok ? midTask.value.status : null).toBe('running');

    release({ summary: 'demo result', input_config: {} });
    await expect(run).resolves.toMatchObject({ status: 'finished' });
  });

  it('records a placeholder failure on both task and scenario', async () => {
    const task = await enqueue();
    jest.spyOn(runtime.scenarios, 'executePlaceholder').mockRejectedValue(new Error('boom'));

    const final = await runtime.coordinator.execute(task);

    expect(final.status).toBe('failed');
    expect(final.error).toBe('boom');
    expect(final.finishedAt?.toISOString()).toBe(at(5));

    const scenario = await runtime.scenarios.get(task.scenarioId);
    expect(scenario?.status).toBe('failed');
    expect(scenario?.result).toBeNull();
    expect(scenario?.finishedAt?.toISOString()).toBe(at(4));
    expect(console.warn).toHaveBeenCalledWith(`[execution] task ${task.taskId} failed: boom`);
  });

  it('stringifies a root cause that is not an Error', async () => {
    const task = await enqueue();
    jest.spyOn(runtime.scenarios, 'executePlaceholder').mockRejectedValue('plain failure');

    const final = await runtime.coordinator.execute(task);

    expect(final.error).toBe('plain failure');
  });

  it('fails the task when the scenario vanished before the run', async () => {
    const task = await enqueue();
    await runtime.store.scenarios.clear();

    const final = await runtime.coordinator.execute(task);

    expect(final.status).toBe('failed');
    expect(final.error).toBe(`scenario '${task.scenarioId}' not found`);
    expect(console.error).toHaveBeenCalledWith(
      `[execution] could not mark scenario ${task.scenarioId} failed`,
      expect.any(NotFoundError),
    );
  });

  it('fails a scenario that was still pending when marking it running broke', async () => {
    const task = await enqueue();
    jest
      .spyOn(runtime.store.scenarios, 'update')
      .mockRejectedValueOnce(new Error('store blip'));

    const final = await runtime.coordinator.execute(task);

    expect(final.status).toBe('failed');
    expect(final.error).toBe('store blip');

    const scenario = await runtime.scenarios.get(task.scenarioId);
    expect(scenario?.status).toBe('failed');
    expect(scenario?.result).toBeNull();
    expect(scenario?.startedAt).toBeNull();
    expect(scenario?.finishedAt?.toISOString()).toBe(at(4));
    expect(console.error).not.toHaveBeenCalled();

    const rerun = await runtime.tasks.create(task.scenarioId);
    expect(rerun.ok).toBe(false);
    if (rerun.ok) return;
    expect(rerun.error).toBeInstanceOf(ConflictError);
    expect(rerun.error.message).toBe('scenario cannot be run: failed');
  });

  it('still records the task outcome when the scenario cannot be marked failed', async () => {
    const task = await enqueue();
    jest.spyOn(runtime.scenarios, 'executePlaceholder').mockRejectedValue(new Error('boom'));
    jest.spyOn(runtime.scenarios, 'abort').mockRejectedValue(new Error('store offline'));

    const final = await runtime.coordinator.execute(task);

    expect(final.status).toBe('failed');
    expect(final.error).toBe('boom');
    const scenario = await runtime.scenarios.get(task.scenarioId);
    expect(scenario?.status).toBe('running');
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('abandons the run when the task does not exist', async () => {
    const task = await enqueue();

    await expect(
      runtime.coordinator.execute({ taskId: 'missing-task', scenarioId: task.scenarioId }),
    ).rejects.toThrow("task 'missing-task' not found");

    const scenario = await runtime.scenarios.get(task.scenarioId);
    expect(scenario?.status).toBe('pending');
  });
});
