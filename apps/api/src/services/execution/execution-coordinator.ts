import { ExecutionFailure, NotFoundError } from '@scenario-runner/domain';
import type { ClockPort, RunRequest, Task } from '@scenario-runner/domain';
import type { ScenarioService } from '../scenario.service.js';
import type { TaskService } from '../task.service.js';

/**
 * Drives one task through its run. Steps are strictly sequential; between
 * marking the scenario running and recording its result a reader sees
 * `running` with `result = null`.
 */
export class ExecutionCoordinator {
  constructor(
    private readonly scenarios: ScenarioService,
    private readonly tasks: TaskService,
    private readonly clock: ClockPort,
  ) {}

  async execute(request: RunRequest): Promise<Task> {
    const { taskId, scenarioId } = request;

    // Nothing has happened yet if this fails, so the run is simply abandoned.
    const started = await this.tasks.update(taskId, {
      status: 'running',
      startedAt: this.clock.now(),
    });
    if (!started.ok) throw started.error;

    let failure: ExecutionFailure | null = null;
    try {
      await this.scenarios.markRunning(scenarioId);

      const scenario = await this.scenarios.get(scenarioId);
      if (!scenario) throw new NotFoundError('scenario', scenarioId);

      const result = await this.scenarios.executePlaceholder(scenario.name, scenario.config);
      await this.scenarios.markFinished(scenarioId, result);
    } catch (err) {
      failure = new ExecutionFailure(scenarioId, err);
      console.warn(`[execution] task ${taskId} failed: ${failure.message}`);
      await this.markScenarioFailed(scenarioId);
    }

    const finished = await this.tasks.update(
      taskId,
      failure
        ? { status: 'failed', error: failure.message, finishedAt: this.clock.now() }
        : { status: 'finished', finishedAt: this.clock.now() },
    );
    if (!finished.ok) throw finished.error;

    console.log(`[execution] task ${taskId} ${finished.value.status}`);
    return finished.value;
  }

  /**
   * Best-effort: the task outcome is recorded whether or not this succeeds.
   * The scenario may still be pending if step 2 itself failed.
   */
  private async markScenarioFailed(scenarioId: string): Promise<void> {
    try {
      await this.scenarios.abort(scenarioId);
    } catch (err) {
      console.error(`[execution] could not mark scenario ${scenarioId} failed`, err);
    }
  }
}
