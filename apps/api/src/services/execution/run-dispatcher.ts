import type { RunDispatcherPort, RunRequest } from '@scenario-runner/domain';

export type RunHandler = (request: RunRequest) => Promise<unknown>;

/**
 * In-process channel between the request that creates a task and the
 * coordinator that runs it. Each submission becomes one job started on a
 * later macrotask, so the submitter has already answered its caller.
 */
export class InProcessRunDispatcher implements RunDispatcherPort {
  private readonly pending = new Set<Promise<void>>();

  constructor(private readonly handler: RunHandler) {}

  get inFlight(): number {
    return this.pending.size;
  }

  submit(request: RunRequest): void {
    const job = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.handler(request))
      .then(
        () => undefined,
        (err: unknown) => {
          console.error(`[run-dispatcher] task ${request.taskId} aborted`, err);
        },
      );

    this.pending.add(job);
    void job.finally(() => this.pending.delete(job));
  }

  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}
