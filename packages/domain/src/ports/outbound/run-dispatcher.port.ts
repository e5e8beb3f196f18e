import type { RunRequest } from '../../entities/task.js';

/**
 * Hands a created task to whatever executes it. Submission never waits for
 * the run and a submitted run cannot be cancelled.
 */
export interface RunDispatcherPort {
  submit(request: RunRequest): void;
  /** Resolves once every run submitted so far has settled. */
  drain(): Promise<void>;
  readonly inFlight: number;
}
