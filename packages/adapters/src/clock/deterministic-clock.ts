import type { ClockPort } from '@scenario-runner/domain';

/** First read returns `startMs`; every later read is `stepMs` past the one before. */
export class DeterministicClock implements ClockPort {
  private nextMs: number;

  constructor(
    startMs: number,
    private readonly stepMs = 1_000,
  ) {
    this.nextMs = startMs;
  }

  now(): Date {
    const readAt = this.nextMs;
    this.nextMs += this.stepMs;
    return new Date(readAt);
  }
}

export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}
