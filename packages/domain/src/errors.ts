import type { ExecutionStatus } from './entities/execution-status.js';

/**
 * Base class for failures the service expects and can describe to a caller.
 * `status` is the HTTP status the boundary layer answers with.
 */
export abstract class DomainError extends Error {
  abstract readonly status: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends DomainError {
  readonly status = 400;
}

export class NotFoundError extends DomainError {
  readonly status = 404;

  constructor(
    readonly entity: string,
    readonly id: string,
  ) {
    super(`${entity} '${id}' not found`);
  }
}

export class ConflictError extends DomainError {
  readonly status = 409;

  constructor(
    readonly scenarioId: string,
    readonly currentStatus: ExecutionStatus,
  ) {
    super(`scenario cannot be run: ${currentStatus}`);
  }
}

export class InvalidTransitionError extends DomainError {
  readonly status = 409;

  constructor(
    readonly entity: string,
    readonly id: string,
    readonly from: ExecutionStatus,
    readonly to: ExecutionStatus,
  ) {
    super(`${entity} '${id}' cannot move from ${from} to ${to}`);
  }
}

/** Raised around a scenario run; only ever recorded on the task, never returned to a caller. */
export class ExecutionFailure extends DomainError {
  readonly status = 500;

  constructor(
    readonly scenarioId: string,
    readonly rootCause: unknown,
  ) {
    super(rootCause instanceof Error ? rootCause.message : String(rootCause));
  }
}

// ─── Storage ──────────────────────────────────────────────────────────────────

export class DuplicateKeyError extends Error {
  constructor(
    readonly entity: string,
    readonly id: string,
  ) {
    super(`${entity} '${id}' already exists`);
    this.name = 'DuplicateKeyError';
  }
}

export class RecordNotFoundError extends Error {
  constructor(
    readonly entity: string,
    readonly id: string,
  ) {
    super(`${entity} '${id}' does not exist`);
    this.name = 'RecordNotFoundError';
  }
}
