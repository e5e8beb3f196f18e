import { InvalidTransitionError } from '../errors.js';

export type ExecutionStatus = 'pending' | 'running' | 'finished' | 'failed';

export const EXECUTION_STATUSES: readonly ExecutionStatus[] = [
  'pending',
  'running',
  'finished',
  'failed',
];

export type TerminalStatus = Extract<ExecutionStatus, 'finished' | 'failed'>;
export type ActiveStatus = Extract<ExecutionStatus, 'pending' | 'running'>;

/**
 * Forward-only edges shared by scenarios and tasks:
 * pending → running → finished | failed.
 */
const TRANSITIONS: Record<ExecutionStatus, readonly ExecutionStatus[]> = {
  pending: ['running'],
  running: ['finished', 'failed'],
  finished: [],
  failed: [],
};

export function canTransition(from: ExecutionStatus, to: ExecutionStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: ExecutionStatus): status is TerminalStatus {
  return status === 'finished' || status === 'failed';
}

export function isActiveStatus(status: ExecutionStatus): status is ActiveStatus {
  return status === 'pending' || status === 'running';
}

export function assertTransition(
  entity: string,
  id: string,
  from: ExecutionStatus,
  to: ExecutionStatus,
): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(entity, id, from, to);
  }
}
