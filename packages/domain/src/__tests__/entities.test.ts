/**
 * Domain Entity & State-Machine Tests
 *
 * The domain package exports interfaces, the shared execution-status state
 * machine and the error taxonomy. These tests verify:
 *   1. Only forward edges are legal transitions
 *   2. Terminal and active status predicates agree with the edge table
 *   3. Entities can be constructed with valid data
 *   4. Errors carry the messages and HTTP statuses the boundary relies on
 */

import { describe, it, expect } from '@jest/globals';

import {
  EXECUTION_STATUSES,
  canTransition,
  isActiveStatus,
  isTerminalStatus,
  assertTransition,
  ConflictError,
  DomainError,
  ExecutionFailure,
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
  succeed,
  fail,
} from '../index.js';
import type { ExecutionStatus, Outcome, Scenario, Task } from '../index.js';

const NOW = new Date('2026-01-01T00:00:00.000Z');

function makeScenario(overrides: Partial<Scenario> = {}): Scenario {
  return {
    id: 'scn-001',
    name: 'demo',
    config: null,
    status: 'pending',
    result: null,
    createdAt: NOW,
    startedAt: null,
    finishedAt: null,
    ...overrides,
  };
}

function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    taskId: 'task-001',
    scenarioId: 'scn-001',
    status: 'pending',
    error: null,
    createdAt: NOW,
    startedAt: null,
    finishedAt: null,
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// State machine
// ═══════════════════════════════════════════════════════════════════════════════

describe('execution status transitions', () => {
  const legal: Array<[ExecutionStatus, ExecutionStatus]> = [
    ['pending', 'running'],
    ['running', 'finished'],
    ['running', 'failed'],
  ];

  it.each(legal)('allows %s → %s', (from, to) => {
    expect(canTransition(from, to)).toBe(true);
  });

  it('rejects every other pair', () => {
    for (const from of EXECUTION_STATUSES) {
      for (const to of EXECUTION_STATUSES) {
        const isLegal = legal.some(([f, t]) => f === from && t === to);
        expect(canTransition(from, to)).toBe(isLegal);
      }
    }
  });

  it('never leaves a terminal status', () => {
    for (const to of EXECUTION_STATUSES) {
      expect(canTransition('finished', to)).toBe(false);
      expect(canTransition('failed', to)).toBe(false);
    }
  });

  it('classifies terminal and active statuses', () => {
    expect(EXECUTION_STATUSES.filter(isTerminalStatus)).toEqual(['finished', 'failed']);
    expect(EXECUTION_STATUSES.filter(isActiveStatus)).toEqual(['pending', 'running']);
  });

  it('assertTransition throws InvalidTransitionError for an illegal edge', () => {
    expect(() => assertTransition('task', 't-1', 'finished', 'running')).toThrow(
      InvalidTransitionError,
    );
    expect(() => assertTransition('task', 't-1', 'finished', 'running')).toThrow(
      "task 't-1' cannot move from finished to running",
    );
    expect(() => assertTransition('task', 't-1', 'pending', 'running')).not.toThrow();
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Entities
// ═══════════════════════════════════════════════════════════════════════════════

describe('Scenario', () => {
  it('starts pending without a result', () => {
    const scenario = makeScenario();
    expect(scenario.status).toBe('pending');
    expect(scenario.result).toBeNull();
    expect(scenario.startedAt).toBeNull();
  });

  it('holds the echoed config once finished', () => {
    const scenario = makeScenario({
      config: { a: 1 },
      status: 'finished',
      result: { summary: 'demo result', input_config: { a: 1 } },
      startedAt: NOW,
      finishedAt: new Date(NOW.getTime() + 100),
    });
    expect(scenario.result?.input_config).toEqual({ a: 1 });
    expect(scenario.finishedAt?.getTime()).toBe(NOW.getTime() + 100);
  });
});

describe('Task', () => {
  it('references its scenario by id', () => {
    const task = makeTask({ scenarioId: 'scn-xyz' });
    expect(task.scenarioId).toBe('scn-xyz');
    expect(task.error).toBeNull();
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Errors & outcomes
// ═══════════════════════════════════════════════════════════════════════════════

describe('error taxonomy', () => {
  it('maps each domain error to its HTTP status', () => {
    expect(new ValidationError('bad').status).toBe(400);
    expect(new NotFoundError('scenario', 'x').status).toBe(404);
    expect(new ConflictError('x', 'finished').status).toBe(409);
    expect(new ExecutionFailure('x', new Error('boom')).status).toBe(500);
  });

  it('formats not-found and conflict messages', () => {
    expect(new NotFoundError('task', 'abc').message).toBe("task 'abc' not found");
    expect(new ConflictError('abc', 'running').message).toBe('scenario cannot be run: running');
  });

  it('uses the subclass name and stays a DomainError', () => {
    const err = new ConflictError('abc', 'pending');
    expect(err.name).toBe('ConflictError');
    expect(err).toBeInstanceOf(DomainError);
    expect(err).toBeInstanceOf(Error);
  });

  it('ExecutionFailure describes the root cause', () => {
    expect(new ExecutionFailure('x', new Error('disk full')).message).toBe('disk full');
    expect(new ExecutionFailure('x', 'plain string').message).toBe('plain string');
  });
});

describe('Outcome', () => {
  it('narrows on ok', () => {
    const outcomes: Array<Outcome<number, ValidationError>> = [
      succeed(42),
      fail(new ValidationError('nope')),
    ];
    const seen = outcomes.map((o) => (o.ok ? o.value : o.error.message));
    expect(seen).toEqual([42, 'nope']);
  });
});
