// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/execution-status.js';
export * from './entities/scenario.js';
export * from './entities/task.js';

// ─── Errors & outcomes ────────────────────────────────────────────────────────
export * from './errors.js';
export * from './outcome.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/scenario-command.port.js';
export * from './ports/inbound/task-command.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/scenario-repository.port.js';
export * from './ports/outbound/task-repository.port.js';
export * from './ports/outbound/record-store.port.js';
export * from './ports/outbound/clock.port.js';
export * from './ports/outbound/run-dispatcher.port.js';
