export type CoordinatorErrorCode =
  | 'VALIDATION'
  | 'UNKNOWN_WORK'
  | 'CAPACITY_VIOLATION'
  | 'DEPENDENCY_VIOLATION'
  | 'QUOTA_EXCEEDED'
  | 'STATE_CORRUPTION'
  | 'CONFIG';

export class CoordinatorError extends Error {
  readonly code: CoordinatorErrorCode;

  constructor(code: CoordinatorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends CoordinatorError {
  constructor(message: string, code: 'VALIDATION' | 'UNKNOWN_WORK' = 'VALIDATION') {
    super(code, message);
  }
}

export class UnknownWorkError extends ValidationError {
  readonly workId: string;

  constructor(workId: string) {
    super(`Unknown work item: ${workId}`, 'UNKNOWN_WORK');
    this.workId = workId;
  }
}

/** Admission beyond the WIP limit. Never expected; the transaction is aborted. */
export class CapacityViolationError extends CoordinatorError {
  constructor(activeCount: number, wipLimit: number) {
    super(
      'CAPACITY_VIOLATION',
      `Refusing to admit work: ${activeCount} active items already fill the WIP limit of ${wipLimit}`,
    );
  }
}

/** Admission of an item whose dependencies are not all completed. Never expected; the transaction is aborted. */
export class DependencyViolationError extends CoordinatorError {
  readonly workId: string;
  readonly blockedBy: string[];

  constructor(workId: string, blockedBy: string[]) {
    super('DEPENDENCY_VIOLATION', `Refusing to admit ${workId}: still waiting on ${blockedBy.join(', ')}`);
    this.workId = workId;
    this.blockedBy = blockedBy;
  }
}

export class QuotaExceededError extends CoordinatorError {
  readonly tier: string;
  readonly requested: number;
  readonly usable: number;

  constructor(tier: string, requested: number, usable: number) {
    super(
      'QUOTA_EXCEEDED',
      `Tier ${tier} has ${usable} usable units left, ${requested} requested; deferring to the next budget cycle`,
    );
    this.tier = tier;
    this.requested = requested;
    this.usable = usable;
  }
}

export class StateCorruptionError extends CoordinatorError {
  readonly statePath: string;

  constructor(statePath: string, detail: string, cause?: unknown) {
    super(
      'STATE_CORRUPTION',
      `Ledger at ${statePath} is unreadable (${detail}); scheduling is halted until it is repaired or reset`,
      { cause },
    );
    this.statePath = statePath;
  }
}

export class ConfigError extends CoordinatorError {
  constructor(message: string, cause?: unknown) {
    super('CONFIG', message, { cause });
  }
}

export function isCoordinatorError(error: unknown): error is CoordinatorError {
  return error instanceof CoordinatorError;
}
