export type ErrorKind =
  | 'ValidationError'
  | 'AccessDenied'
  | 'DiffTooLarge'
  | 'CheckFailure'
  | 'AgentFailure'
  | 'OperatorRejected'
  | 'BranchFailure'
  | 'StorageFailure';

/**
 * `task` errors abort only the offending task; the scheduler records them and moves on.
 * `session` errors halt the scheduler.
 */
export type ErrorScope = 'task' | 'session';

const SESSION_SCOPED: ReadonlySet<ErrorKind> = new Set<ErrorKind>(['ValidationError', 'StorageFailure']);

export class GantryError extends Error {
  public readonly details: Record<string, unknown>;

  constructor(
    public readonly kind: ErrorKind,
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = kind;
    this.details = details;
  }

  get scope(): ErrorScope {
    return SESSION_SCOPED.has(this.kind) ? 'session' : 'task';
  }

  toJSON(): Record<string, unknown> {
    return { kind: this.kind, message: this.message, ...this.details };
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends GantryError {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = [],
    details: Record<string, unknown> = {}
  ) {
    super('ValidationError', message, { ...details, issues });
  }
}

export interface AccessViolation {
  path: string;
  role: string;
  reason: 'outside_docs' | 'protected_path' | 'out_of_scope' | 'stage_not_allowed';
  allowed: string[];
}

export class AccessDenied extends GantryError {
  constructor(
    message: string,
    public readonly violations: AccessViolation[]
  ) {
    super('AccessDenied', message, { violations });
  }
}

export class DiffTooLarge extends GantryError {
  constructor(
    public readonly actual: number,
    public readonly cap: number
  ) {
    super('DiffTooLarge', `Change-set of ${actual} lines exceeds the cap of ${cap}`, { actual, cap });
  }
}

export class CheckFailure extends GantryError {
  constructor(
    public readonly failedCheck: string,
    details: Record<string, unknown> = {}
  ) {
    super('CheckFailure', `Check '${failedCheck}' failed`, { ...details, failedCheck });
  }
}

export class AgentFailure extends GantryError {
  constructor(message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super('AgentFailure', message, details, options);
  }
}

export class OperatorRejected extends GantryError {
  constructor(
    message: string,
    public readonly cancelled: boolean = false,
    details: Record<string, unknown> = {}
  ) {
    super('OperatorRejected', message, { ...details, cancelled });
  }
}

export class BranchFailure extends GantryError {
  constructor(
    public readonly branch: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('BranchFailure', message, { branch }, options);
  }
}

export class StorageFailure extends GantryError {
  constructor(message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super('StorageFailure', message, details, options);
  }
}

/**
 * Raised when the state machine is asked for a move its transition table forbids.
 * This is a programming error, so it is never recovered at task level.
 */
export class IllegalTransitionError extends Error {
  constructor(
    message: string,
    public readonly taskId: string,
    public readonly from: string,
    public readonly to: string
  ) {
    super(message);
    this.name = 'IllegalTransitionError';
  }
}

export function isTaskScoped(err: unknown): err is GantryError {
  return err instanceof GantryError && err.scope === 'task';
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
