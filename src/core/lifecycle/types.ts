import type { CheckResult } from '../checks/types.js';
import type { GantryError } from '../errors.js';
import type { RoleId } from '../policy/roles.js';
import type { BaseRef } from '../vcs.js';
import type { TaskState } from './states.js';

/** One task's branch and commit within a session. At most one of each. */
export interface TaskRecord {
  taskId: string;
  branch: string;
  base: BaseRef;
  /** Set only once the task is committed. */
  commit?: string;
  /** States entered, starting at `Queued`. */
  history: TaskState[];
}

export type TaskOutcome =
  | { ok: true; taskId: string; commit: string; branch: string }
  | { ok: false; taskId: string; error: GantryError };

/** Progress notifications for a UI. Handlers must not throw. */
export interface LifecycleEvents {
  stageStarted?(taskId: string, stage: TaskState, role?: RoleId): void;
  transitioned?(taskId: string, from: TaskState, to: TaskState): void;
  checksFinished?(taskId: string, results: readonly CheckResult[]): void;
  committed?(taskId: string, commit: string, branch: string): void;
  aborted?(taskId: string, error: GantryError): void;
}
