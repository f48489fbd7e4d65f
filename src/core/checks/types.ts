import type { ChangeSet } from '../changeset.js';

export interface CheckResult {
  name: string;
  passed: boolean;
  /** Tail of the tool's output, or the reason it did not run to completion. */
  diagnostics: string;
  durationMs: number;
  timedOut?: boolean;
}

export interface CheckRunOptions {
  signal?: AbortSignal;
  /** Bound for each individual check. */
  timeoutMs?: number;
}

/**
 * Opaque format/lint/typecheck/test/build runner. Results come back in execution
 * order and stop at the first failure.
 */
export interface ChecksCapability {
  runChecks(changeSet: ChangeSet, options?: CheckRunOptions): Promise<CheckResult[]>;
}
