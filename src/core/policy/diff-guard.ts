import { diffSize, type ChangeSet } from '../changeset.js';

export const DEFAULT_DIFF_CAP = 300;

export type DiffDecision = { allowed: true; size: number } | { allowed: false; actual: number; cap: number };

/** Accepts a change-set whose added + removed line total stays within `cap`. */
export function checkDiff(changeSet: ChangeSet, cap: number = DEFAULT_DIFF_CAP): DiffDecision {
  const size = diffSize(changeSet);
  if (size > cap) return { allowed: false, actual: size, cap };
  return { allowed: true, size };
}
