export interface ChangeEntry {
  path: string;
  additions: number;
  deletions: number;
}

/** Ordered (path, added, removed) triples describing a proposed or committed diff. */
export type ChangeSet = readonly ChangeEntry[];

export function diffSize(changeSet: ChangeSet): number {
  return changeSet.reduce((acc, e) => acc + e.additions + e.deletions, 0);
}

export function changedPaths(changeSet: ChangeSet): string[] {
  return changeSet.map((e) => e.path);
}

/**
 * Union of an observed change-set and the paths an agent claims to have touched.
 * Observed counts win; claimed-only paths are kept so they are still authorized.
 */
export function mergeClaims(observed: ChangeSet, claimed: ChangeSet): ChangeEntry[] {
  const byPath = new Map<string, ChangeEntry>();
  for (const e of claimed) byPath.set(normalizePath(e.path), { ...e, path: normalizePath(e.path) });
  for (const e of observed) byPath.set(e.path, { ...e });
  return Array.from(byPath.values()).sort((a, b) => a.path.localeCompare(b.path));
}

/** Repo-relative POSIX form, the way git reports paths. */
export function normalizePath(path: string): string {
  return path.replaceAll('\\', '/').replace(/^\.\/+/, '');
}
