import type { ChangeEntry } from '../core/changeset.js';

export interface DiffResult {
  files: DiffFile[];
  summary: { additions: number; deletions: number; filesChanged: number };
  raw: string;
}

export type ChangeType = 'added' | 'modified' | 'deleted';

export interface DiffFile {
  path: string;
  changeType: ChangeType;
  additions: number;
  deletions: number;
}

export interface DiffParseInput {
  rawDiff: string;
  nameStatus: string;
  numStat: string;
}

/**
 * Parse git diff outputs into a structured representation.
 *
 * Inputs are expected from `git diff --no-renames` so a move shows up as a
 * deletion plus an addition; both paths then count as touched:
 * - rawDiff:    `git diff --no-renames <from>`
 * - nameStatus: `git diff --no-renames --name-status <from>`
 * - numStat:    `git diff --no-renames --numstat <from>`
 */
export function parseDiff({ rawDiff, nameStatus, numStat }: DiffParseInput): DiffResult {
  const counts = parseNumStat(numStat);
  const types = parseNameStatus(nameStatus);

  const paths = Array.from(new Set([...counts.keys(), ...types.keys()])).sort((a, b) => a.localeCompare(b));
  const files: DiffFile[] = paths.map((path) => ({
    path,
    changeType: types.get(path) ?? 'modified',
    additions: counts.get(path)?.additions ?? 0,
    deletions: counts.get(path)?.deletions ?? 0
  }));

  return {
    files,
    summary: {
      additions: files.reduce((a, f) => a + f.additions, 0),
      deletions: files.reduce((a, f) => a + f.deletions, 0),
      filesChanged: files.length
    },
    raw: rawDiff
  };
}

/** The (path, added, removed) view of a diff that the policy layer works on. */
export function toChangeSet(diff: Pick<DiffResult, 'files'>): ChangeEntry[] {
  return diff.files.map((f) => ({ path: f.path, additions: f.additions, deletions: f.deletions }));
}

function parseNumStat(numStat: string): Map<string, { additions: number; deletions: number }> {
  const out = new Map<string, { additions: number; deletions: number }>();
  for (const line of numStat.split('\n')) {
    const parts = line.split('\t');
    if (parts.length < 3) continue;
    const [addsRaw, delsRaw, ...rest] = parts;
    const path = rest.join('\t').trim();
    if (!path) continue;
    // Binary files report '-' for both counts.
    out.set(path, { additions: safeInt(addsRaw), deletions: safeInt(delsRaw) });
  }
  return out;
}

function parseNameStatus(nameStatus: string): Map<string, ChangeType> {
  const out = new Map<string, ChangeType>();
  for (const line of nameStatus.split('\n')) {
    const [status, ...rest] = line.split('\t');
    const path = rest.join('\t').trim();
    if (!status || !path) continue;
    // A = added, D = deleted; M, T (type change) and anything else count as modified.
    out.set(path, status.startsWith('A') ? 'added' : status.startsWith('D') ? 'deleted' : 'modified');
  }
  return out;
}

function safeInt(s: string): number {
  const n = Number.parseInt(s, 10);
  return Number.isFinite(n) ? n : 0;
}
