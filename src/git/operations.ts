import { execa } from 'execa';
import { copyFile, readFile, rm } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import { isEngineArtifactPath } from '../workspace/protected-paths.js';
import { parseDiff, type DiffFile, type DiffResult } from './diff-parser.js';

export interface GitRepo {
  repoRoot: string;
}

export function git(repoRoot: string): GitRepo {
  return { repoRoot };
}

async function run(repo: GitRepo, args: string[], env?: Record<string, string>): Promise<string> {
  // Paths come back verbatim (no octal quoting), so globs match non-ASCII names.
  const res = await execa('git', ['-c', 'core.quotePath=false', ...args], {
    cwd: repo.repoRoot,
    stdout: 'pipe',
    stderr: 'pipe',
    ...(env ? { env } : {})
  });
  return res.stdout;
}

export async function isGitRepo(repo: GitRepo): Promise<boolean> {
  const res = await execa('git', ['rev-parse', '--is-inside-work-tree'], { cwd: repo.repoRoot, reject: false });
  return res.exitCode === 0 && res.stdout.trim() === 'true';
}

export async function hasCommits(repo: GitRepo): Promise<boolean> {
  const res = await execa('git', ['rev-parse', '--verify', '--quiet', 'HEAD'], { cwd: repo.repoRoot, reject: false });
  return res.exitCode === 0;
}

export async function getCurrentCommit(repo: GitRepo): Promise<string> {
  return (await run(repo, ['rev-parse', 'HEAD'])).trim();
}

export async function getCurrentBranch(repo: GitRepo): Promise<string> {
  return (await run(repo, ['rev-parse', '--abbrev-ref', 'HEAD'])).trim();
}

export async function branchExists(repo: GitRepo, name: string): Promise<boolean> {
  const res = await execa('git', ['rev-parse', '--verify', '--quiet', `refs/heads/${name}`], {
    cwd: repo.repoRoot,
    reject: false
  });
  return res.exitCode === 0;
}

/**
 * Create and check out a branch.
 * Equivalent: `git checkout -b <name> [<startPoint>]`
 */
export async function createBranch(repo: GitRepo, name: string, startPoint?: string): Promise<void> {
  const args = ['checkout', '-b', name];
  if (startPoint) args.push(startPoint);
  await run(repo, args);
}

export async function checkout(repo: GitRepo, ref: string): Promise<void> {
  await run(repo, ['checkout', ref]);
}

/**
 * Delete a local branch.
 * Equivalent: `git branch -d <name>`
 */
export async function deleteBranch(repo: GitRepo, name: string, opts?: { force?: boolean }): Promise<void> {
  const force = opts?.force ?? false;
  await run(repo, ['branch', force ? '-D' : '-d', name]);
}

export async function statusPorcelain(repo: GitRepo): Promise<string> {
  return await run(repo, ['status', '--porcelain', '--untracked-files=all']);
}

function extractPathsFromPorcelainLine(line: string): string[] {
  // "XY <path>", "?? <path>", or "R  old -> new".
  const trimmed = line.trimEnd();
  if (trimmed.length < 4) return [];
  const rest = trimmed.slice(3).trim();
  if (!rest) return [];
  const arrow = ' -> ';
  if (rest.includes(arrow)) {
    const [a, b] = rest.split(arrow);
    return [a?.trim(), b?.trim()].filter((x): x is string => !!x);
  }
  return [rest];
}

export async function isClean(repo: GitRepo, opts?: { ignoreEngineArtifacts?: boolean }): Promise<boolean> {
  return (await dirtyPaths(repo, opts)).length === 0;
}

export async function dirtyPaths(repo: GitRepo, opts?: { ignoreEngineArtifacts?: boolean }): Promise<string[]> {
  const out = await statusPorcelain(repo);
  const paths = out
    .split('\n')
    .filter((l) => l.trim().length > 0)
    .flatMap(extractPathsFromPorcelainLine);
  return opts?.ignoreEngineArtifacts ? paths.filter((p) => !isEngineArtifactPath(p)) : paths;
}

export async function lsFiles(repo: GitRepo): Promise<string[]> {
  const out = await run(repo, ['ls-files']);
  return out
    .split('\n')
    .map((s) => s.trim())
    .filter(Boolean);
}

async function listUntracked(repo: GitRepo): Promise<string[]> {
  const out = await run(repo, ['ls-files', '--others', '--exclude-standard']);
  return out
    .split('\n')
    .map((s) => s.trim())
    .filter(Boolean)
    .filter((p) => !isEngineArtifactPath(p));
}

/**
 * Diff the working tree (tracked and untracked) against `fromCommit`.
 * Untracked files are counted as fully added. Only `.gitignore` hides a path;
 * engine artifacts never appear.
 */
export async function diff(repo: GitRepo, fromCommit: string): Promise<DiffResult> {
  const [rawDiff, nameStatus, numStat, untracked] = await Promise.all([
    run(repo, ['diff', '--no-renames', fromCommit]),
    run(repo, ['diff', '--no-renames', '--name-status', fromCommit]),
    run(repo, ['diff', '--no-renames', '--numstat', fromCommit]),
    listUntracked(repo)
  ]);

  const parsed = parseDiff({ rawDiff, nameStatus, numStat });
  const tracked = parsed.files.filter((f) => !isEngineArtifactPath(f.path));
  const existing = new Set(tracked.map((f) => f.path));

  const added: DiffFile[] = [];
  for (const p of untracked) {
    if (existing.has(p)) continue;
    added.push({ path: p, changeType: 'added', additions: await countFileLines(join(repo.repoRoot, p)), deletions: 0 });
  }

  const files = [...tracked, ...added].sort((a, b) => a.path.localeCompare(b.path));
  return {
    raw: parsed.raw,
    files,
    summary: {
      additions: files.reduce((a, f) => a + f.additions, 0),
      deletions: files.reduce((a, f) => a + f.deletions, 0),
      filesChanged: files.length
    }
  };
}

async function countFileLines(absPath: string): Promise<number> {
  const buf = await readFile(absPath);
  // Binary files count as zero lines, like git's numstat '-'.
  if (buf.includes(0)) return 0;
  const text = buf.toString('utf8');
  if (text.length === 0) return 0;
  const lines = text.split('\n').length;
  return text.endsWith('\n') ? lines - 1 : lines;
}

export async function resetHard(repo: GitRepo, commit: string): Promise<void> {
  await run(repo, ['reset', '--hard', commit]);
}

/** Remove untracked files and directories, keeping the engine's own directory. */
export async function clean(repo: GitRepo): Promise<void> {
  await run(repo, ['clean', '-fd', '-e', '.gantry/']);
}

/**
 * Stage everything except engine artifacts and commit it.
 * Returns the new commit id, or null when nothing was left to commit.
 */
export async function commit(repo: GitRepo, message: string): Promise<string | null> {
  await run(repo, ['add', '-A']);
  const staged = (await run(repo, ['diff', '--cached', '--name-only']))
    .split('\n')
    .map((s) => s.trim())
    .filter(Boolean);

  const enginePaths = staged.filter((p) => isEngineArtifactPath(p));
  if (enginePaths.length > 0) {
    // Engine artifacts never get committed.
    await run(repo, ['reset', '--', ...enginePaths]);
  }
  if (staged.length === enginePaths.length) return null;

  await run(repo, ['commit', '-m', message]);
  return await getCurrentCommit(repo);
}

/**
 * Record the working tree (tracked and untracked, `.gitignore` applied) as a tree
 * object and return its id. Works on a scratch copy of the index, so the real
 * index and the working tree are left untouched.
 */
export async function snapshotTree(repo: GitRepo): Promise<string> {
  const [indexPath, scratchPath] = (
    await Promise.all([
      run(repo, ['rev-parse', '--git-path', 'index']),
      run(repo, ['rev-parse', '--git-path', 'gantry-snapshot.index'])
    ])
  ).map((p) => resolve(repo.repoRoot, p.trim()));

  try {
    await copyFile(indexPath, scratchPath);
  } catch (err) {
    // No index yet: the scratch index starts empty.
    if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) throw err;
  }
  try {
    const env = { GIT_INDEX_FILE: scratchPath };
    await run(repo, ['add', '-A'], env);
    return (await run(repo, ['write-tree'], env)).trim();
  } finally {
    await rm(scratchPath, { force: true });
  }
}

/** Content diff between two trees from `snapshotTree`. Engine artifacts never appear. */
export async function diffTrees(repo: GitRepo, fromTree: string, toTree: string): Promise<DiffFile[]> {
  const [nameStatus, numStat] = await Promise.all([
    run(repo, ['diff', '--no-renames', '--name-status', fromTree, toTree]),
    run(repo, ['diff', '--no-renames', '--numstat', fromTree, toTree])
  ]);
  return parseDiff({ rawDiff: '', nameStatus, numStat }).files.filter((f) => !isEngineArtifactPath(f.path));
}
