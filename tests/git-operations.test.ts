import { describe, expect, it } from 'vitest';
import { execa } from 'execa';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { createTempGitRepo, writeFileInRepo } from './git-fixture.js';
import {
  branchExists,
  checkout,
  clean,
  commit,
  createBranch,
  deleteBranch,
  diff,
  dirtyPaths,
  getCurrentBranch,
  getCurrentCommit,
  git,
  hasCommits,
  isClean,
  isGitRepo,
  diffTrees,
  lsFiles,
  resetHard,
  snapshotTree
} from '../src/git/operations.js';
import { parseDiff } from '../src/git/diff-parser.js';

describe('git operations', () => {
  it('reports current commit and clean status', async () => {
    const { dir } = await createTempGitRepo();
    const repo = git(dir);

    expect(await isGitRepo(repo)).toBe(true);
    expect(await hasCommits(repo)).toBe(true);
    expect(await getCurrentCommit(repo)).toMatch(/^[0-9a-f]{40}$/);
    expect(await isClean(repo)).toBe(true);
  });

  it('creates, switches and deletes branches', async () => {
    const { dir } = await createTempGitRepo();
    const repo = git(dir);
    const main = await getCurrentBranch(repo);

    await createBranch(repo, 'task/T1');
    expect(await getCurrentBranch(repo)).toBe('task/T1');
    expect(await branchExists(repo, 'task/T1')).toBe(true);

    await checkout(repo, main);
    await deleteBranch(repo, 'task/T1', { force: true });
    expect(await branchExists(repo, 'task/T1')).toBe(false);
  });

  it('diffs tracked and untracked changes against a commit', async () => {
    const { dir } = await createTempGitRepo();
    const repo = git(dir);
    const base = await getCurrentCommit(repo);

    await writeFileInRepo(dir, 'README.md', '# temp\nhello\n');
    await writeFileInRepo(dir, 'notes.txt', 'a\nb\nc\n');

    const result = await diff(repo, base);
    expect(result.raw).toContain('diff --git');
    expect(result.files).toEqual([
      { path: 'README.md', changeType: 'modified', additions: 1, deletions: 0 },
      { path: 'notes.txt', changeType: 'added', additions: 3, deletions: 0 }
    ]);
    expect(result.summary).toEqual({ additions: 4, deletions: 0, filesChanged: 2 });
  });

  it('keeps engine artifacts out of diffs, dirty checks and commits', async () => {
    const { dir } = await createTempGitRepo();
    const repo = git(dir);
    const base = await getCurrentCommit(repo);

    await mkdir(join(dir, '.gantry', 'sessions', 's-20261018-001'), { recursive: true });
    await writeFile(join(dir, '.gantry', 'sessions', 's-20261018-001', 'audit.jsonl'), '{}\n', 'utf8');

    expect((await diff(repo, base)).files).toEqual([]);
    expect(await dirtyPaths(repo, { ignoreEngineArtifacts: true })).toEqual([]);
    expect(await commit(repo, 'nothing')).toBeNull();

    await writeFileInRepo(dir, 'a.txt', 'x\n');
    const id = await commit(repo, 'add a');
    expect(id).toMatch(/^[0-9a-f]{40}$/);
    expect(await lsFiles(repo)).toEqual(['README.md', 'a.txt']);
  });

  it('shows build output the same way commit() would stage it', async () => {
    const { dir } = await createTempGitRepo();
    const repo = git(dir);
    const base = await getCurrentCommit(repo);

    await mkdir(join(dir, 'dist'), { recursive: true });
    await writeFileInRepo(dir, 'dist/x.js', 'a\nb\n');

    expect((await diff(repo, base)).files).toEqual([{ path: 'dist/x.js', changeType: 'added', additions: 2, deletions: 0 }]);
    await commit(repo, 'build');
    expect(await lsFiles(repo)).toEqual(['README.md', 'dist/x.js']);
  });

  it('reports non-ASCII paths verbatim', async () => {
    const { dir } = await createTempGitRepo();
    const repo = git(dir);
    const base = await getCurrentCommit(repo);

    await mkdir(join(dir, 'docs'), { recursive: true });
    await writeFileInRepo(dir, 'docs/café.md', '# menu\n');
    await writeFileInRepo(dir, 'README.md', 'naïve\n');

    expect((await diff(repo, base)).files.map((f) => f.path)).toEqual(['README.md', 'docs/café.md']);
    await execa('git', ['add', '-A'], { cwd: dir });
    expect((await diff(repo, base)).files.map((f) => f.path)).toEqual(['README.md', 'docs/café.md']);
  });

  it('sees a rewrite between snapshots even when line counts stay the same', async () => {
    const { dir } = await createTempGitRepo();
    const repo = git(dir);

    await writeFileInRepo(dir, 'spec.txt', 'expect 2\n');
    const before = await snapshotTree(repo);
    expect(await snapshotTree(repo)).toBe(before);

    await writeFileInRepo(dir, 'spec.txt', 'expect 3\n');
    const after = await snapshotTree(repo);

    expect(await diffTrees(repo, before, after)).toEqual([{ path: 'spec.txt', changeType: 'modified', additions: 1, deletions: 1 }]);
    // The real index is left as it was.
    const { stdout } = await execa('git', ['status', '--porcelain'], { cwd: dir });
    expect(stdout.trim()).toBe('?? spec.txt');
  });

  it('resetHard() reverts tracked edits and clean() removes untracked files but not .gantry', async () => {
    const { dir } = await createTempGitRepo();
    const repo = git(dir);
    const base = await getCurrentCommit(repo);

    await writeFileInRepo(dir, 'README.md', 'changed\n');
    await writeFileInRepo(dir, 'untracked.txt', 'y\n');
    await mkdir(join(dir, '.gantry', 'state'), { recursive: true });
    await writeFile(join(dir, '.gantry', 'state', 'done.yaml'), '[]\n', 'utf8');

    await resetHard(repo, base);
    await clean(repo);

    const { stdout } = await execa('git', ['status', '--porcelain', '--untracked-files=all'], { cwd: dir });
    expect(stdout.trim()).toBe('?? .gantry/state/done.yaml');
    expect(await isClean(repo, { ignoreEngineArtifacts: true })).toBe(true);
  });

  it('reports the paths of a move as a deletion and an addition', () => {
    const parsed = parseDiff({
      rawDiff: '',
      nameStatus: 'D\told.ts\nA\tnew.ts\n',
      numStat: '0\t4\told.ts\n4\t0\tnew.ts\n-\t-\tlogo.png\n'
    });
    expect(parsed.files).toEqual([
      { path: 'logo.png', changeType: 'modified', additions: 0, deletions: 0 },
      { path: 'new.ts', changeType: 'added', additions: 4, deletions: 0 },
      { path: 'old.ts', changeType: 'deleted', additions: 0, deletions: 4 }
    ]);
  });
});
