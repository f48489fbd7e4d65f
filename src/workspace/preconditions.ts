import { stat } from 'node:fs/promises';
import { join } from 'node:path';

import { ValidationError, type ValidationIssue } from '../core/errors.js';
import { dirtyPaths, git, hasCommits, isGitRepo } from '../git/operations.js';
import { fileExists } from '../utils/fs.js';

/**
 * Refuse to start a session unless the repository is a git work tree with at least
 * one commit, no uncommitted changes outside engine artifacts, and a backlog file.
 */
export async function assertSessionPreconditions(repoRoot: string, backlogPath: string): Promise<void> {
  const issues: ValidationIssue[] = [];

  const isDir = await stat(repoRoot)
    .then((s) => s.isDirectory())
    .catch(() => false);
  if (!isDir) {
    throw new ValidationError(`Repository not found: ${repoRoot}`, [{ path: 'repo', message: 'not a directory' }]);
  }

  const repo = git(repoRoot);
  if (!(await isGitRepo(repo))) {
    throw new ValidationError(`Not a git repository: ${repoRoot}`, [{ path: 'repo', message: 'not a git work tree' }]);
  }

  if (!(await hasCommits(repo))) {
    issues.push({ path: 'repo', message: 'repository has no commits yet' });
  } else {
    const dirty = await dirtyPaths(repo, { ignoreEngineArtifacts: true });
    if (dirty.length > 0) {
      issues.push({ path: 'repo', message: `working tree is not clean: ${dirty.slice(0, 5).join(', ')}${dirty.length > 5 ? ', ...' : ''}` });
    }
  }

  if (!(await fileExists(join(repoRoot, backlogPath)))) {
    issues.push({ path: 'backlog', message: `backlog file not found: ${backlogPath}` });
  }

  if (issues.length > 0) {
    throw new ValidationError(`Repository is not ready for a session: ${issues.map((i) => i.message).join('; ')}`, issues);
  }
}
