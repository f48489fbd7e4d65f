import { toChangeSet } from '../git/diff-parser.js';
import {
  branchExists,
  checkout,
  clean,
  commit,
  createBranch,
  deleteBranch,
  diff,
  diffTrees,
  getCurrentBranch,
  getCurrentCommit,
  git,
  resetHard,
  snapshotTree,
  type GitRepo
} from '../git/operations.js';
import type { ChangeSet } from './changeset.js';

/** Where a task branches from: a ref to return to and the revision it points at. */
export interface BaseRef {
  ref: string;
  revision: string;
}

/**
 * The version-control primitives the lifecycle depends on. Each call is atomic
 * from the engine's point of view and may fail on its own.
 */
export interface VersionControl {
  head(): Promise<BaseRef>;
  branchExists(name: string): Promise<boolean>;
  /** Create `name` at `base.revision` and check it out. */
  createBranch(name: string, base: BaseRef): Promise<void>;
  /** Working tree (tracked and untracked) against `baseRevision`. */
  computeDiff(baseRevision: string): Promise<ChangeSet>;
  /** Opaque id of the working tree's current content. */
  snapshot(): Promise<string>;
  /** Paths whose content differs between two snapshots, with their line counts. */
  diffSnapshots(from: string, to: string): Promise<ChangeSet>;
  /** Squash the whole working tree into one commit on the current branch. */
  commit(message: string): Promise<string>;
  /**
   * Throw away uncommitted work, return to `base.ref`, and drop `branch`
   * (created by the engine, holding no commits) when given.
   */
  discard(branch: string | null, base: BaseRef): Promise<void>;
}

export class GitVersionControl implements VersionControl {
  private readonly repo: GitRepo;

  constructor(repoRoot: string) {
    this.repo = git(repoRoot);
  }

  async head(): Promise<BaseRef> {
    const [ref, revision] = await Promise.all([getCurrentBranch(this.repo), getCurrentCommit(this.repo)]);
    // Detached HEAD reports "HEAD"; the revision itself is then the ref to return to.
    return { ref: ref === 'HEAD' ? revision : ref, revision };
  }

  async branchExists(name: string): Promise<boolean> {
    return await branchExists(this.repo, name);
  }

  async createBranch(name: string, base: BaseRef): Promise<void> {
    await createBranch(this.repo, name, base.revision);
  }

  async computeDiff(baseRevision: string): Promise<ChangeSet> {
    return toChangeSet(await diff(this.repo, baseRevision));
  }

  async snapshot(): Promise<string> {
    return await snapshotTree(this.repo);
  }

  async diffSnapshots(from: string, to: string): Promise<ChangeSet> {
    if (from === to) return [];
    return toChangeSet({ files: await diffTrees(this.repo, from, to) });
  }

  async commit(message: string): Promise<string> {
    const id = await commit(this.repo, message);
    if (!id) throw new Error('Nothing to commit');
    return id;
  }

  async discard(branch: string | null, base: BaseRef): Promise<void> {
    await resetHard(this.repo, 'HEAD');
    await clean(this.repo);
    await checkout(this.repo, base.ref);
    if (branch && branch !== base.ref && (await branchExists(this.repo, branch))) {
      await deleteBranch(this.repo, branch, { force: true });
    }
  }
}
