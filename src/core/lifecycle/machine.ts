import type { AgentCapability, AgentContext, AgentResult } from '../agent/types.js';
import type { ApprovalDecision, ApprovalRequest } from '../approval.js';
import type { AuditLog } from '../audit/log.js';
import type { BacklogGraph } from '../backlog/graph.js';
import { taskTitle, type Task } from '../backlog/types.js';
import { diffSize, mergeClaims, type ChangeSet } from '../changeset.js';
import type { CheckResult, ChecksCapability } from '../checks/types.js';
import {
  AccessDenied,
  AgentFailure,
  BranchFailure,
  CheckFailure,
  DiffTooLarge,
  GantryError,
  IllegalTransitionError,
  OperatorRejected,
  StorageFailure,
  errorMessage,
  isTaskScoped
} from '../errors.js';
import type { AccessPolicy } from '../policy/access.js';
import { checkDiff } from '../policy/diff-guard.js';
import { STAGE_ACTORS, type RoleId } from '../policy/roles.js';
import type { SessionConfig } from '../session.js';
import type { TaskRecordStore } from '../task-records.js';
import type { BaseRef, VersionControl } from '../vcs.js';
import { Logger, quietLogger } from '../../utils/logger.js';
import { CancelledError, TimeoutError, withDeadline } from '../../utils/timeout.js';
import { branchNameFor, type TaskState } from './states.js';
import type { LifecycleEvents, TaskOutcome, TaskRecord } from './types.js';

export interface LifecycleDeps {
  session: SessionConfig;
  graph: BacklogGraph;
  policy: AccessPolicy;
  vcs: VersionControl;
  agent: AgentCapability;
  checks: ChecksCapability;
  audit: AuditLog;
  records?: TaskRecordStore;
  logger?: Logger;
  events?: LifecycleEvents;
  signal?: AbortSignal;
}

interface TaskRun {
  task: Task;
  record: TaskRecord;
  base: BaseRef;
  /** Only a branch the engine created may be deleted on abort. */
  createdBranch: boolean;
  /** Stage currently being worked towards; failures are recorded against it. */
  attempting: TaskState;
}

interface GateReview {
  role?: RoleId;
  changeSet: ChangeSet;
  cap?: number;
  checks?: CheckResult[];
  summary?: string;
}

type ChecksOutcome = { passed: true; results: CheckResult[] } | { passed: false; results: CheckResult[]; failed: CheckResult };

type AgentStage = 'TestsGenerated' | 'Implemented' | 'DocumentationEdited';

/**
 * Drives one task from `Queued` to `Committed` or `Aborted`.
 *
 * Each stage does its work, then passes a gate: a `proposed` audit entry followed by
 * exactly one answer (`approved`, or `rejected` when an automated check or the
 * operator says no). Task-scoped failures are absorbed here: the working tree is
 * reset, the branch dropped, and the outcome reported. Session-scoped failures
 * propagate after a best-effort cleanup.
 */
export class TaskLifecycle {
  private readonly runs = new Map<string, TaskRecord>();
  private readonly log: Logger;

  constructor(private readonly deps: LifecycleDeps) {
    this.log = deps.logger?.child('lifecycle') ?? quietLogger();
  }

  record(taskId: string): TaskRecord | undefined {
    return this.runs.get(taskId);
  }

  records(): TaskRecord[] {
    return Array.from(this.runs.values());
  }

  async execute(taskId: string, base: BaseRef): Promise<TaskOutcome> {
    const { graph, session } = this.deps;
    const task = graph.get(taskId);
    if (task.category !== session.mode || !graph.ready(session.mode).includes(taskId)) {
      throw new IllegalTransitionError(
        `Task '${taskId}' is not ready to run in ${session.mode} mode (state ${task.state})`,
        taskId,
        task.state,
        'BranchCreated'
      );
    }

    const branch = branchNameFor(task.category, task.id);
    const record: TaskRecord = { taskId, branch, base, history: [task.state] };
    this.runs.set(taskId, record);
    const run: TaskRun = { task, record, base, createdBranch: false, attempting: 'BranchCreated' };

    try {
      const commit = task.category === 'bootstrap' ? await this.runBootstrap(run) : await this.runStandard(run);
      return { ok: true, taskId, commit, branch };
    } catch (err) {
      if (!isTaskScoped(err)) {
        await this.cleanupAfterSessionError(run, err);
        throw err;
      }
      try {
        await this.abort(run, err);
      } catch (abortErr) {
        await this.cleanupAfterSessionError(run, abortErr);
        throw abortErr;
      }
      return { ok: false, taskId, error: err };
    }
  }

  // ── Pipelines ─────────────────────────────────────────────────────────────

  private async runStandard(run: TaskRun): Promise<string> {
    await this.createBranch(run);
    await this.agentStage(run, 'TestsGenerated');

    const retries = this.deps.session.maxCheckRetries;
    let feedback: string | undefined;
    for (let attempt = 0; ; attempt++) {
      await this.agentStage(run, 'Implemented', feedback);
      const outcome = await this.runChecks(run);
      if (outcome.passed) {
        const decision = await this.commitGate(run, outcome.results);
        return await this.commit(run, decision);
      }

      if (attempt >= retries) {
        throw new CheckFailure(outcome.failed.name, { checks: outcome.results });
      }
      await this.deps.audit.append({
        taskId: run.task.id,
        stage: 'ChecksFailed',
        outcome: 'rejected',
        data: {
          kind: 'CheckFailure',
          reason: `Check '${outcome.failed.name}' failed`,
          failedCheck: outcome.failed.name,
          checks: outcome.results,
          retrying: true,
          attempt: attempt + 1
        }
      });
      this.log.info(`retrying ${run.task.id} after failed check`, { check: outcome.failed.name, attempt: attempt + 1 });
      feedback = outcome.failed.diagnostics;
    }
  }

  private async runBootstrap(run: TaskRun): Promise<string> {
    await this.createBranch(run);
    await this.agentStage(run, 'DocumentationEdited');
    const decision = await this.commitGate(run);
    return await this.commit(run, decision);
  }

  // ── Stages ────────────────────────────────────────────────────────────────

  private async createBranch(run: TaskRun): Promise<void> {
    const { vcs } = this.deps;
    const { branch } = run.record;
    this.startStage(run, 'BranchCreated');

    let exists: boolean;
    try {
      exists = await vcs.branchExists(branch);
    } catch (err) {
      throw new BranchFailure(branch, `Cannot inspect branch ${branch}: ${errorMessage(err)}`, { cause: err });
    }
    if (exists) throw new BranchFailure(branch, `Branch ${branch} already exists`);

    try {
      await vcs.createBranch(branch, run.base);
    } catch (err) {
      throw new BranchFailure(branch, `Cannot create branch ${branch}: ${errorMessage(err)}`, { cause: err });
    }
    run.createdBranch = true;

    await this.gate(run, 'BranchCreated', { changeSet: [] }, { branch, base: run.base });
  }

  /** Agent work for one stage, authorized on what the stage changed. */
  private async agentStage(run: TaskRun, stage: AgentStage, feedback?: string): Promise<void> {
    const role = actorFor(stage);
    this.startStage(run, stage, role);
    const { changes, result } = await this.invokeAgent(run, stage, role, feedback);

    await this.gate(
      run,
      stage,
      { role, changeSet: changes, summary: result.summary },
      { role, changeSet: changes, size: diffSize(changes), ...(result.summary ? { summary: result.summary } : {}) },
      () => this.authorize(role, stage, changes)
    );
  }

  private async runChecks(run: TaskRun): Promise<ChecksOutcome> {
    const { audit, checks, session, signal } = this.deps;
    this.startStage(run, 'ChecksRunning');
    const cumulative = await this.observe(run);

    await audit.append({ taskId: run.task.id, stage: 'ChecksRunning', outcome: 'approved', data: { by: 'engine', size: diffSize(cumulative) } });
    this.enter(run, 'ChecksRunning');

    let results: CheckResult[];
    try {
      results = await checks.runChecks(cumulative, { signal, timeoutMs: session.checkTimeoutMs });
    } catch (err) {
      if (signal?.aborted || err instanceof CancelledError) {
        throw new OperatorRejected('Cancelled by operator', true, { stage: 'ChecksRunning' });
      }
      if (err instanceof GantryError) throw err;
      run.attempting = 'ChecksFailed';
      this.enter(run, 'ChecksFailed');
      throw new CheckFailure('(runner)', { error: errorMessage(err) });
    }
    if (signal?.aborted) throw new OperatorRejected('Cancelled by operator', true, { stage: 'ChecksRunning' });
    this.deps.events?.checksFinished?.(run.task.id, results);

    const failed = results.find((r) => !r.passed);
    if (failed) {
      run.attempting = 'ChecksFailed';
      this.enter(run, 'ChecksFailed');
      return { passed: false, results, failed };
    }

    this.startStage(run, 'ChecksPassed');
    await this.gate(run, 'ChecksPassed', { changeSet: cumulative, checks: results }, { size: diffSize(cumulative), checks: results });
    return { passed: true, results };
  }

  /**
   * `→ Committed`: the cumulative change-set must be non-empty and within the cap,
   * and in interactive sessions the reviewer must be allowed to commit it. The
   * answer to this gate is the `committed` entry itself.
   */
  private async commitGate(run: TaskRun, checks?: CheckResult[]): Promise<ApprovalDecision> {
    const { session, audit } = this.deps;
    this.startStage(run, 'Committed', 'reviewer');

    const cumulative = await this.observe(run);
    if (cumulative.length === 0) {
      throw new AgentFailure(`Task '${run.task.id}' produced no changes to commit`, { stage: 'Committed' });
    }

    return await this.review(
      run,
      'Committed',
      { role: 'reviewer', changeSet: cumulative, cap: session.diffCap, checks },
      { changeSet: cumulative, size: diffSize(cumulative), cap: session.diffCap, ...(checks ? { checks } : {}) },
      () => {
        const guard = checkDiff(cumulative, session.diffCap);
        if (!guard.allowed) throw new DiffTooLarge(guard.actual, guard.cap);
        if (audit.interactive) this.authorize('reviewer', 'Committed', cumulative);
      }
    );
  }

  private async commit(run: TaskRun, decision: ApprovalDecision): Promise<string> {
    const { vcs, audit, session, events } = this.deps;
    const { task, record } = run;
    run.attempting = 'Committed';

    let commit: string;
    try {
      commit = await vcs.commit(commitMessage(task, session.sessionId));
    } catch (err) {
      throw new StorageFailure(`Commit failed for task '${task.id}': ${errorMessage(err)}`, { taskId: task.id }, { cause: err });
    }

    await audit.append({
      taskId: task.id,
      stage: 'Committed',
      outcome: 'committed',
      data: { commit, branch: record.branch, by: decision.by, ...(decision.notes ? { notes: decision.notes } : {}) }
    });
    this.enter(run, 'Committed');
    record.commit = commit;
    this.log.info(`committed ${task.id}`, { commit, branch: record.branch });
    events?.committed?.(task.id, commit, record.branch);
    return commit;
  }

  // ── Gate, agent and policy helpers ────────────────────────────────────────

  /** `review`, then record the approval and enter `stage`. */
  private async gate(
    run: TaskRun,
    stage: TaskState,
    review: GateReview,
    data: Record<string, unknown>,
    automated?: () => void
  ): Promise<void> {
    const decision = await this.review(run, stage, review, data, automated);
    await this.deps.audit.append({
      taskId: run.task.id,
      stage,
      outcome: 'approved',
      data: { by: decision.by, ...(decision.notes ? { notes: decision.notes } : {}) }
    });
    this.enter(run, stage);
  }

  /**
   * Record the proposal, apply the automated checks and ask the operator.
   * Any denial throws before an answer is written.
   */
  private async review(
    run: TaskRun,
    stage: TaskState,
    review: GateReview,
    data: Record<string, unknown>,
    automated?: () => void
  ): Promise<ApprovalDecision> {
    const { audit, session, signal } = this.deps;
    const proposal = await audit.append({ taskId: run.task.id, stage, outcome: 'proposed', data });

    automated?.();

    const request: ApprovalRequest = {
      sessionId: session.sessionId,
      taskId: run.task.id,
      title: taskTitle(run.task),
      stage,
      branch: run.record.branch,
      size: diffSize(review.changeSet),
      ...review
    };
    const decision = await audit.awaitApproval(proposal, request, signal);
    if (decision.decision === 'reject') {
      const notes = decision.notes?.trim();
      throw new OperatorRejected(`Operator rejected ${stage}${notes ? `: ${notes}` : ''}`, false, notes ? { notes } : {});
    }
    return decision;
  }

  private async invokeAgent(
    run: TaskRun,
    stage: TaskState,
    role: RoleId,
    feedback?: string
  ): Promise<{ changes: ChangeSet; result: AgentResult }> {
    const { agent, session, signal, records } = this.deps;
    const prior = await this.observe(run);
    const context = this.contextFor(run, stage, role, prior, feedback);
    const before = await this.snapshot(run);

    let result: AgentResult;
    try {
      result = await withDeadline((inner) => agent.propose(context, stage, { signal: inner, timeoutMs: session.agentTimeoutMs }), {
        timeoutMs: session.agentTimeoutMs,
        signal
      });
    } catch (err) {
      if (err instanceof CancelledError) throw new OperatorRejected('Cancelled by operator', true, { stage });
      if (err instanceof TimeoutError) {
        throw new AgentFailure(`Agent timed out after ${err.timeoutMs}ms at ${stage}`, { stage, role, timeoutMs: err.timeoutMs }, { cause: err });
      }
      if (err instanceof GantryError) throw err;
      throw new AgentFailure(`Agent failed at ${stage}: ${errorMessage(err)}`, { stage, role }, { cause: err });
    }

    if (result.problems.length > 0) {
      await records?.appendProblems(
        result.problems.map((question) => ({ task: run.task.id, question, blocking: true, session: session.sessionId }))
      );
      throw new AgentFailure(`Agent reported ${result.problems.length} problem(s) at ${stage}`, {
        stage,
        role,
        problems: result.problems
      });
    }

    const after = await this.snapshot(run);
    return { changes: mergeClaims(await this.stageChanges(run, before, after), result.changeSet), result };
  }

  private contextFor(run: TaskRun, stage: TaskState, role: RoleId, prior: ChangeSet, feedback?: string): AgentContext {
    const { session, policy } = this.deps;
    const def = policy.roles[role];
    return {
      sessionId: session.sessionId,
      repoRoot: session.repoRoot,
      branch: run.record.branch,
      role,
      stage,
      task: {
        id: run.task.id,
        title: taskTitle(run.task),
        description: run.task.description,
        dependsOn: run.task.dependsOn,
        category: run.task.category
      },
      allowedPaths: def.paths,
      excludedPaths: def.exclude,
      priorChanges: prior,
      ...(feedback ? { feedback } : {})
    };
  }

  private authorize(role: RoleId, stage: TaskState, changeSet: ChangeSet): void {
    const decision = this.deps.policy.authorize(role, stage, changeSet, this.deps.session.mode);
    if (!decision.allowed) {
      throw new AccessDenied(`Access denied (${decision.rule}): ${decision.reason}`, decision.violations);
    }
  }

  private async observe(run: TaskRun): Promise<ChangeSet> {
    try {
      return await this.deps.vcs.computeDiff(run.base.revision);
    } catch (err) {
      throw new StorageFailure(`Cannot diff working tree: ${errorMessage(err)}`, { taskId: run.task.id }, { cause: err });
    }
  }

  private async snapshot(run: TaskRun): Promise<string> {
    try {
      return await this.deps.vcs.snapshot();
    } catch (err) {
      throw new StorageFailure(`Cannot snapshot working tree: ${errorMessage(err)}`, { taskId: run.task.id }, { cause: err });
    }
  }

  /** What one agent call changed, by content rather than by line counts. */
  private async stageChanges(run: TaskRun, before: string, after: string): Promise<ChangeSet> {
    try {
      return await this.deps.vcs.diffSnapshots(before, after);
    } catch (err) {
      throw new StorageFailure(`Cannot diff working tree: ${errorMessage(err)}`, { taskId: run.task.id }, { cause: err });
    }
  }

  // ── State bookkeeping ─────────────────────────────────────────────────────

  private startStage(run: TaskRun, stage: TaskState, role?: RoleId): void {
    if (this.deps.signal?.aborted) throw new OperatorRejected('Cancelled by operator', true, { stage });
    run.attempting = stage;
    this.deps.events?.stageStarted?.(run.task.id, stage, role);
  }

  private enter(run: TaskRun, to: TaskState): void {
    const from = run.task.state;
    this.deps.graph.transition(run.task.id, to);
    run.record.history.push(to);
    this.log.debug(`${run.task.id}: ${from} -> ${to}`);
    this.deps.events?.transitioned?.(run.task.id, from, to);
  }

  private async abort(run: TaskRun, error: GantryError): Promise<void> {
    const { audit, events } = this.deps;
    const gateDenial =
      error instanceof AccessDenied || error instanceof DiffTooLarge || error instanceof CheckFailure || error instanceof OperatorRejected;

    await audit.append({
      taskId: run.task.id,
      stage: error instanceof CheckFailure ? 'ChecksFailed' : run.attempting,
      outcome: gateDenial ? 'rejected' : 'aborted',
      data: { ...error.details, kind: error.kind, reason: error.message }
    });

    await this.discard(run);
    this.enter(run, 'Aborted');
    this.log.warn(`aborted ${run.task.id}: ${error.message}`, { kind: error.kind, stage: run.attempting });
    events?.aborted?.(run.task.id, error);
  }

  private async discard(run: TaskRun): Promise<void> {
    try {
      await this.deps.vcs.discard(run.createdBranch ? run.record.branch : null, run.base);
    } catch (err) {
      throw new StorageFailure(
        `Cannot restore ${run.base.ref} after task '${run.task.id}': ${errorMessage(err)}`,
        { taskId: run.task.id, branch: run.record.branch },
        { cause: err }
      );
    }
  }

  private async cleanupAfterSessionError(run: TaskRun, err: unknown): Promise<void> {
    this.log.error(`session error during ${run.task.id}: ${errorMessage(err)}`);
    try {
      await this.deps.vcs.discard(run.createdBranch ? run.record.branch : null, run.base);
    } catch (cleanupErr) {
      this.log.error(`cleanup after session error failed: ${errorMessage(cleanupErr)}`, { taskId: run.task.id });
    }
  }
}

function actorFor(stage: TaskState): RoleId {
  const role = STAGE_ACTORS[stage];
  if (!role) throw new Error(`No role acts at stage ${stage}`);
  return role;
}

function commitMessage(task: Task, sessionId: string): string {
  return `${taskTitle(task)}\n\nTask: ${task.id}\nSession: ${sessionId}\n`;
}
