import type { AuditLog } from './audit/log.js';
import { SESSION_STAGE } from './audit/types.js';
import { taskTitle, type BlockedTask, type Task } from './backlog/types.js';
import type { GantryError } from './errors.js';
import { TaskLifecycle, type LifecycleDeps } from './lifecycle/machine.js';
import { isTerminal } from './lifecycle/states.js';
import type { LifecycleEvents, TaskOutcome } from './lifecycle/types.js';
import type { BaseRef } from './vcs.js';
import { Logger, quietLogger } from '../utils/logger.js';

export interface SchedulerEvents extends LifecycleEvents {
  taskStarted?(task: Task): void;
  taskFinished?(outcome: TaskOutcome): void;
  deadlocked?(blocked: BlockedTask[]): void;
}

export interface SchedulerOptions extends Omit<LifecycleDeps, 'events'> {
  /** Restrict the session to these task IDs. */
  only?: readonly string[];
  events?: SchedulerEvents;
}

export interface SchedulerReport {
  sessionId: string;
  committed: Array<{ taskId: string; commit: string; branch: string }>;
  aborted: Array<{ taskId: string; error: GantryError }>;
  blocked: BlockedTask[];
  cancelled: boolean;
  /** Where the integration base ended up: the last committed branch, or the starting point. */
  base: BaseRef | null;
}

/**
 * Serial driver over the backlog: runs the first ready task of the session's
 * mode to a terminal state, then the next, until nothing is ready.
 */
export class Scheduler {
  private readonly lifecycle: TaskLifecycle;
  private readonly log: Logger;
  private readonly only: ReadonlySet<string> | undefined;

  constructor(private readonly opts: SchedulerOptions) {
    this.lifecycle = new TaskLifecycle(opts);
    this.log = opts.logger?.child('scheduler') ?? quietLogger();
    this.only = opts.only && opts.only.length > 0 ? new Set(opts.only) : undefined;
    if (this.only) {
      for (const id of this.only) opts.graph.get(id);
    }
  }

  get taskLifecycle(): TaskLifecycle {
    return this.lifecycle;
  }

  async run(): Promise<SchedulerReport> {
    const { graph, session, audit, events, signal } = this.opts;
    const mode = session.mode;
    const report: SchedulerReport = { sessionId: session.sessionId, committed: [], aborted: [], blocked: [], cancelled: false, base: null };

    await this.sessionEntry(audit, 'approved', {
      event: 'started',
      mode,
      interactive: session.interactive,
      tasks: graph.tasks().map((t) => t.id),
      committed: graph.tasks().filter((t) => t.state === 'Committed').map((t) => t.id),
      ...(this.only ? { only: Array.from(this.only) } : {})
    });

    let base = await this.opts.vcs.head();
    report.base = base;
    this.log.info(`session ${session.sessionId} started`, { mode, base });

    while (graph.pending(mode, this.only).length > 0) {
      if (signal?.aborted) {
        report.cancelled = true;
        await this.sessionEntry(audit, 'aborted', { event: 'cancelled', pending: graph.pending(mode, this.only) });
        break;
      }

      const ready = graph.ready(mode, this.only);
      if (ready.length === 0) {
        report.blocked = graph.blocked(mode, this.only);
        this.log.warn('no task is ready; remaining tasks are blocked', { blocked: report.blocked });
        await this.sessionEntry(audit, 'aborted', { event: 'blocked', blocked: report.blocked });
        events?.deadlocked?.(report.blocked);
        break;
      }

      const taskId = ready[0];
      const task = graph.get(taskId);
      events?.taskStarted?.(task);
      this.log.debug(`running ${taskId}`, { title: taskTitle(task), base: base.ref });

      const outcome = await this.lifecycle.execute(taskId, base);
      const state = graph.get(taskId).state;
      if (!isTerminal(state)) {
        throw new Error(`Task '${taskId}' came back from the lifecycle in non-terminal state ${state}`);
      }

      if (outcome.ok) {
        report.committed.push({ taskId, commit: outcome.commit, branch: outcome.branch });
        await this.opts.records?.appendDone({
          id: taskId,
          title: taskTitle(task),
          commit: outcome.commit,
          branch: outcome.branch,
          session: session.sessionId
        });
        // Dependents build on top of what was just committed.
        base = { ref: outcome.branch, revision: outcome.commit };
        report.base = base;
      } else {
        report.aborted.push({ taskId, error: outcome.error });
      }
      events?.taskFinished?.(outcome);
    }

    await this.sessionEntry(audit, 'committed', {
      event: 'finished',
      committed: report.committed.map((c) => c.taskId),
      aborted: report.aborted.map((a) => a.taskId),
      blocked: report.blocked.map((b) => b.taskId),
      cancelled: report.cancelled
    });
    this.log.info(`session ${session.sessionId} finished`, {
      committed: report.committed.length,
      aborted: report.aborted.length,
      blocked: report.blocked.length
    });
    return report;
  }

  private async sessionEntry(
    audit: AuditLog,
    outcome: 'approved' | 'committed' | 'aborted',
    data: Record<string, unknown>
  ): Promise<void> {
    await audit.append({ taskId: null, stage: SESSION_STAGE, outcome, data });
  }
}
