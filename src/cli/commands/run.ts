import { resolve } from 'node:path';

import { CommandAgent } from '../../core/agent/command-agent.js';
import type { AgentCapability } from '../../core/agent/types.js';
import type { ApprovalChannel } from '../../core/approval.js';
import { AuditLog } from '../../core/audit/log.js';
import type { BacklogGraph } from '../../core/backlog/graph.js';
import { loadBacklog } from '../../core/backlog/reader.js';
import { taskTitle } from '../../core/backlog/types.js';
import { CommandChecks } from '../../core/checks/command-checks.js';
import type { ChecksCapability } from '../../core/checks/types.js';
import { loadProjectConfig } from '../../core/config/project-config.js';
import { GantryError, ValidationError, errorMessage } from '../../core/errors.js';
import type { SessionMode } from '../../core/lifecycle/states.js';
import { AccessPolicy } from '../../core/policy/access.js';
import { Scheduler, type SchedulerEvents, type SchedulerReport } from '../../core/scheduler.js';
import { createSessionConfig } from '../../core/session.js';
import { YamlTaskRecordStore } from '../../core/task-records.js';
import { GitVersionControl, type VersionControl } from '../../core/vcs.js';
import { Logger } from '../../utils/logger.js';
import { initSession, workspacePaths } from '../../workspace/layout.js';
import { assertSessionPreconditions } from '../../workspace/preconditions.js';
import { PromptApprovalChannel } from '../approval-prompt.js';
import { installCliCancellation } from '../cancel.js';
import { resolveAgentTimeoutMs } from '../session-timeout.js';
import { getRenderer, type Renderer } from '../ui/renderer.js';

export interface RunCommandOptions {
  repoRoot?: string;
  mode: SessionMode;
  interactive?: boolean;
  /** Restrict the session to these task IDs. */
  only?: string[];
  /** Overrides the configured diff cap. */
  diffCap?: number;
  logger?: Logger;
  /** Cancels the session. Without one, Ctrl+C and SIGTERM are wired up. */
  signal?: AbortSignal;
  // Capabilities; defaults come from `.gantry/config.yaml`.
  agent?: AgentCapability;
  checks?: ChecksCapability;
  vcs?: VersionControl;
  approvals?: ApprovalChannel;
  now?: Date;
}

export interface RunCommandResult {
  ok: boolean;
  sessionId?: string;
  report?: SchedulerReport;
  details?: unknown;
}

/**
 * `gantry run` and `gantry bootstrap`: one session over the backlog.
 *
 * `ok` is false when a task aborted, tasks stayed blocked, the operator cancelled,
 * or a session-scoped error stopped the scheduler.
 */
export async function runSessionCommand(opts: RunCommandOptions): Promise<RunCommandResult> {
  const r = getRenderer();
  const repoRoot = resolve(opts.repoRoot ?? process.cwd());
  const logger = opts.logger ?? new Logger({ level: process.env.GANTRY_VERBOSE === '1' ? 'debug' : 'warn' });
  const log = logger.child('run');

  const cancellation = opts.signal ? null : installCliCancellation({ onCancel: () => r.warn('Cancelling after the current step...') });
  const signal = opts.signal ?? cancellation?.signal;

  try {
    const config = await loadProjectConfig(repoRoot);
    await assertSessionPreconditions(repoRoot, config.backlogPath);

    const paths = workspacePaths(repoRoot);
    const records = new YamlTaskRecordStore(paths.donePath, paths.problemsPath);
    const done = await records.readDone();
    const graph = await loadBacklog(repoRoot, config.backlogPath, { committed: done.map((d) => d.id) });

    const agent = opts.agent ?? commandAgentFrom(config.agent);
    const checks = opts.checks ?? new CommandChecks(repoRoot, config.checks);
    const vcs = opts.vcs ?? new GitVersionControl(repoRoot);

    const session = await initSession(repoRoot, opts.now);
    const interactive = opts.interactive ?? false;
    const sessionConfig = createSessionConfig({
      sessionId: session.sessionId,
      repoRoot,
      mode: opts.mode,
      interactive,
      roles: config.roles,
      docsRoot: config.docsRoot,
      diffCap: opts.diffCap ?? config.diffCap,
      agentTimeoutMs: resolveAgentTimeoutMs(config.agent?.timeoutMs),
      checkTimeoutMs: config.checkTimeoutMs,
      maxCheckRetries: config.maxCheckRetries
    });
    const audit = await AuditLog.open(session.auditPath, session.sessionId, {
      interactive,
      approvals: opts.approvals ?? new PromptApprovalChannel(r)
    });

    const scheduler = new Scheduler({
      session: sessionConfig,
      graph,
      policy: new AccessPolicy({ roles: config.roles, docsRoot: config.docsRoot }),
      vcs,
      agent,
      checks,
      audit,
      records,
      logger,
      signal,
      only: opts.only,
      events: rendererEvents(r, graph, opts.mode)
    });

    const startHead = await vcs.head();
    r.sessionStart({
      sessionId: session.sessionId,
      mode: opts.mode,
      interactive,
      tasks: graph.pending(opts.mode, opts.only?.length ? new Set(opts.only) : undefined).length,
      base: startHead.ref
    });

    const started = Date.now();
    const report = await scheduler.run();
    r.sessionComplete({
      sessionId: report.sessionId,
      mode: opts.mode,
      durationMs: Date.now() - started,
      committed: report.committed,
      aborted: report.aborted.map((a) => ({ taskId: a.taskId, kind: a.error.kind, reason: a.error.message })),
      blocked: report.blocked,
      cancelled: report.cancelled,
      auditPath: session.auditPath
    });

    const ok = report.aborted.length === 0 && report.blocked.length === 0 && !report.cancelled;
    return {
      ok,
      sessionId: report.sessionId,
      report,
      ...(report.cancelled ? { details: { reason: 'cancelled' } } : ok ? {} : { details: failureSummary(report) })
    };
  } catch (err) {
    log.error(`session failed: ${errorMessage(err)}`);
    if (signal?.aborted && !(err instanceof GantryError && err.scope === 'session')) {
      return { ok: false, details: { reason: 'cancelled' } };
    }
    return { ok: false, details: describeError(err) };
  } finally {
    cancellation?.dispose();
  }
}

function commandAgentFrom(spec: { command: string | string[]; env: Record<string, string> } | undefined): AgentCapability {
  if (!spec) {
    throw new ValidationError('No agent configured', [{ path: 'agent.command', message: 'set agent.command in .gantry/config.yaml' }]);
  }
  return new CommandAgent({ command: spec.command, env: spec.env });
}

function rendererEvents(r: Renderer, graph: BacklogGraph, mode: SessionMode): SchedulerEvents {
  const total = graph.tasks().filter((t) => t.category === mode && t.state !== 'Committed').length;
  let index = 0;
  return {
    taskStarted: (task) => r.taskStart({ taskId: task.id, title: taskTitle(task), index: ++index, total }),
    stageStarted: (taskId, stage, role) => r.stageStarted(taskId, stage, role),
    transitioned: (taskId, from, to) => r.stageEntered(taskId, from, to),
    checksFinished: (_taskId, results) => r.checkResults([...results]),
    committed: (taskId, commit, branch) => r.taskCommitted(taskId, commit, branch),
    aborted: (taskId, error) => r.taskAborted(taskId, error),
    deadlocked: (blocked) => r.blocked(blocked)
  };
}

function failureSummary(report: SchedulerReport): string {
  const parts: string[] = [];
  if (report.aborted.length > 0) parts.push(`${report.aborted.length} task(s) aborted: ${report.aborted.map((a) => a.taskId).join(', ')}`);
  if (report.blocked.length > 0) parts.push(`${report.blocked.length} task(s) blocked: ${report.blocked.map((b) => b.taskId).join(', ')}`);
  return parts.join('\n');
}

export function describeError(err: unknown): string {
  if (err instanceof ValidationError && err.issues.length > 0) {
    return [err.message, ...err.issues.map((i) => `  ${i.path}: ${i.message}`)].join('\n');
  }
  return errorMessage(err);
}
