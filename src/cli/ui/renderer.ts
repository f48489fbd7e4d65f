import chalk from 'chalk';

import type { ApprovalDecision, ApprovalRequest } from '../../core/approval.js';
import type { BlockedTask } from '../../core/backlog/types.js';
import type { CheckResult } from '../../core/checks/types.js';
import { AccessDenied, CheckFailure, type GantryError } from '../../core/errors.js';
import type { SessionMode, TaskState } from '../../core/lifecycle/states.js';
import { theme, INDENT, RULE_WIDTH, ROLE_LABEL_WIDTH } from './theme.js';
import {
  changeSetLines,
  drawBox,
  formatMs,
  keyValue,
  phaseBanner,
  roleLabel,
  verificationLine
} from './format.js';
import { startSpinner, type SpinnerHandle } from './spinner.js';
import { promptInput, promptSelect } from './prompts.js';

export interface SessionSummary {
  sessionId: string;
  mode: SessionMode;
  durationMs: number;
  committed: Array<{ taskId: string; commit: string; branch: string }>;
  aborted: Array<{ taskId: string; kind: string; reason: string }>;
  blocked: BlockedTask[];
  cancelled: boolean;
  auditPath: string;
}

// ── Renderer Interface ──────────────────────────────────────────────────────

/**
 * Single output coordinator for the CLI.
 * - InteractiveRenderer: colors, spinners, boxes on a TTY
 * - QuietRenderer: JSON lines (--quiet)
 */
export interface Renderer {
  // ── Session ──
  phaseBanner(phase: string): void;
  sessionStart(info: { sessionId: string; mode: SessionMode; interactive: boolean; tasks: number; base: string }): void;
  sessionComplete(summary: SessionSummary): void;
  blocked(tasks: BlockedTask[]): void;

  // ── Task Activity ──
  taskStart(info: { taskId: string; title: string; index: number; total: number }): void;
  stageStarted(taskId: string, stage: TaskState, role?: string): void;
  stageEntered(taskId: string, from: TaskState, to: TaskState): void;
  taskCommitted(taskId: string, commit: string, branch: string): void;
  taskAborted(taskId: string, error: GantryError): void;
  checkResults(results: CheckResult[]): void;

  // ── Gates ──
  presentApproval(request: ApprovalRequest, signal?: AbortSignal): Promise<ApprovalDecision>;

  // ── Errors ──
  error(title: string, details: string, tip?: string): void;
  warn(message: string): void;

  // ── Spinners ──
  spinner(message: string): SpinnerHandle;

  // ── Generic ──
  text(message: string): void;
  blank(): void;
  info(message: string): void;
  success(message: string): void;
  dim(message: string): void;
}

// ── Interactive Renderer (Rich TTY Output) ──────────────────────────────────

export class InteractiveRenderer implements Renderer {
  private active: SpinnerHandle | null = null;

  private writeln(msg: string = ''): void {
    process.stderr.write(msg + '\n');
  }

  private roleMessage(role: string, message: string): void {
    this.writeln(`${INDENT}${roleLabel(role)}${message}`);
  }

  phaseBanner(phase: string): void {
    this.writeln();
    this.writeln(INDENT + phaseBanner(phase));
    this.writeln();
  }

  sessionStart(info: { sessionId: string; mode: SessionMode; interactive: boolean; tasks: number; base: string }): void {
    this.phaseBanner(info.mode === 'bootstrap' ? 'Bootstrap' : 'Run');
    this.writeln(keyValue('Session', theme.bold(info.sessionId)));
    this.writeln(keyValue('Tasks', `${info.tasks} pending`));
    this.writeln(keyValue('Base', info.base));
    this.writeln(keyValue('Gates', info.interactive ? 'operator approval' : 'automatic'));
    this.writeln();
  }

  sessionComplete(s: SessionSummary): void {
    this.phaseBanner('Summary');
    this.writeln(keyValue('Session', s.sessionId));
    this.writeln(keyValue('Duration', formatMs(s.durationMs)));
    this.writeln(keyValue('Committed', String(s.committed.length)));
    for (const c of s.committed) {
      this.writeln(`${INDENT}  ${theme.check} ${c.taskId} ${theme.dim(`${c.branch} [${c.commit.slice(0, 7)}]`)}`);
    }
    this.writeln(keyValue('Aborted', String(s.aborted.length)));
    for (const a of s.aborted) {
      this.writeln(`${INDENT}  ${theme.cross} ${a.taskId} ${theme.dim(`${a.kind}: ${a.reason}`)}`);
    }
    if (s.blocked.length > 0) this.writeln(keyValue('Blocked', s.blocked.map((b) => b.taskId).join(', ')));
    if (s.cancelled) this.writeln(keyValue('Cancelled', 'yes'));
    this.writeln(keyValue('Audit', s.auditPath));
    this.writeln();
    if (s.committed.length > 0) {
      this.writeln(`${INDENT}${theme.dim('Next: review the task branches and merge when ready.')}`);
      this.writeln();
    }
  }

  blocked(tasks: BlockedTask[]): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.warning('BLOCKED')}  no remaining task can become ready`);
    for (const b of tasks) {
      this.writeln(`${INDENT}  ${theme.bullet} ${b.taskId} ${theme.dim(`waits on ${b.blockedBy.join(', ')}`)}`);
    }
  }

  taskStart(info: { taskId: string; title: string; index: number; total: number }): void {
    this.writeln(`${INDENT}${theme.bold(`[${info.index}/${info.total}] ${info.taskId}`)} ${info.title}`);
  }

  stageStarted(taskId: string, stage: TaskState, role?: string): void {
    this.active?.stop();
    const who = role ? `${theme.role(role)(role)} ` : '';
    this.active = startSpinner(`${who}${stage} ${theme.dim(taskId)}`);
  }

  stageEntered(taskId: string, from: TaskState, to: TaskState): void {
    const line = `${from} ${theme.arrow} ${theme.state(to)(to)} ${theme.dim(taskId)}`;
    if (this.active) {
      this.active.succeed(line);
      this.active = null;
      return;
    }
    this.dim(`${from} → ${to} ${taskId}`);
  }

  taskCommitted(taskId: string, commit: string, branch: string): void {
    this.active?.stop();
    this.active = null;
    this.writeln(`${INDENT}${theme.success(taskId)} committed on ${branch} ${theme.dim(`[${commit.slice(0, 7)}]`)}`);
    this.writeln();
  }

  taskAborted(taskId: string, error: GantryError): void {
    this.active?.fail(`${taskId} ${theme.error('aborted')}`);
    this.active = null;
    this.roleMessage('engine', `${theme.error(error.kind)}: ${error.message}`);
    if (error instanceof AccessDenied) {
      for (const v of error.violations) {
        this.writeln(`${INDENT}${' '.repeat(ROLE_LABEL_WIDTH)}${v.path} ${theme.dim(`(${v.reason})`)}`);
      }
    }
    if (error instanceof CheckFailure) {
      const diag = failedDiagnostics(error);
      if (diag) this.writeln(diag.split('\n').slice(-20).map((l) => `${INDENT}${' '.repeat(ROLE_LABEL_WIDTH)}${theme.dim(l)}`).join('\n'));
    }
    this.writeln();
  }

  checkResults(results: CheckResult[]): void {
    for (const r of results) {
      const detail = r.timedOut ? `timed out (${formatMs(r.durationMs)})` : formatMs(r.durationMs);
      this.writeln(verificationLine({ name: r.name, passed: r.passed, detail }));
    }
  }

  async presentApproval(request: ApprovalRequest, signal?: AbortSignal): Promise<ApprovalDecision> {
    this.active?.stop();
    this.active = null;

    const lines: string[] = [];
    lines.push(`${theme.gate.label('Task:')}   ${request.taskId} ${theme.dim(request.title)}`);
    lines.push(`${theme.gate.label('Stage:')}  ${request.stage}${request.role ? theme.dim(` (${request.role})`) : ''}`);
    if (request.branch) lines.push(`${theme.gate.label('Branch:')} ${request.branch}`);
    const cap = request.cap !== undefined ? ` / cap ${request.cap}` : '';
    lines.push(`${theme.gate.label('Size:')}   ${request.size} lines${cap}`);
    lines.push('');
    if (request.changeSet.length > 0) {
      lines.push(theme.bold('Changes:'));
      for (const l of changeSetLines(request.changeSet)) lines.push(`  ${l}`);
      lines.push('');
    }
    if (request.checks && request.checks.length > 0) {
      lines.push(theme.bold('Checks:'));
      for (const c of request.checks) lines.push(`  ${c.passed ? theme.check : theme.cross} ${c.name}`);
      lines.push('');
    }
    if (request.summary) {
      lines.push(theme.bold('Summary:'));
      for (const l of request.summary.split('\n').slice(0, 8)) lines.push(`  ${l}`);
    }
    while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();

    this.writeln();
    this.writeln(drawBox(`Gate: ${request.stage}`, lines, RULE_WIDTH));
    this.writeln();

    for (;;) {
      const action = await promptSelect(
        {
          message: 'Decision',
          choices: [
            { name: chalk.green('Approve'), value: 'approve' as const },
            { name: chalk.red('Reject'), value: 'reject' as const },
            { name: chalk.dim('View all changes'), value: 'changes' as const }
          ]
        },
        signal
      );

      if (action === 'changes') {
        this.writeln();
        for (const l of changeSetLines(request.changeSet, Number.POSITIVE_INFINITY)) this.writeln(`${INDENT}${l}`);
        this.writeln();
        continue;
      }

      const notes = await promptInput({ message: action === 'reject' ? 'Rejection reason' : 'Notes (optional)', default: '' }, signal);
      return { decision: action, by: 'operator', ...(notes.trim() ? { notes: notes.trim() } : {}) };
    }
  }

  error(title: string, details: string, tip?: string): void {
    this.active?.stop();
    this.active = null;
    this.writeln();
    this.writeln(`${INDENT}${theme.error(theme.bold('ERROR'))}  ${title}`);
    this.writeln();
    for (const line of details.split('\n')) {
      this.writeln(`${INDENT}${line}`);
    }
    if (tip) {
      this.writeln();
      this.writeln(`${INDENT}${theme.dim('Tip:')} ${tip}`);
    }
    this.writeln();
  }

  warn(message: string): void {
    this.writeln(`${INDENT}${theme.warning('⚠')} ${message}`);
  }

  spinner(message: string): SpinnerHandle {
    return startSpinner(message);
  }

  text(message: string): void {
    this.writeln(message);
  }

  blank(): void {
    this.writeln();
  }

  info(message: string): void {
    this.writeln(`${INDENT}${theme.info('ℹ')} ${message}`);
  }

  success(message: string): void {
    this.writeln(`${INDENT}${theme.check} ${message}`);
  }

  dim(message: string): void {
    this.writeln(`${INDENT}${theme.dim(message)}`);
  }
}

// ── Quiet Renderer (JSON Lines) ─────────────────────────────────────────────

export class QuietRenderer implements Renderer {
  private emit(type: string, data: Record<string, unknown> = {}): void {
    const event = { type, timestamp: new Date().toISOString(), ...data };
    process.stderr.write(JSON.stringify(event) + '\n');
  }

  phaseBanner(phase: string): void {
    this.emit('phase', { phase });
  }

  sessionStart(info: { sessionId: string; mode: SessionMode; interactive: boolean; tasks: number; base: string }): void {
    this.emit('session_start', { ...info });
  }

  sessionComplete(summary: SessionSummary): void {
    this.emit('session_complete', { ...summary });
  }

  blocked(tasks: BlockedTask[]): void {
    this.emit('blocked', { tasks });
  }

  taskStart(info: { taskId: string; title: string; index: number; total: number }): void {
    this.emit('task_start', { ...info });
  }

  stageStarted(taskId: string, stage: TaskState, role?: string): void {
    this.emit('stage_start', { task: taskId, stage, role });
  }

  stageEntered(taskId: string, from: TaskState, to: TaskState): void {
    this.emit('transition', { task: taskId, from, to });
  }

  taskCommitted(taskId: string, commit: string, branch: string): void {
    this.emit('committed', { task: taskId, commit, branch });
  }

  taskAborted(taskId: string, error: GantryError): void {
    this.emit('aborted', { task: taskId, error: error.toJSON() });
  }

  checkResults(results: CheckResult[]): void {
    this.emit('checks', { results });
  }

  async presentApproval(request: ApprovalRequest, signal?: AbortSignal): Promise<ApprovalDecision> {
    this.emit('approval_requested', { ...request });
    const action = await promptSelect(
      {
        message: `Approve ${request.stage} for ${request.taskId}?`,
        choices: [
          { name: 'Approve', value: 'approve' as const },
          { name: 'Reject', value: 'reject' as const }
        ]
      },
      signal
    );
    return { decision: action, by: 'operator' };
  }

  error(title: string, details: string, tip?: string): void {
    this.emit('error', { title, details, tip });
  }

  warn(message: string): void {
    this.emit('warn', { message });
  }

  spinner(message: string): SpinnerHandle {
    this.emit('spinner', { message });
    return {
      update: (t) => this.emit('spinner_update', { message: t }),
      succeed: (t) => this.emit('spinner_done', { message: t, ok: true }),
      fail: (t) => this.emit('spinner_done', { message: t, ok: false }),
      stop: () => undefined
    };
  }

  text(message: string): void {
    this.emit('text', { message });
  }

  blank(): void {
    // nothing to emit
  }

  info(message: string): void {
    this.emit('info', { message });
  }

  success(message: string): void {
    this.emit('success', { message });
  }

  dim(message: string): void {
    this.emit('dim', { message });
  }
}

function failedDiagnostics(error: CheckFailure): string | null {
  const checks = error.details.checks;
  if (!Array.isArray(checks)) return null;
  for (const c of checks) {
    if (typeof c === 'object' && c !== null && 'name' in c && c.name === error.failedCheck && 'diagnostics' in c) {
      return typeof c.diagnostics === 'string' ? c.diagnostics : null;
    }
  }
  return null;
}

// ── Factory ─────────────────────────────────────────────────────────────────

let _instance: Renderer | null = null;

/**
 * Get the global Renderer instance.
 * Defaults to InteractiveRenderer; use `setRenderer` to override.
 */
export function getRenderer(): Renderer {
  if (!_instance) {
    _instance = process.env.GANTRY_QUIET === '1' ? new QuietRenderer() : new InteractiveRenderer();
  }
  return _instance;
}

/**
 * Override the global Renderer (e.g., for testing).
 */
export function setRenderer(renderer: Renderer): void {
  _instance = renderer;
}

export function createRenderer(opts: { quiet?: boolean } = {}): Renderer {
  const r = opts.quiet ? new QuietRenderer() : new InteractiveRenderer();
  _instance = r;
  return r;
}
