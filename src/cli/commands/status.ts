import { resolve } from 'node:path';

import { AuditReader } from '../../core/audit/reader.js';
import { replayHistories } from '../../core/audit/replay.js';
import type { AuditEntry } from '../../core/audit/types.js';
import { resolveSessionId, sessionPaths } from '../../workspace/layout.js';
import { getRenderer } from '../ui/renderer.js';
import { theme, INDENT } from '../ui/theme.js';
import { formatTimestamp, keyValue, padRight } from '../ui/format.js';

export interface StatusCommandOptions {
  repoRoot?: string;
  sessionId?: string;
  tail?: number;
}

/**
 * `gantry status [session-id]`: task states rebuilt from a session's audit log,
 * followed by its most recent entries.
 */
export async function runStatusCommand(opts: StatusCommandOptions): Promise<{ ok: boolean; details?: unknown }> {
  const r = getRenderer();
  const repoRoot = resolve(opts.repoRoot ?? process.cwd());
  const sessionId = await resolveSessionId(repoRoot, opts.sessionId);
  if (!sessionId) return { ok: false, details: 'No sessions found under .gantry/sessions/' };

  const reader = new AuditReader(sessionPaths(repoRoot, sessionId).auditPath);
  const { entries, warnings } = await reader.readAllSafe();
  if (entries.length === 0 && warnings.length === 0) {
    return { ok: false, details: `Session ${sessionId} has no audit entries` };
  }
  const integrity = await reader.verifyIntegrity();
  const histories = replayHistories(entries);

  r.text(`${INDENT}${theme.bold(`Session ${sessionId}`)}`);
  r.blank();
  r.text(keyValue('Started', entries.length ? formatTimestamp(entries[0].timestamp) : theme.dim('unknown')));
  r.text(keyValue('Finished', sessionFinished(entries) ? 'yes' : theme.warning('no')));
  r.text(keyValue('Entries', String(entries.length)));
  if (!integrity.ok) r.warn(`Audit integrity: ${integrity.message ?? 'failed'}`);
  r.blank();

  // ── Tasks ─────────────────────────────────────────────────────────────────
  r.text(`${INDENT}${theme.bold('Tasks')}`);
  if (histories.size === 0) {
    r.text(`${INDENT}  ${theme.dim('(no tasks)')}`);
  } else {
    const width = Math.max(...Array.from(histories.keys()).map((id) => id.length), 6) + 2;
    for (const h of histories.values()) {
      const last = h.entries[h.entries.length - 1];
      const reason = last && typeof last.data.reason === 'string' ? `  ${theme.dim(last.data.reason)}` : '';
      r.text(`${INDENT}  ${padRight(h.taskId, width)}${theme.state(h.state)(padRight(h.state, 22))}${reason}`);
    }
  }
  r.blank();

  // ── Recent Entries ────────────────────────────────────────────────────────
  const tailN = opts.tail ?? 10;
  r.text(`${INDENT}${theme.bold('Recent Entries')} ${theme.dim(`(last ${tailN})`)}`);
  for (const w of warnings) r.text(`${INDENT}  ${theme.warning('⚠')} ${w}`);
  for (const e of entries.slice(Math.max(0, entries.length - tailN))) {
    r.text(`${INDENT}  ${formatEntry(e)}`);
  }
  r.blank();

  return { ok: true, details: Object.fromEntries(Array.from(histories.values()).map((h) => [h.taskId, h.state])) };
}

export function formatEntry(e: AuditEntry): string {
  const task = padRight(e.taskId ?? '-', 14);
  const stage = padRight(e.stage, 20);
  const detail = entryDetail(e.data);
  return `${theme.dim(formatTimestamp(e.timestamp))}  ${task}${stage}${padRight(e.outcome, 10)}${detail ? `  ${theme.dim(detail)}` : ''}`;
}

function entryDetail(data: Record<string, unknown>): string {
  const parts: string[] = [];
  if (typeof data.event === 'string') parts.push(data.event);
  if (typeof data.role === 'string') parts.push(data.role);
  if (typeof data.size === 'number') parts.push(`size=${data.size}`);
  if (typeof data.commit === 'string') parts.push(`commit=${data.commit.slice(0, 7)}`);
  if (typeof data.kind === 'string') parts.push(data.kind);
  if (typeof data.reason === 'string') parts.push(data.reason);
  if (typeof data.by === 'string') parts.push(`by=${data.by}`);
  return parts.join('  ');
}

function sessionFinished(entries: readonly AuditEntry[]): boolean {
  return entries.some((e) => e.taskId === null && e.data.event === 'finished');
}
