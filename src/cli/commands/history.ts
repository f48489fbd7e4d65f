import { resolve } from 'node:path';

import { AuditReader } from '../../core/audit/reader.js';
import { SESSION_STAGE, SessionStartedData, type AuditEntry } from '../../core/audit/types.js';
import { listSessionIds, sessionPaths } from '../../workspace/layout.js';
import { getRenderer } from '../ui/renderer.js';
import { theme, INDENT } from '../ui/theme.js';
import { formatMs, padRight } from '../ui/format.js';
import { formatEntry } from './status.js';

export interface HistoryCommandOptions {
  repoRoot?: string;
  detailSessionId?: string;
}

export interface SessionSummaryRow {
  id: string;
  mode: string;
  finished: boolean;
  committed: number;
  aborted: number;
  durationMs: number | null;
}

/**
 * `gantry history`: one line per session, summarized from its audit log.
 * `--detail <session-id>` prints the full timeline instead.
 */
export async function runHistoryCommand(opts: HistoryCommandOptions): Promise<{ ok: boolean; details?: unknown }> {
  const r = getRenderer();
  const repoRoot = resolve(opts.repoRoot ?? process.cwd());

  if (opts.detailSessionId) {
    const sessionId = opts.detailSessionId;
    const reader = new AuditReader(sessionPaths(repoRoot, sessionId).auditPath);
    const { entries, warnings } = await reader.readAllSafe();
    const integrity = await reader.verifyIntegrity();

    r.text(`${INDENT}${theme.bold(`History: ${sessionId}`)}`);
    r.blank();
    if (!integrity.ok) r.warn(`Audit integrity: ${integrity.message ?? 'failed'}`);
    for (const w of warnings) r.warn(w);

    if (entries.length === 0) {
      r.dim('No audit entries found.');
    } else {
      for (const e of entries) r.text(`${INDENT}  ${theme.dim(String(e.seq).padStart(4))}  ${formatEntry(e)}`);
    }
    r.blank();
    return { ok: true, details: { entries: entries.length } };
  }

  const ids = await listSessionIds(repoRoot);
  if (ids.length === 0) {
    r.dim('No sessions found.');
    return { ok: true, details: 'No sessions found.' };
  }

  const rows: SessionSummaryRow[] = [];
  for (const id of ids) {
    const { entries } = await new AuditReader(sessionPaths(repoRoot, id).auditPath).readAllSafe();
    rows.push(summarizeSession(id, entries));
  }

  r.text(`${INDENT}${theme.bold('Sessions')}`);
  r.blank();
  const idWidth = Math.max(...rows.map((s) => s.id.length), 6) + 2;
  for (const s of rows) {
    const state = s.finished ? theme.success(padRight('finished', 12)) : theme.warning(padRight('incomplete', 12));
    const duration = s.durationMs != null ? formatMs(s.durationMs) : theme.dim('unknown');
    r.text(
      `${INDENT}  ${padRight(s.id, idWidth)}${padRight(s.mode, 11)}${state}` +
        `${theme.dim('committed=')}${s.committed}  ${theme.dim('aborted=')}${s.aborted}  ${theme.dim('duration=')}${duration}`
    );
  }

  r.blank();
  r.dim('Run `gantry history --detail <session-id>` for the full timeline.');
  r.blank();
  return { ok: true, details: rows };
}

export function summarizeSession(id: string, entries: readonly AuditEntry[]): SessionSummaryRow {
  const sessionEntries = entries.filter((e) => e.taskId === null && e.stage === SESSION_STAGE);
  const started = sessionEntries.map((e) => SessionStartedData.safeParse(e.data)).find((p) => p.success);
  const finished = sessionEntries.find((e) => e.data.event === 'finished');

  const first = entries.length ? Date.parse(entries[0].timestamp) : Number.NaN;
  const last = entries.length ? Date.parse(entries[entries.length - 1].timestamp) : Number.NaN;

  return {
    id,
    mode: started?.success ? started.data.mode : 'unknown',
    finished: finished !== undefined,
    committed: entries.filter((e) => e.taskId !== null && e.outcome === 'committed').length,
    aborted: entries.filter((e) => e.taskId !== null && (e.outcome === 'aborted' || (e.outcome === 'rejected' && e.data.retrying !== true)))
      .length,
    durationMs: Number.isFinite(first) && Number.isFinite(last) ? Math.max(0, last - first) : null
  };
}
