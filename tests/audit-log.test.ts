import { describe, expect, it } from 'vitest';
import { appendFile, mkdtemp, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { ApprovalRequest } from '../src/core/approval.js';
import { AuditLog } from '../src/core/audit/log.js';
import { AuditReader } from '../src/core/audit/reader.js';
import { AuditWriter } from '../src/core/audit/writer.js';
import { OperatorRejected, StorageFailure } from '../src/core/errors.js';
import { MemoryAuditSink, RecordingApprovals } from './fakes.js';

const SESSION = 's-20261018-001';

function request(stage: ApprovalRequest['stage'] = 'BranchCreated'): ApprovalRequest {
  return { sessionId: SESSION, taskId: 'A', title: 'A', stage, changeSet: [], size: 0 };
}

describe('audit writer and reader', () => {
  it('appends JSONL entries with a monotonic seq and verifies integrity', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'gantry-audit-'));
    const auditPath = join(dir, 'sessions', SESSION, 'audit.jsonl');

    const writer = await AuditWriter.open(auditPath, SESSION);
    const e1 = await writer.append({ taskId: null, stage: 'session', outcome: 'approved', data: { event: 'started' } });
    const e2 = await writer.append({ taskId: 'A', stage: 'BranchCreated', outcome: 'proposed' });

    expect(e1.seq).toBe(1);
    expect(e2.seq).toBe(2);
    expect(e1.timestamp).toMatch(/Z$/);
    expect(e2.sessionId).toBe(SESSION);
    expect(e2.data).toEqual({});

    const reader = new AuditReader(auditPath);
    expect(await reader.readAll()).toHaveLength(2);
    expect(await reader.verifyIntegrity()).toEqual({ ok: true });
    expect((await reader.forTask('A')).map((e) => e.seq)).toEqual([2]);
    expect((await reader.tail(1))[0].seq).toBe(2);
  });

  it('continues the sequence when a log is reopened', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'gantry-audit-'));
    const auditPath = join(dir, 'audit.jsonl');

    const first = await AuditWriter.open(auditPath, SESSION);
    await first.append({ taskId: 'A', stage: 'BranchCreated', outcome: 'proposed' });
    const second = await AuditWriter.open(auditPath, SESSION);
    const entry = await second.append({ taskId: 'A', stage: 'BranchCreated', outcome: 'approved' });

    expect(entry.seq).toBe(2);
    const lines = (await readFile(auditPath, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(2);
  });

  it('detects sequence gaps', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'gantry-audit-'));
    const auditPath = join(dir, 'audit.jsonl');
    const ts = new Date().toISOString();

    await writeFile(
      auditPath,
      `${JSON.stringify({ seq: 1, timestamp: ts, sessionId: SESSION, taskId: null, stage: 'session', outcome: 'approved', data: {} })}\n` +
        `${JSON.stringify({ seq: 3, timestamp: ts, sessionId: SESSION, taskId: 'A', stage: 'Committed', outcome: 'committed', data: {} })}\n`,
      'utf8'
    );

    const integrity = await new AuditReader(auditPath).verifyIntegrity();
    expect(integrity).toEqual({ ok: false, message: 'Sequence gap at index 1 (expected seq=2, got 3)' });
  });

  it('skips a torn trailing line and reports it', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'gantry-audit-'));
    const auditPath = join(dir, 'audit.jsonl');
    const writer = await AuditWriter.open(auditPath, SESSION);
    await writer.append({ taskId: 'A', stage: 'BranchCreated', outcome: 'proposed' });
    await appendFile(auditPath, '{"seq":2,"timest', 'utf8');

    const { entries, warnings } = await new AuditReader(auditPath).readAllSafe();
    expect(entries).toHaveLength(1);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatch(/^audit parse failed at line 2 \(last line\)/);

    const reopened = await AuditWriter.open(auditPath, SESSION);
    expect((await reopened.append({ taskId: 'A', stage: 'BranchCreated', outcome: 'approved' })).seq).toBe(2);
  });

  it('reads a missing log as empty', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'gantry-audit-'));
    expect(await new AuditReader(join(dir, 'none.jsonl')).readAll()).toEqual([]);
  });
});

describe('audit log gates', () => {
  it('approves at once when the session is not interactive', async () => {
    const approvals = new RecordingApprovals([{ decision: 'reject', by: 'operator' }]);
    const log = new AuditLog(new MemoryAuditSink(), { interactive: false, approvals });
    const proposal = await log.append({ taskId: 'A', stage: 'BranchCreated', outcome: 'proposed' });

    expect(await log.awaitApproval(proposal, request())).toEqual({ decision: 'approve', by: 'auto' });
    expect(approvals.requests).toHaveLength(0);
  });

  it('asks the channel when interactive', async () => {
    const approvals = new RecordingApprovals([{ decision: 'reject', by: 'operator', notes: 'no' }]);
    const log = new AuditLog(new MemoryAuditSink(), { interactive: true, approvals });
    const proposal = await log.append({ taskId: 'A', stage: 'BranchCreated', outcome: 'proposed' });

    expect(await log.awaitApproval(proposal, request())).toEqual({ decision: 'reject', by: 'operator', notes: 'no' });
    expect(approvals.requests).toEqual([request()]);
  });

  it('only answers the most recent proposal for a stage', async () => {
    const log = new AuditLog(new MemoryAuditSink(), { interactive: false });
    const stale = await log.append({ taskId: 'A', stage: 'Implemented', outcome: 'proposed' });
    await log.append({ taskId: 'A', stage: 'Implemented', outcome: 'proposed' });
    const approved = await log.append({ taskId: 'A', stage: 'Implemented', outcome: 'approved' });

    await expect(log.awaitApproval(stale, request('Implemented'))).rejects.toThrow(
      'Entry seq=1 is not the most recent proposal for Implemented'
    );
    await expect(log.awaitApproval(approved, request('Implemented'))).rejects.toThrow('awaitApproval expects a proposed entry');
  });

  it('treats cancellation and a failed prompt as operator rejection', async () => {
    const controller = new AbortController();
    controller.abort();
    const failing = { decide: async () => Promise.reject(new Error('prompt closed')) };

    const cancelled = new AuditLog(new MemoryAuditSink(), { interactive: true, approvals: new RecordingApprovals() });
    const p1 = await cancelled.append({ taskId: 'A', stage: 'BranchCreated', outcome: 'proposed' });
    await expect(cancelled.awaitApproval(p1, request(), controller.signal)).rejects.toBeInstanceOf(OperatorRejected);

    const broken = new AuditLog(new MemoryAuditSink(), { interactive: true, approvals: failing });
    const p2 = await broken.append({ taskId: 'A', stage: 'BranchCreated', outcome: 'proposed' });
    await expect(broken.awaitApproval(p2, request())).rejects.toThrow('Approval prompt ended without a decision: prompt closed');
  });

  it('wraps sink errors as storage failures', async () => {
    const log = new AuditLog({ append: async () => Promise.reject(new Error('EIO')) }, { interactive: false });
    await expect(log.append({ taskId: 'A', stage: 'BranchCreated', outcome: 'proposed' })).rejects.toBeInstanceOf(StorageFailure);
    expect(log.entries()).toEqual([]);
  });
});
