import { describe, expect, it } from 'vitest';
import { mkdir, mkdtemp, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { initSession, listSessionIds, resolveSessionId, sessionPaths, workspacePaths } from '../src/workspace/layout.js';

describe('workspace layout', () => {
  it('places engine files under .gantry', () => {
    const ws = workspacePaths('/repo');
    expect(ws.configPath).toBe(join('/repo', '.gantry', 'config.yaml'));
    expect(ws.donePath).toBe(join('/repo', '.gantry', 'state', 'done.yaml'));
    expect(ws.problemsPath).toBe(join('/repo', '.gantry', 'state', 'problems.yaml'));
    expect(sessionPaths('/repo', 's-20261018-001').auditPath).toBe(join('/repo', '.gantry', 'sessions', 's-20261018-001', 'audit.jsonl'));
  });

  it('allocates consecutive session directories', async () => {
    const repoRoot = await mkdtemp(join(tmpdir(), 'gantry-ws-'));
    const now = new Date('2026-10-18T09:00:00Z');

    const first = await initSession(repoRoot, now);
    const second = await initSession(repoRoot, now);

    expect(first.sessionId).toBe('s-20261018-001');
    expect(second.sessionId).toBe('s-20261018-002');
    expect((await stat(second.sessionDir)).isDirectory()).toBe(true);
  });

  it('lists only session directories and resolves the latest', async () => {
    const repoRoot = await mkdtemp(join(tmpdir(), 'gantry-ws-'));
    expect(await listSessionIds(repoRoot)).toEqual([]);
    expect(await resolveSessionId(repoRoot)).toBeNull();

    const sessions = workspacePaths(repoRoot).sessionsDir;
    for (const name of ['s-20261018-002', 's-20261017-005', 'scratch']) await mkdir(join(sessions, name), { recursive: true });

    expect(await listSessionIds(repoRoot)).toEqual(['s-20261017-005', 's-20261018-002']);
    expect(await resolveSessionId(repoRoot)).toBe('s-20261018-002');
    expect(await resolveSessionId(repoRoot, 's-20261017-005')).toBe('s-20261017-005');
  });
});
