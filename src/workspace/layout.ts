import { mkdir, readdir } from 'node:fs/promises';
import { join } from 'node:path';

import { nextSessionId, parseSessionId } from '../utils/id.js';

export const ENGINE_DIR = '.gantry';

export interface WorkspacePaths {
  repoRoot: string;
  engineDir: string;
  configPath: string;
  sessionsDir: string;
  stateDir: string;
  donePath: string;
  problemsPath: string;
}

export interface SessionPaths {
  repoRoot: string;
  sessionId: string;
  sessionDir: string;
  auditPath: string;
}

export function workspacePaths(repoRoot: string): WorkspacePaths {
  const engineDir = join(repoRoot, ENGINE_DIR);
  const stateDir = join(engineDir, 'state');
  return {
    repoRoot,
    engineDir,
    configPath: join(engineDir, 'config.yaml'),
    sessionsDir: join(engineDir, 'sessions'),
    stateDir,
    donePath: join(stateDir, 'done.yaml'),
    problemsPath: join(stateDir, 'problems.yaml')
  };
}

export function sessionPaths(repoRoot: string, sessionId: string): SessionPaths {
  const sessionDir = join(workspacePaths(repoRoot).sessionsDir, sessionId);
  return { repoRoot, sessionId, sessionDir, auditPath: join(sessionDir, 'audit.jsonl') };
}

export async function listSessionIds(repoRoot: string): Promise<string[]> {
  try {
    const entries = await readdir(workspacePaths(repoRoot).sessionsDir, { withFileTypes: true });
    return entries
      .filter((e) => e.isDirectory() && parseSessionId(e.name) !== null)
      .map((e) => e.name)
      .sort((a, b) => a.localeCompare(b));
  } catch {
    return [];
  }
}

/** The explicit id when given, otherwise the most recent session. */
export async function resolveSessionId(repoRoot: string, explicit?: string): Promise<string | null> {
  if (explicit) return explicit;
  const ids = await listSessionIds(repoRoot);
  return ids.length ? ids[ids.length - 1] : null;
}

/** Allocate the next session id and create its directory. */
export async function initSession(repoRoot: string, now: Date = new Date()): Promise<SessionPaths> {
  const sessionId = nextSessionId(await listSessionIds(repoRoot), now);
  const paths = sessionPaths(repoRoot, sessionId);
  await mkdir(paths.sessionDir, { recursive: true });
  return paths;
}
