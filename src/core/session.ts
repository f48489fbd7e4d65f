import type { SessionMode } from './lifecycle/states.js';
import { DEFAULT_DIFF_CAP } from './policy/diff-guard.js';
import { defaultRoles, type RoleTable } from './policy/roles.js';

/**
 * Everything a session needs to know, fixed at construction and handed to the
 * scheduler and lifecycle explicitly.
 */
export interface SessionConfig {
  sessionId: string;
  repoRoot: string;
  mode: SessionMode;
  interactive: boolean;
  roles: RoleTable;
  docsRoot: string;
  diffCap: number;
  /** Per agent call; unset means unbounded. */
  agentTimeoutMs?: number;
  /** Per check; unset means unbounded. */
  checkTimeoutMs?: number;
  /** Extra developer attempts after a failed check run. */
  maxCheckRetries: number;
}

export type SessionConfigInput = Pick<SessionConfig, 'sessionId' | 'repoRoot'> & Partial<Omit<SessionConfig, 'sessionId' | 'repoRoot'>>;

export function createSessionConfig(input: SessionConfigInput): SessionConfig {
  const docsRoot = input.docsRoot ?? 'docs';
  return {
    sessionId: input.sessionId,
    repoRoot: input.repoRoot,
    mode: input.mode ?? 'run',
    interactive: input.interactive ?? false,
    roles: input.roles ?? defaultRoles(docsRoot),
    docsRoot,
    diffCap: input.diffCap ?? DEFAULT_DIFF_CAP,
    agentTimeoutMs: input.agentTimeoutMs,
    checkTimeoutMs: input.checkTimeoutMs,
    maxCheckRetries: input.maxCheckRetries ?? 0
  };
}
