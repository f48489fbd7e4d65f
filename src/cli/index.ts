#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { SessionMode } from '../core/lifecycle/states.js';
import { Logger } from '../utils/logger.js';
import { runHistoryCommand } from './commands/history.js';
import { runSessionCommand } from './commands/run.js';
import { runStatusCommand } from './commands/status.js';
import { runValidateCommand } from './commands/validate.js';
import { createRenderer, getRenderer } from './ui/renderer.js';

interface GlobalFlags {
  verbose: boolean;
  quiet: boolean;
  repo?: string;
}

interface SessionFlags {
  interactive?: boolean;
  task: string[];
  diffCap?: number;
}

export function buildCli(): Command {
  const program = new Command();
  let globalFlags: GlobalFlags = { verbose: false, quiet: false };

  const version = detectVersionSync() ?? '0.0.0';

  program
    .name('gantry')
    .description('Backlog-driven task orchestration with role-restricted, size-bounded, audited commits')
    .version(version, '-v, --version');

  program
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Machine-friendly output (JSON lines)')
    .option('-C, --repo <path>', 'Repository root (defaults to the current directory)');

  program.hook('preAction', (thisCommand) => {
    const o = thisCommand.opts<{ verbose?: boolean; quiet?: boolean; repo?: string }>();
    globalFlags = { verbose: o.verbose === true, quiet: o.quiet === true, repo: o.repo };
    process.env.GANTRY_VERBOSE = globalFlags.verbose ? '1' : '0';
    process.env.GANTRY_QUIET = globalFlags.quiet ? '1' : '0';
    createRenderer({ quiet: globalFlags.quiet });
  });

  // ── Sessions ─────────────────────────────────────────────────────────────

  const session = (mode: SessionMode) => async (opts: SessionFlags) => {
    const logger = new Logger({ level: globalFlags.verbose ? 'debug' : 'warn', json: globalFlags.quiet });
    const res = await runSessionCommand({
      repoRoot: globalFlags.repo,
      mode,
      interactive: opts.interactive === true,
      only: opts.task,
      diffCap: opts.diffCap,
      logger
    });
    const r = getRenderer();
    if (isCancelled(res.details)) {
      r.warn('Cancelled.');
      process.exitCode = 130;
      return;
    }
    if (!res.ok) {
      r.error(
        mode === 'bootstrap' ? 'Bootstrap failed' : 'Run failed',
        String(res.details ?? 'unknown error'),
        res.sessionId ? `Use \`gantry status ${res.sessionId}\` to inspect the session.` : 'Try running with --verbose for more details.'
      );
      process.exitCode = 1;
    }
  };

  program
    .command('run')
    .description('Run queued tasks: tests, implementation, checks, commit')
    .option('-i, --interactive', 'Ask the operator at every gate')
    .option('-t, --task <task-id>', 'Restrict the session to a task (repeatable)', collectRepeatable, [])
    .option('--diff-cap <lines>', 'Override the configured diff cap', parsePositiveInt)
    .action(session('run'));

  program
    .command('bootstrap')
    .description('Run bootstrap tasks: documentation edits only')
    .option('-i, --interactive', 'Ask the operator at every gate')
    .option('-t, --task <task-id>', 'Restrict the session to a task (repeatable)', collectRepeatable, [])
    .option('--diff-cap <lines>', 'Override the configured diff cap', parsePositiveInt)
    .action(session('bootstrap'));

  program
    .command('validate')
    .description('Check the configuration and backlog and print the execution order')
    .action(async () => {
      const res = await runValidateCommand({ repoRoot: globalFlags.repo });
      if (!res.ok) {
        getRenderer().error('Validation failed', String(res.details ?? 'unknown error'));
        process.exitCode = 1;
      }
    });

  // ── Observability ────────────────────────────────────────────────────────

  program
    .command('status')
    .description('Show task states of a session')
    .argument('[session-id]', 'Session id (defaults to latest)')
    .option('--tail <n>', 'Audit tail entries', parsePositiveInt, 10)
    .action(async (sessionId: string | undefined, opts: { tail: number }) => {
      const res = await runStatusCommand({ repoRoot: globalFlags.repo, sessionId, tail: opts.tail });
      if (!res.ok) {
        getRenderer().error('Status failed', String(res.details ?? 'unknown error'));
        process.exitCode = 1;
      }
    });

  program
    .command('history')
    .description('List past sessions')
    .option('--detail <session-id>', 'Print the full audit timeline of a session')
    .action(async (opts: { detail?: string }) => {
      const res = await runHistoryCommand({ repoRoot: globalFlags.repo, detailSessionId: opts.detail });
      if (!res.ok) {
        getRenderer().error('History failed', String(res.details ?? 'unknown error'));
        process.exitCode = 1;
      }
    });

  return program;
}

buildCli()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    getRenderer().error('Unexpected error', err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });

function isCancelled(details: unknown): boolean {
  return typeof details === 'object' && details !== null && 'reason' in details && details.reason === 'cancelled';
}

function detectVersionSync(): string | null {
  try {
    let current = dirname(fileURLToPath(import.meta.url));
    for (let i = 0; i < 8; i++) {
      const candidate = resolve(current, 'package.json');
      if (existsSync(candidate)) {
        const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
        if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
          return parsed.version;
        }
        return null;
      }
      const parent = resolve(current, '..');
      if (parent === current) break;
      current = parent;
    }
    return null;
  } catch {
    return null;
  }
}

function collectRepeatable(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('expected a positive integer');
  return n;
}
