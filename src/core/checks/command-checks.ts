import { execa } from 'execa';

import type { ChangeSet } from '../changeset.js';
import type { CheckSpec } from '../config/project-config.js';
import type { CheckResult, CheckRunOptions, ChecksCapability } from './types.js';

const DIAGNOSTIC_TAIL_CHARS = 8_000;

/**
 * Runs configured check commands in the repository, in order, stopping at the
 * first failure. A check passes when its command exits 0 within its timeout.
 */
export class CommandChecks implements ChecksCapability {
  constructor(
    private readonly repoRoot: string,
    private readonly specs: readonly CheckSpec[]
  ) {}

  async runChecks(changeSet: ChangeSet, options: CheckRunOptions = {}): Promise<CheckResult[]> {
    const results: CheckResult[] = [];
    for (const spec of this.specs) {
      if (options.signal?.aborted) break;
      const result = await this.runOne(spec, changeSet, options);
      results.push(result);
      if (!result.passed) break;
    }
    return results;
  }

  private async runOne(spec: CheckSpec, changeSet: ChangeSet, options: CheckRunOptions): Promise<CheckResult> {
    const timeoutMs = spec.timeoutMs ?? options.timeoutMs;
    const common = {
      cwd: this.repoRoot,
      reject: false,
      all: true,
      stdin: 'ignore',
      env: { GANTRY_CHANGED_PATHS: changeSet.map((e) => e.path).join('\n') },
      forceKillAfterDelay: 5_000,
      ...(timeoutMs ? { timeout: timeoutMs } : {}),
      ...(options.signal ? { cancelSignal: options.signal } : {})
    } as const;

    const started = Date.now();
    const res =
      typeof spec.cmd === 'string'
        ? await execa(spec.cmd, { ...common, shell: true })
        : await execa(spec.cmd[0], spec.cmd.slice(1), common);
    const durationMs = Date.now() - started;

    if (res.timedOut) {
      return { name: spec.name, passed: false, diagnostics: `timed out after ${timeoutMs}ms\n${tail(res.all)}`, durationMs, timedOut: true };
    }
    if (res.isCanceled) {
      return { name: spec.name, passed: false, diagnostics: 'cancelled', durationMs };
    }
    // A command that cannot be spawned has no exit code; the reason is in `shortMessage`.
    const spawnError = typeof res.shortMessage === 'string' ? res.shortMessage : 'failed to start';
    const diagnostics = res.exitCode === undefined ? spawnError : tail(res.all);
    return { name: spec.name, passed: res.exitCode === 0, diagnostics, durationMs };
  }
}

function tail(s: string | undefined): string {
  if (!s) return '';
  return s.length > DIAGNOSTIC_TAIL_CHARS ? s.slice(-DIAGNOSTIC_TAIL_CHARS) : s;
}
