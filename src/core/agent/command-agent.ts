import { execa } from 'execa';
import { isAbsolute, relative, resolve } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';

import { writeText } from '../../utils/fs.js';
import { CancelledError } from '../../utils/timeout.js';
import { normalizePath, type ChangeEntry } from '../changeset.js';
import { AgentFailure, errorMessage } from '../errors.js';
import type { TaskState } from '../lifecycle/states.js';
import type { AgentCapability, AgentContext, AgentInvokeOptions, AgentResult } from './types.js';

const ProposedFileSchema = z.object({
  path: z.string().trim().min(1),
  content: z.string().default('')
});

const ProposalSchema = z.object({
  proposed_changes: z
    .array(ProposedFileSchema)
    .nullish()
    .transform((v) => v ?? []),
  problems: z
    .array(z.union([z.string(), z.number()]).transform((v) => String(v).trim()))
    .nullish()
    .transform((v) => (v ?? []).filter((p) => p.length > 0)),
  summary: z.string().optional()
});

export type ProposedFile = z.infer<typeof ProposedFileSchema>;
export type Proposal = z.infer<typeof ProposalSchema>;

export interface CommandAgentOptions {
  /** A shell string, or argv with the executable first. */
  command: string | readonly string[];
  env?: Record<string, string>;
  /** Grace period between SIGTERM and SIGKILL once a call is cut short. */
  forceKillAfterMs?: number;
}

const OUTPUT_TAIL_CHARS = 4_000;

/**
 * Runs an external command as the agent. The task context goes in as JSON on stdin
 * and as `GANTRY_*` variables. The command may edit the working tree itself, print a
 * YAML proposal on stdout for the engine to apply, or both.
 */
export class CommandAgent implements AgentCapability {
  constructor(private readonly opts: CommandAgentOptions) {
    if (typeof opts.command !== 'string' && opts.command.length === 0) {
      throw new Error('CommandAgent needs a non-empty command');
    }
  }

  async propose(context: AgentContext, stage: TaskState, options: AgentInvokeOptions = {}): Promise<AgentResult> {
    const env = { ...this.opts.env, ...agentEnv(context, stage) };
    const input = JSON.stringify({ ...context, stage });
    const common = {
      cwd: context.repoRoot,
      env,
      input,
      reject: false,
      stdout: 'pipe',
      stderr: 'pipe',
      killSignal: 'SIGTERM',
      forceKillAfterDelay: this.opts.forceKillAfterMs ?? 5_000,
      ...(options.timeoutMs ? { timeout: options.timeoutMs } : {}),
      ...(options.signal ? { cancelSignal: options.signal } : {})
    } as const;

    const command = this.opts.command;
    const result =
      typeof command === 'string'
        ? await execa(command, { ...common, shell: true })
        : await execa(command[0], command.slice(1), common);

    if (result.isCanceled) throw new CancelledError('Agent call cancelled');
    if (result.timedOut) {
      throw new AgentFailure(`Agent command timed out after ${options.timeoutMs}ms`, { stage, timeoutMs: options.timeoutMs });
    }
    if (result.exitCode !== 0) {
      throw new AgentFailure(`Agent command exited with code ${result.exitCode ?? 'unknown'}`, {
        stage,
        exitCode: result.exitCode,
        stderr: tail(result.stderr)
      });
    }

    const proposal = parseProposal(result.stdout);
    const changeSet = await applyProposal(context.repoRoot, proposal.proposed_changes);
    return {
      changeSet,
      problems: proposal.problems,
      ...(proposal.summary ? { summary: proposal.summary } : {})
    };
  }
}

export function agentEnv(context: AgentContext, stage: TaskState): Record<string, string> {
  return {
    GANTRY_SESSION_ID: context.sessionId,
    GANTRY_TASK_ID: context.task.id,
    GANTRY_ROLE: context.role,
    GANTRY_STAGE: stage,
    GANTRY_BRANCH: context.branch,
    GANTRY_ALLOWED_PATHS: context.allowedPaths.join(','),
    GANTRY_EXCLUDED_PATHS: context.excludedPaths.join(',')
  };
}

/**
 * Read a proposal from agent output. The YAML may be the whole output or sit in a
 * ```yaml fence. Output that carries neither `proposed_changes` nor `problems` is
 * not a proposal and reads as empty.
 */
export function parseProposal(output: string): Proposal {
  const text = extractYamlBlock(output) ?? output;
  if (!text.trim()) return ProposalSchema.parse({});

  let doc: unknown;
  try {
    doc = YAML.parse(text);
  } catch {
    return ProposalSchema.parse({});
  }
  if (!isProposalShaped(doc)) return ProposalSchema.parse({});

  const parsed = ProposalSchema.safeParse(doc);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new AgentFailure(`Malformed agent proposal: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}

/**
 * Write proposed files under `repoRoot`. Every path is checked before anything is
 * written; an absolute path or one that leaves the repository fails the whole batch.
 */
export async function applyProposal(repoRoot: string, files: readonly ProposedFile[]): Promise<ChangeEntry[]> {
  const root = resolve(repoRoot);
  const targets = files.map((f) => ({ file: f, rel: repoRelative(root, f.path) }));

  const escaping = targets.filter((t) => t.rel === null).map((t) => t.file.path);
  if (escaping.length > 0) {
    throw new AgentFailure(`Proposed paths escape the repository: ${escaping.join(', ')}`, { paths: escaping });
  }

  const out: ChangeEntry[] = [];
  for (const t of targets) {
    if (t.rel === null) continue;
    try {
      await writeText(resolve(root, t.rel), t.file.content);
    } catch (err) {
      throw new AgentFailure(`Cannot write proposed file ${t.rel}: ${errorMessage(err)}`, { path: t.rel }, { cause: err });
    }
    out.push({ path: t.rel, additions: countLines(t.file.content), deletions: 0 });
  }
  return out.sort((a, b) => a.path.localeCompare(b.path));
}

function repoRelative(root: string, proposed: string): string | null {
  const p = normalizePath(proposed);
  if (isAbsolute(p) || /^[A-Za-z]:/.test(p)) return null;
  const rel = relative(root, resolve(root, p));
  if (!rel || rel.split(/[\\/]/)[0] === '..' || isAbsolute(rel)) return null;
  return normalizePath(rel);
}

function isProposalShaped(doc: unknown): boolean {
  return typeof doc === 'object' && doc !== null && !Array.isArray(doc) && ('proposed_changes' in doc || 'problems' in doc);
}

function extractYamlBlock(output: string): string | null {
  const m = /```ya?ml\s*\n([\s\S]*?)```/.exec(output);
  return m ? m[1] : null;
}

function countLines(content: string): number {
  if (!content) return 0;
  const lines = content.split('\n').length;
  return content.endsWith('\n') ? lines - 1 : lines;
}

function tail(s: string): string {
  return s.length > OUTPUT_TAIL_CHARS ? s.slice(-OUTPUT_TAIL_CHARS) : s;
}
