import { describe, expect, it } from 'vitest';
import { mkdtemp, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { CommandAgent, agentEnv, applyProposal, parseProposal } from '../src/core/agent/command-agent.js';
import type { AgentContext } from '../src/core/agent/types.js';
import { AgentFailure } from '../src/core/errors.js';
import { CancelledError } from '../src/utils/timeout.js';

function context(repoRoot: string): AgentContext {
  return {
    sessionId: 's-20261018-001',
    repoRoot,
    branch: 'task/T1',
    role: 'developer',
    stage: 'Implemented',
    task: { id: 'T1', title: 'Add greeting', description: '', dependsOn: [], category: 'run' },
    allowedPaths: ['**'],
    excludedPaths: ['tests/**'],
    priorChanges: []
  };
}

/** Argv running an inline Node.js script. */
function nodeScript(source: string): string[] {
  return [process.execPath, '-e', source];
}

describe('parseProposal', () => {
  it('reads a fenced YAML block', () => {
    const output = [
      'Here is my change.',
      '```yaml',
      'proposed_changes:',
      '  - path: src/greet.ts',
      '    content: |',
      '      export const hi = 1;',
      'summary: adds greeting',
      '```',
      'done'
    ].join('\n');
    expect(parseProposal(output)).toEqual({
      proposed_changes: [{ path: 'src/greet.ts', content: 'export const hi = 1;\n' }],
      problems: [],
      summary: 'adds greeting'
    });
  });

  it('reads bare YAML and normalizes problems', () => {
    expect(parseProposal('problems:\n  - "  Which port?  "\n  - 42\n  - ""\n')).toEqual({
      proposed_changes: [],
      problems: ['Which port?', '42']
    });
  });

  it('treats output that is not a proposal as empty', () => {
    const empty = { proposed_changes: [], problems: [] };
    expect(parseProposal('')).toEqual(empty);
    expect(parseProposal('I edited the files directly.')).toEqual(empty);
    expect(parseProposal('key: [unclosed')).toEqual(empty);
    expect(parseProposal('- a\n- b\n')).toEqual(empty);
  });

  it('fails on a proposal with the wrong shape', () => {
    expect(() => parseProposal('proposed_changes:\n  - content: x\n')).toThrow(AgentFailure);
    expect(() => parseProposal('proposed_changes: nope\n')).toThrow(/^Malformed agent proposal: proposed_changes: /);
  });
});

describe('applyProposal', () => {
  it('writes files and reports their line counts', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'gantry-agent-'));
    const written = await applyProposal(dir, [
      { path: 'src/b.ts', content: 'one\ntwo\n' },
      { path: './src/a.ts', content: 'x' },
      { path: 'docs/empty.md', content: '' }
    ]);

    expect(written).toEqual([
      { path: 'docs/empty.md', additions: 0, deletions: 0 },
      { path: 'src/a.ts', additions: 1, deletions: 0 },
      { path: 'src/b.ts', additions: 2, deletions: 0 }
    ]);
    expect(await readFile(join(dir, 'src', 'b.ts'), 'utf8')).toBe('one\ntwo\n');
  });

  it('writes nothing when any path escapes the repository', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'gantry-agent-'));
    await expect(
      applyProposal(dir, [
        { path: 'src/ok.ts', content: 'x' },
        { path: '../outside.ts', content: 'x' },
        { path: '/etc/hosts', content: 'x' }
      ])
    ).rejects.toThrow('Proposed paths escape the repository: ../outside.ts, /etc/hosts');
    await expect(readFile(join(dir, 'src', 'ok.ts'), 'utf8')).rejects.toThrow();
  });

  it('allows names that merely start with two dots', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'gantry-agent-'));
    expect(await applyProposal(dir, [{ path: '..notes.md', content: 'n\n' }])).toEqual([{ path: '..notes.md', additions: 1, deletions: 0 }]);
  });
});

describe('CommandAgent', () => {
  it('exports the task context as environment variables', () => {
    expect(agentEnv(context('/repo'), 'Implemented')).toEqual({
      GANTRY_SESSION_ID: 's-20261018-001',
      GANTRY_TASK_ID: 'T1',
      GANTRY_ROLE: 'developer',
      GANTRY_STAGE: 'Implemented',
      GANTRY_BRANCH: 'task/T1',
      GANTRY_ALLOWED_PATHS: '**',
      GANTRY_EXCLUDED_PATHS: 'tests/**'
    });
  });

  it('passes the context on stdin and applies the printed proposal', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'gantry-agent-'));
    const script = [
      "let input = '';",
      "process.stdin.on('data', (c) => { input += c; });",
      "process.stdin.on('end', () => {",
      '  const ctx = JSON.parse(input);',
      "  const body = 'task ' + ctx.task.id + ' at ' + ctx.stage + ' by ' + process.env.GANTRY_ROLE;",
      "  console.log('proposed_changes:');",
      "  console.log('  - path: src/out.txt');",
      "  console.log('    content: ' + JSON.stringify(body + '\\n'));",
      '});'
    ].join('\n');

    const agent = new CommandAgent({ command: nodeScript(script) });
    const result = await agent.propose(context(dir), 'Implemented');

    expect(result).toEqual({ changeSet: [{ path: 'src/out.txt', additions: 1, deletions: 0 }], problems: [] });
    expect(await readFile(join(dir, 'src', 'out.txt'), 'utf8')).toBe('task T1 at Implemented by developer\n');
  });

  it('fails on a non-zero exit with the tail of stderr', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'gantry-agent-'));
    const agent = new CommandAgent({ command: nodeScript("console.error('no credentials'); process.exit(3);") });

    const err = await agent.propose(context(dir), 'Implemented').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AgentFailure);
    if (err instanceof AgentFailure) {
      expect(err.message).toBe('Agent command exited with code 3');
      expect(err.details.stderr).toBe('no credentials');
    }
  });

  it('fails when the command outlives its timeout', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'gantry-agent-'));
    const agent = new CommandAgent({ command: nodeScript('setTimeout(() => {}, 10000);'), forceKillAfterMs: 100 });
    await expect(agent.propose(context(dir), 'Implemented', { timeoutMs: 200 })).rejects.toThrow(
      'Agent command timed out after 200ms'
    );
  });

  it('reports cancellation separately', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'gantry-agent-'));
    const controller = new AbortController();
    const agent = new CommandAgent({ command: nodeScript('setTimeout(() => {}, 10000);'), forceKillAfterMs: 100 });
    setTimeout(() => controller.abort(), 100);
    await expect(agent.propose(context(dir), 'Implemented', { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
  });

  it('refuses an empty command', () => {
    expect(() => new CommandAgent({ command: [] })).toThrow('CommandAgent needs a non-empty command');
  });
});
