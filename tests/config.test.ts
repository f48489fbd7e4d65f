import { describe, expect, it } from 'vitest';
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { DEFAULT_BACKLOG_PATH, loadProjectConfig } from '../src/core/config/project-config.js';
import { loadBacklog } from '../src/core/backlog/reader.js';
import { ValidationError } from '../src/core/errors.js';
import { writeText } from '../src/utils/fs.js';

async function repo(files: Record<string, string>): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'gantry-config-'));
  for (const [path, content] of Object.entries(files)) await writeText(join(dir, path), content);
  return dir;
}

describe('project config', () => {
  it('falls back to defaults without a config file', async () => {
    const dir = await repo({});
    const config = await loadProjectConfig(dir);

    expect(config.diffCap).toBe(300);
    expect(config.docsRoot).toBe('docs');
    expect(config.backlogPath).toBe(DEFAULT_BACKLOG_PATH);
    expect(config.maxCheckRetries).toBe(0);
    expect(config.checks).toEqual([]);
    expect(config.checksSource).toBeNull();
    expect(config.agent).toBeUndefined();
    expect(config.roles.tester.paths).toEqual(['tests/**', 'docs/tests/**']);
  });

  it('reads agent, checks and role overrides', async () => {
    const dir = await repo({
      '.gantry/config.yaml': [
        'diffCap: 500',
        'docsRoot: handbook',
        'agent:',
        '  command: ["my-agent", "--json"]',
        '  timeoutMs: 120000',
        'checks:',
        '  - name: lint',
        '    cmd: npm run lint',
        '  - name: unit',
        '    cmd: [npm, test]',
        '    timeoutMs: 60000',
        'roles:',
        '  tester:',
        '    paths: ["spec/**"]',
        ''
      ].join('\n')
    });
    const config = await loadProjectConfig(dir);

    expect(config.diffCap).toBe(500);
    expect(config.agent).toEqual({ command: ['my-agent', '--json'], timeoutMs: 120000, env: {} });
    expect(config.checks).toEqual([
      { name: 'lint', cmd: 'npm run lint' },
      { name: 'unit', cmd: ['npm', 'test'], timeoutMs: 60000 }
    ]);
    expect(config.checksSource).toBe(join(dir, '.gantry', 'config.yaml'));
    expect(config.roles.tester).toEqual({ paths: ['spec/**'], exclude: [], stages: ['TestsGenerated'] });
    expect(config.roles.architect.paths).toEqual(['handbook/**']);
  });

  it('takes checks from the legacy file when the config declares none', async () => {
    const dir = await repo({
      'docs/orchestrator.yaml': 'checks:\n  - name: build\n    cmd: make\nother: ignored\n'
    });
    const config = await loadProjectConfig(dir);
    expect(config.checks).toEqual([{ name: 'build', cmd: 'make' }]);
    expect(config.checksSource).toBe(join(dir, 'docs', 'orchestrator.yaml'));
  });

  it('rejects unknown keys', async () => {
    const dir = await repo({ '.gantry/config.yaml': 'diffcap: 10\n' });
    await expect(loadProjectConfig(dir)).rejects.toThrow(/^Invalid configuration in .*config\.yaml \(1 issue\)$/);
  });

  it('rejects duplicate check names', async () => {
    const dir = await repo({ '.gantry/config.yaml': 'checks:\n  - { name: t, cmd: a }\n  - { name: t, cmd: b }\n' });
    await expect(loadProjectConfig(dir)).rejects.toThrow("Duplicate check name 't'");
  });

  it('reports YAML that does not parse', async () => {
    const dir = await repo({ '.gantry/config.yaml': 'checks: [\n' });
    await expect(loadProjectConfig(dir)).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('backlog reader', () => {
  it('reads the backlog file', async () => {
    const dir = await repo({
      'docs/tasks/backlog.yaml': 'tasks:\n  - id: A\n    title: First\n  - id: B\n    depends_on: [A]\n'
    });
    const graph = await loadBacklog(dir, DEFAULT_BACKLOG_PATH);
    expect(graph.order()).toEqual(['A', 'B']);
  });

  it('reads an empty file as an empty backlog', async () => {
    const dir = await repo({ 'docs/tasks/backlog.yaml': '' });
    expect((await loadBacklog(dir, DEFAULT_BACKLOG_PATH)).tasks()).toEqual([]);
  });

  it('fails with a validation error when the file is missing', async () => {
    const dir = await repo({});
    await expect(loadBacklog(dir, DEFAULT_BACKLOG_PATH)).rejects.toThrow(/^Cannot read backlog docs\/tasks\/backlog\.yaml: /);
  });
});
