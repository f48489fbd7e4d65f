import { resolve } from 'node:path';

import { loadBacklog } from '../../core/backlog/reader.js';
import { taskTitle } from '../../core/backlog/types.js';
import { loadProjectConfig } from '../../core/config/project-config.js';
import { getRenderer } from '../ui/renderer.js';
import { theme, INDENT } from '../ui/theme.js';
import { keyValue, padRight } from '../ui/format.js';
import { describeError } from './run.js';

export interface ValidateCommandOptions {
  repoRoot?: string;
}

/**
 * `gantry validate`: load the configuration and backlog without touching the
 * repository, and print the execution order.
 */
export async function runValidateCommand(opts: ValidateCommandOptions): Promise<{ ok: boolean; details?: unknown }> {
  const r = getRenderer();
  const repoRoot = resolve(opts.repoRoot ?? process.cwd());

  try {
    const config = await loadProjectConfig(repoRoot);
    const graph = await loadBacklog(repoRoot, config.backlogPath);

    r.text(`${INDENT}${theme.bold('Backlog')} ${theme.dim(config.backlogPath)}`);
    r.blank();
    r.text(keyValue('Tasks', String(graph.tasks().length)));
    r.text(keyValue('Checks', config.checks.length ? config.checks.map((c) => c.name).join(', ') : theme.dim('(none)')));
    r.text(keyValue('Diff cap', String(config.diffCap)));
    r.text(keyValue('Agent', config.agent ? theme.success('configured') : theme.warning('not configured')));
    r.blank();

    const order = graph.order();
    const width = Math.max(...order.map((id) => id.length), 6) + 2;
    order.forEach((id, i) => {
      const t = graph.get(id);
      const deps = t.dependsOn.length ? theme.dim(` after ${t.dependsOn.join(', ')}`) : '';
      r.text(`${INDENT}  ${String(i + 1).padStart(3)}. ${padRight(id, width)}${padRight(t.category, 11)}${taskTitle(t)}${deps}`);
    });
    r.blank();
    r.success('Backlog is valid');
    return { ok: true, details: { order } };
  } catch (err) {
    return { ok: false, details: describeError(err) };
  }
}
