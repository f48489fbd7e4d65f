import { join } from 'node:path';

import { readYaml } from '../../utils/fs.js';
import { ValidationError, errorMessage } from '../errors.js';
import { BacklogGraph, type BacklogLoadOptions } from './graph.js';

/** Read and validate the backlog file at `backlogPath` (repo-relative). */
export async function loadBacklog(repoRoot: string, backlogPath: string, options: BacklogLoadOptions = {}): Promise<BacklogGraph> {
  const abs = join(repoRoot, backlogPath);
  let raw: unknown;
  try {
    raw = await readYaml(abs);
  } catch (err) {
    throw new ValidationError(`Cannot read backlog ${backlogPath}: ${errorMessage(err)}`, [{ path: '(root)', message: errorMessage(err) }], {
      file: backlogPath
    });
  }
  // An empty file is an empty backlog.
  return BacklogGraph.load(raw ?? [], options);
}
