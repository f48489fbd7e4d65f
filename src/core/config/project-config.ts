import { join } from 'node:path';
import { z } from 'zod';

import { readYamlIfExists } from '../../utils/fs.js';
import { ValidationError, errorMessage, type ValidationIssue } from '../errors.js';
import { DEFAULT_DIFF_CAP } from '../policy/diff-guard.js';
import { RoleIdSchema, RoleOverrideSchema, defaultRoles, mergeRoles, type RoleTable } from '../policy/roles.js';
import { workspacePaths } from '../../workspace/layout.js';

export const DEFAULT_BACKLOG_PATH = 'docs/tasks/backlog.yaml';
export const LEGACY_CONFIG_PATH = 'docs/orchestrator.yaml';

const CommandSchema = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]);

export const CheckSpecSchema = z.object({
  name: z.string().trim().min(1),
  /** A shell string, or argv with the executable first. */
  cmd: CommandSchema,
  timeoutMs: z.number().int().positive().optional()
});
export type CheckSpec = z.infer<typeof CheckSpecSchema>;

export const AgentSpecSchema = z.object({
  command: CommandSchema,
  timeoutMs: z.number().int().positive().optional(),
  env: z.record(z.string(), z.string()).default({})
});
export type AgentSpec = z.infer<typeof AgentSpecSchema>;

export const ProjectConfigSchema = z
  .object({
    diffCap: z.number().int().positive().default(DEFAULT_DIFF_CAP),
    docsRoot: z.string().min(1).default('docs'),
    backlogPath: z.string().min(1).default(DEFAULT_BACKLOG_PATH),
    agent: AgentSpecSchema.optional(),
    checks: z.array(CheckSpecSchema).optional(),
    checkTimeoutMs: z.number().int().positive().optional(),
    maxCheckRetries: z.number().int().min(0).default(0),
    roles: z.record(RoleIdSchema, RoleOverrideSchema).default({})
  })
  .strict();

export type ProjectConfigFile = z.infer<typeof ProjectConfigSchema>;

export interface ProjectConfig extends Omit<ProjectConfigFile, 'checks' | 'roles'> {
  checks: CheckSpec[];
  /** Defaults with the file's overrides applied. */
  roles: RoleTable;
  /** Which file the checks came from, if any. */
  checksSource: string | null;
}

const LegacyConfigSchema = z.object({ checks: z.array(CheckSpecSchema).default([]) }).passthrough();

/**
 * Load `.gantry/config.yaml` (optional). When it declares no checks, the `checks`
 * list of `docs/orchestrator.yaml` is used instead.
 */
export async function loadProjectConfig(repoRoot: string): Promise<ProjectConfig> {
  const configPath = workspacePaths(repoRoot).configPath;
  const file = parseWith(ProjectConfigSchema, await readConfigYaml(configPath), configPath);
  const { checks: declared, roles: overrides, ...rest } = file;

  let checks: CheckSpec[] = declared ?? [];
  let checksSource: string | null = declared ? configPath : null;
  if (!declared) {
    const legacyPath = join(repoRoot, LEGACY_CONFIG_PATH);
    const legacyRaw = await readConfigYaml(legacyPath, null);
    if (legacyRaw !== null) {
      checks = parseWith(LegacyConfigSchema, legacyRaw, legacyPath).checks;
      checksSource = legacyPath;
    }
  }

  const names = new Set<string>();
  for (const c of checks) {
    if (names.has(c.name)) {
      throw new ValidationError(`Duplicate check name '${c.name}'`, [{ path: 'checks', message: `duplicate name '${c.name}'` }]);
    }
    names.add(c.name);
  }

  return {
    ...rest,
    checks,
    checksSource,
    roles: mergeRoles(defaultRoles(rest.docsRoot), overrides)
  };
}

async function readConfigYaml(path: string, fallback: unknown = {}): Promise<unknown> {
  try {
    return (await readYamlIfExists(path, fallback)) ?? fallback;
  } catch (err) {
    throw new ValidationError(`Cannot parse ${path}: ${errorMessage(err)}`, [{ path: '(root)', message: errorMessage(err) }], { file: path });
  }
}

function parseWith<T extends z.ZodTypeAny>(schema: T, raw: unknown, file: string): z.infer<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues: ValidationIssue[] = parsed.error.issues.map((i) => ({ path: i.path.join('.') || '(root)', message: i.message }));
    throw new ValidationError(`Invalid configuration in ${file} (${issues.length} issue${issues.length === 1 ? '' : 's'})`, issues, { file });
  }
  return parsed.data;
}
