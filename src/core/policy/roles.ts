import { z } from 'zod';

import { TaskStateSchema, type TaskState } from '../lifecycle/states.js';

export const RoleIdSchema = z.enum(['tester', 'developer', 'reviewer', 'architect']);
export type RoleId = z.infer<typeof RoleIdSchema>;

export const RoleDefinitionSchema = z.object({
  /** Globs the role may write. */
  paths: z.array(z.string().min(1)).min(1),
  /** Globs carved out of `paths`. */
  exclude: z.array(z.string().min(1)).default([]),
  /** Lifecycle stages the role may trigger. */
  stages: z.array(TaskStateSchema).default([])
});

export type RoleDefinition = z.infer<typeof RoleDefinitionSchema>;
export type RoleTable = Record<RoleId, RoleDefinition>;

export const RoleOverrideSchema = RoleDefinitionSchema.partial();
export type RoleOverride = z.infer<typeof RoleOverrideSchema>;

/** Which role acts for each agent- or review-driven stage. */
export const STAGE_ACTORS: Partial<Record<TaskState, RoleId>> = {
  TestsGenerated: 'tester',
  Implemented: 'developer',
  DocumentationEdited: 'architect',
  Committed: 'reviewer'
};

export function defaultRoles(docsRoot: string = 'docs'): RoleTable {
  const docs = trimSlashes(docsRoot);
  return {
    tester: { paths: ['tests/**', `${docs}/tests/**`], exclude: [], stages: ['TestsGenerated'] },
    developer: { paths: ['**'], exclude: ['tests/**', `${docs}/tests/**`], stages: ['Implemented'] },
    reviewer: { paths: ['**'], exclude: [], stages: ['Committed'] },
    architect: { paths: [`${docs}/**`], exclude: [], stages: ['DocumentationEdited'] }
  };
}

/** Field-wise override: a field present in the override replaces the default one. */
export function mergeRoles(base: RoleTable, overrides: Partial<Record<RoleId, RoleOverride>> = {}): RoleTable {
  const out: RoleTable = { ...base };
  for (const id of RoleIdSchema.options) {
    const o = overrides[id];
    if (!o) continue;
    out[id] = {
      paths: o.paths ?? base[id].paths,
      exclude: o.exclude ?? base[id].exclude,
      stages: o.stages ?? base[id].stages
    };
  }
  return out;
}

export function trimSlashes(p: string): string {
  return p.replaceAll('\\', '/').replace(/^\.?\/+/, '').replace(/\/+$/, '');
}
