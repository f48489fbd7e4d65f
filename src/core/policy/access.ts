import picomatch from 'picomatch';

import type { ChangeSet } from '../changeset.js';
import type { AccessViolation } from '../errors.js';
import type { SessionMode, TaskState } from '../lifecycle/states.js';
import { isProtectedPath } from '../../workspace/protected-paths.js';
import { trimSlashes, type RoleId, type RoleTable } from './roles.js';

export type AccessRule = 'mode' | 'protected' | 'stage' | 'path';

export type AccessDecision =
  | { allowed: true }
  | { allowed: false; rule: AccessRule; reason: string; violations: AccessViolation[] };

export interface AccessPolicyOptions {
  roles: RoleTable;
  docsRoot: string;
}

/**
 * Role/stage/path authorization over a proposed change-set.
 * Pure: role definitions are fixed for the lifetime of the policy.
 */
export class AccessPolicy {
  private readonly docsRoot: string;
  private readonly inDocs: (path: string) => boolean;

  constructor(private readonly opts: AccessPolicyOptions) {
    this.docsRoot = trimSlashes(opts.docsRoot);
    this.inDocs = picomatch([`${this.docsRoot}/**`], { dot: true });
  }

  get roles(): RoleTable {
    return this.opts.roles;
  }

  authorize(role: RoleId, stage: TaskState, changeSet: ChangeSet, mode: SessionMode = 'run'): AccessDecision {
    const def = this.opts.roles[role];

    // Mode-level override, checked before anything role-specific.
    if (mode === 'bootstrap') {
      const outside = changeSet.filter((e) => !this.inDocs(e.path));
      if (outside.length > 0) {
        return deny('mode', `bootstrap may only touch ${this.docsRoot}/`, outside.map((e) => ({
          path: e.path,
          role,
          reason: 'outside_docs',
          allowed: [`${this.docsRoot}/**`]
        })));
      }
    }

    const protectedHits = changeSet.filter((e) => isProtectedPath(e.path));
    if (protectedHits.length > 0) {
      return deny('protected', 'protected engine paths cannot be modified', protectedHits.map((e) => ({
        path: e.path,
        role,
        reason: 'protected_path',
        allowed: []
      })));
    }

    if (!def.stages.includes(stage)) {
      return deny('stage', `role '${role}' may not trigger stage ${stage}`, changeSet.map((e) => ({
        path: e.path,
        role,
        reason: 'stage_not_allowed',
        allowed: def.paths
      })));
    }

    const inRole = picomatch([...def.paths], { dot: true });
    const excluded = def.exclude.length > 0 ? picomatch([...def.exclude], { dot: true }) : null;
    const violations: AccessViolation[] = [];
    for (const e of changeSet) {
      if (inRole(e.path) && !excluded?.(e.path)) continue;
      violations.push({ path: e.path, role, reason: 'out_of_scope', allowed: def.paths });
    }
    if (violations.length > 0) {
      return deny('path', `role '${role}' may not modify ${violations.map((v) => v.path).join(', ')}`, violations);
    }

    return { allowed: true };
  }
}

function deny(rule: AccessRule, reason: string, violations: AccessViolation[]): AccessDecision {
  return { allowed: false, rule, reason, violations };
}
