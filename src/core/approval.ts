import type { ChangeSet } from './changeset.js';
import type { CheckResult } from './checks/types.js';
import type { TaskState } from './lifecycle/states.js';
import type { RoleId } from './policy/roles.js';

/** What the operator sees at a gate. */
export interface ApprovalRequest {
  sessionId: string;
  taskId: string;
  title: string;
  stage: TaskState;
  role?: RoleId;
  branch?: string;
  /** The change-set produced by this stage (cumulative at the commit gate). */
  changeSet: ChangeSet;
  size: number;
  cap?: number;
  checks?: CheckResult[];
  summary?: string;
}

export interface ApprovalDecision {
  decision: 'approve' | 'reject';
  notes?: string;
  by: 'operator' | 'auto';
}

export interface ApprovalChannel {
  decide(request: ApprovalRequest, signal?: AbortSignal): Promise<ApprovalDecision>;
}

/** Non-interactive sessions: every gate passes. */
export class AutoApprove implements ApprovalChannel {
  async decide(): Promise<ApprovalDecision> {
    return { decision: 'approve', by: 'auto' };
  }
}
