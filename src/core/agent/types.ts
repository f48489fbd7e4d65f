import type { ChangeSet } from '../changeset.js';
import type { TaskCategory, TaskState } from '../lifecycle/states.js';
import type { RoleId } from '../policy/roles.js';

export interface AgentContext {
  sessionId: string;
  repoRoot: string;
  branch: string;
  role: RoleId;
  stage: TaskState;
  task: {
    id: string;
    title: string;
    description: string;
    dependsOn: readonly string[];
    category: TaskCategory;
  };
  /** Patterns the acting role may write. */
  allowedPaths: readonly string[];
  excludedPaths: readonly string[];
  /** Everything the task has changed so far on its branch. */
  priorChanges: ChangeSet;
  /** Diagnostics of the failing check when the developer is asked to try again. */
  feedback?: string;
}

export interface AgentResult {
  /** Paths the agent says it touched. Untrusted: the engine also diffs the working tree. */
  changeSet: ChangeSet;
  /** Blocking questions for the operator; any entry aborts the task. */
  problems: string[];
  summary?: string;
}

export interface AgentInvokeOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/** Non-deterministic code-writing capability. Its edits land in the working tree. */
export interface AgentCapability {
  propose(context: AgentContext, stage: TaskState, options?: AgentInvokeOptions): Promise<AgentResult>;
}
