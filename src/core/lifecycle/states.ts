import { z } from 'zod';

export const TaskStateSchema = z.enum([
  'Queued',
  'BranchCreated',
  'TestsGenerated',
  'Implemented',
  'ChecksRunning',
  'ChecksPassed',
  'ChecksFailed',
  'DocumentationEdited',
  'Committed',
  'Aborted'
]);

export type TaskState = z.infer<typeof TaskStateSchema>;

export const TaskCategorySchema = z.enum(['run', 'bootstrap']);

/** Session mode; a task runs only in the mode matching its category. */
export type TaskCategory = z.infer<typeof TaskCategorySchema>;
export type SessionMode = TaskCategory;

export const TERMINAL_STATES: ReadonlySet<TaskState> = new Set<TaskState>(['Committed', 'Aborted']);

export function isTerminal(state: TaskState): boolean {
  return TERMINAL_STATES.has(state);
}

// ── Transition tables ───────────────────────────────────────────────────────
// `Aborted` is reachable from every non-terminal state. `ChecksFailed → Implemented`
// is only taken when the session grants a check retry budget.

const RUN_TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  Queued: ['BranchCreated', 'Aborted'],
  BranchCreated: ['TestsGenerated', 'Aborted'],
  TestsGenerated: ['Implemented', 'Aborted'],
  Implemented: ['ChecksRunning', 'Aborted'],
  ChecksRunning: ['ChecksPassed', 'ChecksFailed', 'Aborted'],
  ChecksPassed: ['Committed', 'Aborted'],
  ChecksFailed: ['Implemented', 'Aborted'],
  DocumentationEdited: [],
  Committed: [],
  Aborted: []
};

const BOOTSTRAP_TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  Queued: ['BranchCreated', 'Aborted'],
  BranchCreated: ['DocumentationEdited', 'Aborted'],
  TestsGenerated: [],
  Implemented: [],
  ChecksRunning: [],
  ChecksPassed: [],
  ChecksFailed: [],
  DocumentationEdited: ['Committed', 'Aborted'],
  Committed: [],
  Aborted: []
};

export function allowedTransitions(category: TaskCategory, from: TaskState): readonly TaskState[] {
  const table = category === 'bootstrap' ? BOOTSTRAP_TRANSITIONS : RUN_TRANSITIONS;
  return table[from];
}

export function canTransition(category: TaskCategory, from: TaskState, to: TaskState): boolean {
  return allowedTransitions(category, from).includes(to);
}

export function branchNameFor(category: TaskCategory, taskId: string): string {
  return category === 'bootstrap' ? `bootstrap/${taskId}` : `task/${taskId}`;
}
