import { TaskStateSchema, type TaskState } from '../lifecycle/states.js';
import { SESSION_STAGE, SessionStartedData, type AuditEntry } from './types.js';

export interface TaskHistory {
  taskId: string;
  state: TaskState;
  /** States entered, in order, starting at `Queued`. */
  stages: TaskState[];
  entries: AuditEntry[];
}

/**
 * Rebuild each task's final lifecycle state from an audit log.
 *
 * The session `started` entry seeds every task (`Queued`, or `Committed` when carried
 * over from an earlier session). Task entries then apply in order:
 * `committed` → Committed, `rejected`/`aborted` → Aborted (unless the rejection
 * announced a retry), `approved` → the stage it names. A final rejection filed
 * under `ChecksFailed` passes through that state on its way to `Aborted`.
 */
export function replayTaskStates(entries: readonly AuditEntry[]): Record<string, TaskState> {
  const out: Record<string, TaskState> = {};
  for (const h of replayHistories(entries).values()) out[h.taskId] = h.state;
  return out;
}

export function replayHistories(entries: readonly AuditEntry[]): Map<string, TaskHistory> {
  const histories = new Map<string, TaskHistory>();
  const ensure = (taskId: string, initial: TaskState = 'Queued'): TaskHistory => {
    let h = histories.get(taskId);
    if (!h) {
      h = { taskId, state: initial, stages: [initial], entries: [] };
      histories.set(taskId, h);
    }
    return h;
  };

  for (const e of entries) {
    if (e.taskId === null) {
      const started = e.stage === SESSION_STAGE ? SessionStartedData.safeParse(e.data) : null;
      if (started?.success) {
        const committed = new Set(started.data.committed);
        for (const id of started.data.tasks) ensure(id, committed.has(id) ? 'Committed' : 'Queued');
      }
      continue;
    }

    const h = ensure(e.taskId);
    h.entries.push(e);
    if (e.outcome === 'rejected' && e.stage === 'ChecksFailed' && e.data.retrying !== true && h.state !== 'ChecksFailed') {
      h.stages.push('ChecksFailed');
    }
    const next = nextState(h.state, e);
    if (next !== h.state) {
      h.state = next;
      h.stages.push(next);
    }
  }

  return histories;
}

function nextState(current: TaskState, e: AuditEntry): TaskState {
  switch (e.outcome) {
    case 'committed':
      return 'Committed';
    case 'aborted':
      return 'Aborted';
    case 'rejected':
      return e.data.retrying === true ? 'ChecksFailed' : 'Aborted';
    case 'approved': {
      const stage = TaskStateSchema.safeParse(e.stage);
      return stage.success ? stage.data : current;
    }
    case 'proposed':
      return current;
  }
}
