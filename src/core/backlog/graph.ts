import { IllegalTransitionError, ValidationError, type ValidationIssue } from '../errors.js';
import { canTransition, isTerminal, type TaskCategory, type TaskState } from '../lifecycle/states.js';
import { BacklogFileSchema, type BlockedTask, type Task, type TaskDeclaration } from './types.js';

export interface BacklogLoadOptions {
  /** IDs committed by earlier sessions; they start out `Committed`. Unknown IDs are ignored. */
  committed?: Iterable<string>;
}

const WHITE = 0;
const GRAY = 1;
const BLACK = 2;

/**
 * Validated dependency DAG over the backlog, and the single source of truth for
 * which tasks are ready to run.
 */
export class BacklogGraph {
  private readonly byId: Map<string, Task>;
  private readonly dependents: Map<string, string[]>;
  /** Dependencies before dependents, declaration order as tie-break. */
  private readonly topoOrder: string[];

  private constructor(tasks: Task[]) {
    this.byId = new Map(tasks.map((t) => [t.id, t]));
    this.dependents = new Map(tasks.map((t) => [t.id, []]));
    for (const t of tasks) {
      for (const dep of t.dependsOn) this.dependents.get(dep)?.push(t.id);
    }
    this.topoOrder = topologicalOrder(tasks, this.byId);
  }

  /**
   * Parse and validate task declarations. Fails as a whole with a `ValidationError`
   * listing every problem: schema errors, duplicate IDs, unknown dependencies, cycles.
   */
  static load(declarations: unknown, options: BacklogLoadOptions = {}): BacklogGraph {
    const parsed = BacklogFileSchema.safeParse(declarations);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => ({ path: i.path.join('.') || '(root)', message: i.message }));
      throw new ValidationError(`Backlog is malformed (${issues.length} issue${issues.length === 1 ? '' : 's'})`, issues);
    }
    return BacklogGraph.fromDeclarations(parsed.data, options);
  }

  static fromDeclarations(declarations: readonly TaskDeclaration[], options: BacklogLoadOptions = {}): BacklogGraph {
    const issues: ValidationIssue[] = [];
    const seen = new Set<string>();

    declarations.forEach((d, i) => {
      if (seen.has(d.id)) issues.push({ path: `${i}.id`, message: `Duplicate task id '${d.id}'` });
      seen.add(d.id);
    });

    declarations.forEach((d, i) => {
      for (const dep of d.dependsOn) {
        if (!seen.has(dep)) {
          issues.push({ path: `${i}.dependsOn`, message: `Task '${d.id}' depends on unknown task '${dep}'` });
        }
      }
    });

    const edges = new Map<string, string[]>();
    for (const d of declarations) {
      if (!edges.has(d.id)) edges.set(d.id, d.dependsOn.filter((dep) => seen.has(dep)));
    }
    const cycles = findCycles(Array.from(edges.keys()), edges);
    for (const cycle of cycles) {
      issues.push({ path: 'dependsOn', message: `Dependency cycle: ${cycle.join(' -> ')}` });
    }

    if (issues.length > 0) {
      const first = cycles[0];
      const headline = first
        ? `Backlog has a dependency cycle: ${first.join(' -> ')}`
        : `Backlog is invalid (${issues.length} issue${issues.length === 1 ? '' : 's'})`;
      throw new ValidationError(headline, issues, { cycles });
    }

    const committed = new Set(options.committed ?? []);
    const tasks: Task[] = declarations.map((d, index) => ({
      id: d.id,
      title: d.title,
      description: d.description,
      dependsOn: d.dependsOn,
      category: d.category,
      state: committed.has(d.id) ? 'Committed' : 'Queued',
      index
    }));
    return new BacklogGraph(tasks);
  }

  tasks(): Task[] {
    return Array.from(this.byId.values());
  }

  get(taskId: string): Task {
    const t = this.byId.get(taskId);
    if (!t) throw new Error(`Unknown task '${taskId}'`);
    return t;
  }

  has(taskId: string): boolean {
    return this.byId.has(taskId);
  }

  dependentsOf(taskId: string): readonly string[] {
    return this.dependents.get(taskId) ?? [];
  }

  /** Queued tasks whose dependencies are all `Committed`, in declaration order. */
  ready(category?: TaskCategory, only?: ReadonlySet<string>): string[] {
    const out: string[] = [];
    for (const t of this.byId.values()) {
      if (!inScope(t, category, only)) continue;
      if (t.state !== 'Queued') continue;
      if (t.dependsOn.every((dep) => this.get(dep).state === 'Committed')) out.push(t.id);
    }
    return out;
  }

  /** Non-terminal tasks in scope, in declaration order. */
  pending(category?: TaskCategory, only?: ReadonlySet<string>): string[] {
    return this.tasks()
      .filter((t) => inScope(t, category, only) && !isTerminal(t.state))
      .map((t) => t.id);
  }

  /**
   * Pending tasks that can no longer become ready in this session, each with the
   * root causes: aborted dependencies, or uncommitted ones outside the scope.
   */
  blocked(category?: TaskCategory, only?: ReadonlySet<string>): BlockedTask[] {
    const causes = new Map<string, Set<string>>();
    for (const id of this.topoOrder) {
      const t = this.get(id);
      const mine = new Set<string>();
      for (const dep of t.dependsOn) {
        const d = this.get(dep);
        if (d.state === 'Committed') continue;
        if (d.state === 'Aborted' || !inScope(d, category, only)) {
          mine.add(dep);
          continue;
        }
        for (const c of causes.get(dep) ?? []) mine.add(c);
      }
      causes.set(id, mine);
    }

    return this.pending(category, only)
      .map((id) => ({ taskId: id, blockedBy: sortByIndex(this, causes.get(id) ?? new Set<string>()) }))
      .filter((b) => b.blockedBy.length > 0);
  }

  /** Move a task along its category's transition table. */
  transition(taskId: string, to: TaskState): void {
    const t = this.get(taskId);
    if (!canTransition(t.category, t.state, to)) {
      throw new IllegalTransitionError(
        `Illegal transition for task '${taskId}' (${t.category}): ${t.state} -> ${to}`,
        taskId,
        t.state,
        to
      );
    }
    t.state = to;
  }

  markOutcome(taskId: string, outcome: 'Committed' | 'Aborted'): void {
    this.transition(taskId, outcome);
  }

  snapshot(): Record<string, TaskState> {
    const out: Record<string, TaskState> = {};
    for (const t of this.byId.values()) out[t.id] = t.state;
    return out;
  }

  /** Execution order of the whole backlog (dependencies first). */
  order(): readonly string[] {
    return this.topoOrder;
  }
}

// ── Helpers ─────────────────────────────────────────────────────────────────

function inScope(t: Task, category: TaskCategory | undefined, only: ReadonlySet<string> | undefined): boolean {
  if (category && t.category !== category) return false;
  if (only && !only.has(t.id)) return false;
  return true;
}

function sortByIndex(graph: BacklogGraph, ids: Set<string>): string[] {
  return Array.from(ids).sort((a, b) => graph.get(a).index - graph.get(b).index);
}

/**
 * Three-colour DFS over `task -> dependency` edges with an explicit stack, so deep
 * backlogs cannot overflow the call stack. Each cycle closes on its first ID.
 */
function findCycles(roots: readonly string[], edges: ReadonlyMap<string, readonly string[]>): string[][] {
  const color = new Map<string, number>();
  const cycles: string[][] = [];

  for (const root of roots) {
    if ((color.get(root) ?? WHITE) !== WHITE) continue;

    const stack: Array<{ id: string; next: number }> = [{ id: root, next: 0 }];
    color.set(root, GRAY);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const deps = edges.get(frame.id) ?? [];
      if (frame.next >= deps.length) {
        color.set(frame.id, BLACK);
        stack.pop();
        continue;
      }

      const dep = deps[frame.next];
      frame.next += 1;
      const c = color.get(dep) ?? WHITE;
      if (c === WHITE) {
        color.set(dep, GRAY);
        stack.push({ id: dep, next: 0 });
      } else if (c === GRAY) {
        const start = stack.findIndex((f) => f.id === dep);
        cycles.push([...stack.slice(start).map((f) => f.id), dep]);
      }
    }
  }

  return cycles;
}

/** Post-order DFS from each task in declaration order: dependencies come first. */
function topologicalOrder(tasks: readonly Task[], byId: ReadonlyMap<string, Task>): string[] {
  const visited = new Set<string>();
  const out: string[] = [];

  for (const root of tasks) {
    if (visited.has(root.id)) continue;
    visited.add(root.id);
    const stack: Array<{ id: string; next: number }> = [{ id: root.id, next: 0 }];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const deps = byId.get(frame.id)?.dependsOn ?? [];
      if (frame.next >= deps.length) {
        out.push(frame.id);
        stack.pop();
        continue;
      }
      const dep = deps[frame.next];
      frame.next += 1;
      if (!visited.has(dep)) {
        visited.add(dep);
        stack.push({ id: dep, next: 0 });
      }
    }
  }

  return out;
}
