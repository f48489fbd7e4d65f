import { z } from 'zod';

import { TaskCategorySchema, type TaskCategory, type TaskState } from '../lifecycle/states.js';

export const TaskIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, { message: 'task id must be alphanumeric with . _ - (usable in a branch name)' })
  .refine((s) => !s.includes('..') && !s.endsWith('.lock') && !s.endsWith('.'), {
    message: 'task id is not a valid git ref component'
  });

const TaskDeclarationBase = z.object({
  id: z.preprocess((v) => (typeof v === 'number' ? String(v) : v), TaskIdSchema),
  title: z.string().optional(),
  description: z.string().default(''),
  dependsOn: z.array(z.preprocess((v) => (typeof v === 'number' ? String(v) : v), z.string().min(1))).optional(),
  depends_on: z.array(z.preprocess((v) => (typeof v === 'number' ? String(v) : v), z.string().min(1))).optional(),
  category: TaskCategorySchema.default('run')
});

/** One backlog record. `depends_on` is accepted as an alias of `dependsOn`. */
export const TaskDeclarationSchema = TaskDeclarationBase.transform(({ depends_on, dependsOn, ...rest }) => ({
  ...rest,
  dependsOn: Array.from(new Set(dependsOn ?? depends_on ?? []))
}));

export type TaskDeclaration = z.infer<typeof TaskDeclarationSchema>;
export type TaskDeclarationInput = z.input<typeof TaskDeclarationSchema>;

/** A backlog file holds either a bare list or `{ tasks: [...] }`. */
export const BacklogFileSchema = z.union([
  z.array(TaskDeclarationSchema),
  z.object({ tasks: z.array(TaskDeclarationSchema) }).transform((v) => v.tasks)
]);

export interface Task {
  id: string;
  title?: string;
  description: string;
  dependsOn: readonly string[];
  category: TaskCategory;
  state: TaskState;
  /** Position in the backlog; the deterministic tie-break between ready tasks. */
  index: number;
}

export interface BlockedTask {
  taskId: string;
  /** Dependencies that keep the task from ever becoming ready in this session. */
  blockedBy: string[];
}

export function taskTitle(task: Pick<Task, 'id' | 'title' | 'description'>): string {
  if (task.title && task.title.trim()) return task.title.trim();
  const firstLine = task.description.split('\n').find((l) => l.trim().length > 0);
  return firstLine?.trim() ?? task.id;
}
