import { z } from 'zod';

import { readYamlIfExists, writeYaml } from '../utils/fs.js';
import { StorageFailure, ValidationError, errorMessage } from './errors.js';

export const DoneRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string().default(''),
  commit: z.string().min(1),
  branch: z.string().min(1),
  session: z.string().min(1)
});
export type DoneRecord = z.infer<typeof DoneRecordSchema>;

export const ProblemRecordSchema = z.object({
  task: z.string().min(1),
  question: z.string().min(1),
  blocking: z.boolean().default(true),
  session: z.string().min(1)
});
export type ProblemRecord = z.infer<typeof ProblemRecordSchema>;

/** Cross-session memory: what got committed, and what agents asked. */
export interface TaskRecordStore {
  readDone(): Promise<DoneRecord[]>;
  appendDone(record: DoneRecord): Promise<void>;
  readProblems(): Promise<ProblemRecord[]>;
  appendProblems(records: readonly ProblemRecord[]): Promise<void>;
}

/** `.gantry/state/done.yaml` and `.gantry/state/problems.yaml`, each a YAML list. */
export class YamlTaskRecordStore implements TaskRecordStore {
  constructor(
    private readonly donePath: string,
    private readonly problemsPath: string
  ) {}

  async readDone(): Promise<DoneRecord[]> {
    return await readList(this.donePath, DoneRecordSchema);
  }

  async appendDone(record: DoneRecord): Promise<void> {
    const current = await this.readDone();
    await writeList(this.donePath, [...current.filter((r) => r.id !== record.id), record]);
  }

  async readProblems(): Promise<ProblemRecord[]> {
    return await readList(this.problemsPath, ProblemRecordSchema);
  }

  async appendProblems(records: readonly ProblemRecord[]): Promise<void> {
    if (records.length === 0) return;
    const current = await this.readProblems();
    await writeList(this.problemsPath, [...current, ...records]);
  }
}

async function readList<T extends z.ZodTypeAny>(path: string, schema: T): Promise<z.infer<T>[]> {
  let raw: unknown;
  try {
    raw = await readYamlIfExists(path, []);
  } catch (err) {
    throw new StorageFailure(`Cannot read ${path}: ${errorMessage(err)}`, { path }, { cause: err });
  }
  const parsed = z.array(schema).safeParse(raw ?? []);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => ({ path: i.path.join('.') || '(root)', message: i.message }));
    throw new ValidationError(`${path} is malformed`, issues, { file: path });
  }
  return parsed.data;
}

async function writeList(path: string, records: readonly unknown[]): Promise<void> {
  try {
    await writeYaml(path, records);
  } catch (err) {
    throw new StorageFailure(`Cannot write ${path}: ${errorMessage(err)}`, { path }, { cause: err });
  }
}
