import { readFile } from 'node:fs/promises';

import { errorMessage } from '../errors.js';
import { AuditEntrySchema, type AuditEntry } from './types.js';
import { isErrnoException } from './writer.js';

export class AuditReader {
  constructor(private auditPath: string) {}

  async readAll(): Promise<AuditEntry[]> {
    const { entries } = await this.readAllSafe();
    return entries;
  }

  async readAllSafe(): Promise<{ entries: AuditEntry[]; warnings: string[] }> {
    const warnings: string[] = [];
    const entries: AuditEntry[] = [];

    const lines = await readJsonlLines(this.auditPath);
    for (let i = 0; i < lines.length; i++) {
      try {
        entries.push(AuditEntrySchema.parse(JSON.parse(lines[i])));
      } catch (err) {
        // A trailing partial line is the usual crash artifact; mid-file damage is skipped.
        const isLast = i === lines.length - 1;
        warnings.push(`audit parse failed at line ${i + 1}${isLast ? ' (last line)' : ''}: ${errorMessage(err)}`);
      }
    }

    return { entries, warnings };
  }

  async tail(n: number): Promise<AuditEntry[]> {
    const { entries } = await this.readAllSafe();
    return entries.slice(Math.max(0, entries.length - n));
  }

  async forTask(taskId: string): Promise<AuditEntry[]> {
    const { entries } = await this.readAllSafe();
    return entries.filter((e) => e.taskId === taskId);
  }

  async verifyIntegrity(): Promise<{ ok: boolean; message?: string }> {
    const { entries, warnings } = await this.readAllSafe();
    if (warnings.length) {
      return { ok: false, message: warnings.join('\n') };
    }
    for (let i = 0; i < entries.length; i++) {
      const expected = i + 1;
      if (entries[i].seq !== expected) {
        return { ok: false, message: `Sequence gap at index ${i} (expected seq=${expected}, got ${entries[i].seq})` };
      }
    }
    return { ok: true };
  }
}

async function readJsonlLines(path: string): Promise<string[]> {
  try {
    const content = await readFile(path, 'utf8');
    return content
      .split('\n')
      .map((l) => l.trim())
      .filter(Boolean);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return [];
    throw err;
  }
}
