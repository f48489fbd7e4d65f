import { mkdir, open, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { AuditEntrySchema, type AuditEntry, type AuditEntryInput } from './types.js';

/** Append-only JSONL writer. Each line is fsynced before `append` resolves. */
export class AuditWriter {
  private nextSeq: number;

  private constructor(
    readonly auditPath: string,
    readonly sessionId: string,
    nextSeq: number
  ) {
    this.nextSeq = nextSeq;
  }

  static async open(auditPath: string, sessionId: string): Promise<AuditWriter> {
    await mkdir(dirname(auditPath), { recursive: true });
    const nextSeq = await computeNextSeq(auditPath);
    return new AuditWriter(auditPath, sessionId, nextSeq);
  }

  async append(input: AuditEntryInput): Promise<AuditEntry> {
    const entry = AuditEntrySchema.parse({
      ...input,
      seq: this.nextSeq,
      timestamp: new Date().toISOString(),
      sessionId: this.sessionId
    });

    const fh = await open(this.auditPath, 'a');
    try {
      await fh.appendFile(`${JSON.stringify(entry)}\n`, 'utf8');
      await fh.sync();
    } finally {
      await fh.close();
    }

    this.nextSeq += 1;
    return entry;
  }
}

async function computeNextSeq(auditPath: string): Promise<number> {
  let content: string;
  try {
    content = await readFile(auditPath, 'utf8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return 1;
    throw err;
  }

  const lines = content
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean);

  // Tolerate a trailing partial line left by a crash mid-write.
  for (let i = lines.length - 1; i >= 0; i--) {
    const seq = readSeq(lines[i]);
    if (seq !== null) return seq + 1;
  }
  return 1;
}

function readSeq(line: string): number | null {
  try {
    const parsed: unknown = JSON.parse(line);
    if (parsed && typeof parsed === 'object' && 'seq' in parsed && typeof parsed.seq === 'number' && Number.isFinite(parsed.seq)) {
      return parsed.seq;
    }
    return null;
  } catch {
    return null;
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
