import { z } from 'zod';

export const TimestampIso = z
  .string()
  .refine((s) => !Number.isNaN(Date.parse(s)), { message: 'timestamp must be ISO datetime' });

export const AuditOutcomeSchema = z.enum(['proposed', 'approved', 'rejected', 'committed', 'aborted']);
export type AuditOutcome = z.infer<typeof AuditOutcomeSchema>;

/** Stage name used by entries that belong to the session rather than a task. */
export const SESSION_STAGE = 'session';

export const AuditEntrySchema = z.object({
  seq: z.number().int().positive(),
  timestamp: TimestampIso,
  sessionId: z.string().min(1),
  taskId: z.string().nullable(),
  stage: z.string().min(1),
  outcome: AuditOutcomeSchema,
  data: z.record(z.string(), z.unknown()).default({})
});

export type AuditEntry = z.infer<typeof AuditEntrySchema>;

export type AuditEntryInput = Omit<z.input<typeof AuditEntrySchema>, 'seq' | 'timestamp' | 'sessionId'> & {
  seq?: never;
  timestamp?: never;
};

// ── Session-level payloads ──────────────────────────────────────────────────

export const SessionStartedData = z.object({
  event: z.literal('started'),
  mode: z.enum(['run', 'bootstrap']),
  interactive: z.boolean(),
  tasks: z.array(z.string()),
  committed: z.array(z.string()).default([])
});

export type SessionStartedData = z.infer<typeof SessionStartedData>;
