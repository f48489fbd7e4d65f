import { AutoApprove, type ApprovalChannel, type ApprovalDecision, type ApprovalRequest } from '../approval.js';
import { OperatorRejected, StorageFailure, errorMessage } from '../errors.js';
import type { AuditEntry, AuditEntryInput } from './types.js';
import { AuditWriter } from './writer.js';

/** Anything that can durably append an entry and hand back its stored form. */
export interface AuditSink {
  append(input: AuditEntryInput): Promise<AuditEntry>;
}

export interface AuditLogOptions {
  interactive: boolean;
  approvals?: ApprovalChannel;
}

/**
 * The session's append-only decision record, plus the operator gate.
 *
 * Storage errors surface as `StorageFailure`, which halts the session.
 */
export class AuditLog {
  private readonly written: AuditEntry[] = [];
  private readonly approvals: ApprovalChannel;

  constructor(
    private readonly sink: AuditSink,
    private readonly opts: AuditLogOptions
  ) {
    this.approvals = opts.approvals ?? new AutoApprove();
  }

  static async open(auditPath: string, sessionId: string, opts: AuditLogOptions): Promise<AuditLog> {
    try {
      return new AuditLog(await AuditWriter.open(auditPath, sessionId), opts);
    } catch (err) {
      throw new StorageFailure(`Cannot open audit log ${auditPath}: ${errorMessage(err)}`, { auditPath }, { cause: err });
    }
  }

  get interactive(): boolean {
    return this.opts.interactive;
  }

  async append(input: AuditEntryInput): Promise<AuditEntry> {
    let entry: AuditEntry;
    try {
      entry = await this.sink.append(input);
    } catch (err) {
      throw new StorageFailure(`Audit append failed: ${errorMessage(err)}`, { stage: input.stage, taskId: input.taskId }, { cause: err });
    }
    this.written.push(entry);
    return entry;
  }

  /** Entries appended through this log, in order. */
  entries(): readonly AuditEntry[] {
    return this.written;
  }

  /**
   * Hold progression at a gate until the operator answers `proposal`.
   * Non-interactive logs approve immediately. Cancellation (or a prompt that dies)
   * is an operator rejection.
   */
  async awaitApproval(proposal: AuditEntry, request: ApprovalRequest, signal?: AbortSignal): Promise<ApprovalDecision> {
    if (proposal.outcome !== 'proposed') {
      throw new Error(`awaitApproval expects a proposed entry (seq=${proposal.seq} is ${proposal.outcome})`);
    }
    const latest = this.latestProposal(proposal.taskId, proposal.stage);
    if (latest?.seq !== proposal.seq) {
      throw new Error(`Entry seq=${proposal.seq} is not the most recent proposal for ${proposal.stage}`);
    }

    if (!this.opts.interactive) return { decision: 'approve', by: 'auto' };
    if (signal?.aborted) throw new OperatorRejected('Cancelled by operator', true);

    try {
      return await this.approvals.decide(request, signal);
    } catch (err) {
      throw new OperatorRejected(`Approval prompt ended without a decision: ${errorMessage(err)}`, true);
    }
  }

  private latestProposal(taskId: string | null, stage: string): AuditEntry | undefined {
    for (let i = this.written.length - 1; i >= 0; i--) {
      const e = this.written[i];
      if (e.outcome === 'proposed' && e.taskId === taskId && e.stage === stage) return e;
    }
    return undefined;
  }
}
