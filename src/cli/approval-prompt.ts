import type { ApprovalChannel, ApprovalDecision, ApprovalRequest } from '../core/approval.js';
import type { Renderer } from './ui/renderer.js';

/**
 * Operator gate on the terminal. `GANTRY_TEST_GATE_DECISION=approve|reject` answers
 * every gate without prompting, for scripted runs.
 */
export class PromptApprovalChannel implements ApprovalChannel {
  constructor(private readonly renderer: Renderer) {}

  async decide(request: ApprovalRequest, signal?: AbortSignal): Promise<ApprovalDecision> {
    const forced = process.env.GANTRY_TEST_GATE_DECISION?.trim();
    if (forced === 'approve' || forced === 'reject') {
      return { decision: forced, by: 'operator', notes: `forced ${forced}` };
    }
    return await this.renderer.presentApproval(request, signal);
  }
}
