/**
 * Handoff Parser
 *
 * Parses agent text replies for explicit control markers, used when the
 * backend reports no structured handoff intent:
 * - [HANDOFF: agent_name] payload  - Transfer control, rest of the reply is the payload
 * - [APPROVED]                     - Reviewer accepts the report
 * - [REVISION_REQUIRED: reason]    - Reviewer refuses the report
 */

import type { HandoffDecision, HandoffIntent } from '@baton/agent-contracts';
import { NO_HANDOFF } from '@baton/agent-contracts';

export interface ParsedReply {
  intent?: HandoffIntent;
  /** Reply text with the marker removed */
  response: string;
}

/**
 * Parse an agent reply for control markers
 *
 * @param reply - Model text response
 * @returns Intent (if a marker was found) and the cleaned reply
 */
export function parseHandoffMarkers(reply: string): ParsedReply {
  // Check for [HANDOFF: name]
  const handoffMatch = reply.match(/\[HANDOFF:\s*([^\]\s][^\]]*)\]/i);
  if (handoffMatch) {
    const target = handoffMatch[1]?.trim() ?? '';
    const index = handoffMatch.index ?? 0;
    const payload = reply.slice(index + handoffMatch[0].length).trim();
    const response = reply.replace(handoffMatch[0], '').trim();
    return {
      intent: { type: 'handoff', target, payload: payload || undefined },
      response,
    };
  }

  // Check for [APPROVED]
  if (/\[APPROVED\]/i.test(reply)) {
    return {
      intent: { type: 'finish', approved: true },
      response: reply.replace(/\[APPROVED\]/i, '').trim(),
    };
  }

  // Check for [REVISION_REQUIRED: reason]
  const revisionMatch = reply.match(/\[REVISION_REQUIRED:\s*([^\]]+)\]/i);
  if (revisionMatch) {
    const reason = revisionMatch[1]?.trim() || 'No reason provided';
    return {
      intent: { type: 'finish', approved: false, notes: reason },
      response: reply.replace(revisionMatch[0], '').trim(),
    };
  }

  return { response: reply.trim() };
}

/**
 * Map a backend intent onto the decision the router consumes
 */
export function decisionFromIntent(intent: HandoffIntent | undefined): HandoffDecision {
  if (!intent) {
    return NO_HANDOFF;
  }
  if (intent.type === 'handoff') {
    return { kind: 'handoff', target: intent.target, payload: intent.payload };
  }
  return { kind: 'none', approved: intent.approved, notes: intent.notes };
}
