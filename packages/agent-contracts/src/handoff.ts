/**
 * Handoff, routing and quota decisions.
 *
 * All three are discriminated unions so the orchestration loop can switch
 * exhaustively on them.
 */

// ═══════════════════════════════════════════════════════════════════════
// HandoffDecision: what one agent invocation asks for next
// ═══════════════════════════════════════════════════════════════════════

export type HandoffDecision =
  | {
      kind: 'none';
      /**
       * Set by reviewing agents. `true` approves the candidate result,
       * `false` explicitly rejects it. Undefined = no verdict.
       */
      approved?: boolean;
      notes?: string;
    }
  | {
      kind: 'handoff';
      target: string;
      /** Condensed notes forwarded to the target agent */
      payload?: string;
    };

export const NO_HANDOFF: HandoffDecision = { kind: 'none' };

// ═══════════════════════════════════════════════════════════════════════
// RouteResult: Handoff Router verdict
// ═══════════════════════════════════════════════════════════════════════

export type RouteRejection = 'InvalidHandoffTarget' | 'MaxHopsExceeded';

export type RouteResult =
  | { kind: 'next'; target: string }
  | { kind: 'terminate' }
  | { kind: 'rejected'; reason: RouteRejection; message: string };

// ═══════════════════════════════════════════════════════════════════════
// QuotaDecision: Quota Tracker verdict
// ═══════════════════════════════════════════════════════════════════════

export type QuotaDenialReason = 'SearchLimitExceeded' | 'DuplicateQuery';

export type QuotaDecision =
  | { allowed: true }
  | { allowed: false; reason: QuotaDenialReason; message: string };
