/**
 * Session Result Aggregator
 *
 * Pure read of a session into the caller-facing SessionResult. Everything
 * returned is a copy; mutating the result never affects the session.
 */

import type { SessionFailure, SessionResult } from '@baton/agent-contracts';
import type { Session } from './session.js';
import { toSnapshot } from '../quota/quota-tracker.js';

export function finalize(session: Session): SessionResult {
  const state = session.state;
  let status: SessionResult['status'] = 'failed';
  let failure: SessionFailure | undefined;

  if (state.status === 'terminated') {
    if (state.outcome === 'success') {
      status = 'approved';
    } else {
      failure = { ...state.failure };
    }
  } else {
    failure = { code: 'InternalError', message: `Session finalized while ${state.status}` };
  }

  const finishedAt = session.finishedAt ?? new Date();

  return {
    sessionId: session.id,
    task: session.task,
    status,
    output: session.lastOutput,
    failure,
    transcript: session.transcript.map((entry) => ({
      ...entry,
      ...(entry.detail ? { detail: { ...entry.detail } } : {}),
    })),
    report: session.sharedState.reportContent,
    review: session.sharedState.review,
    hops: session.hops,
    visited: Object.fromEntries(session.visited),
    quotas: session.quotaList().map(toSnapshot),
    startedAt: session.startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: finishedAt.getTime() - session.startedAt.getTime(),
  };
}
