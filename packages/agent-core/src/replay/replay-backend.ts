/**
 * Transcript replay.
 *
 * Turns the invocation entries of a finished session into a scripted model
 * backend. Each recorded invocation becomes one reply carrying the recorded
 * decision; a recorded timeout becomes a reply that never arrives, a recorded
 * backend failure a thrown error. Replaying against a fresh session with the
 * same registry reproduces the terminal status.
 */

import { z } from 'zod';
import type { HandoffIntent, ILLM, LLMRequest, LLMResponse, SessionResult, TranscriptEntry } from '@baton/agent-contracts';
import { BackendError } from '@baton/agent-contracts';

type ReplayStep =
  | { kind: 'reply'; agent: string; response: LLMResponse }
  | { kind: 'timeout'; agent: string }
  | { kind: 'error'; agent: string; message: string };

const RecordedDecisionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('handoff'), target: z.string(), payload: z.string().optional() }),
  z.object({ kind: z.literal('none'), approved: z.boolean().optional(), notes: z.string().optional() }),
]);

function intentFromEntry(entry: TranscriptEntry): HandoffIntent {
  const parsed = RecordedDecisionSchema.safeParse(entry.detail?.decision);
  if (!parsed.success) {
    return { type: 'finish' };
  }
  const decision = parsed.data;
  return decision.kind === 'handoff'
    ? { type: 'handoff', target: decision.target, payload: decision.payload }
    : { type: 'finish', approved: decision.approved, notes: decision.notes };
}

export function replayStepsFrom(transcript: readonly TranscriptEntry[]): ReplayStep[] {
  const steps: ReplayStep[] = [];
  for (const entry of transcript) {
    switch (entry.kind) {
      case 'invocation':
        steps.push({
          kind: 'reply',
          agent: entry.agent,
          response: { content: entry.output, toolCalls: [], handoff: intentFromEntry(entry) },
        });
        break;
      case 'timed_out':
        steps.push({ kind: 'timeout', agent: entry.agent });
        break;
      case 'backend_error':
        steps.push({ kind: 'error', agent: entry.agent, message: entry.output });
        break;
      default:
        break;
    }
  }
  return steps;
}

export class ReplayBackend implements ILLM {
  private cursor = 0;

  constructor(private readonly steps: readonly ReplayStep[]) {}

  /** Recorded steps not yet replayed */
  get remaining(): number {
    return this.steps.length - this.cursor;
  }

  complete(request: LLMRequest): Promise<LLMResponse> {
    const step = this.steps[this.cursor];
    if (!step) {
      return Promise.reject(new BackendError('Replay exhausted: no recorded step left'));
    }
    this.cursor += 1;

    switch (step.kind) {
      case 'reply':
        return Promise.resolve(step.response);
      case 'error':
        return Promise.reject(new BackendError(step.message));
      case 'timeout':
        return new Promise<LLMResponse>((_resolve, reject) => {
          request.signal.addEventListener('abort', () => reject(request.signal.reason), { once: true });
        });
    }
  }
}

export function createReplayBackend(result: Pick<SessionResult, 'transcript'>): ReplayBackend {
  return new ReplayBackend(replayStepsFrom(result.transcript));
}
