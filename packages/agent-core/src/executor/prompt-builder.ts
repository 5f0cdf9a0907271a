/**
 * Prompt assembly for one agent invocation.
 */

import type { AgentSpec, MeteredCapability, SharedState } from '@baton/agent-contracts';

export interface SystemPromptContext {
  /** Bullet list of allowed handoff targets */
  handoffTargets: string;
  sharedState: Readonly<SharedState>;
  /** Metered capabilities with no calls left */
  exhausted: readonly MeteredCapability[];
}

const EXHAUSTED_NOTICE: Record<MeteredCapability, string> = {
  'web-search': 'No further searches are allowed in this session. Use the results you already have or hand off.',
  retrieval: 'No further retrievals are allowed in this session. Use the passages you already have or hand off.',
};

export function buildSystemPrompt(spec: AgentSpec, ctx: SystemPromptContext): string {
  const sections: string[] = [];

  const intro = spec.systemPrompt.trim() || `You are ${spec.name}.`;
  sections.push(spec.description && !spec.systemPrompt.trim() ? `${intro} ${spec.description}` : intro);

  if (spec.canHandoffTo.length > 0) {
    sections.push(
      [
        '## Handoff',
        'You may hand off to:',
        ctx.handoffTargets,
        'To hand off, call the `handoff` tool, or end your reply with `[HANDOFF: agent_name]` followed by the notes that agent needs.',
        'Hand off only to the agents listed above.',
      ].join('\n'),
    );
  } else {
    sections.push('## Handoff\nYou cannot hand off. Finish with your answer.');
  }

  if (spec.role === 'terminal-reviewer') {
    sections.push(
      '## Verdict\nEnd your reply with `[APPROVED]` to accept the report, or `[REVISION_REQUIRED: reason]` to refuse it. You may also call the `finish` tool.',
    );
  }

  sections.push(
    ['## Shared state', '### Report', ctx.sharedState.reportContent, '### Review', ctx.sharedState.review].join('\n'),
  );

  if (ctx.exhausted.length > 0) {
    sections.push(['## Constraints', ...ctx.exhausted.map((c) => `- ${EXHAUSTED_NOTICE[c]}`)].join('\n'));
  }

  return sections.join('\n\n');
}

/**
 * Input for the agent receiving a handoff: the task plus what was forwarded
 */
export function buildHandoffInput(task: string, from: string, forwarded: string): string {
  const notes = forwarded.trim();
  if (!notes) {
    return task;
  }
  return `${task}\n\n## Handoff from ${from}\n${notes}`;
}
