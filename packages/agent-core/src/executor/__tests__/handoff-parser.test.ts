import { describe, it, expect } from 'vitest';
import { decisionFromIntent, parseHandoffMarkers } from '../handoff-parser.js';

describe('parseHandoffMarkers', () => {
  it('takes the text after a handoff marker as the payload', () => {
    expect(parseHandoffMarkers('[HANDOFF: write_agent] Found three sources')).toEqual({
      intent: { type: 'handoff', target: 'write_agent', payload: 'Found three sources' },
      response: 'Found three sources',
    });
  });

  it('leaves the payload empty when the marker ends the reply', () => {
    expect(parseHandoffMarkers('Summary first.\n[HANDOFF: review_agent]')).toEqual({
      intent: { type: 'handoff', target: 'review_agent', payload: undefined },
      response: 'Summary first.',
    });
  });

  it('parses an approval', () => {
    expect(parseHandoffMarkers('Looks good. [APPROVED]')).toEqual({
      intent: { type: 'finish', approved: true },
      response: 'Looks good.',
    });
  });

  it('parses a revision request with its reason', () => {
    expect(parseHandoffMarkers('[REVISION_REQUIRED: cite sources] Needs work')).toEqual({
      intent: { type: 'finish', approved: false, notes: 'cite sources' },
      response: 'Needs work',
    });
  });

  it('prefers a handoff marker over a verdict', () => {
    expect(parseHandoffMarkers('[APPROVED] [HANDOFF: write_agent]').intent).toEqual({
      type: 'handoff',
      target: 'write_agent',
      payload: undefined,
    });
  });

  it('returns no intent for a plain reply', () => {
    expect(parseHandoffMarkers('  Just an answer. ')).toEqual({ response: 'Just an answer.' });
  });
});

describe('decisionFromIntent', () => {
  it('maps a missing intent to no handoff', () => {
    expect(decisionFromIntent(undefined)).toEqual({ kind: 'none' });
  });

  it('maps handoff and finish intents', () => {
    expect(decisionFromIntent({ type: 'handoff', target: 'write_agent', payload: 'notes' })).toEqual({
      kind: 'handoff',
      target: 'write_agent',
      payload: 'notes',
    });
    expect(decisionFromIntent({ type: 'finish', approved: false, notes: 'weak' })).toEqual({
      kind: 'none',
      approved: false,
      notes: 'weak',
    });
  });
});
