import { describe, it, expect } from 'vitest';
import { describeOutcome, hasText } from '../outcome.js';
import { countWords } from '../word-count.js';

describe('describeOutcome', () => {
  it('should pass text through for ok and unchanged', () => {
    expect(describeOutcome({ kind: 'ok', text: 'Draft' }, 'generate')).toBe('Draft');
    expect(describeOutcome({ kind: 'unchanged', text: 'Same' }, 'refine')).toBe('Same');
  });

  it('should show input guidance as is', () => {
    expect(describeOutcome({ kind: 'input-missing', message: 'Add notes' }, 'generate')).toBe('Add notes');
  });

  it('should explain missing configuration', () => {
    expect(describeOutcome({ kind: 'config-missing' }, 'refine')).toBe(
      'Error: ANTHROPIC_API_KEY not set. Please add it to your .env file.'
    );
  });

  it('should prefix upstream failures by action', () => {
    const outcome = { kind: 'upstream-failed', reason: 'timeout' } as const;

    expect(describeOutcome(outcome, 'generate')).toBe('Error generating draft: timeout');
    expect(describeOutcome(outcome, 'refine')).toBe('Error refining text: timeout');
  });
});

describe('hasText', () => {
  it('should accept only outcomes carrying document text', () => {
    expect(hasText({ kind: 'ok', text: 'a' })).toBe(true);
    expect(hasText({ kind: 'unchanged', text: 'a' })).toBe(true);
    expect(hasText({ kind: 'config-missing' })).toBe(false);
    expect(hasText({ kind: 'input-missing', message: 'm' })).toBe(false);
    expect(hasText({ kind: 'upstream-failed', reason: 'r' })).toBe(false);
  });
});

describe('countWords', () => {
  it('should count whitespace-separated words', () => {
    expect(countWords('Dear team,\n\nThe office  is closed.')).toBe(6);
  });

  it('should return zero for empty text', () => {
    expect(countWords('')).toBe(0);
    expect(countWords(' \n\t ')).toBe(0);
  });
});
