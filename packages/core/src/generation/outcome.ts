/**
 * Result of a generate or refine call, kept structured until it reaches a caller
 * that needs a display string
 */
export type GenerationOutcome =
  | { kind: 'ok'; text: string }
  | { kind: 'input-missing'; message: string }
  | { kind: 'unchanged'; text: string }
  | { kind: 'config-missing' }
  | { kind: 'upstream-failed'; reason: string };

export type GenerationAction = 'generate' | 'refine';

export const CONFIG_MISSING_MESSAGE =
  'Error: ANTHROPIC_API_KEY not set. Please add it to your .env file.';

const FAILURE_PREFIX: Record<GenerationAction, string> = {
  generate: 'Error generating draft',
  refine: 'Error refining text',
};

/**
 * Render an outcome as the single string shown to the user
 *
 * @example
 * ```typescript
 * describeOutcome({ kind: 'upstream-failed', reason: 'timeout' }, 'refine');
 * // 'Error refining text: timeout'
 * ```
 */
export function describeOutcome(outcome: GenerationOutcome, action: GenerationAction): string {
  switch (outcome.kind) {
    case 'ok':
    case 'unchanged':
      return outcome.text;
    case 'input-missing':
      return outcome.message;
    case 'config-missing':
      return CONFIG_MISSING_MESSAGE;
    case 'upstream-failed':
      return `${FAILURE_PREFIX[action]}: ${outcome.reason}`;
  }
}

/**
 * True when the outcome carries document text (new or unchanged)
 */
export function hasText(
  outcome: GenerationOutcome
): outcome is Extract<GenerationOutcome, { kind: 'ok' | 'unchanged' }> {
  return outcome.kind === 'ok' || outcome.kind === 'unchanged';
}
