/**
 * Generation - prompt composition and model calls for drafting and refining
 */

export {
  describeOutcome,
  hasText,
  CONFIG_MISSING_MESSAGE,
  type GenerationOutcome,
  type GenerationAction,
} from './outcome.js';

export {
  buildDraftPrompt,
  buildRefinePrompt,
  EDITOR_SYSTEM_PROMPT,
  DEFAULT_MAX_OUTPUT_TOKENS,
  type PromptPair,
} from './prompts.js';

export {
  DraftWriter,
  NOTES_MISSING_MESSAGE,
  TEXT_MISSING_MESSAGE,
  type DraftWriterOptions,
} from './draft-writer.js';

export { countWords } from './word-count.js';
