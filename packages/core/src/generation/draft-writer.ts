import type { Logger, TextGenerationProvider } from '../types.js';
import type { DocumentTemplate } from '../templates/schema.js';
import { DEFAULT_TONE } from '../templates/schema.js';
import { silentLogger, errorMessage } from '../logger.js';
import { describeOutcome, type GenerationOutcome } from './outcome.js';
import {
  buildDraftPrompt,
  buildRefinePrompt,
  DEFAULT_MAX_OUTPUT_TOKENS,
  type PromptPair,
} from './prompts.js';

export const NOTES_MISSING_MESSAGE = 'Please enter some notes or bullet points first.';
export const TEXT_MISSING_MESSAGE = 'No text to refine. Generate a draft first.';

export interface DraftWriterOptions {
  maxOutputTokens?: number;
}

/**
 * DraftWriter - turns notes into a draft and applies edit instructions
 *
 * Without a provider (no API key configured) every call that would reach the
 * model returns `config-missing` instead.
 *
 * @example
 * ```typescript
 * const writer = new DraftWriter(new AnthropicProvider(apiKey), logger);
 * const outcome = await writer.generateDraftOutcome(registry.getByName('memo'), notes, 'Formal');
 * ```
 */
export class DraftWriter {
  private readonly provider?: TextGenerationProvider;
  private readonly logger: Logger;
  private readonly maxOutputTokens: number;

  constructor(
    provider: TextGenerationProvider | undefined,
    logger: Logger = silentLogger,
    options: DraftWriterOptions = {}
  ) {
    this.provider = provider;
    this.logger = logger;
    this.maxOutputTokens = options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;
  }

  /**
   * Whether a generation provider is configured
   */
  get isConfigured(): boolean {
    return this.provider !== undefined;
  }

  async generateDraftOutcome(
    template: DocumentTemplate,
    notes: string,
    tone: string = DEFAULT_TONE
  ): Promise<GenerationOutcome> {
    if (!notes.trim()) {
      return { kind: 'input-missing', message: NOTES_MISSING_MESSAGE };
    }
    if (!this.provider) {
      return { kind: 'config-missing' };
    }

    this.logger.debug('Generating draft', { template: template.name, tone });
    return this.call(this.provider, buildDraftPrompt(template, notes, tone), 'Failed to generate draft');
  }

  async refineTextOutcome(
    currentText: string,
    instruction: string,
    templateName = 'general'
  ): Promise<GenerationOutcome> {
    if (!currentText.trim()) {
      return { kind: 'input-missing', message: TEXT_MISSING_MESSAGE };
    }
    if (!instruction.trim()) {
      return { kind: 'unchanged', text: currentText };
    }
    if (!this.provider) {
      return { kind: 'config-missing' };
    }

    this.logger.debug('Refining text', { template: templateName });
    return this.call(this.provider, buildRefinePrompt(currentText, instruction), 'Failed to refine text');
  }

  /**
   * Generate a draft and return the text or a user-facing message
   */
  async generateDraft(template: DocumentTemplate, notes: string, tone?: string): Promise<string> {
    return describeOutcome(await this.generateDraftOutcome(template, notes, tone), 'generate');
  }

  /**
   * Refine text and return the result or a user-facing message
   */
  async refineText(currentText: string, instruction: string, templateName?: string): Promise<string> {
    return describeOutcome(await this.refineTextOutcome(currentText, instruction, templateName), 'refine');
  }

  private async call(
    provider: TextGenerationProvider,
    prompt: PromptPair,
    failureLabel: string
  ): Promise<GenerationOutcome> {
    try {
      const response = await provider.generate({ ...prompt, maxOutputTokens: this.maxOutputTokens });

      this.logger.info('Generation complete', {
        inputTokens: response.usage.inputTokens,
        outputTokens: response.usage.outputTokens,
        cost: provider.calculateCost(response.usage),
        stopReason: response.stopReason,
      });

      if (response.stopReason === 'max_tokens') {
        this.logger.warn('Generation stopped at the output token limit', {
          maxOutputTokens: this.maxOutputTokens,
        });
      }

      return { kind: 'ok', text: response.text.trim() };
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.error(`${failureLabel}: ${reason}`);
      return { kind: 'upstream-failed', reason };
    }
  }
}
