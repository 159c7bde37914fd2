import Anthropic from '@anthropic-ai/sdk';
import type {
  TextGenerationProvider,
  GenerationRequest,
  GenerationResponse,
  Usage,
  ModelInfo,
} from '../types.js';

/**
 * Pricing per 1K tokens (as of 2025-01-01)
 */
const PRICING: Record<string, { input: number; output: number }> = {
  'claude-opus-4-20250514': { input: 0.015, output: 0.075 },
  'claude-sonnet-4-20250514': { input: 0.003, output: 0.015 },
  'claude-3-5-sonnet-20241022': { input: 0.003, output: 0.015 },
  'claude-3-5-haiku-20241022': { input: 0.0008, output: 0.004 },
};

// Short aliases accepted in CLAUDE_MODEL
const MODEL_ALIASES: Record<string, string> = {
  'claude-opus-4': 'claude-opus-4-20250514',
  'claude-sonnet-4': 'claude-sonnet-4-20250514',
  'claude-sonnet-3-5': 'claude-3-5-sonnet-20241022',
  'claude-haiku-3-5': 'claude-3-5-haiku-20241022',
};

export interface AnthropicProviderOptions {
  model?: string;
  /** Per-request timeout in milliseconds */
  timeout?: number;
}

/**
 * AnthropicProvider - text generation through the Claude Messages API
 */
export class AnthropicProvider implements TextGenerationProvider {
  private client: Anthropic;
  private model: string;

  constructor(apiKey: string, options: AnthropicProviderOptions = {}) {
    this.client = new Anthropic({ apiKey, timeout: options.timeout });
    this.model = this.normalizeModel(options.model ?? 'claude-sonnet-4-20250514');
  }

  /**
   * Send one system prompt + user message and return the text reply
   */
  async generate(request: GenerationRequest): Promise<GenerationResponse> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: request.maxOutputTokens,
        system: request.systemPrompt,
        messages: [{ role: 'user', content: request.userMessage }],
      });

      return this.parseResponse(response);
    } catch (error) {
      throw new AnthropicProviderError(
        `Failed to send message: ${error instanceof Error ? error.message : 'Unknown error'}`,
        error
      );
    }
  }

  /**
   * Calculate cost based on token usage (0 for models without a price entry)
   */
  calculateCost(usage: Usage): number {
    const pricing = PRICING[this.model];
    if (!pricing) return 0;

    const inputCost = (usage.inputTokens / 1000) * pricing.input;
    const outputCost = (usage.outputTokens / 1000) * pricing.output;
    return inputCost + outputCost;
  }

  /**
   * Get model information
   */
  getModelInfo(): ModelInfo {
    const pricing = PRICING[this.model];
    return {
      name: this.model,
      maxTokens: 200000, // Claude context window
      inputCostPer1k: pricing?.input ?? 0,
      outputCostPer1k: pricing?.output ?? 0,
    };
  }

  /**
   * Map short names to full model IDs; unknown IDs pass through unchanged
   */
  private normalizeModel(model: string): string {
    const trimmed = model.trim();
    if (!trimmed) {
      throw new AnthropicProviderError('Model name must not be empty');
    }
    return MODEL_ALIASES[trimmed] ?? trimmed;
  }

  /**
   * Parse Anthropic API response to GenerationResponse
   */
  private parseResponse(response: Anthropic.Messages.Message): GenerationResponse {
    const parts: string[] = [];

    for (const block of response.content) {
      if (block.type === 'text') {
        parts.push(block.text);
      }
    }

    if (parts.length === 0) {
      throw new Error('Response contained no text content');
    }

    return {
      text: parts.join(''),
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
      stopReason: this.mapStopReason(response.stop_reason),
    };
  }

  /**
   * Map Anthropic stop reason to our format
   */
  private mapStopReason(reason: string | null): GenerationResponse['stopReason'] {
    switch (reason) {
      case 'end_turn':
        return 'end_turn';
      case 'max_tokens':
        return 'max_tokens';
      case 'stop_sequence':
        return 'stop_sequence';
      default:
        return 'other';
    }
  }
}

/**
 * Custom error for Anthropic provider failures
 */
export class AnthropicProviderError extends Error {
  public override readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'AnthropicProviderError';
    this.cause = cause;
  }
}
