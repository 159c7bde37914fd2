/**
 * Core types for the DocWriter library
 */

// ============================================================================
// Provider Types
// ============================================================================

export interface Usage {
  inputTokens: number;
  outputTokens: number;
}

/**
 * A single text-in/text-out request to the generation collaborator
 */
export interface GenerationRequest {
  systemPrompt: string;
  userMessage: string;
  maxOutputTokens: number;
}

export interface GenerationResponse {
  text: string;
  usage: Usage;
  stopReason: 'end_turn' | 'max_tokens' | 'stop_sequence' | 'other';
}

export interface ModelInfo {
  name: string;
  maxTokens: number;
  inputCostPer1k: number;
  outputCostPer1k: number;
}

/**
 * Opaque text-generation service. Implementations throw on failure.
 */
export interface TextGenerationProvider {
  generate(request: GenerationRequest): Promise<GenerationResponse>;

  calculateCost(usage: Usage): number;
  getModelInfo(): ModelInfo;
}

// ============================================================================
// Draft Types
// ============================================================================

/**
 * A persisted snapshot of notes, generated text and metadata
 */
export interface Draft {
  title: string;
  templateName: string;
  tone: string;
  notes: string;
  documentText: string;
  savedAt: string; // ISO-8601, second precision
  filename: string;
}

export type DraftInput = Omit<Draft, 'savedAt' | 'filename'>;

export interface DraftSummary {
  title: string;
  savedAt: string;
  filepath: string;
  templateName: string;
}

// ============================================================================
// Logging
// ============================================================================

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface Logger {
  error(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
}
