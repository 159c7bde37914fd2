/**
 * DocWriter Core Library
 *
 * Turns rough notes into formatted documents with an LLM, keeps drafts on
 * disk and exports them to PDF and DOCX
 */

export {
  DocWriterClient,
  type DocWriterClientOptions,
  type DocWriterClientEvents,
  type HealthReport,
  type Diagnostics,
} from './client.js';
export { AnthropicProvider, AnthropicProviderError, type AnthropicProviderOptions } from './providers/anthropic.js';
export {
  loadConfig,
  loadEnvFile,
  ConfigError,
  DEFAULT_MODEL,
  DEFAULT_DRAFTS_DIR,
  type DocWriterConfig,
  type WebConfig,
} from './config.js';
export { createLogger, silentLogger, errorMessage } from './logger.js';

export type {
  Usage,
  GenerationRequest,
  GenerationResponse,
  ModelInfo,
  TextGenerationProvider,
  Draft,
  DraftInput,
  DraftSummary,
  LogLevel,
  Logger,
} from './types.js';

// Export template system
export * from './templates/index.js';

// Export storage system
export * from './storage/index.js';

// Export document export system
export * from './export/index.js';

// Export generation system
export * from './generation/index.js';
