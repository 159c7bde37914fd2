import { EventEmitter } from 'eventemitter3';
import { access, readFile } from 'fs/promises';
import { constants } from 'fs';
import type { Draft, DraftInput, DraftSummary, Logger, TextGenerationProvider } from './types.js';
import type { DocWriterConfig } from './config.js';
import { createLogger, errorMessage } from './logger.js';
import { AnthropicProvider } from './providers/anthropic.js';
import { TemplateLoader, loadBundledRegistry, type TemplateRegistry } from './templates/index.js';
import { FileDraftStore, type DraftStore } from './storage/index.js';
import { DocumentExporter, type ExportFormat, type ExportOptions, type ExportResult } from './export/index.js';
import { DraftWriter, type GenerationOutcome } from './generation/index.js';

export interface DocWriterClientOptions {
  config: DocWriterConfig;
  logger?: Logger;
  /** Use this provider instead of building one from the API key */
  provider?: TextGenerationProvider;
  store?: DraftStore;
  exporter?: DocumentExporter;
  /** Load templates from this catalog instead of the bundled one */
  catalogPath?: string;
}

export interface DocWriterClientEvents {
  ready: () => void;
  'init:failed': (error: unknown) => void;
  'draft:generated': (outcome: GenerationOutcome) => void;
  'draft:refined': (outcome: GenerationOutcome) => void;
  'draft:saved': (filepath: string) => void;
  'draft:deleted': (filename: string) => void;
  'export:completed': (format: ExportFormat, path: string) => void;
  'export:failed': (format: ExportFormat, result: Extract<ExportResult, { ok: false }>) => void;
}

export interface HealthReport {
  healthy: boolean;
  provider: { healthy: boolean; model?: string; error?: string };
  storage: { healthy: boolean; error?: string };
  templates: { healthy: boolean; count: number };
  timestamp: number;
  issues: string[];
}

export interface Diagnostics {
  version: string;
  config: {
    model: string;
    draftsDir: string;
    logLevel: string;
    providerConfigured: boolean;
    maxOutputTokens: number;
    generationTimeoutMs: number;
  };
  templates: {
    count: number;
    templates: Array<{ name: string; displayName: string }>;
    tones: readonly string[];
  };
  drafts: { count: number };
  system: {
    nodeVersion: string;
    platform: string;
    memory: { used: number; total: number };
  };
}

/**
 * DocWriterClient - Main entry point of the library
 *
 * Built once at process start from configuration. Owns the template registry,
 * draft store, generation provider, draft writer and exporter.
 *
 * @example
 * ```typescript
 * loadEnvFile();
 * const client = new DocWriterClient({ config: loadConfig() });
 * await client.waitForInit();
 *
 * const outcome = await client.generateDraft('formal_letter', notes, 'Formal');
 * if (outcome.kind === 'ok') {
 *   await client.saveDraft({ title: 'Pothole', templateName: 'formal_letter', tone: 'Formal', notes, documentText: outcome.text });
 * }
 * ```
 */
export class DocWriterClient extends EventEmitter<DocWriterClientEvents> {
  private readonly config: DocWriterConfig;
  private readonly logger: Logger;
  private readonly provider?: TextGenerationProvider;
  private readonly store: DraftStore;
  private readonly exporter: DocumentExporter;
  private readonly writer: DraftWriter;
  private readonly catalogPath?: string;
  private registry?: TemplateRegistry;
  private initError?: unknown;
  private initPromise: Promise<void>;

  constructor(options: DocWriterClientOptions) {
    super();
    this.config = options.config;
    this.logger = options.logger ?? createLogger(options.config.logLevel);
    this.catalogPath = options.catalogPath;
    this.provider = options.provider ?? this.createProvider();
    this.store = options.store ?? new FileDraftStore(this.config.draftsDir, { logger: this.logger });
    this.exporter =
      options.exporter ?? new DocumentExporter(this.config.draftsDir, { logger: this.logger });
    this.writer = new DraftWriter(this.provider, this.logger, {
      maxOutputTokens: this.config.maxOutputTokens,
    });

    this.logger.info('DocWriterClient initialized', {
      model: this.provider?.getModelInfo().name ?? 'none',
      draftsDir: this.config.draftsDir,
    });

    // Start initialization in background (templates + storage)
    this.initPromise = this.initialize().then(
      () => {
        this.emit('ready');
      },
      (error: unknown) => {
        this.initError = error;
        this.logger.error('Client initialization failed', { error: errorMessage(error) });
        this.emit('init:failed', error);
      }
    );
  }

  /**
   * Wait for client initialization to complete
   *
   * @throws the initialization error if templates or storage failed to load
   */
  async waitForInit(): Promise<void> {
    await this.initPromise;
    if (this.initError !== undefined) {
      throw this.initError;
    }
  }

  /**
   * Template registry (available after waitForInit)
   */
  get templates(): TemplateRegistry {
    if (!this.registry) {
      throw new Error('Templates not loaded yet; await waitForInit() first');
    }
    return this.registry;
  }

  getConfig(): DocWriterConfig {
    return this.config;
  }

  getLogger(): Logger {
    return this.logger;
  }

  getStore(): DraftStore {
    return this.store;
  }

  getExporter(): DocumentExporter {
    return this.exporter;
  }

  getWriter(): DraftWriter {
    return this.writer;
  }

  /**
   * Generate a draft from notes with the named template (unknown names use the default)
   */
  async generateDraft(templateName: string | undefined, notes: string, tone?: string): Promise<GenerationOutcome> {
    await this.waitForInit();
    const template = this.templates.getByName(templateName);
    const outcome = await this.writer.generateDraftOutcome(template, notes, tone ?? this.templates.defaultTone);

    this.emit('draft:generated', outcome);
    return outcome;
  }

  /**
   * Apply an edit instruction to existing text
   */
  async refineText(currentText: string, instruction: string, templateName?: string): Promise<GenerationOutcome> {
    const outcome = await this.writer.refineTextOutcome(currentText, instruction, templateName);

    this.emit('draft:refined', outcome);
    return outcome;
  }

  async saveDraft(input: DraftInput): Promise<string> {
    await this.waitForInit();
    const filepath = await this.store.save(input);

    this.emit('draft:saved', filepath);
    return filepath;
  }

  async loadDraft(filepath: string): Promise<Draft> {
    return this.store.load(filepath);
  }

  async listDrafts(): Promise<DraftSummary[]> {
    return this.store.list();
  }

  async deleteDraft(filename: string): Promise<boolean> {
    const deleted = await this.store.delete(filename);

    if (deleted) {
      this.emit('draft:deleted', filename);
    }
    return deleted;
  }

  /**
   * Map a bare draft filename to its path; undefined for anything outside the store
   */
  resolveDraft(filename: string): string | undefined {
    return this.store.resolve(filename);
  }

  async exportDocument(format: ExportFormat, text: string, options?: ExportOptions): Promise<ExportResult> {
    const result = await this.exporter.export(format, text, options);

    if (result.ok) {
      this.emit('export:completed', format, result.path);
    } else {
      this.emit('export:failed', format, result);
    }
    return result;
  }

  /**
   * Health check - verify all components are operational
   *
   * Checks:
   * - Provider configured (no API call is made)
   * - Drafts directory writable
   * - Template registry status
   *
   * @example
   * ```typescript
   * const health = await client.healthCheck();
   *
   * if (!health.healthy) {
   *   console.error('Client unhealthy:', health.issues);
   * }
   * ```
   */
  async healthCheck(): Promise<HealthReport> {
    const timestamp = Date.now();
    const issues: string[] = [];

    // Check Provider
    const providerHealthy = this.provider !== undefined;
    let providerError: string | undefined;
    if (!providerHealthy) {
      providerError = 'ANTHROPIC_API_KEY not set';
      issues.push('Provider not configured');
    }

    // Check Storage
    let storageHealthy = false;
    let storageError: string | undefined;
    try {
      await access(this.config.draftsDir, constants.W_OK);
      storageHealthy = true;
    } catch (error) {
      storageError = errorMessage(error);
      issues.push(`Storage error: ${storageError}`);
    }

    // Check Templates
    const templateCount = this.registry?.size ?? 0;
    const templatesHealthy = templateCount > 0;
    if (!templatesHealthy) {
      issues.push('No templates loaded');
    }

    return {
      healthy: providerHealthy && storageHealthy && templatesHealthy,
      provider: {
        healthy: providerHealthy,
        model: this.provider?.getModelInfo().name,
        error: providerError,
      },
      storage: { healthy: storageHealthy, error: storageError },
      templates: { healthy: templatesHealthy, count: templateCount },
      timestamp,
      issues,
    };
  }

  /**
   * Get diagnostic information about the client
   *
   * @example
   * ```typescript
   * const diagnostics = await client.getDiagnostics();
   * console.log('Templates:', diagnostics.templates.count);
   * ```
   */
  async getDiagnostics(): Promise<Diagnostics> {
    const templates = this.registry?.list() ?? [];
    const drafts = await this.store.list();
    const memUsage = process.memoryUsage();

    return {
      version: await this.readPackageVersion(),
      config: {
        model: this.provider?.getModelInfo().name ?? this.config.model,
        draftsDir: this.config.draftsDir,
        logLevel: this.config.logLevel,
        providerConfigured: this.provider !== undefined,
        maxOutputTokens: this.config.maxOutputTokens,
        generationTimeoutMs: this.config.generationTimeoutMs,
      },
      templates: {
        count: templates.length,
        templates: templates.map((t) => ({ name: t.name, displayName: t.displayName })),
        tones: this.registry?.tones ?? [],
      },
      drafts: { count: drafts.length },
      system: {
        nodeVersion: process.version,
        platform: process.platform,
        memory: {
          used: Math.round(memUsage.heapUsed / 1024 / 1024), // MB
          total: Math.round(memUsage.heapTotal / 1024 / 1024), // MB
        },
      },
    };
  }

  private async initialize(): Promise<void> {
    const [registry] = await Promise.all([this.loadTemplates(), this.store.initialize()]);
    this.registry = registry;
  }

  private async loadTemplates(): Promise<TemplateRegistry> {
    if (this.catalogPath) {
      return new TemplateLoader(this.logger).loadRegistry(this.catalogPath);
    }
    return loadBundledRegistry(this.logger);
  }

  private async readPackageVersion(): Promise<string> {
    try {
      const raw = await readFile(new URL('../package.json', import.meta.url), 'utf-8');
      const parsed: unknown = JSON.parse(raw);
      if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
        return parsed.version;
      }
    } catch (error) {
      this.logger.debug('Could not read package version', { error: errorMessage(error) });
    }
    return '0.0.0';
  }

  private createProvider(): TextGenerationProvider | undefined {
    if (!this.config.anthropicApiKey) {
      this.logger.warn('ANTHROPIC_API_KEY not set; draft generation is disabled');
      return undefined;
    }

    return new AnthropicProvider(this.config.anthropicApiKey, {
      model: this.config.model,
      timeout: this.config.generationTimeoutMs,
    });
  }
}
