import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import { DocWriterClient } from '../client.js';
import { loadConfig, type DocWriterConfig } from '../config.js';
import { silentLogger } from '../logger.js';
import { TemplateValidationError } from '../templates/schema.js';
import { MockGenerationProvider } from './mock-generation-provider.js';
import type { Logger } from '../types.js';

describe('DocWriterClient', () => {
  let dir: string;
  let config: DocWriterConfig;
  let provider: MockGenerationProvider;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'docwriter-client-'));
    config = loadConfig({ DRAFTS_DIR: join(dir, 'drafts') });
    provider = new MockGenerationProvider({ text: 'Dear Council,\n\nPlease fix the road.' });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should initialize with templates and storage', async () => {
    const client = new DocWriterClient({ config, provider, logger: silentLogger });

    await client.waitForInit();

    expect(client.templates.size).toBe(8);
    expect(await client.listDrafts()).toEqual([]);
  });

  it('should emit ready after initialization', async () => {
    const client = new DocWriterClient({ config, provider, logger: silentLogger });
    const ready = vi.fn();
    client.on('ready', ready);

    await client.waitForInit();

    expect(ready).toHaveBeenCalledTimes(1);
  });

  it('should use custom logger', () => {
    const logs: string[] = [];
    const customLogger: Logger = {
      error: (msg: string) => logs.push(`ERROR: ${msg}`),
      warn: (msg: string) => logs.push(`WARN: ${msg}`),
      info: (msg: string) => logs.push(`INFO: ${msg}`),
      debug: (msg: string) => logs.push(`DEBUG: ${msg}`),
    };

    const client = new DocWriterClient({ config, provider, logger: customLogger });

    expect(client.getLogger()).toBe(customLogger);
    expect(logs[0]).toBe('INFO: DocWriterClient initialized');
  });

  it('should build an Anthropic provider from the API key', async () => {
    const client = new DocWriterClient({
      config: loadConfig({ DRAFTS_DIR: join(dir, 'drafts'), ANTHROPIC_API_KEY: 'test-key-123' }),
      logger: silentLogger,
    });
    await client.waitForInit();

    expect(client.getWriter().isConfigured).toBe(true);
    expect((await client.getDiagnostics()).config.model).toBe('claude-sonnet-4-20250514');
  });

  it('should warn and disable generation without an API key', async () => {
    const logger: Logger = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
    const client = new DocWriterClient({ config, logger });

    expect(logger.warn).toHaveBeenCalledWith('ANTHROPIC_API_KEY not set; draft generation is disabled');
    expect(await client.generateDraft('memo', 'notes')).toEqual({ kind: 'config-missing' });
  });

  it('should reject waitForInit when the catalog is invalid', async () => {
    const catalogPath = join(dir, 'bad.yaml');
    await writeFile(catalogPath, 'templates: []\n');
    const client = new DocWriterClient({ config, provider, logger: silentLogger, catalogPath });
    const failed = vi.fn();
    client.on('init:failed', failed);

    await expect(client.waitForInit()).rejects.toThrow(TemplateValidationError);
    expect(failed).toHaveBeenCalledTimes(1);
  });

  describe('generation', () => {
    it('should generate with the named template and default tone', async () => {
      const client = new DocWriterClient({ config, provider, logger: silentLogger });

      const outcome = await client.generateDraft('formal_letter', 'Pothole on Main Street');

      expect(outcome).toEqual({ kind: 'ok', text: 'Dear Council,\n\nPlease fix the road.' });
      expect(provider.lastRequest?.userMessage).toBe(
        'Document type: Formal Letter\n\nMy notes and bullet points:\nPothole on Main Street'
      );
      expect(provider.lastRequest?.systemPrompt).toContain('\n\nTone: Professional\n');
    });

    it('should fall back to the general template for unknown names', async () => {
      const client = new DocWriterClient({ config, provider, logger: silentLogger });

      await client.generateDraft('no_such_template', 'notes', 'Casual');

      expect(provider.lastRequest?.userMessage).toMatch(/^Document type: General Document\n/);
    });

    it('should emit generation events', async () => {
      const client = new DocWriterClient({ config, provider, logger: silentLogger });
      const generated = vi.fn();
      const refined = vi.fn();
      client.on('draft:generated', generated);
      client.on('draft:refined', refined);

      await client.generateDraft('memo', 'notes');
      await client.refineText('Text', '');

      expect(generated).toHaveBeenCalledWith({ kind: 'ok', text: 'Dear Council,\n\nPlease fix the road.' });
      expect(refined).toHaveBeenCalledWith({ kind: 'unchanged', text: 'Text' });
    });
  });

  describe('drafts', () => {
    it('should save, list, load and delete drafts', async () => {
      const client = new DocWriterClient({ config, provider, logger: silentLogger });
      const saved = vi.fn();
      const deleted = vi.fn();
      client.on('draft:saved', saved);
      client.on('draft:deleted', deleted);

      const filepath = await client.saveDraft({
        title: 'Road repair',
        templateName: 'formal_letter',
        tone: 'Formal',
        notes: 'Pothole',
        documentText: 'Dear Council,',
      });
      const filename = basename(filepath);

      expect(saved).toHaveBeenCalledWith(filepath);
      expect((await client.listDrafts()).map((d) => d.title)).toEqual(['Road repair']);
      expect(client.resolveDraft(filename)).toBe(filepath);
      expect((await client.loadDraft(filepath)).documentText).toBe('Dear Council,');

      expect(await client.deleteDraft(filename)).toBe(true);
      expect(deleted).toHaveBeenCalledWith(filename);
      expect(await client.deleteDraft(filename)).toBe(false);
      expect(deleted).toHaveBeenCalledTimes(1);
    });
  });

  describe('export', () => {
    it('should export into the drafts directory and emit completion', async () => {
      const client = new DocWriterClient({ config, provider, logger: silentLogger });
      const completed = vi.fn();
      client.on('export:completed', completed);

      const result = await client.exportDocument('docx', 'Hello.', { title: 'Letter' });

      expect(result.ok).toBe(true);
      expect(result.ok && result.path.startsWith(config.draftsDir)).toBe(true);
      expect(completed).toHaveBeenCalledWith('docx', result.ok ? result.path : '');
    });

    it('should emit failures for empty text', async () => {
      const client = new DocWriterClient({ config, provider, logger: silentLogger });
      const failed = vi.fn();
      client.on('export:failed', failed);

      await client.exportDocument('pdf', '   ');

      expect(failed).toHaveBeenCalledWith('pdf', {
        ok: false,
        reason: 'empty-input',
        message: 'No text to export',
      });
    });
  });

  describe('healthCheck', () => {
    it('should report healthy when all components work', async () => {
      const client = new DocWriterClient({ config, provider, logger: silentLogger });
      await client.waitForInit();

      const health = await client.healthCheck();

      expect(health.healthy).toBe(true);
      expect(health.provider).toEqual({ healthy: true, model: 'mock-model', error: undefined });
      expect(health.templates).toEqual({ healthy: true, count: 8 });
      expect(health.issues).toEqual([]);
    });

    it('should flag a missing provider', async () => {
      const client = new DocWriterClient({ config, logger: silentLogger });
      await client.waitForInit();

      const health = await client.healthCheck();

      expect(health.healthy).toBe(false);
      expect(health.issues).toEqual(['Provider not configured']);
    });
  });

  describe('getDiagnostics', () => {
    it('should describe configuration, templates and drafts', async () => {
      const client = new DocWriterClient({ config, provider, logger: silentLogger });
      await client.waitForInit();
      await client.saveDraft({
        title: 'One',
        templateName: 'memo',
        tone: 'Casual',
        notes: '',
        documentText: 'x',
      });

      const diagnostics = await client.getDiagnostics();

      expect(diagnostics.version).toMatch(/^\d+\.\d+\.\d+/);
      expect(diagnostics.config).toEqual({
        model: 'mock-model',
        draftsDir: config.draftsDir,
        logLevel: 'info',
        providerConfigured: true,
        maxOutputTokens: 4096,
        generationTimeoutMs: 120000,
      });
      expect(diagnostics.templates.count).toBe(8);
      expect(diagnostics.templates.templates[0]).toEqual({
        name: 'formal_letter',
        displayName: 'Formal Letter',
      });
      expect(diagnostics.drafts.count).toBe(1);
    });
  });
});
