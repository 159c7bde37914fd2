/**
 * Shared fixtures for server tests: an in-process provider, a fake renderer and
 * an app wired to a temp drafts directory
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Express } from 'express';
import {
  DocWriterClient,
  DocumentExporter,
  FileDraftStore,
  loadConfig,
  silentLogger,
  type DocumentRenderer,
  type GenerationRequest,
  type GenerationResponse,
  type TextGenerationProvider,
  type Usage,
  type ModelInfo,
} from '@docwriter/core';
import { createApp, type AppOptions } from '../app.js';

export const TEST_SECRET = 'test-secret';
export const TEST_PASSWORD = 'test-password';

// 2026-05-20 16:45:09 local time
export const EXPORT_CLOCK = new Date(2026, 4, 20, 16, 45, 9);

type Reply = (request: GenerationRequest) => Promise<GenerationResponse>;

/**
 * Provider whose reply is a plain function, so a test can delay or fail it
 */
export class StubProvider implements TextGenerationProvider {
  readonly requests: GenerationRequest[] = [];
  reply: Reply;

  constructor(text = 'Generated document.') {
    this.reply = async () => ({
      text,
      usage: { inputTokens: 10, outputTokens: 20 },
      stopReason: 'end_turn',
    });
  }

  async generate(request: GenerationRequest): Promise<GenerationResponse> {
    this.requests.push(request);
    return this.reply(request);
  }

  calculateCost(usage: Usage): number {
    return (usage.inputTokens + usage.outputTokens) * 0.00001;
  }

  getModelInfo(): ModelInfo {
    return { name: 'stub-model', maxTokens: 8192, inputCostPer1k: 0.01, outputCostPer1k: 0.01 };
  }
}

/**
 * Renderer that writes the title and line texts instead of a real document
 */
export function fakeRenderer(
  format: DocumentRenderer['format'],
  mimeType: string
): DocumentRenderer {
  return {
    format,
    extension: format,
    mimeType,
    render: async (lines, title) =>
      Buffer.from([`${format.toUpperCase()} ${title}`, ...lines.map((line) => line.text)].join('\n')),
  };
}

export interface TestApp {
  app: Express;
  client: DocWriterClient;
  provider: StubProvider;
  draftsDir: string;
  /** Mutable clock shared by sessions and downloads */
  clock: { now: number };
  cleanup: () => Promise<void>;
}

export interface TestAppOptions extends Partial<Omit<AppOptions, 'client' | 'now'>> {
  provider?: StubProvider | null;
}

export async function createTestApp(options: TestAppOptions = {}): Promise<TestApp> {
  const draftsDir = await mkdtemp(join(tmpdir(), 'docwriter-server-'));
  const { provider: providerOption, ...appOptions } = options;
  const config = loadConfig({ DRAFTS_DIR: draftsDir });
  const provider = providerOption === null ? undefined : (providerOption ?? new StubProvider());
  const clock = { now: Date.UTC(2026, 4, 20, 12, 0, 0) };

  const client = new DocWriterClient({
    config,
    logger: silentLogger,
    provider,
    store: new FileDraftStore(draftsDir, { now: () => EXPORT_CLOCK }),
    exporter: new DocumentExporter(draftsDir, {
      now: () => EXPORT_CLOCK,
      renderers: {
        pdf: fakeRenderer('pdf', 'application/pdf'),
        docx: fakeRenderer(
          'docx',
          'application/vnd.openxmlformats-officedocument.wordprocessingml.document'
        ),
      },
    }),
  });
  await client.waitForInit();

  const app = createApp({
    secretKey: TEST_SECRET,
    sessionTimeoutMinutes: 60,
    ...appOptions,
    client,
    now: () => clock.now,
  });

  return {
    app,
    client,
    provider: provider ?? new StubProvider(),
    draftsDir,
    clock,
    cleanup: () => rm(draftsDir, { recursive: true, force: true }),
  };
}
