import { Router, type Response } from 'express';
import {
  countWords,
  describeOutcome,
  type GenerationAction,
  type GenerationOutcome,
} from '@docwriter/core';
import type { RouteContext } from '../context.js';
import { GenerateBodySchema, RefineBodySchema, parseBody } from '../validation.js';
import { exclusivePerSession } from '../middleware.js';

/**
 * Map an outcome onto an HTTP response
 */
export function sendOutcome(res: Response, outcome: GenerationOutcome, action: GenerationAction): void {
  switch (outcome.kind) {
    case 'ok':
    case 'unchanged':
      res.json({
        status: outcome.kind,
        documentText: outcome.text,
        wordCount: countWords(outcome.text),
      });
      return;
    case 'input-missing':
      res.status(400).json({ error: describeOutcome(outcome, action) });
      return;
    case 'config-missing':
      res.status(503).json({ error: describeOutcome(outcome, action) });
      return;
    case 'upstream-failed':
      res.status(502).json({ error: describeOutcome(outcome, action) });
      return;
  }
}

export function createGenerationRoutes(ctx: RouteContext): Router {
  const router = Router();

  /**
   * POST /generate
   * Body: { "templateName": "memo", "notes": "...", "tone": "Formal" }
   */
  router.post(
    '/generate',
    ctx.limiter,
    ctx.requireAuth,
    exclusivePerSession(async (req, res) => {
      const body = parseBody(GenerateBodySchema, req, res);
      if (!body) return;

      const outcome = await ctx.client.generateDraft(body.templateName, body.notes, body.tone);
      sendOutcome(res, outcome, 'generate');
    })
  );

  /**
   * POST /refine
   * Body: { "currentText": "...", "instruction": "make it shorter", "templateName": "memo" }
   */
  router.post(
    '/refine',
    ctx.limiter,
    ctx.requireAuth,
    exclusivePerSession(async (req, res) => {
      const body = parseBody(RefineBodySchema, req, res);
      if (!body) return;

      const outcome = await ctx.client.refineText(body.currentText, body.instruction, body.templateName);
      sendOutcome(res, outcome, 'refine');
    })
  );

  return router;
}
