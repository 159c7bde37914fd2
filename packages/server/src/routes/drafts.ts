import { Router } from 'express';
import { basename } from 'path';
import { CorruptDraftError, DraftNotFoundError, StorageError } from '@docwriter/core';
import type { RouteContext } from '../context.js';
import { SaveDraftBodySchema, parseBody } from '../validation.js';

export function createDraftRoutes(ctx: RouteContext): Router {
  const router = Router();

  /**
   * POST /drafts
   * Save a new draft
   */
  router.post('/drafts', ctx.limiter, ctx.requireAuth, async (req, res, next) => {
    const body = parseBody(SaveDraftBodySchema, req, res);
    if (!body) return;

    try {
      const filepath = await ctx.client.saveDraft(body);
      res.status(201).json({ filepath, filename: basename(filepath) });
    } catch (error) {
      if (error instanceof StorageError) {
        res.status(500).json({ error: 'Failed to save draft.' });
        return;
      }
      next(error);
    }
  });

  /**
   * GET /drafts
   * List drafts, newest first
   */
  router.get('/drafts', ctx.requireAuth, async (_req, res, next) => {
    try {
      const drafts = await ctx.client.listDrafts();
      res.json({
        drafts: drafts.map((draft) => ({ ...draft, filename: basename(draft.filepath) })),
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /drafts/:filename
   * Load one draft by its bare filename
   */
  router.get('/drafts/:filename', ctx.requireAuth, async (req, res, next) => {
    const filepath = ctx.client.resolveDraft(req.params.filename);
    if (!filepath) {
      res.status(400).json({ error: 'Invalid draft filename' });
      return;
    }

    try {
      res.json(await ctx.client.loadDraft(filepath));
    } catch (error) {
      if (error instanceof DraftNotFoundError) {
        res.status(404).json({ error: `Draft not found: ${req.params.filename}` });
        return;
      }
      if (error instanceof CorruptDraftError) {
        res.status(422).json({ error: 'Could not load draft.' });
        return;
      }
      next(error);
    }
  });

  /**
   * DELETE /drafts/:filename
   */
  router.delete('/drafts/:filename', ctx.limiter, ctx.requireAuth, async (req, res, next) => {
    if (!ctx.client.resolveDraft(req.params.filename)) {
      res.status(400).json({ error: 'Invalid draft filename' });
      return;
    }

    try {
      const deleted = await ctx.client.deleteDraft(req.params.filename);
      if (!deleted) {
        res.status(404).json({ error: `Draft not found: ${req.params.filename}` });
        return;
      }
      res.json({ deleted: true });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
