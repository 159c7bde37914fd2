import { Router } from 'express';
import { basename } from 'path';
import { isExportFormat } from '@docwriter/core';
import type { RouteContext } from '../context.js';
import { ExportBodySchema, parseBody } from '../validation.js';
import { currentSession } from '../middleware.js';

export function createExportRoutes(ctx: RouteContext): Router {
  const router = Router();

  /**
   * POST /export/:format
   * Body: { "text": "...", "title": "Quarterly Report" }
   *
   * Responds 303 to a one-time GET /downloads/:token URL.
   */
  router.post('/export/:format', ctx.limiter, ctx.requireAuth, async (req, res, next) => {
    const format = req.params.format;
    if (!isExportFormat(format)) {
      res.status(400).json({ error: `Unsupported export format: ${format}` });
      return;
    }

    const body = parseBody(ExportBodySchema, req, res);
    if (!body) return;

    try {
      const result = await ctx.client.exportDocument(format, body.text, { title: body.title });

      if (!result.ok) {
        if (result.reason === 'empty-input') {
          res.status(400).json({ error: 'No text to export.' });
        } else {
          res.status(500).json({ error: `${format.toUpperCase()} export failed.` });
        }
        return;
      }

      const renderer = ctx.client.getExporter().getRenderer(format);
      const filename = basename(result.path);
      const token = ctx.downloads.register({
        path: result.path,
        filename,
        mimeType: renderer.mimeType,
        sessionToken: currentSession(req).token,
      });
      const location = `/downloads/${token}`;

      res.status(303).location(location).json({ download: location, filename });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /downloads/:token
   * Stream an exported file once
   */
  router.get('/downloads/:token', ctx.requireAuth, (req, res, next) => {
    const sessionToken = req.webSession?.token;
    const entry = sessionToken ? ctx.downloads.take(req.params.token, sessionToken) : undefined;
    if (!entry) {
      res.status(404).json({ error: 'Download not found or expired' });
      return;
    }

    res.type(entry.mimeType);
    res.download(entry.path, entry.filename, (error) => {
      if (error) next(error);
    });
  });

  return router;
}
