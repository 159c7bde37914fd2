import { Router } from 'express';
import type { RouteContext } from '../context.js';

export function createTemplateRoutes(ctx: RouteContext): Router {
  const router = Router();

  /**
   * GET /templates
   * Document types, tone options and the default selection
   */
  router.get('/templates', ctx.requireAuth, (_req, res) => {
    const registry = ctx.client.templates;

    res.json({
      templates: registry.list().map((template) => ({
        name: template.name,
        displayName: template.displayName,
        description: template.description,
        placeholder: template.placeholder,
      })),
      tones: registry.tones,
      defaultTemplate: registry.defaultTemplate.name,
      defaultTone: registry.defaultTone,
    });
  });

  return router;
}
