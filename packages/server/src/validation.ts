import { z } from 'zod';
import type { Request, Response } from 'express';

export const MAX_TEXT_LENGTH = 10_000;
export const MAX_SHORT_FIELD_LENGTH = 200;
export const MAX_INSTRUCTION_LENGTH = 2_000;

const text = z.string().max(MAX_TEXT_LENGTH);
const shortField = z.string().max(MAX_SHORT_FIELD_LENGTH);

export const LoginBodySchema = z.object({
  password: shortField,
});

export const GenerateBodySchema = z.object({
  templateName: shortField.optional(),
  notes: text,
  tone: shortField.optional(),
});

export const RefineBodySchema = z.object({
  currentText: text,
  instruction: z.string().max(MAX_INSTRUCTION_LENGTH),
  templateName: shortField.default('general'),
});

export const SaveDraftBodySchema = z.object({
  title: shortField,
  templateName: shortField.default('general'),
  tone: shortField.default('Professional'),
  notes: text.default(''),
  documentText: text.default(''),
});

export const ExportBodySchema = z.object({
  text,
  title: shortField.default('Document'),
});

/**
 * Validate `req.body`; on failure send 400 with the offending fields and return undefined
 */
export function parseBody<S extends z.ZodTypeAny>(
  schema: S,
  req: Request,
  res: Response
): z.output<S> | undefined {
  const result = schema.safeParse(req.body ?? {});

  if (!result.success) {
    res.status(400).json({
      error: 'Invalid request',
      details: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
    });
    return undefined;
  }
  return result.data;
}
