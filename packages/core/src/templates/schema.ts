import { z } from 'zod';

/**
 * Zod schema for the YAML template catalog
 */

export const DEFAULT_TONES = [
  'Formal',
  'Professional',
  'Friendly',
  'Casual',
  'Academic',
  'Persuasive',
] as const;

export const DEFAULT_TONE = 'Professional';

// One document type as written in YAML
const TemplateEntrySchema = z
  .object({
    name: z.string().regex(/^[a-z0-9_]+$/, 'must be lower_snake_case'),
    display_name: z.string().min(1),
    description: z.string(),
    system_prompt: z.string().min(1),
    placeholder: z.string().default(''),
  })
  .transform((entry) => ({
    name: entry.name,
    displayName: entry.display_name,
    description: entry.description,
    systemPrompt: entry.system_prompt,
    placeholder: entry.placeholder,
  }));

// Root catalog schema
export const CatalogSchema = z.object({
  templates: z.array(TemplateEntrySchema).min(1, 'catalog must define at least one template'),
  tones: z.array(z.string().min(1)).min(1).optional(),
});

// TypeScript types derived from Zod schemas
export type DocumentTemplate = Readonly<z.output<typeof TemplateEntrySchema>>;

export interface TemplateCatalog {
  templates: DocumentTemplate[];
  tones: string[];
}

/**
 * Custom error for template validation failures
 */
export class TemplateValidationError extends Error {
  constructor(
    message: string,
    public errors?: z.ZodError
  ) {
    super(message);
    this.name = 'TemplateValidationError';
  }

  /**
   * Get formatted error details
   */
  getDetails(): string {
    if (!this.errors) return this.message;

    return this.errors.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('\n');
  }
}
