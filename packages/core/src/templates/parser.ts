import { parse as parseYaml } from 'yaml';
import { CatalogSchema, DEFAULT_TONES, TemplateValidationError } from './schema.js';
import type { TemplateCatalog } from './schema.js';

/**
 * Parse YAML catalog content and validate against schema
 *
 * @param yamlContent - Raw YAML catalog content
 * @returns Validated catalog with templates frozen in file order
 * @throws TemplateValidationError if validation fails
 *
 * @example
 * ```typescript
 * const catalogYaml = await readFile('catalog.yaml', 'utf-8');
 * const catalog = parseCatalog(catalogYaml);
 * console.log(catalog.templates[0].name); // 'formal_letter'
 * ```
 */
export function parseCatalog(yamlContent: string): TemplateCatalog {
  try {
    const parsed: unknown = parseYaml(yamlContent);

    if (!parsed) {
      throw new TemplateValidationError('Catalog file is empty or contains only comments');
    }

    return validateCatalog(parsed);
  } catch (error) {
    if (error instanceof TemplateValidationError) {
      throw error;
    }

    // Handle YAML parsing errors
    if (error instanceof Error) {
      throw new TemplateValidationError(`Failed to parse YAML catalog: ${error.message}`);
    }

    throw new TemplateValidationError('Unknown error parsing catalog');
  }
}

/**
 * Validate a catalog object (already parsed)
 *
 * @throws TemplateValidationError on schema errors or duplicate template names
 */
export function validateCatalog(catalogObj: unknown): TemplateCatalog {
  const result = CatalogSchema.safeParse(catalogObj);

  if (!result.success) {
    throw new TemplateValidationError('Catalog validation failed', result.error);
  }

  const seen = new Set<string>();
  for (const template of result.data.templates) {
    if (seen.has(template.name)) {
      throw new TemplateValidationError(`Duplicate template name: '${template.name}'`);
    }
    seen.add(template.name);
  }

  return {
    templates: result.data.templates.map((template) => Object.freeze(template)),
    tones: result.data.tones ?? [...DEFAULT_TONES],
  };
}
