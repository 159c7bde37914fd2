/**
 * Template System - YAML catalog parsing, validation, registry and loading
 */

export {
  CatalogSchema,
  TemplateValidationError,
  DEFAULT_TONES,
  DEFAULT_TONE,
  type DocumentTemplate,
  type TemplateCatalog,
} from './schema.js';

export { parseCatalog, validateCatalog } from './parser.js';

export { TemplateRegistry } from './registry.js';

export { TemplateLoader, BUNDLED_CATALOG_PATH, loadBundledRegistry } from './loader.js';
