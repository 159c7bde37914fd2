import type { DocumentTemplate, TemplateCatalog } from './schema.js';
import { DEFAULT_TONE } from './schema.js';

/**
 * Template Registry - read-only catalog of document types
 *
 * Lookups never fail: an unknown or empty name resolves to the default
 * template, which is the last entry of the catalog.
 */
export class TemplateRegistry {
  private readonly templates: readonly DocumentTemplate[];
  private readonly byName: ReadonlyMap<string, DocumentTemplate>;
  private readonly toneOptions: readonly string[];

  constructor(catalog: TemplateCatalog) {
    if (catalog.templates.length === 0) {
      throw new Error('TemplateRegistry requires at least one template');
    }

    this.templates = Object.freeze([...catalog.templates]);
    this.byName = new Map(catalog.templates.map((t) => [t.name, t]));
    this.toneOptions = Object.freeze([...catalog.tones]);
  }

  /**
   * List all templates in catalog order
   */
  list(): readonly DocumentTemplate[] {
    return this.templates;
  }

  /**
   * Get a template by name, falling back to the default template
   *
   * @param name - Template name (may be unknown or empty)
   */
  getByName(name: string | undefined): DocumentTemplate {
    return (name && this.byName.get(name)) || this.defaultTemplate;
  }

  /**
   * Check if template exists
   */
  has(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * Get all template names in catalog order
   */
  listNames(): string[] {
    return this.templates.map((t) => t.name);
  }

  /**
   * Template used when a lookup misses (last catalog entry)
   */
  get defaultTemplate(): DocumentTemplate {
    const last = this.templates[this.templates.length - 1];
    if (!last) {
      throw new Error('TemplateRegistry is empty');
    }
    return last;
  }

  /**
   * Tone options in display order
   */
  get tones(): readonly string[] {
    return this.toneOptions;
  }

  /**
   * Tone preselected in the UI
   */
  get defaultTone(): string {
    return this.toneOptions.includes(DEFAULT_TONE) ? DEFAULT_TONE : (this.toneOptions[0] ?? DEFAULT_TONE);
  }

  /**
   * Get number of registered templates
   */
  get size(): number {
    return this.templates.length;
  }
}
