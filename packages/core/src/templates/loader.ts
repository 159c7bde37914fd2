import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { parseCatalog } from './parser.js';
import { TemplateRegistry } from './registry.js';
import type { Logger } from '../types.js';
import type { TemplateCatalog } from './schema.js';

/**
 * Path of the catalog shipped beside this module
 */
export const BUNDLED_CATALOG_PATH = fileURLToPath(new URL('./catalog.yaml', import.meta.url));

/**
 * Template Loader - Loads the template catalog from filesystem
 */
export class TemplateLoader {
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Load and validate a catalog file
   *
   * @param filePath - Path to catalog YAML file
   */
  async loadCatalog(filePath: string = BUNDLED_CATALOG_PATH): Promise<TemplateCatalog> {
    try {
      const content = await readFile(filePath, 'utf-8');
      const catalog = parseCatalog(content);

      this.logger?.debug(`Loaded ${catalog.templates.length} templates from ${filePath}`);

      return catalog;
    } catch (error) {
      this.logger?.error(`Failed to load template catalog from ${filePath}`, {
        error: error instanceof Error ? error.message : 'Unknown',
      });
      throw error;
    }
  }

  /**
   * Load a catalog and build the registry from it
   */
  async loadRegistry(filePath?: string): Promise<TemplateRegistry> {
    const catalog = await this.loadCatalog(filePath);
    const registry = new TemplateRegistry(catalog);

    this.logger?.info(`Loaded ${registry.size} templates`, { tones: registry.tones.length });

    return registry;
  }
}

let bundledRegistry: Promise<TemplateRegistry> | undefined;

/**
 * Registry built from the bundled catalog, loaded once per process
 */
export function loadBundledRegistry(logger?: Logger): Promise<TemplateRegistry> {
  if (!bundledRegistry) {
    bundledRegistry = new TemplateLoader(logger).loadRegistry().catch((error: unknown) => {
      bundledRegistry = undefined;
      throw error;
    });
  }
  return bundledRegistry;
}
