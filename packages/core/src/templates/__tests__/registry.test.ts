import { describe, it, expect, beforeEach } from 'vitest';
import { TemplateRegistry } from '../registry.js';
import type { DocumentTemplate } from '../schema.js';

describe('TemplateRegistry', () => {
  let registry: TemplateRegistry;

  const createTestTemplate = (name: string, displayName: string): DocumentTemplate => ({
    name,
    displayName,
    description: `${displayName} description`,
    systemPrompt: `You write ${displayName}. Output plain text only.`,
    placeholder: '',
  });

  const templates = [
    createTestTemplate('memo', 'Memo'),
    createTestTemplate('report', 'Report'),
    createTestTemplate('general', 'General Document'),
  ];

  beforeEach(() => {
    registry = new TemplateRegistry({ templates, tones: ['Formal', 'Professional', 'Casual'] });
  });

  describe('constructor', () => {
    it('should reject an empty catalog', () => {
      expect(() => new TemplateRegistry({ templates: [], tones: [] })).toThrow(
        'TemplateRegistry requires at least one template'
      );
    });

    it('should not be affected by later changes to the source catalog', () => {
      const source = [...templates];
      const isolated = new TemplateRegistry({ templates: source, tones: ['Formal'] });

      source.pop();

      expect(isolated.size).toBe(3);
    });
  });

  describe('list', () => {
    it('should list templates in catalog order', () => {
      expect(registry.list().map((t) => t.name)).toEqual(['memo', 'report', 'general']);
    });

    it('should return the same order on every call', () => {
      expect(registry.listNames()).toEqual(registry.listNames());
    });
  });

  describe('getByName', () => {
    it('should return the identical template for every registered name', () => {
      for (const template of registry.list()) {
        expect(registry.getByName(template.name)).toBe(template);
      }
    });

    it('should fall back to the last template for unknown names', () => {
      expect(registry.getByName('nonexistent').name).toBe('general');
    });

    it('should fall back to the last template for empty or missing names', () => {
      expect(registry.getByName('').name).toBe('general');
      expect(registry.getByName(undefined).name).toBe('general');
    });
  });

  describe('has', () => {
    it('should report registered names only', () => {
      expect(registry.has('memo')).toBe(true);
      expect(registry.has('letter')).toBe(false);
    });
  });

  describe('tones', () => {
    it('should expose tones in order', () => {
      expect(registry.tones).toEqual(['Formal', 'Professional', 'Casual']);
    });

    it('should preselect Professional when offered', () => {
      expect(registry.defaultTone).toBe('Professional');
    });

    it('should preselect the first tone otherwise', () => {
      const other = new TemplateRegistry({ templates, tones: ['Casual', 'Formal'] });
      expect(other.defaultTone).toBe('Casual');
    });
  });

  describe('size', () => {
    it('should count templates', () => {
      expect(registry.size).toBe(3);
      expect(registry.defaultTemplate.name).toBe('general');
    });
  });
});
