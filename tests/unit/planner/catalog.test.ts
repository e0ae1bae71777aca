import { copyFileStructure, copyPages, profileFor, templateFor } from '../../../src/planner/catalog.js';
import { DOMAINS } from '../../../src/planner/types.js';

describe('template catalog', () => {
  it('should have a template for every domain except general', () => {
    for (const domain of DOMAINS) {
      const profile = profileFor(domain);
      expect(profile.domain).toBe(domain);
      if (domain === 'general') {
        expect(profile.template).toBeNull();
      } else {
        expect(profile.template?.core_features.length).toBeGreaterThan(0);
        expect(profile.template?.pages.length).toBeGreaterThan(0);
      }
    }
  });

  it('should list the marketplace pages in order', () => {
    expect(templateFor('marketplace')?.pages.map((p) => p.name)).toEqual([
      'Home',
      'Product Detail',
      'Cart',
      'Seller Dashboard',
    ]);
  });

  it('should include a product card in the marketplace file structure', () => {
    expect(Object.keys(templateFor('marketplace')?.file_structure ?? {})).toContain(
      'src/components/ProductCard.js',
    );
  });

  it('should be frozen', () => {
    const template = templateFor('dashboard');
    expect(Object.isFrozen(template)).toBe(true);
    expect(Object.isFrozen(template?.pages[0].components)).toBe(true);
  });

  it('should return the same template on every lookup', () => {
    expect(templateFor('social')).toBe(templateFor('social'));
  });

  it('should hand out copies that can be mutated', () => {
    const template = templateFor('social');
    if (!template) throw new Error('social template missing');

    const pages = copyPages(template);
    pages[0].components.push('Extra');
    expect(template.pages[0].components).not.toContain('Extra');

    const files = copyFileStructure(template);
    expect(files).toEqual(template.file_structure);
    expect(files).not.toBe(template.file_structure);
  });

  it('should return no file structure for a template without one', () => {
    expect(copyFileStructure({ core_features: ['a'], pages: [] })).toBeUndefined();
  });
});
