import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigService } from '../../src/config/config-service';

describe('ConfigService', () => {
  it('should load the shipped facet configuration', () => {
    const config = new ConfigService();
    expect(config.facets.map((f) => f.key)).toEqual(['brands', 'categories', 'colorFamilies', 'price', 'rating']);
    expect([...config.numericKeys]).toEqual(['price', 'rating']);
    expect(config.facet('price')?.intervals).toHaveLength(5);
  });

  it('should fall back to the built-in facets when the file is missing', () => {
    const config = new ConfigService(path.join(os.tmpdir(), 'storefront-no-such-file.json'));
    expect(config.facets).toEqual(ConfigService.builtInDefault().facets);
  });

  it('should fall back when the file is not valid JSON', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'storefront-config-'));
    const file = path.join(dir, 'facets.json');
    fs.writeFileSync(file, '{ not json');
    try {
      expect(new ConfigService(file).numericKeys.has('price')).toBe(true);
      expect(new ConfigService(file).facet('brands')?.label).toBe('Brand');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should read custom numeric keys', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'storefront-config-'));
    const file = path.join(dir, 'facets.json');
    fs.writeFileSync(file, JSON.stringify({ numericKeys: ['attributes.weight'], facets: [{ key: 'brands', label: 'Maker' }] }));
    try {
      const config = new ConfigService(file);
      expect([...config.numericKeys]).toEqual(['attributes.weight']);
      expect(config.facet('brands')?.label).toBe('Maker');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
