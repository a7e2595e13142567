import * as fs from 'fs';
import * as path from 'path';
import { FacetConfig, FacetDefinition } from './types';
import { logger } from '../observability/logger';

// Resolve from project root (2 levels up from dist/config/ or src/config/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
const FACET_CONFIG_FILE = path.resolve(PROJECT_ROOT, 'config', 'facets.json');

export class ConfigService {
  private facetConfig: FacetConfig = ConfigService.builtInDefault();

  constructor(private readonly file = FACET_CONFIG_FILE) {
    this.load();
  }

  load(): void {
    if (!fs.existsSync(this.file)) {
      logger.warn({ file: this.file }, 'Facet config not found; using built-in default');
      this.facetConfig = ConfigService.builtInDefault();
      return;
    }

    try {
      const raw = fs.readFileSync(this.file, 'utf-8');
      const parsed = JSON.parse(raw) as Partial<FacetConfig>;
      this.facetConfig = {
        numericKeys: parsed.numericKeys ?? ConfigService.builtInDefault().numericKeys,
        facets: parsed.facets ?? [],
      };
      logger.info({ facets: this.facetConfig.facets.length }, 'Loaded facet config');
    } catch (err) {
      logger.error({ file: this.file, err }, 'Failed to load facet config; using built-in default');
      this.facetConfig = ConfigService.builtInDefault();
    }
  }

  get facets(): FacetDefinition[] {
    return this.facetConfig.facets;
  }

  get numericKeys(): ReadonlySet<string> {
    return new Set(this.facetConfig.numericKeys);
  }

  facet(key: string): FacetDefinition | undefined {
    return this.facetConfig.facets.find((f) => f.key === key);
  }

  static builtInDefault(): FacetConfig {
    return {
      numericKeys: ['price', 'rating'],
      facets: [
        { key: 'brands', label: 'Brand', limit: 10 },
        { key: 'categories', label: 'Category', limit: 10 },
        {
          key: 'price',
          label: 'Price',
          intervals: [{ maximum: 25 }, { minimum: 25, maximum: 100 }, { minimum: 100 }],
        },
      ],
    };
  }
}

/** Singleton */
export const configService = new ConfigService();
