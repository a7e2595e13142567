import { logger } from '../observability/logger';
import { ResourcePaths } from '../retail/paths';
import { describeError } from '../retail/errors';
import { RetailService } from '../retail/types';
import { ShopperContext } from './types';

const log = logger.child({ component: 'autocomplete' });

export interface AutocompleteResult {
  query: string;
  suggestions: string[];
  attributionToken?: string;
  error?: string;
}

export class AutocompleteService {
  constructor(
    private readonly retail: RetailService,
    private readonly paths: ResourcePaths,
    private readonly maxSuggestions: number,
  ) {}

  async complete(rawQuery: string, shopper: ShopperContext): Promise<AutocompleteResult> {
    const query = rawQuery.trim();
    if (!query) return { query, suggestions: [] };

    try {
      const response = await this.retail.completeQuery({
        catalog: this.paths.catalog(),
        query,
        visitorId: shopper.visitorId,
        maxSuggestions: this.maxSuggestions,
      });
      return {
        query,
        suggestions: (response.completionResults ?? []).map((r) => r.suggestion).filter(Boolean),
        attributionToken: response.attributionToken,
      };
    } catch (err) {
      log.warn({ query }, 'Autocomplete degraded');
      return { query, suggestions: [], error: describeError(err) };
    }
  }
}
