/**
 * Recommendation Engine: home page recommendations.
 *
 * Asks the prediction serving config for products given a home-page-view
 * event. Full product data comes back in result metadata (returnProduct).
 */

import { logger } from '../observability/logger';
import { toProductCard } from '../catalog/product-mapper';
import { ResourcePaths } from '../retail/paths';
import { describeError } from '../retail/errors';
import { PredictRequest, RetailService } from '../retail/types';
import { ShopperContext } from '../search/types';
import { HomePageView, RecommendationOptions } from './types';

const log = logger.child({ component: 'recommendation-engine' });

export class RecommendationEngine {
  constructor(
    private readonly retail: RetailService,
    private readonly paths: ResourcePaths,
    private readonly options: RecommendationOptions,
  ) {}

  buildRequest(shopper: ShopperContext): PredictRequest {
    return {
      placement: this.paths.servingConfig(this.options.servingConfigId),
      userEvent: {
        eventType: 'home-page-view',
        visitorId: shopper.visitorId,
        ...(shopper.userId ? { userInfo: { userId: shopper.userId } } : {}),
      },
      pageSize: this.options.pageSize,
      params: { returnProduct: true },
    };
  }

  async homePage(shopper: ShopperContext): Promise<HomePageView> {
    try {
      const response = await this.retail.predict(this.buildRequest(shopper));
      const recommendations = (response.results ?? []).map((r) =>
        toProductCard(r.metadata?.product ?? { id: r.id }, r.id),
      );
      log.info({ count: recommendations.length }, 'Recommendations served');
      return {
        recommendations,
        attributionToken: response.attributionToken,
        event: { eventType: 'home-page-view', attributionToken: response.attributionToken },
      };
    } catch (err) {
      log.warn({ visitorId: shopper.visitorId }, 'Recommendations degraded');
      return {
        recommendations: [],
        event: { eventType: 'home-page-view' },
        error: describeError(err),
      };
    }
  }
}
