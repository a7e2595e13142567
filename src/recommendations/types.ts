import { PageEvent, ProductCard } from '../catalog/types';

export interface HomePageView {
  recommendations: ProductCard[];
  attributionToken?: string;
  event: PageEvent;
  error?: string;
}

export interface RecommendationOptions {
  servingConfigId: string;
  pageSize: number;
}
