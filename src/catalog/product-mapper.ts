import { Product } from '../retail/types';
import { ProductCard } from './types';

export function toProductCard(product: Product, fallbackId?: string): ProductCard {
  const id = product.id || fallbackId || '';
  return {
    id,
    title: product.title || id,
    uri: product.uri,
    imageUrl: product.images?.[0]?.uri,
    price: product.priceInfo?.price,
    originalPrice: product.priceInfo?.originalPrice,
    currencyCode: product.priceInfo?.currencyCode,
    brands: product.brands ?? [],
    categories: product.categories ?? [],
    description: product.description,
    averageRating: product.rating?.averageRating,
    ratingCount: product.rating?.ratingCount,
    availability: product.availability,
  };
}

/** Product details for a page event; the tracker only needs ids */
export function productDetails(ids: string[]): Array<{ product: { id: string } }> {
  return ids.map((id) => ({ product: { id } }));
}
