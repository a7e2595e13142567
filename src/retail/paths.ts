/** Resource-name helpers for the commerce search service. */

export interface CatalogCoordinates {
  projectId: string;
  location: string;
  catalogId: string;
  branch: string;
}

export class ResourcePaths {
  constructor(private readonly coords: CatalogCoordinates) {}

  catalog(): string {
    const { projectId, location, catalogId } = this.coords;
    return `projects/${projectId}/locations/${location}/catalogs/${catalogId}`;
  }

  servingConfig(servingConfigId: string): string {
    return `${this.catalog()}/servingConfigs/${servingConfigId}`;
  }

  branch(): string {
    return `${this.catalog()}/branches/${this.coords.branch}`;
  }

  product(productId: string): string {
    return `${this.branch()}/products/${encodeURIComponent(productId)}`;
  }
}
