export interface FacetInterval {
  minimum?: number;
  maximum?: number;
}

export interface FacetDefinition {
  key: string;
  label: string;
  /** Maximum number of values the service should return */
  limit?: number;
  /** Present for numeric facets: the buckets shown to the shopper */
  intervals?: FacetInterval[];
}

export interface FacetConfig {
  /** Keys whose query values are "min-max" range tokens */
  numericKeys: string[];
  facets: FacetDefinition[];
}
