/**
 * Facet Filter Builder
 *
 * Turns storefront query parameters into the service's filter expression:
 *
 *   price=10-25&price=50-&brands=Acme
 *     → ((price >= 10.0 AND price < 25.0) OR (price >= 50.0)) AND brands: ANY("Acme")
 *
 * Numeric keys take "min-max" tokens (either side may be empty, upper bound
 * exclusive). Every other key becomes an ANY() clause. Malformed numeric
 * tokens are dropped without error.
 */

/** Query-string values as Fastify parses them (repeated keys become arrays) */
export type QueryParams = Record<string, string | string[] | undefined>;

/** Facet key → raw selected values, in first-appearance order */
export type FacetSelection = Map<string, string[]>;

export interface NumericRange {
  min?: number;
  max?: number;
}

export interface FacetFilterResult {
  filter: string;
  selected: FacetSelection;
}

/** Parameters that drive query text and paging, never facets */
export const RESERVED_PARAMS: ReadonlySet<string> = new Set(['query', 'page', 'page_size', 'expand']);

export const DEFAULT_NUMERIC_KEYS: ReadonlySet<string> = new Set(['price', 'rating']);

const DECIMAL = /^\+?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// Attribute names as the service spells them (brands, attributes.material, ...)
const FACET_KEY = /^[A-Za-z_][A-Za-z0-9_.]*$/;

export function toValueList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/**
 * Collect non-reserved parameters as facet selections, dropping empty and
 * duplicate values and keys that are not attribute names.
 */
export function collectFacetSelection(
  params: QueryParams,
  reserved: ReadonlySet<string> = RESERVED_PARAMS,
): FacetSelection {
  const selected: FacetSelection = new Map();
  for (const [key, raw] of Object.entries(params)) {
    if (reserved.has(key) || !FACET_KEY.test(key)) continue;
    const values: string[] = [];
    for (const value of toValueList(raw)) {
      if (value !== '' && !values.includes(value)) values.push(value);
    }
    if (values.length > 0) selected.set(key, values);
  }
  return selected;
}

/** Parse a "min-max" token; null when the token is not a usable range */
export function parseRange(token: string): NumericRange | null {
  const parts = token.split('-');
  if (parts.length !== 2) return null;

  const [minText, maxText] = parts.map((p) => p.trim());
  const min = parseBound(minText);
  const max = parseBound(maxText);
  if (min === null || max === null) return null;
  if (min === undefined && max === undefined) return null;
  return { min, max };
}

function parseBound(text: string): number | undefined | null {
  if (text === '') return undefined;
  if (!DECIMAL.test(text)) return null;
  const n = parseFloat(text);
  return Number.isFinite(n) ? n : null;
}

export function formatNumber(n: number): string {
  return Number.isInteger(n) ? n.toFixed(1) : String(n);
}

export function rangeClause(key: string, range: NumericRange): string {
  const bounds: string[] = [];
  if (range.min !== undefined) bounds.push(`${key} >= ${formatNumber(range.min)}`);
  if (range.max !== undefined) bounds.push(`${key} < ${formatNumber(range.max)}`);
  return `(${bounds.join(' AND ')})`;
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function textClause(key: string, values: string[]): string {
  return `${key}: ANY(${values.map(quote).join(', ')})`;
}

/** Build the clause for one facet key; null when nothing valid remains */
export function facetClause(key: string, values: string[], numericKeys: ReadonlySet<string>): string | null {
  if (!numericKeys.has(key)) {
    return values.length > 0 ? textClause(key, values) : null;
  }

  const ranges: string[] = [];
  for (const token of values) {
    const range = parseRange(token);
    if (range) ranges.push(rangeClause(key, range));
  }
  if (ranges.length === 0) return null;
  return ranges.length === 1 ? ranges[0] : `(${ranges.join(' OR ')})`;
}

export function buildFacetFilter(
  params: QueryParams,
  numericKeys: ReadonlySet<string> = DEFAULT_NUMERIC_KEYS,
  reserved: ReadonlySet<string> = RESERVED_PARAMS,
): FacetFilterResult {
  const selected = collectFacetSelection(params, reserved);
  const clauses: string[] = [];
  for (const [key, values] of selected) {
    const clause = facetClause(key, values, numericKeys);
    if (clause) clauses.push(clause);
  }
  return { filter: clauses.join(' AND '), selected };
}

/** Render a service interval back into the token used on facet links */
export function intervalToken(interval: NumericRange): string {
  const min = interval.min === undefined ? '' : String(interval.min);
  const max = interval.max === undefined ? '' : String(interval.max);
  return `${min}-${max}`;
}
