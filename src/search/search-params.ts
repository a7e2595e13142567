import { QueryParams, toValueList } from './facet-filter';
import { SearchParams } from './types';

export const MAX_PAGE_SIZE = 120;

const TRUTHY = new Set(['true', '1', 'on', 'yes']);

function first(value: string | string[] | undefined): string | undefined {
  return toValueList(value)[0];
}

function positiveInt(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) return undefined;
  const n = parseInt(value, 10);
  return n >= 1 ? n : undefined;
}

/** Read query text, paging and the expansion toggle; bad values fall back to defaults */
export function parseSearchParams(params: QueryParams, defaultPageSize: number): SearchParams {
  const page = positiveInt(first(params.page)) ?? 1;
  const pageSize = Math.min(positiveInt(first(params.page_size)) ?? defaultPageSize, MAX_PAGE_SIZE);
  const expandRaw = first(params.expand);

  return {
    query: (first(params.query) ?? '').trim(),
    page,
    pageSize,
    expand: expandRaw !== undefined && TRUTHY.has(expandRaw.toLowerCase()),
  };
}

export interface HrefChanges {
  set?: Record<string, string>;
  drop?: string[];
  toggle?: { key: string; value: string };
}

/**
 * Rebuild a link from the current query parameters. Toggling adds the value
 * when absent and removes it when present; any facet change resets paging.
 */
export function buildHref(path: string, params: QueryParams, changes: HrefChanges = {}): string {
  const search = new URLSearchParams();
  const drop = new Set(changes.drop ?? []);
  if (changes.toggle) drop.add('page');
  for (const key of Object.keys(changes.set ?? {})) drop.add(key);

  let toggled = false;
  for (const [key, raw] of Object.entries(params)) {
    if (drop.has(key)) continue;
    for (const value of toValueList(raw)) {
      if (changes.toggle && changes.toggle.key === key && changes.toggle.value === value) {
        toggled = true;
        continue;
      }
      search.append(key, value);
    }
  }
  if (changes.toggle && !toggled) {
    search.append(changes.toggle.key, changes.toggle.value);
  }
  for (const [key, value] of Object.entries(changes.set ?? {})) {
    search.set(key, value);
  }

  const qs = search.toString();
  return qs ? `${path}?${qs}` : path;
}
