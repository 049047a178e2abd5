import { ConversionError } from '../errors.js';
import type { QueryStringInput } from './query-key-parser.js';
import type { PaginationOptions } from './query-state.js';

export const LIMIT_PARAMETER = '_limit';
export const OFFSET_PARAMETER = '_offset';
export const ORDER_PARAMETER = '_order';
export const DESCENDING_PARAMETER = '_desc';

const RESERVED_PARAMETERS: ReadonlySet<string> = new Set([
  LIMIT_PARAMETER,
  OFFSET_PARAMETER,
  ORDER_PARAMETER,
  DESCENDING_PARAMETER,
]);

export interface RequestParameters {
  /** Every entry that is not a reserved key, in query order. */
  filters: URLSearchParams;
  pagination: PaginationOptions;
}

function parseInteger(name: string, raw: string): number {
  const trimmed = raw.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new ConversionError(name, raw, 'an integer');
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Separates the reserved `_limit`, `_offset`, `_order` and `_desc` keys from
 * the filter entries of a parsed query string. `_desc` only needs to be
 * present; its value is ignored.
 * @throws ConversionError when `_limit` or `_offset` is not an integer.
 */
export function extractRequestParameters(
  query: QueryStringInput,
): RequestParameters {
  const entries: Array<[string, string]> =
    query instanceof URLSearchParams
      ? Array.from(query.entries())
      : Object.entries(query);

  const filters = new URLSearchParams();
  const pagination: PaginationOptions = { ascending: true };

  for (const [key, value] of entries) {
    if (!RESERVED_PARAMETERS.has(key)) {
      filters.append(key, value);
      continue;
    }
    switch (key) {
      case LIMIT_PARAMETER:
        pagination.limit = parseInteger(key, value);
        break;
      case OFFSET_PARAMETER:
        pagination.offset = parseInteger(key, value);
        break;
      case ORDER_PARAMETER:
        pagination.orderBy = value;
        break;
      case DESCENDING_PARAMETER:
        pagination.ascending = false;
        break;
    }
  }

  return { filters, pagination };
}
